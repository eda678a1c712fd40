import { createApp } from './app.js';
import { getConfig } from './config.js';

const config = getConfig();
createApp().listen(config.port, () => {
  console.log(`[critical-events] Backend running on http://localhost:${config.port}`);
  console.log(`[critical-events] Upload dir: ${config.uploadDir}`);
  console.log(`[critical-events] Device log: ${config.device.remoteLogPath} (via ${config.device.adbPath})`);
});
