import { getConfig } from './config.js';
import { runCli } from './cli.js';
import { AdbDevicePuller } from './device/adb.js';

const config = getConfig();
const puller = new AdbDevicePuller({
  adbPath: config.device.adbPath,
  onCommand: (command) => console.log(`Executing: ${command.join(' ')}`),
});

runCli(process.argv.slice(2), {
  io: { out: (line) => console.log(line), err: (line) => console.error(line) },
  puller,
  remoteLogPath: config.device.remoteLogPath,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
