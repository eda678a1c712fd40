import { Router, Request, Response, NextFunction } from 'express';
import { CriticalEventsError } from '@critical-events/parser';
import { getConfig } from '../config.js';
import { AdbDevicePuller } from '../device/adb.js';
import { importFromDevice } from '../services/device-import.js';
import { httpStatusFor } from '../services/event-report.js';

const router = Router();

/**
 * POST /api/device/pull
 * Pull the critical event log from the attached device with adb and store
 * it like an upload. Returns { id, filename, size }.
 */
router.post('/pull', async (_req: Request, res: Response, next: NextFunction) => {
  const config = getConfig();
  const puller = new AdbDevicePuller({
    adbPath: config.device.adbPath,
    onCommand: (command) => console.log(`[critical-events] Executing: ${command.join(' ')}`),
  });

  try {
    const imported = await importFromDevice(puller, config.device.remoteLogPath, config.uploadDir);
    console.log(`[critical-events] Pulled ${config.device.remoteLogPath} as upload ${imported.id}`);
    res.json(imported);
  } catch (err) {
    if (err instanceof CriticalEventsError) {
      console.error(`[critical-events] ${err.message}`);
      res.status(httpStatusFor(err)).json({ error: err.message, code: err.code });
      return;
    }
    next(err);
  }
});

export default router;
