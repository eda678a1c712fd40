import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { DevicePuller } from '../device/adb.js';
import { uploadPath } from './event-report.js';

export interface ImportedUpload {
  id: string;
  filename: string;
  size: number;
}

/**
 * Pull the log off the device and file it under the upload directory, as
 * if it had been uploaded. The puller's temporary copy is always removed.
 */
export async function importFromDevice(
  puller: DevicePuller,
  remotePath: string,
  uploadDir: string,
): Promise<ImportedUpload> {
  const pulled = await puller.pull(remotePath);
  try {
    const id = crypto.randomUUID();
    const dest = uploadPath(uploadDir, id);
    await fs.mkdir(uploadDir, { recursive: true });
    await fs.copyFile(pulled.localPath, dest);
    const { size } = await fs.stat(dest);
    return { id, filename: path.posix.basename(remotePath), size };
  } finally {
    await pulled.cleanup();
  }
}
