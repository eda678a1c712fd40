import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DevicePullError } from '@critical-events/parser';

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args);
  return { stdout, stderr };
};

export interface PulledFile {
  remotePath: string;
  localPath: string;
  /** Remove the temporary directory holding `localPath`. */
  cleanup(): Promise<void>;
}

/**
 * Copies a file off a connected device into a local temporary file.
 */
export interface DevicePuller {
  pull(remotePath: string): Promise<PulledFile>;
}

export interface AdbPullerOptions {
  adbPath: string;
  run?: CommandRunner;
  tmpDir?: string;
  onCommand?: (command: string[]) => void;
}

export class AdbDevicePuller implements DevicePuller {
  private readonly adbPath: string;
  private readonly run: CommandRunner;
  private readonly tmpDir: string;
  private readonly onCommand?: (command: string[]) => void;

  constructor(options: AdbPullerOptions) {
    this.adbPath = options.adbPath;
    this.run = options.run ?? runCommand;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.onCommand = options.onCommand;
  }

  async pull(remotePath: string): Promise<PulledFile> {
    const dir = await fs.mkdtemp(path.join(this.tmpDir, 'critical-events-'));
    const localPath = path.join(dir, path.posix.basename(remotePath) || 'critical_event_log.pb');
    const args = ['pull', remotePath, localPath];
    const removeDir = () => fs.rm(dir, { recursive: true, force: true });

    this.onCommand?.([this.adbPath, ...args]);
    try {
      await this.run(this.adbPath, args);
    } catch (err) {
      await removeDir();
      const stderr = readStderr(err);
      const reason = stderr.trim() || (err instanceof Error ? err.message : String(err));
      throw new DevicePullError(`Error pulling file from device: ${reason}`, stderr, { cause: err });
    }

    return { remotePath, localPath, cleanup: removeDir };
  }
}

function readStderr(err: unknown): string {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr;
  }
  return '';
}
