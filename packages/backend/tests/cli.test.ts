import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  CriticalEvent,
  DevicePullError,
  encodeEventLog,
  formatReport,
  renderEventLog,
} from '@critical-events/parser';
import { CliDeps, parseCliArgs, runCli } from '../src/cli.js';
import { DevicePuller, PulledFile } from '../src/device/adb.js';

const REMOTE = '/data/misc/critical-events/critical_event_log.pb';

const LOG: CriticalEvent[] = [
  {
    timestampMs: 1700000000000n,
    payload: { kind: 'anr', subject: '', process: 'com.example.app', pid: 1234, uid: 10123, processClass: 1 },
  },
  {
    timestampMs: 1700000060000n,
    payload: {
      kind: 'java_crash',
      exceptionClass: 'java.lang.NullPointerException',
      process: 'com.example.app',
      pid: 4321,
      uid: 10123,
      processClass: 1,
    },
  },
];

interface Captured {
  out: string[];
  err: string[];
}

function makeDeps(puller: DevicePuller = unusedPuller()): CliDeps & { captured: Captured } {
  const captured: Captured = { out: [], err: [] };
  return {
    captured,
    io: { out: (line) => captured.out.push(line), err: (line) => captured.err.push(line) },
    puller,
    remoteLogPath: REMOTE,
  };
}

function unusedPuller(): DevicePuller {
  return {
    pull: vi.fn(async () => {
      throw new Error('pull should not be called');
    }),
  };
}

describe('parseCliArgs', () => {
  it('should accept a file and an event type list', () => {
    expect(parseCliArgs(['events.pb', '--event-types', 'anr,java_crash'])).toEqual({
      ok: true,
      options: { file: 'events.pb', auto: false, eventTypes: ['anr', 'java_crash'], help: false },
    });
  });

  it('should accept the --event-types=value form', () => {
    const parsed = parseCliArgs(['--auto', '--event-types=watchdog']);
    expect(parsed).toEqual({
      ok: true,
      options: { file: null, auto: true, eventTypes: ['watchdog'], help: false },
    });
  });

  it('should treat an all-empty type list as no filter', () => {
    const parsed = parseCliArgs(['events.pb', '--event-types', ',']);
    expect(parsed.ok && parsed.options.eventTypes).toBeNull();
  });

  it('should require a value for --event-types', () => {
    expect(parseCliArgs(['events.pb', '--event-types'])).toEqual({
      ok: false,
      error: '--event-types requires a comma-separated list of event types',
    });
  });

  it('should reject an empty --event-types value', () => {
    const error = '--event-types requires a comma-separated list of event types';
    expect(parseCliArgs(['events.pb', '--event-types', ''])).toEqual({ ok: false, error });
    expect(parseCliArgs(['events.pb', '--event-types='])).toEqual({ ok: false, error });
  });

  it('should reject unknown options', () => {
    expect(parseCliArgs(['--verbose'])).toEqual({ ok: false, error: 'Unrecognized option --verbose' });
  });

  it('should reject a second positional argument', () => {
    expect(parseCliArgs(['a.pb', 'b.pb'])).toEqual({ ok: false, error: 'Unexpected argument b.pb' });
  });

  it('should reject a file together with --auto', () => {
    expect(parseCliArgs(['--auto', 'a.pb'])).toEqual({ ok: false, error: 'Unexpected argument a.pb' });
    expect(parseCliArgs(['a.pb', '--auto'])).toEqual({ ok: false, error: 'Unexpected argument a.pb' });
  });
});

describe('runCli', () => {
  let dir: string;
  let logFile: string;
  let emptyFile: string;
  let garbageFile: string;
  let logBytes: Uint8Array;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'critical-events-cli-'));
    logBytes = encodeEventLog(LOG);
    logFile = path.join(dir, 'events.pb');
    emptyFile = path.join(dir, 'empty.pb');
    garbageFile = path.join(dir, 'garbage.pb');
    await fs.writeFile(logFile, logBytes);
    await fs.writeFile(emptyFile, Buffer.alloc(0));
    await fs.writeFile(garbageFile, Buffer.from([0x0a, 0x05, 0x08]));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function fakePuller(source: string, cleanup = vi.fn(async () => {})): DevicePuller {
    return {
      pull: vi.fn(async (remotePath: string): Promise<PulledFile> => ({
        remotePath,
        localPath: source,
        cleanup,
      })),
    };
  }

  it('should print usage and fail without arguments', async () => {
    const deps = makeDeps();
    expect(await runCli([], deps)).toBe(1);
    expect(deps.captured.out[0]).toBe('Usage:');
    expect(deps.captured.out[1]).toBe('  critical-events <protobuf_file> [--event-types TYPE1,TYPE2,...]');
  });

  it('should print usage and succeed with --help', async () => {
    const deps = makeDeps();
    expect(await runCli(['--help'], deps)).toBe(0);
    expect(deps.captured.out[0]).toBe('Usage:');
  });

  it('should report argument errors on one line', async () => {
    const deps = makeDeps();
    expect(await runCli(['--nope'], deps)).toBe(1);
    expect(deps.captured.err).toEqual(['Error: Unrecognized option --nope']);
    expect(deps.captured.out).toEqual([]);
  });

  it('should fail when only a filter is given', async () => {
    const deps = makeDeps();
    expect(await runCli(['--event-types', 'anr'], deps)).toBe(1);
    expect(deps.captured.err).toEqual(['Error: No input file specified']);
  });

  it('should print the byte count and the report for a file', async () => {
    const deps = makeDeps();
    expect(await runCli([logFile], deps)).toBe(0);
    expect(deps.captured.out).toEqual([
      `Reading ${logBytes.length} bytes from ${logFile}`,
      formatReport(renderEventLog(LOG)),
    ]);
    expect(deps.captured.err).toEqual([]);
  });

  it('should only print events of the requested kinds', async () => {
    const deps = makeDeps();
    expect(await runCli([logFile, '--event-types', 'java_crash'], deps)).toBe(0);

    const report = deps.captured.out[1].split('\n');
    expect(report).toContain('Events Count: 2');
    expect(report.filter((line) => line.startsWith('Event #'))).toEqual(['Event #2:']);
    expect(report).toContain('  Type: Java Crash');
  });

  it('should print the empty-log message', async () => {
    const deps = makeDeps();
    expect(await runCli([emptyFile], deps)).toBe(0);
    expect(deps.captured.out[0]).toBe(`Reading 0 bytes from ${emptyFile}`);
    expect(deps.captured.out[1].split('\n').slice(-2)).toEqual([
      '--------------------------------------------------',
      'No events found in storage.',
    ]);
  });

  it('should fail on a missing file before reading anything', async () => {
    const missing = path.join(dir, 'missing.pb');
    const deps = makeDeps();

    expect(await runCli([missing], deps)).toBe(1);
    expect(deps.captured.out).toEqual([]);
    expect(deps.captured.err).toEqual([`Error: File '${missing}' not found.`]);
  });

  it('should fail on a malformed file after the byte count', async () => {
    const deps = makeDeps();

    expect(await runCli([garbageFile], deps)).toBe(1);
    expect(deps.captured.out).toEqual([`Reading 3 bytes from ${garbageFile}`]);
    expect(deps.captured.err).toHaveLength(1);
    expect(deps.captured.err[0].startsWith('Error: Failed to parse critical event log:')).toBe(true);
  });

  it('should pull from the device, report and clean up with --auto', async () => {
    const cleanup = vi.fn(async () => {});
    const puller = fakePuller(logFile, cleanup);
    const deps = makeDeps(puller);

    expect(await runCli(['--auto'], deps)).toBe(0);
    expect(puller.pull).toHaveBeenCalledWith(REMOTE);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(deps.captured.out).toEqual([
      'Pulling critical events log from Android device...',
      `Successfully pulled ${REMOTE} from device to ${logFile}`,
      `Reading ${logBytes.length} bytes from ${logFile}`,
      formatReport(renderEventLog(LOG)),
      `Cleaned up temporary file: ${logFile}`,
    ]);
  });

  it('should clean up the pulled file when decoding fails', async () => {
    const cleanup = vi.fn(async () => {});
    const deps = makeDeps(fakePuller(garbageFile, cleanup));

    expect(await runCli(['--auto'], deps)).toBe(1);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(deps.captured.out.at(-1)).toBe(`Cleaned up temporary file: ${garbageFile}`);
  });

  it('should warn but succeed when cleanup fails', async () => {
    const cleanup = vi.fn(async () => {
      throw new Error('EBUSY');
    });
    const deps = makeDeps(fakePuller(logFile, cleanup));

    expect(await runCli(['--auto'], deps)).toBe(0);
    expect(deps.captured.err).toEqual([
      `Warning: Failed to clean up temporary file ${logFile}: EBUSY`,
    ]);
  });

  it('should fail when the device pull fails', async () => {
    const puller: DevicePuller = {
      pull: vi.fn(async () => {
        throw new DevicePullError('Error pulling file from device: adb: no devices/emulators found');
      }),
    };
    const deps = makeDeps(puller);

    expect(await runCli(['--auto'], deps)).toBe(1);
    expect(deps.captured.err).toEqual([
      'Error: Error pulling file from device: adb: no devices/emulators found',
    ]);
  });
});
