import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  CriticalEvent,
  DevicePullError,
  encodeEventLog,
  EventLogIOError,
  MalformedInputError,
} from '@critical-events/parser';
import {
  httpStatusFor,
  isValidUploadId,
  loadEventReport,
  uploadPath,
} from '../src/services/event-report.js';
import { EventLogStore } from '../src/store.js';

const LOG: CriticalEvent[] = [
  { timestampMs: 1700000000000n, payload: { kind: 'watchdog', subject: 'system_server', uuid: 'abc-123' } },
  { timestampMs: 1700000001000n, payload: { kind: 'excessive_binder_calls', uid: 10050 } },
];

describe('loadEventReport', () => {
  let uploadDir: string;

  beforeAll(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'critical-events-uploads-'));
    await fs.writeFile(uploadPath(uploadDir, 'log-1'), encodeEventLog(LOG));
    await fs.writeFile(uploadPath(uploadDir, 'broken'), Buffer.from([0x0a, 0x09]));
  });

  afterAll(async () => {
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('should decode and render an upload', async () => {
    const report = await loadEventReport('log-1', [], { uploadDir, store: new EventLogStore() });

    expect(report.id).toBe('log-1');
    expect(report.totalEvents).toBe(2);
    expect(report.shownEvents).toBe(2);
    expect(report.filter).toBeNull();
    expect(report.events.map((e) => e.typeLabel)).toEqual(['Watchdog', 'Excessive Binder Calls']);
    expect(report.report.split('\n')[3]).toBe('Events Count: 2');
  });

  it('should apply the kind filter', async () => {
    const report = await loadEventReport('log-1', ['excessive_binder_calls'], {
      uploadDir,
      store: new EventLogStore(),
    });

    expect(report.shownEvents).toBe(1);
    expect(report.events[0].index).toBe(2);
    expect(report.events[0].fields).toEqual([{ label: 'UID', value: '10050' }]);
    expect(report.filter).toEqual(['excessive_binder_calls']);
  });

  it('should reuse the cached decode', async () => {
    const store = new EventLogStore();
    const setSpy = vi.spyOn(store, 'set');

    await loadEventReport('log-1', [], { uploadDir, store });
    await loadEventReport('log-1', ['watchdog'], { uploadDir, store });

    expect(setSpy).toHaveBeenCalledTimes(1);
    expect(store.get('log-1')?.byteLength).toBe(encodeEventLog(LOG).length);
  });

  it('should throw EventLogIOError for an unknown upload', async () => {
    await expect(
      loadEventReport('missing', [], { uploadDir, store: new EventLogStore() })
    ).rejects.toThrow(new EventLogIOError('missing', 'Upload missing not found'));
  });

  it('should refuse ids that are not plain names', async () => {
    await expect(
      loadEventReport('../etc/passwd', [], { uploadDir, store: new EventLogStore() })
    ).rejects.toThrow(EventLogIOError);
  });

  it('should throw MalformedInputError for a corrupt upload', async () => {
    await expect(
      loadEventReport('broken', [], { uploadDir, store: new EventLogStore() })
    ).rejects.toThrow(MalformedInputError);
  });
});

describe('isValidUploadId', () => {
  it('should accept UUIDs and reject paths', () => {
    expect(isValidUploadId('3f2b9c1e-7a4d-4e8b-9c1f-2d3e4f5a6b7c')).toBe(true);
    expect(isValidUploadId('a/b')).toBe(false);
    expect(isValidUploadId('')).toBe(false);
  });
});

describe('httpStatusFor', () => {
  it('should map error codes to HTTP statuses', () => {
    expect(httpStatusFor(new EventLogIOError('x', 'gone'))).toBe(404);
    expect(httpStatusFor(new MalformedInputError('bad'))).toBe(422);
    expect(httpStatusFor(new DevicePullError('no device'))).toBe(502);
  });
});
