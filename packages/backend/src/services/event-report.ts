import path from 'node:path';
import {
  CriticalEventsError,
  EventLogIOError,
  formatReport,
  LoadedEventLog,
  readEventLogFile,
  RenderedBlock,
  renderEventLog,
} from '@critical-events/parser';
import type { EventLogStore } from '../store.js';

export interface EventReport {
  id: string;
  totalEvents: number;
  shownEvents: number;
  filter: string[] | null;
  events: RenderedBlock[];
  report: string;
}

export interface EventReportOptions {
  uploadDir: string;
  store: EventLogStore;
}

const UPLOAD_ID_RE = /^[A-Za-z0-9-]+$/;

export function isValidUploadId(id: string): boolean {
  return UPLOAD_ID_RE.test(id);
}

export function uploadPath(uploadDir: string, id: string): string {
  return path.join(uploadDir, `${id}.pb`);
}

/**
 * Decode an uploaded log (or reuse the cached decode) and render it with
 * the requested kind filter.
 */
export async function loadEventReport(
  id: string,
  types: string[],
  options: EventReportOptions,
): Promise<EventReport> {
  if (!isValidUploadId(id)) {
    throw new EventLogIOError(id, `Upload ${id} not found`);
  }

  let stored = options.store.get(id);
  if (!stored) {
    const filePath = uploadPath(options.uploadDir, id);
    let loaded: LoadedEventLog;
    try {
      loaded = await readEventLogFile(filePath);
    } catch (err) {
      if (err instanceof EventLogIOError) {
        throw new EventLogIOError(filePath, `Upload ${id} not found`, { cause: err });
      }
      throw err;
    }
    stored = { log: loaded.log, byteLength: loaded.byteLength };
    options.store.set(id, stored);
  }

  const result = renderEventLog(stored.log, types);
  return {
    id,
    totalEvents: result.totalEvents,
    shownEvents: result.shownEvents,
    filter: result.filter,
    events: result.blocks,
    report: formatReport(result),
  };
}

export function httpStatusFor(err: CriticalEventsError): number {
  switch (err.code) {
    case 'IO_ERROR':
      return 404;
    case 'MALFORMED_INPUT':
      return 422;
    case 'DEVICE_PULL_FAILED':
      return 502;
  }
}
