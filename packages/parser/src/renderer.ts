import { processClassName } from './process-class.js';
import {
  CriticalEvent,
  EventKind,
  EventLog,
  EventPayload,
  RenderedBlock,
  RenderedField,
  RenderResult,
} from './types.js';

const NOT_AVAILABLE = 'N/A';
const INVALID_TIMESTAMP = 'Invalid timestamp';
const MAX_YEAR = 9999;
const RULE_WIDTH = 50;

const TYPE_LABELS: Record<EventKind, string> = {
  watchdog: 'Watchdog',
  half_watchdog: 'Half Watchdog',
  anr: 'App Not Responding (ANR)',
  java_crash: 'Java Crash',
  native_crash: 'Native Crash',
  system_server_started: 'System Server Started',
  install_packages: 'Install Packages',
  excessive_binder_calls: 'Excessive Binder Calls',
};

// ============================================================
// Timestamps
// ============================================================

const MAX_SAFE_MS = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Local time as "YYYY-MM-DD HH:MM:SS.mmm". Non-positive values and dates
 * past year 9999 give "Invalid timestamp"; values too large to convert to a
 * date exactly give "Invalid timestamp: <raw>".
 */
export function formatTimestamp(timestampMs: bigint): string {
  if (timestampMs <= 0n) return INVALID_TIMESTAMP;
  if (timestampMs > MAX_SAFE_MS) return `${INVALID_TIMESTAMP}: ${timestampMs}`;

  const date = new Date(Number(timestampMs));
  if (Number.isNaN(date.getTime()) || date.getFullYear() > MAX_YEAR) return INVALID_TIMESTAMP;

  const day = [
    pad(date.getFullYear(), 4),
    pad(date.getMonth() + 1, 2),
    pad(date.getDate(), 2),
  ].join('-');
  const time = [
    pad(date.getHours(), 2),
    pad(date.getMinutes(), 2),
    pad(date.getSeconds(), 2),
  ].join(':');
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

// ============================================================
// Single event
// ============================================================

export function typeLabel(payload: EventPayload): string {
  if (payload.kind === 'unknown') return `Unknown (${payload.tag ?? 'none'})`;
  return TYPE_LABELS[payload.kind];
}

export function describeFields(payload: EventPayload): RenderedField[] {
  switch (payload.kind) {
    case 'watchdog':
      return [text('Subject', payload.subject), text('UUID', payload.uuid)];
    case 'half_watchdog':
      return [text('Subject', payload.subject)];
    case 'anr':
      return [
        text('Subject', payload.subject),
        text('Process', payload.process),
        num('PID', payload.pid),
        num('UID', payload.uid),
        { label: 'Process Class', value: processClassName(payload.processClass) },
      ];
    case 'java_crash':
      return [
        text('Exception', payload.exceptionClass),
        text('Process', payload.process),
        num('PID', payload.pid),
        num('UID', payload.uid),
        { label: 'Process Class', value: processClassName(payload.processClass) },
      ];
    case 'native_crash':
      return [
        text('Process', payload.process),
        num('PID', payload.pid),
        num('UID', payload.uid),
        { label: 'Process Class', value: processClassName(payload.processClass) },
      ];
    case 'excessive_binder_calls':
      return [num('UID', payload.uid)];
    case 'system_server_started':
    case 'install_packages':
    case 'unknown':
      return [];
  }
}

function text(label: string, value: string): RenderedField {
  return { label, value: value === '' ? NOT_AVAILABLE : value };
}

function num(label: string, value: number): RenderedField {
  return { label, value: String(value) };
}

export function renderEvent(event: CriticalEvent, index: number): RenderedBlock {
  const { payload } = event;
  const time = formatTimestamp(event.timestampMs);
  const label = typeLabel(payload);
  const fields = describeFields(payload);

  return {
    index,
    kind: payload.kind === 'unknown' ? null : payload.kind,
    timestampMs: event.timestampMs.toString(),
    time,
    typeLabel: label,
    fields,
    lines: [
      `Event #${index}:`,
      `  Time: ${time} (${event.timestampMs} ms)`,
      `  Type: ${label}`,
      ...fields.map((f) => `    ${f.label}: ${f.value}`),
    ],
  };
}

// ============================================================
// Whole log
// ============================================================

/**
 * Split a comma-separated kind selector. Names are not checked against the
 * known kinds; an unrecognized one matches nothing.
 */
export function parseEventFilter(selector: string): string[] {
  return selector
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Render every event, or only those whose kind is in `filter`. An empty or
 * absent filter shows everything. Events with an unknown payload never
 * match a filter.
 */
export function renderEventLog(
  log: EventLog,
  filter?: ReadonlySet<string> | readonly string[],
): RenderResult {
  const requested = filter ? [...new Set(filter)] : [];
  const wanted = requested.length > 0 ? new Set(requested) : null;
  const blocks: RenderedBlock[] = [];

  log.forEach((event, i) => {
    const { kind } = event.payload;
    if (wanted && (kind === 'unknown' || !wanted.has(kind))) return;
    blocks.push(renderEvent(event, i + 1));
  });

  return {
    blocks,
    totalEvents: log.length,
    shownEvents: blocks.length,
    filter: wanted ? requested : null,
  };
}

/**
 * Full text report: banner, event count, one block per shown event and,
 * when nothing was shown, the reason.
 */
export function formatReport(result: RenderResult): string {
  const lines = [
    '='.repeat(RULE_WIDTH),
    'CRITICAL EVENT STORAGE',
    '='.repeat(RULE_WIDTH),
    `Events Count: ${result.totalEvents}`,
    '-'.repeat(RULE_WIDTH),
  ];

  if (result.totalEvents === 0) {
    lines.push('No events found in storage.');
    return lines.join('\n');
  }

  for (const block of result.blocks) {
    lines.push(...block.lines, '');
  }
  if (result.filter && result.shownEvents === 0) {
    lines.push(`No events of type(s) ${result.filter.join(', ')} found.`);
  }
  return lines.join('\n');
}
