// ============================================================
// Event kinds
// ============================================================

export type EventKind =
  | 'watchdog'
  | 'half_watchdog'
  | 'anr'
  | 'java_crash'
  | 'native_crash'
  | 'system_server_started'
  | 'install_packages'
  | 'excessive_binder_calls';

export const EVENT_KINDS: readonly EventKind[] = [
  'watchdog',
  'half_watchdog',
  'anr',
  'java_crash',
  'native_crash',
  'system_server_started',
  'install_packages',
  'excessive_binder_calls',
];

export function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

// ============================================================
// Payloads
// ============================================================

export interface WatchdogPayload {
  kind: 'watchdog';
  subject: string;
  uuid: string;
}

export interface HalfWatchdogPayload {
  kind: 'half_watchdog';
  subject: string;
}

export interface AnrPayload {
  kind: 'anr';
  subject: string;
  process: string;
  pid: number;
  uid: number;
  processClass: number;   // CriticalEventProto.ProcessClass, may be out of range
}

export interface JavaCrashPayload {
  kind: 'java_crash';
  exceptionClass: string;
  process: string;
  pid: number;
  uid: number;
  processClass: number;
}

export interface NativeCrashPayload {
  kind: 'native_crash';
  process: string;
  pid: number;
  uid: number;
  processClass: number;
}

export interface SystemServerStartedPayload {
  kind: 'system_server_started';
}

export interface InstallPackagesPayload {
  kind: 'install_packages';
}

export interface ExcessiveBinderCallsPayload {
  kind: 'excessive_binder_calls';
  uid: number;
}

/**
 * A payload whose oneof tag this build does not know, or an event with no
 * payload at all (`tag` is null). `raw` holds the whole encoded event so it
 * can be written back unchanged.
 */
export interface UnknownPayload {
  kind: 'unknown';
  tag: number | null;
  raw: Uint8Array;
}

export type KnownPayload =
  | WatchdogPayload
  | HalfWatchdogPayload
  | AnrPayload
  | JavaCrashPayload
  | NativeCrashPayload
  | SystemServerStartedPayload
  | InstallPackagesPayload
  | ExcessiveBinderCallsPayload;

export type EventPayload = KnownPayload | UnknownPayload;

// ============================================================
// Event log
// ============================================================

export interface CriticalEvent {
  timestampMs: bigint;  // int64 ms since epoch, exact; <= 0 is invalid but kept
  payload: EventPayload;
}

export type EventLog = readonly CriticalEvent[];

export interface LoadedEventLog {
  path: string;
  byteLength: number;
  log: EventLog;
}

// ============================================================
// Rendering
// ============================================================

export interface RenderedField {
  label: string;   // "Subject", "PID", ...
  value: string;
}

export interface RenderedBlock {
  index: number;          // 1-based position in the log
  kind: EventKind | null; // null for unknown payloads
  timestampMs: string;     // exact decimal value of the int64
  time: string;           // "YYYY-MM-DD HH:MM:SS.mmm" or an invalid marker
  typeLabel: string;
  fields: RenderedField[];
  lines: string[];
}

export interface RenderResult {
  blocks: RenderedBlock[];
  totalEvents: number;
  shownEvents: number;
  filter: string[] | null;  // requested kinds, in the order given
}
