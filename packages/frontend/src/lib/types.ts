// Slim copy of the parser/backend response shapes used by the UI.

export type EventKind =
  | 'watchdog'
  | 'half_watchdog'
  | 'anr'
  | 'java_crash'
  | 'native_crash'
  | 'system_server_started'
  | 'install_packages'
  | 'excessive_binder_calls';

export const EVENT_KINDS: EventKind[] = [
  'watchdog',
  'half_watchdog',
  'anr',
  'java_crash',
  'native_crash',
  'system_server_started',
  'install_packages',
  'excessive_binder_calls',
];

export interface RenderedField {
  label: string;
  value: string;
}

export interface RenderedBlock {
  index: number;
  kind: EventKind | null;
  timestampMs: string;
  time: string;
  typeLabel: string;
  fields: RenderedField[];
  lines: string[];
}

export interface EventReport {
  id: string;
  totalEvents: number;
  shownEvents: number;
  filter: string[] | null;
  events: RenderedBlock[];
  report: string;
}

export interface UploadResponse {
  id: string;
  filename: string;
  size: number;
}
