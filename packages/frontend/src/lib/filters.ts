import { EventKind } from './types';

export const KIND_LABELS: Record<EventKind, string> = {
  watchdog: 'Watchdog',
  half_watchdog: 'Half Watchdog',
  anr: 'ANR',
  java_crash: 'Java Crash',
  native_crash: 'Native Crash',
  system_server_started: 'System Server Started',
  install_packages: 'Install Packages',
  excessive_binder_calls: 'Binder Calls',
};

export function toggleKind(selected: ReadonlySet<EventKind>, kind: EventKind): Set<EventKind> {
  const next = new Set(selected);
  if (next.has(kind)) next.delete(kind);
  else next.add(kind);
  return next;
}

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  return `${(size / 1024 / 1024).toFixed(1)} MB`;
}
