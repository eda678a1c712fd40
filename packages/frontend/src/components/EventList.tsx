import { KIND_LABELS } from '../lib/filters';
import { EVENT_KINDS, type EventKind, type EventReport } from '../lib/types';

interface Props {
  report: EventReport;
  selected: ReadonlySet<EventKind>;
  onToggle: (kind: EventKind) => void;
}

const KIND_COLOR: Record<EventKind, string> = {
  watchdog: 'text-red-400',
  half_watchdog: 'text-yellow-400',
  anr: 'text-red-400',
  java_crash: 'text-red-400',
  native_crash: 'text-red-400',
  system_server_started: 'text-green-400',
  install_packages: 'text-green-400',
  excessive_binder_calls: 'text-yellow-400',
};

const ACTIVE_BTN = 'bg-indigo-500/20 border-indigo-500 text-white';
const INACTIVE_BTN = 'bg-surface-card border-border text-gray-500 hover:border-gray-500';

export default function EventList({ report, selected, onToggle }: Props) {
  const filtered = report.filter !== null;

  return (
    <div className="card space-y-3">
      <h2 className="text-lg font-semibold">
        Events{' '}
        <span className="text-gray-500 text-sm font-normal">
          ({report.shownEvents} shown / {report.totalEvents} total)
        </span>
      </h2>

      {/* Filter Bar */}
      <div className="flex flex-wrap items-center gap-2 text-xs">
        {EVENT_KINDS.map((kind) => (
          <button
            key={kind}
            onClick={() => onToggle(kind)}
            className={`px-2 py-1 rounded border transition-colors ${
              selected.has(kind) ? ACTIVE_BTN : INACTIVE_BTN
            }`}
          >
            {KIND_LABELS[kind]}
          </button>
        ))}
      </div>

      {/* Event List */}
      <div className="space-y-2">
        {report.totalEvents === 0 && (
          <p className="text-sm text-gray-500 py-4 text-center">No events found in storage.</p>
        )}
        {report.totalEvents > 0 && filtered && report.shownEvents === 0 && (
          <p className="text-sm text-gray-500 py-4 text-center">
            No events of type(s) {report.filter?.join(', ')} found.
          </p>
        )}
        {report.events.map((event) => (
          <div key={event.index} className="border-t border-border pt-2 text-sm">
            <div className="flex items-baseline gap-3">
              <span className="text-xs text-gray-500 font-mono">#{event.index}</span>
              <span className="text-xs text-gray-400 font-mono whitespace-nowrap">{event.time}</span>
              <span className={`font-medium ${event.kind ? KIND_COLOR[event.kind] : 'text-gray-400'}`}>
                {event.typeLabel}
              </span>
            </div>
            {event.fields.length > 0 && (
              <dl className="grid grid-cols-[max-content_1fr] gap-x-4 gap-y-0.5 mt-1 ml-6">
                {event.fields.map((field) => (
                  <div key={field.label} className="contents">
                    <dt className="text-gray-500">{field.label}</dt>
                    <dd className="font-mono text-gray-200 break-all">{field.value}</dd>
                  </div>
                ))}
              </dl>
            )}
          </div>
        ))}
      </div>
    </div>
  );
}
