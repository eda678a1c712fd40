import { useEventLog } from './hooks/useEventLog';
import UploadZone from './components/UploadZone';
import EventList from './components/EventList';
import { formatBytes } from './lib/filters';

export default function App() {
  const { phase, source, kinds, report, error, openFile, openDevice, toggle, reset } = useEventLog();

  return (
    <div className="min-h-screen p-6 md:p-10">
      {/* Header (when not in upload phase) */}
      {phase !== 'upload' && (
        <div className="flex items-center justify-between mb-6 max-w-5xl mx-auto">
          <h1 className="text-xl font-bold">
            Critical Events
            {source && (
              <span className="ml-3 text-sm font-normal text-gray-500">
                {source.filename} · {formatBytes(source.size)}
              </span>
            )}
          </h1>
          <button
            onClick={reset}
            className="px-3 py-1.5 text-sm border border-border rounded-lg hover:bg-surface-hover transition-colors"
          >
            Open Another
          </button>
        </div>
      )}

      {phase === 'upload' && (
        <div className="pt-20">
          <UploadZone onOpenFile={openFile} onOpenDevice={openDevice} error={error} />
        </div>
      )}

      {phase === 'loading' && (
        <p className="pt-20 text-center text-gray-400">Decoding log...</p>
      )}

      {phase === 'result' && report && (
        <div className="max-w-5xl mx-auto">
          <EventList report={report} selected={kinds} onToggle={toggle} />
        </div>
      )}
    </div>
  );
}
