import { useState, useRef, type ChangeEvent, type DragEvent } from 'react';
import { formatBytes } from '../lib/filters';

interface Props {
  onOpenFile: (file: File) => void;
  onOpenDevice: () => void;
  error: string | null;
}

function isLogFile(file: File | undefined): file is File {
  return file !== undefined && file.name.endsWith('.pb');
}

export default function UploadZone({ onOpenFile, onOpenDevice, error }: Props) {
  const [file, setFile] = useState<File | null>(null);
  const [dragging, setDragging] = useState(false);
  const inputRef = useRef<HTMLInputElement>(null);

  const handleDrop = (e: DragEvent) => {
    e.preventDefault();
    setDragging(false);
    const dropped = e.dataTransfer.files[0];
    if (isLogFile(dropped)) setFile(dropped);
  };

  const handleSelect = (e: ChangeEvent<HTMLInputElement>) => {
    const selected = e.target.files?.[0];
    if (isLogFile(selected)) setFile(selected);
  };

  return (
    <div className="max-w-2xl mx-auto space-y-6">
      <div className="text-center space-y-2">
        <h1 className="text-3xl font-bold">Critical Events</h1>
        <p className="text-gray-400">Viewer for the device critical event log</p>
      </div>

      {/* Drop Zone */}
      <div
        className={`border-2 border-dashed rounded-xl p-12 text-center cursor-pointer transition-colors ${
          dragging ? 'border-indigo-500 bg-indigo-500/5' : 'border-border hover:border-gray-500'
        }`}
        onDragOver={(e) => { e.preventDefault(); setDragging(true); }}
        onDragLeave={() => setDragging(false)}
        onDrop={handleDrop}
        onClick={() => inputRef.current?.click()}
      >
        <input
          ref={inputRef}
          type="file"
          accept=".pb"
          className="hidden"
          onChange={handleSelect}
        />
        {file ? (
          <div className="space-y-1">
            <p className="text-lg font-medium text-white">{file.name}</p>
            <p className="text-sm text-gray-400">{formatBytes(file.size)}</p>
          </div>
        ) : (
          <div className="space-y-2">
            <p className="text-gray-300">Drop critical_event_log.pb here or click to browse</p>
            <p className="text-xs text-gray-500">Pulled from /data/misc/critical-events/</p>
          </div>
        )}
      </div>

      {/* Error */}
      {error && (
        <div className="bg-red-500/10 border border-red-500/30 rounded-lg p-3 text-red-400 text-sm">
          {error}
        </div>
      )}

      {/* Actions */}
      <div className="flex gap-3">
        <button
          onClick={() => file && onOpenFile(file)}
          disabled={!file}
          className="flex-1 py-3 rounded-lg font-medium transition-colors disabled:opacity-40 disabled:cursor-not-allowed bg-indigo-600 hover:bg-indigo-700 text-white"
        >
          Open {file ? file.name : 'log file'}
        </button>
        <button
          onClick={onOpenDevice}
          className="px-4 py-3 rounded-lg border border-border hover:bg-surface-hover transition-colors"
        >
          Pull from device
        </button>
      </div>
    </div>
  );
}
