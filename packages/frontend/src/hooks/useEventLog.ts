import { useState, useCallback, useEffect } from 'react';
import { fetchEvents, pullFromDevice, uploadFile } from '../lib/api';
import { toggleKind } from '../lib/filters';
import type { EventKind, EventReport, UploadResponse } from '../lib/types';

export type AppPhase = 'upload' | 'loading' | 'result';

export function useEventLog() {
  const [phase, setPhase] = useState<AppPhase>('upload');
  const [source, setSource] = useState<UploadResponse | null>(null);
  const [kinds, setKinds] = useState<Set<EventKind>>(new Set());
  const [report, setReport] = useState<EventReport | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!source) return;
    let cancelled = false;

    fetchEvents(source.id, kinds)
      .then((next) => {
        if (cancelled) return;
        setReport(next);
        setPhase('result');
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : 'Unknown error');
        setPhase('upload');
      });

    return () => {
      cancelled = true;
    };
  }, [source, kinds]);

  const open = useCallback(async (load: () => Promise<UploadResponse>) => {
    setError(null);
    setReport(null);
    setPhase('loading');
    try {
      setSource(await load());
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Unknown error');
      setPhase('upload');
    }
  }, []);

  const openFile = useCallback((file: File) => open(() => uploadFile(file)), [open]);
  const openDevice = useCallback(() => open(pullFromDevice), [open]);

  const toggle = useCallback((kind: EventKind) => {
    setKinds((prev) => toggleKind(prev, kind));
  }, []);

  const reset = useCallback(() => {
    setPhase('upload');
    setSource(null);
    setKinds(new Set());
    setReport(null);
    setError(null);
  }, []);

  return { phase, source, kinds, report, error, openFile, openDevice, toggle, reset };
}
