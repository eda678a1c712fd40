import type { EventKind, EventReport, UploadResponse } from './types';

const API_BASE = '/api';

async function readError(res: Response, fallback: string): Promise<Error> {
  const body: unknown = await res.json().catch(() => null);
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return new Error(body.error);
  }
  return new Error(res.statusText || fallback);
}

export async function uploadFile(file: File): Promise<UploadResponse> {
  const form = new FormData();
  form.append('file', file);

  const res = await fetch(`${API_BASE}/upload`, { method: 'POST', body: form });
  if (!res.ok) throw await readError(res, 'Upload failed');
  return res.json();
}

export async function pullFromDevice(): Promise<UploadResponse> {
  const res = await fetch(`${API_BASE}/device/pull`, { method: 'POST' });
  if (!res.ok) throw await readError(res, 'Device pull failed');
  return res.json();
}

export function eventsUrl(id: string, kinds: Iterable<EventKind>): string {
  const types = [...kinds].join(',');
  const query = types ? `?${new URLSearchParams({ types })}` : '';
  return `${API_BASE}/events/${encodeURIComponent(id)}${query}`;
}

export async function fetchEvents(id: string, kinds: Iterable<EventKind>): Promise<EventReport> {
  const res = await fetch(eventsUrl(id, kinds));
  if (!res.ok) throw await readError(res, 'Failed to load events');
  return res.json();
}
