import type { EventLog } from '@critical-events/parser';

export interface StoredEventLog {
  log: EventLog;
  byteLength: number;
}

/**
 * Simple in-memory cache of decoded logs, keyed by upload ID, so repeated
 * filter changes do not decode the file again. Entries expire after 1 hour.
 */
export class EventLogStore {
  private store = new Map<string, { entry: StoredEventLog; timestamp: number }>();

  constructor(private readonly ttlMs = 60 * 60 * 1000) {}

  set(id: string, entry: StoredEventLog): void {
    this.store.set(id, { entry, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string): StoredEventLog | undefined {
    const item = this.store.get(id);
    if (!item) return undefined;
    if (Date.now() - item.timestamp > this.ttlMs) {
      this.store.delete(id);
      return undefined;
    }
    return item.entry;
  }

  get size(): number {
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, item] of this.store) {
      if (now - item.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}

export const eventLogStore = new EventLogStore();
