import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { Root, Type } from 'protobufjs';
import { EventKind, isEventKind } from './types.js';

const PROTO_PATH = fileURLToPath(new URL('../proto/critical_event_log.proto', import.meta.url));

export interface CriticalEventSchema {
  event: Type;
  eventsFieldId: number;       // CriticalEventLogStorageProto.events
  timestampFieldId: number;    // CriticalEventProto.timestamp_ms
  kindByTag: Map<number, EventKind>;
  tagByKind: Map<EventKind, number>;
  processClassNames: Map<number, string>;  // CriticalEventProto.ProcessClass
}

let cachedSchema: CriticalEventSchema | null = null;

/**
 * Load critical_event_log.proto once and index the parts the codec needs.
 * Field names keep their snake_case spelling, so oneof member names are the
 * event kind names.
 */
export function getSchema(): CriticalEventSchema {
  if (!cachedSchema) {
    cachedSchema = buildSchema(new protobuf.Root().loadSync(PROTO_PATH, { keepCase: true }));
  }
  return cachedSchema;
}

function buildSchema(root: Root): CriticalEventSchema {
  const storage = root.lookupType('critical_events.CriticalEventLogStorageProto');
  const event = root.lookupType('critical_events.CriticalEventProto');

  const kindByTag = new Map<number, EventKind>();
  const tagByKind = new Map<EventKind, number>();
  const payload = event.oneofs.event;
  for (const field of payload.fieldsArray) {
    if (!isEventKind(field.name)) {
      throw new Error(`Schema oneof member ${field.name} has no matching event kind`);
    }
    kindByTag.set(field.id, field.name);
    tagByKind.set(field.name, field.id);
  }

  const processClassNames = new Map<number, string>();
  for (const [id, name] of Object.entries(event.lookupEnum('ProcessClass').valuesById)) {
    processClassNames.set(Number(id), name);
  }

  return {
    event,
    eventsFieldId: storage.fields.events.id,
    timestampFieldId: event.fields.timestamp_ms.id,
    kindByTag,
    tagByKind,
    processClassNames,
  };
}
