import { readFile } from 'node:fs/promises';
import protobuf from 'protobufjs';
import { EventLogIOError, MalformedInputError } from './errors.js';
import { CriticalEventSchema, getSchema } from './schema.js';
import {
  CriticalEvent,
  EventKind,
  EventLog,
  EventPayload,
  KnownPayload,
  LoadedEventLog,
} from './types.js';

const WIRE_VARINT = 0;
const WIRE_LENGTH_DELIMITED = 2;

type PlainObject = Record<string, unknown>;

/**
 * Decode a serialized CriticalEventLogStorageProto into its events, oldest
 * first. Throws MalformedInputError when the bytes are not that message.
 */
export function decodeEventLog(buffer: Uint8Array): EventLog {
  const schema = getSchema();
  const events: CriticalEvent[] = [];

  try {
    const reader = protobuf.Reader.create(buffer);
    while (reader.pos < reader.len) {
      const key = reader.uint32();
      const fieldId = key >>> 3;
      const wireType = key & 7;

      if (fieldId === 0) {
        throw new MalformedInputError(`Invalid field number 0 at offset ${reader.pos}`);
      }
      if (fieldId !== schema.eventsFieldId) {
        reader.skipType(wireType);
        continue;
      }
      if (wireType !== WIRE_LENGTH_DELIMITED) {
        throw new MalformedInputError(
          `Event record #${events.length + 1} has wire type ${wireType}, expected ${WIRE_LENGTH_DELIMITED}`
        );
      }
      events.push(decodeEvent(reader.bytes(), schema, events.length + 1));
    }
  } catch (err) {
    if (err instanceof MalformedInputError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`Failed to parse critical event log: ${reason}`, { cause: err });
  }

  return Object.freeze(events);
}

/**
 * Read a log file and decode it. `onRead` fires once the bytes are in
 * memory, before decoding starts.
 */
export async function readEventLogFile(
  path: string,
  onRead?: (byteLength: number) => void,
): Promise<LoadedEventLog> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new EventLogIOError(path, describeReadError(path, err), { cause: err });
  }

  onRead?.(bytes.length);
  return { path, byteLength: bytes.length, log: decodeEventLog(bytes) };
}

function describeReadError(path: string, err: unknown): string {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return `File '${path}' not found.`;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return `Error reading file: ${reason}`;
}

// ============================================================
// Single event
// ============================================================

function decodeEvent(bytes: Uint8Array, schema: CriticalEventSchema, position: number): CriticalEvent {
  const tag = findPayloadTag(bytes, schema, position);
  const message = schema.event.decode(bytes);
  const object: PlainObject = schema.event.toObject(message, { longs: String, defaults: true });
  const timestampMs = readLong(object, 'timestamp_ms');

  const kind = tag === null ? undefined : schema.kindByTag.get(tag);
  const payload: EventPayload = kind === undefined
    ? { kind: 'unknown', tag, raw: Uint8Array.from(bytes) }
    : toPayload(kind, readMessage(object, kind));

  const event: CriticalEvent = { timestampMs, payload: Object.freeze(payload) };
  return Object.freeze(event);
}

/**
 * Find which oneof member the event carries by walking its wire fields.
 * The last known member wins, as in any protobuf oneof. Without one, the
 * first field that is neither the timestamp nor a known member is reported
 * as an unknown payload tag; null when the event carries only a timestamp.
 */
function findPayloadTag(bytes: Uint8Array, schema: CriticalEventSchema, position: number): number | null {
  const reader = protobuf.Reader.create(bytes);
  let lastKnown: number | null = null;
  let firstUnknown: number | null = null;

  while (reader.pos < reader.len) {
    const key = reader.uint32();
    const fieldId = key >>> 3;
    const wireType = key & 7;

    if (fieldId === 0) {
      throw new MalformedInputError(`Event #${position} has an invalid field number 0`);
    }
    if (fieldId === schema.timestampFieldId) {
      if (wireType !== WIRE_VARINT) {
        throw new MalformedInputError(`Event #${position} timestamp has wire type ${wireType}`);
      }
    } else if (schema.kindByTag.has(fieldId)) {
      if (wireType !== WIRE_LENGTH_DELIMITED) {
        throw new MalformedInputError(`Event #${position} payload ${fieldId} has wire type ${wireType}`);
      }
      lastKnown = fieldId;
    } else if (firstUnknown === null) {
      firstUnknown = fieldId;
    }
    reader.skipType(wireType);
  }

  return lastKnown ?? firstUnknown;
}

function toPayload(kind: EventKind, fields: PlainObject): KnownPayload {
  switch (kind) {
    case 'watchdog':
      return { kind, subject: readString(fields, 'subject'), uuid: readString(fields, 'uuid') };
    case 'half_watchdog':
      return { kind, subject: readString(fields, 'subject') };
    case 'anr':
      return {
        kind,
        subject: readString(fields, 'subject'),
        process: readString(fields, 'process'),
        pid: readInt(fields, 'pid'),
        uid: readInt(fields, 'uid'),
        processClass: readInt(fields, 'process_class'),
      };
    case 'java_crash':
      return {
        kind,
        exceptionClass: readString(fields, 'exception_class'),
        process: readString(fields, 'process'),
        pid: readInt(fields, 'pid'),
        uid: readInt(fields, 'uid'),
        processClass: readInt(fields, 'process_class'),
      };
    case 'native_crash':
      return {
        kind,
        process: readString(fields, 'process'),
        pid: readInt(fields, 'pid'),
        uid: readInt(fields, 'uid'),
        processClass: readInt(fields, 'process_class'),
      };
    case 'system_server_started':
      return { kind };
    case 'install_packages':
      return { kind };
    case 'excessive_binder_calls':
      return { kind, uid: readInt(fields, 'uid') };
  }
}

// ============================================================
// Plain-object accessors
// ============================================================

function readMessage(object: PlainObject, key: string): PlainObject {
  const value = object[key];
  return isPlainObject(value) ? value : {};
}

function readString(object: PlainObject, key: string): string {
  const value = object[key];
  return typeof value === 'string' ? value : '';
}

function readInt(object: PlainObject, key: string): number {
  const value = object[key];
  return typeof value === 'number' ? value : 0;
}

// int64 fields come back as decimal strings (longs: String).
function readLong(object: PlainObject, key: string): bigint {
  const value = object[key];
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  return 0n;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
