import protobuf from 'protobufjs';
import { CriticalEventSchema, getSchema } from './schema.js';
import { CriticalEvent, EventLog, KnownPayload } from './types.js';

const WIRE_LENGTH_DELIMITED = 2;

/**
 * Serialize events back into a CriticalEventLogStorageProto. Unknown
 * payloads are written from the bytes they were decoded from.
 */
export function encodeEventLog(log: EventLog): Uint8Array {
  const schema = getSchema();
  const writer = protobuf.Writer.create();
  const key = ((schema.eventsFieldId << 3) | WIRE_LENGTH_DELIMITED) >>> 0;

  for (const event of log) {
    writer.uint32(key).bytes(encodeEvent(event, schema));
  }
  return writer.finish();
}

function encodeEvent(event: CriticalEvent, schema: CriticalEventSchema): Uint8Array {
  const { payload } = event;
  if (payload.kind === 'unknown') return payload.raw;

  return schema.event
    .encode({ timestamp_ms: toLongBits(event.timestampMs), [payload.kind]: payloadFields(payload) })
    .finish();
}

/**
 * Split an int64 into the low/high words protobufjs writes for Long values,
 * so values past 2^53 are encoded exactly.
 */
function toLongBits(value: bigint): { low: number; high: number; unsigned: boolean } {
  const bits = BigInt.asUintN(64, value);
  return {
    low: Number(bits & 0xffffffffn) | 0,
    high: Number(bits >> 32n) | 0,
    unsigned: false,
  };
}

function payloadFields(payload: KnownPayload): Record<string, string | number> {
  switch (payload.kind) {
    case 'watchdog':
      return { subject: payload.subject, uuid: payload.uuid };
    case 'half_watchdog':
      return { subject: payload.subject };
    case 'anr':
      return {
        subject: payload.subject,
        process: payload.process,
        pid: payload.pid,
        uid: payload.uid,
        process_class: payload.processClass,
      };
    case 'java_crash':
      return {
        exception_class: payload.exceptionClass,
        process: payload.process,
        pid: payload.pid,
        uid: payload.uid,
        process_class: payload.processClass,
      };
    case 'native_crash':
      return {
        process: payload.process,
        pid: payload.pid,
        uid: payload.uid,
        process_class: payload.processClass,
      };
    case 'system_server_started':
    case 'install_packages':
      return {};
    case 'excessive_binder_calls':
      return { uid: payload.uid };
  }
}
