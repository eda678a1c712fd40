import protobuf from 'protobufjs';
import type { CriticalEvent, KnownPayload } from '../src/types.js';

// Wire-level builders, independent of the codec under test.

export function eventBytes(timestampMs: number | string, fields: Array<[number, Uint8Array]>): Uint8Array {
  const writer = protobuf.Writer.create();
  writer.uint32((1 << 3) | 0).int64(timestampMs);
  for (const [fieldId, body] of fields) {
    writer.uint32((fieldId << 3) | 2).bytes(body);
  }
  return writer.finish();
}

export function storageBytes(events: Uint8Array[]): Uint8Array {
  const writer = protobuf.Writer.create();
  for (const event of events) {
    writer.uint32((1 << 3) | 2).bytes(event);
  }
  return writer.finish();
}

export function watchdogBody(subject: string, uuid: string): Uint8Array {
  return protobuf.Writer.create()
    .uint32((1 << 3) | 2).string(subject)
    .uint32((2 << 3) | 2).string(uuid)
    .finish();
}

export function anrBody(subject: string, process: string, pid: number, uid: number, processClass: number): Uint8Array {
  return protobuf.Writer.create()
    .uint32((1 << 3) | 2).string(subject)
    .uint32((2 << 3) | 2).string(process)
    .uint32((3 << 3) | 0).int32(pid)
    .uint32((4 << 3) | 0).int32(uid)
    .uint32((5 << 3) | 0).int32(processClass)
    .finish();
}

export function event(timestampMs: number | bigint, payload: KnownPayload): CriticalEvent {
  return { timestampMs: BigInt(timestampMs), payload };
}

export function bytesOf(data: Uint8Array): number[] {
  return Array.from(data);
}
