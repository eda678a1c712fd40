export type CriticalEventsErrorCode = 'IO_ERROR' | 'MALFORMED_INPUT' | 'DEVICE_PULL_FAILED';

export class CriticalEventsError extends Error {
  readonly code: CriticalEventsErrorCode;

  constructor(code: CriticalEventsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The input path is missing or unreadable.
 */
export class EventLogIOError extends CriticalEventsError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('IO_ERROR', message, options);
    this.path = path;
  }
}

/**
 * The bytes do not conform to CriticalEventLogStorageProto.
 */
export class MalformedInputError extends CriticalEventsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', message, options);
  }
}

export class DevicePullError extends CriticalEventsError {
  readonly stderr: string;

  constructor(message: string, stderr = '', options?: { cause?: unknown }) {
    super('DEVICE_PULL_FAILED', message, options);
    this.stderr = stderr;
  }
}
