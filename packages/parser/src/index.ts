export * from './types.js';
export * from './errors.js';
export { decodeEventLog, readEventLogFile } from './decoder.js';
export { encodeEventLog } from './encoder.js';
export { processClassName } from './process-class.js';
export {
  formatTimestamp,
  typeLabel,
  describeFields,
  renderEvent,
  renderEventLog,
  parseEventFilter,
  formatReport,
} from './renderer.js';
