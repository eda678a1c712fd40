import {
  CriticalEventsError,
  EVENT_KINDS,
  formatReport,
  parseEventFilter,
  readEventLogFile,
  renderEventLog,
} from '@critical-events/parser';
import type { DevicePuller, PulledFile } from './device/adb.js';

export interface CliOptions {
  file: string | null;
  auto: boolean;
  eventTypes: string[] | null;
  help: boolean;
}

export type ParsedArgs =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io: CliIO;
  puller: DevicePuller;
  remoteLogPath: string;
  programName?: string;
}

const EVENT_TYPES_FLAG = '--event-types';

export function parseCliArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { file: null, auto: false, eventTypes: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--auto') {
      options.auto = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === EVENT_TYPES_FLAG || arg.startsWith(`${EVENT_TYPES_FLAG}=`)) {
      const value = arg === EVENT_TYPES_FLAG ? argv[++i] : arg.slice(EVENT_TYPES_FLAG.length + 1);
      if (value === undefined || value === '') {
        return { ok: false, error: `${EVENT_TYPES_FLAG} requires a comma-separated list of event types` };
      }
      const kinds = parseEventFilter(value);
      options.eventTypes = kinds.length > 0 ? kinds : null;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unrecognized option ${arg}` };
    } else if (options.file === null) {
      options.file = arg;
    } else {
      return { ok: false, error: `Unexpected argument ${arg}` };
    }
  }

  if (options.auto && options.file !== null) {
    return { ok: false, error: `Unexpected argument ${options.file}` };
  }
  return { ok: true, options };
}

export function usage(programName: string): string[] {
  return [
    'Usage:',
    `  ${programName} <protobuf_file> [${EVENT_TYPES_FLAG} TYPE1,TYPE2,...]`,
    `  ${programName} --auto [${EVENT_TYPES_FLAG} TYPE1,TYPE2,...]`,
    '',
    `Event types: ${EVENT_KINDS.join(', ')}`,
    '',
    'Examples:',
    `  ${programName} critical_events.pb                          # Read protobuf file`,
    `  ${programName} critical_events.pb ${EVENT_TYPES_FLAG} anr,java_crash  # Only ANRs and Java crashes`,
    `  ${programName} --auto                                      # Pull from device and read`,
    `  ${programName} --auto ${EVENT_TYPES_FLAG} watchdog             # Pull from device, watchdogs only`,
  ];
}

/**
 * Run the viewer against `argv` (without the node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { io } = deps;
  const programName = deps.programName ?? 'critical-events';

  if (argv.length === 0) {
    usage(programName).forEach((line) => io.out(line));
    return 1;
  }

  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    io.err(`Error: ${parsed.error}`);
    return 1;
  }
  const { options } = parsed;

  if (options.help) {
    usage(programName).forEach((line) => io.out(line));
    return 0;
  }

  let pulled: PulledFile | null = null;
  if (options.auto) {
    io.out('Pulling critical events log from Android device...');
    try {
      pulled = await deps.puller.pull(deps.remoteLogPath);
    } catch (err) {
      if (err instanceof CriticalEventsError) {
        io.err(`Error: ${err.message}`);
        return 1;
      }
      throw err;
    }
    io.out(`Successfully pulled ${pulled.remotePath} from device to ${pulled.localPath}`);
  }

  const file = pulled?.localPath ?? options.file;
  if (file === null) {
    io.err('Error: No input file specified');
    return 1;
  }

  try {
    const { log } = await readEventLogFile(file, (n) => io.out(`Reading ${n} bytes from ${file}`));
    io.out(formatReport(renderEventLog(log, options.eventTypes ?? undefined)));
    return 0;
  } catch (err) {
    if (err instanceof CriticalEventsError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    if (pulled) await removePulledFile(pulled, io);
  }
}

async function removePulledFile(pulled: PulledFile, io: CliIO): Promise<void> {
  try {
    await pulled.cleanup();
    io.out(`Cleaned up temporary file: ${pulled.localPath}`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.err(`Warning: Failed to clean up temporary file ${pulled.localPath}: ${reason}`);
  }
}
