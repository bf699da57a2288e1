/**
 * Structured logging.
 *
 * One JSON line per entry on stderr; stdout stays free for whatever
 * invoked the engine. Tests and embedders swap the sink with
 * setLogHandler() and the threshold with setLogLevel().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Silent = 'silent',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Lowest to highest; `silent` sits above every level an entry can carry. */
const SEVERITY_ORDER: readonly LogLevel[] = [
  LogLevel.Debug,
  LogLevel.Info,
  LogLevel.Warn,
  LogLevel.Error,
  LogLevel.Silent,
];

function writeJsonLine(entry: LogEntry): void {
  const line = { level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context };
  process.stderr.write(`${JSON.stringify(line)}\n`);
}

let sink: LogHandler = writeJsonLine;
let threshold: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  sink = handler;
}

/** Back to JSON lines on stderr. */
export function resetLogHandler(): void {
  sink = writeJsonLine;
}

/** Entries below `level` are dropped; `silent` drops everything. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Case-insensitive level name, or undefined when it names no level. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  if (!wanted) return undefined;
  return SEVERITY_ORDER.find((level) => level === wanted);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY_ORDER.indexOf(level) < SEVERITY_ORDER.indexOf(threshold)) return;
  sink({ level, message, context, timestamp: new Date().toISOString() });
}

/** Logger whose entries all carry `fields`; `child` layers more on top. */
export function createLogger(fields: Record<string, unknown> = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void =>
      emit(level, message, { ...fields, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (extra) => createLogger({ ...fields, ...extra }),
  };
}

export const logger = createLogger({ component: 'loopflow' });
