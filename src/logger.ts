/**
 * Orchestration log.
 *
 * One JSON object per line on stderr, so that stdout stays free for the
 * CLI's report. Tool output never comes through here: it is captured into
 * each job's log artifact instead.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Errors serialize to `{}` by default; keep their name and message. */
function jsonValue(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

/** Render an entry as the single line the default handler writes. */
export function formatEntry(entry: LogEntry): string {
  return JSON.stringify({ ts: entry.timestamp, level: entry.level, msg: entry.message, ...entry.context }, jsonValue);
}

export const stderrHandler: LogHandler = (entry) => {
  process.stderr.write(`${formatEntry(entry)}\n`);
};

let handler: LogHandler = stderrHandler;
let threshold: LogLevel = LogLevel.Info;

/** Route entries elsewhere; tests collect them in memory. */
export function setLogHandler(next: LogHandler): void {
  handler = next;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** "debug", "WARN" and so on. Unknown names give undefined. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** A logger whose entries also carry `context`, e.g. `{ pipelineId, jobId }`. */
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(bound: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...bound, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...bound, ...context }),
  };
}

export const logger = createLogger({ component: 'buildgate' });
