/**
 * Structured, level-based engine diagnostics as JSON lines on stderr.
 * stdout stays free for the run's event lines and results.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

const defaultLogHandler: LogHandler = (entry) => {
  console.error(JSON.stringify({ ts: entry.timestamp, level: entry.level, msg: entry.message, ...entry.context }));
};

let currentHandler: LogHandler = defaultLogHandler;
const envLevel = process.env.LOG_LEVEL ?? '';
let currentMinLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** Replace the handler (tests, embedding applications). Returns the previous one. */
export function setLogHandler(handler: LogHandler): LogHandler {
  const previous = currentHandler;
  currentHandler = handler;
  return previous;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({ level, message, context, timestamp: new Date().toISOString() });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log('debug', msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log('info', msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log('warn', msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log('error', msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx })
  };
}

export const logger = createLogger({ component: 'wfrun' });
