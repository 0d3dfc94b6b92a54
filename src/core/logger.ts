/**
 * Structured Logging
 * One JSON object per line; warnings and errors go to stderr.
 * Context values under secret-bearing keys are redacted before output.
 */

// ── Log Levels ──

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  module: string;
  message: string;
  context?: LogContext;
}

// ── Global State ──

let globalLogLevel: LogLevel = LogLevel.INFO;
let logOutput: (entry: LogEntry) => void = defaultOutput;

function defaultOutput(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Override the log output function (for testing). */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

export function resetLogOutput(): void {
  logOutput = defaultOutput;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  SILENT: LogLevel.SILENT,
};

/** Parse a level name such as "warn" (case-insensitive). */
export function parseLogLevel(name: string): LogLevel | undefined {
  const upper = name.trim().toUpperCase();
  return Object.hasOwn(LEVELS_BY_NAME, upper) ? LEVELS_BY_NAME[upper] : undefined;
}

// ── Redaction ──

const SECRET_KEY = /private.?key|seed|secret|password|admin.?token|authorization/i;

export const REDACTED = '[REDACTED]';

/** Copy of `context` with secret-bearing keys replaced, at any depth. */
export function redact(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SECRET_KEY.test(key)) {
      out[key] = REDACTED;
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Uint8Array)) {
      out[key] = redact({ ...value });
    } else {
      out[key] = value;
    }
  }
  return out;
}

// ── Console Logger ──

export class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level?: LogLevel,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    const effectiveLevel = this.level ?? globalLogLevel;
    if (level < effectiveLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = redact(context);
    }
    logOutput(entry);
  }
}

/** Create a logger for a given module. */
export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
