/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

// lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
  [LogLevel.LOG]: null,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

const getCurrentLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const formatHeader = (level: LogLevel): string => {
  const header = `[${new Date().toISOString()}] [${level}]`;
  const color = LEVEL_COLORS[level];
  return color === null ? header : `${color}${header}\x1b[0m`;
};

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
}

function isFieldObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

// Common call shape: logger.info("msg", { ...fields })
function toFields(args: unknown[]): Record<string, string> | undefined {
  const maybeFields = args[1];
  if (!isFieldObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = v instanceof Error ? v.message : stringify(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringify(first);

  // the fields object lives in `fields`, not in the message
  const tail = isFieldObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringify).join(" ")}`.trim();
}

let sink: LogSink | null = null;

function emit(level: LogLevel, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  if (sink) {
    sink.write({
      tsMs: Date.now(),
      level,
      message: toMessage(args),
      fields: toFields(args),
    });
    return;
  }

  consoleFn(formatHeader(level), ...args);
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, console.error);
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route records to a custom sink instead of the console.
   * Tests use this to assert on what a scan reported.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  clearSink: () => {
    sink = null;
  },
};
