export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (raw: string): raw is LogLevel =>
  raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error';

export const resolveLogLevel = (env: Record<string, string | undefined> = readEnv()): LogLevel => {
  const raw = (
    env.SOFTRELIEF_LOG_LEVEL ??
    env.LOG_LEVEL ??
    (env.NODE_ENV === 'production' ? 'info' : 'debug')
  )
    .trim()
    .toLowerCase();

  return isLogLevel(raw) ? raw : 'info';
};

function readEnv(): Record<string, string | undefined> {
  // Browser hosts have no process
  return typeof process === 'undefined' ? {} : process.env;
}

const MIN_RANK = LEVELS[resolveLogLevel()];

const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= MIN_RANK;

/** Structured context appended to a log line as key=value pairs */
export interface LogContext {
  [key: string]: unknown;
}

const isLogContext = (arg: unknown): arg is LogContext =>
  arg !== null && typeof arg === 'object' && !Array.isArray(arg) && !(arg instanceof Error);

export const formatContext = (context: LogContext): string =>
  Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');

type Sink = (...args: unknown[]) => void;

const emit = (level: LogLevel, sink: Sink, args: unknown[]): void => {
  if (!shouldLog(level)) {
    return;
  }
  const lastArg = args[args.length - 1];
  if (args.length >= 2 && isLogContext(lastArg)) {
    sink('[softrelief]', ...args.slice(0, -1), formatContext(lastArg));
  } else {
    sink('[softrelief]', ...args);
  }
};

export const logDebug = (...args: unknown[]): void => emit('debug', console.debug, args);

export const logInfo = (...args: unknown[]): void => emit('info', console.log, args);

export const logWarn = (...args: unknown[]): void => emit('warn', console.warn, args);

export const logError = (...args: unknown[]): void => emit('error', console.error, args);
