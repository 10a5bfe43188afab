export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACT_KEYS = new Set([
  'accessKey',
  'secretKey',
  'accessKeyId',
  'secretAccessKey',
  'sessionToken',
  'authorization',
  'credentials',
]);

const REDACT_PATTERN = /secret|token|password|credential|authorization/i;

let currentLevel: LogLevel = 'info';

export const isLogLevel = (value: string): value is LogLevel => {
  return (LOG_LEVELS as readonly string[]).includes(value);
};

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const getLogLevel = (): LogLevel => currentLevel;

const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];

/** JSON replacer: credential-like keys are masked, errors reduced to name and message. */
const redact = (key: string, value: unknown): unknown => {
  if (key !== '' && (REDACT_KEYS.has(key) || REDACT_PATTERN.test(key))) {
    return '[REDACTED]';
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
};

export const serialize = (value: unknown): string => {
  try {
    return JSON.stringify(value, redact);
  } catch {
    // Circular metadata.
    return '[unserializable]';
  }
};

export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

const emit = (level: LogLevel, sink: (...args: unknown[]) => void, message: string, meta?: unknown): void => {
  if (!enabled(level)) {
    return;
  }
  if (meta === undefined) {
    sink(message);
    return;
  }
  sink(message, serialize(meta));
};

export const logDebug = (message: string, meta?: unknown): void => {
  emit('debug', console.debug, message, meta);
};

export const logInfo = (message: string, meta?: unknown): void => {
  emit('info', console.log, message, meta);
};

export const logWarn = (message: string, meta?: unknown): void => {
  emit('warn', console.warn, message, meta);
};

export const logError = (message: string, meta?: unknown): void => {
  emit('error', console.error, message, meta);
};
