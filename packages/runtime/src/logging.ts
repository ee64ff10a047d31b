export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogLevelProvider = LogLevel | (() => LogLevel);

export interface Logger {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const MAX_LOG_META_LENGTH = 4000;
const MAX_LOG_DEPTH = 6;
const MAX_LOG_OBJECT_KEYS = 40;
const MAX_LOG_ARRAY_ITEMS = 20;
const MAX_LOG_VALUE_STRING_LENGTH = 512;

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

const truncateString = (value: string): string => {
  if (value.length <= MAX_LOG_VALUE_STRING_LENGTH) return value;
  return `${value.slice(0, MAX_LOG_VALUE_STRING_LENGTH)}...[truncated]`;
};

// Diagnostic lists and parameter arrays can be long; keep log lines bounded.
const sanitizeForLogging = (value: unknown, depth: number, seen: WeakSet<object>): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === 'string') return truncateString(value);
  if (typeof value !== 'object' || value === null) return value;

  if (seen.has(value)) return '[Circular]';
  seen.add(value);
  if (depth >= MAX_LOG_DEPTH) return '[MaxDepth]';

  if (Array.isArray(value)) {
    const limit = Math.min(value.length, MAX_LOG_ARRAY_ITEMS);
    const out: unknown[] = value.slice(0, limit).map((item) => sanitizeForLogging(item, depth + 1, seen));
    if (value.length > limit) out.push(`[+${value.length - limit} more]`);
    return out;
  }

  const entries = Object.entries(value);
  const limit = Math.min(entries.length, MAX_LOG_OBJECT_KEYS);
  const out: Record<string, unknown> = {};
  entries.slice(0, limit).forEach(([key, item]) => {
    out[key] = sanitizeForLogging(item, depth + 1, seen);
  });
  if (entries.length > limit) out._truncatedKeys = entries.length - limit;
  return out;
};

export const safeStringify = (value: unknown, maxLength: number = MAX_LOG_META_LENGTH): string => {
  try {
    const json = JSON.stringify(sanitizeForLogging(value, 0, new WeakSet<object>()));
    if (json.length <= maxLength) return json;
    return `${json.slice(0, maxLength)}...[truncated]`;
  } catch (err) {
    return `[unserializable meta: ${errorMessage(err)}]`;
  }
};

export const safeFormatMeta = (meta?: Record<string, unknown>): string | null => {
  if (!meta) return null;
  return safeStringify(meta);
};

export const errorMessage = (err: unknown, fallback?: string): string => {
  if (err instanceof Error) return err.message;
  if (fallback !== undefined) return fallback;
  return String(err);
};

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: LogLevelProvider;

  constructor(prefix: string, minLevel: LogLevelProvider = 'info') {
    this.prefix = prefix;
    this.minLevel = minLevel;
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const formatted = safeFormatMeta(meta);
    const payload = formatted ? `${message} ${formatted}` : message;
    const line = `[${this.prefix}] [${level}] ${payload}`;
    // eslint-disable-next-line no-console
    if (level === 'error') console.error(line);
    // eslint-disable-next-line no-console
    else if (level === 'warn') console.warn(line);
    // eslint-disable-next-line no-console
    else console.log(line);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = typeof this.minLevel === 'function' ? this.minLevel() : this.minLevel;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
  }
}
