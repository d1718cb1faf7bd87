export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export type LogSink = (line: string) => void;

type LogEntry = {
  ts: string;
  level: LogLevel;
  msg: string;
  sampleId?: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Defaults to stderr; stdout is reserved for command output */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEY_PATTERN = /^(password|pass|token|apiKey|secret|authorization)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Make a log payload JSON-safe: errors become plain objects and values
 * under credential-like keys are replaced.
 */
export function toLoggable(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toLoggable);
  if (value instanceof Error) {
    const code = 'code' in value ? value.code : undefined;
    return {
      name: value.name,
      message: value.message,
      code: typeof code === 'string' ? code : undefined,
    };
  }
  if (value instanceof Map) {
    return toLoggable(Object.fromEntries(value));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : toLoggable(v);
    }
    return out;
  }
  return String(value);
}

export class Logger {
  constructor(
    private readonly options: LoggerOptions = {},
    private readonly fields: Record<string, unknown> = {}
  ) {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  /** Logger that adds `fields` to every entry (e.g. the sample being processed) */
  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.options, { ...this.fields, ...fields });
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const payload = toLoggable({ ...this.fields, ...(extra ?? {}) });
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(isPlainObject(payload) ? payload : {}),
    };

    const sink = this.options.sink ?? ((line: string) => void process.stderr.write(line));

    if ((this.options.format ?? 'text') === 'json') {
      sink(`${JSON.stringify(entry)}\n`);
      return;
    }

    const samplePart = typeof entry.sampleId === 'string' ? ` sample=${entry.sampleId}` : '';
    sink(`[${entry.ts}] ${level.toUpperCase()}${samplePart} ${msg}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>): void {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>): void {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>): void {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>): void {
    this.log('error', msg, extra);
  }
}

/** Logger that discards everything; the default for library components */
export const silentLogger = new Logger({ sink: () => undefined });
