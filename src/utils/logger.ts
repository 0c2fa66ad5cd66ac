export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  /** Receives each formatted line without a trailing newline. Defaults to stderr. */
  write?: (line: string, level: LogLevel) => void;
  now?: () => Date;
}

// Error instances stringify to `{}`; keep their message and name instead.
function serialize(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level: minLevel, format } = options;
  const write = options.write ?? ((line: string) => { process.stderr.write(line + '\n'); });
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    const ts = now().toISOString();
    const fields = meta ? serialize(meta) : undefined;
    const out = format === 'json'
      ? JSON.stringify({ timestamp: ts, level, message, ...fields })
      : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
               : `[${ts}] [${level.toUpperCase()}] ${message}`;
    write(out, level);
  }

  return {
    debug: (msg, meta) => log('debug', msg, meta),
    info:  (msg, meta) => log('info',  msg, meta),
    warn:  (msg, meta) => log('warn',  msg, meta),
    error: (msg, meta) => log('error', msg, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info:  () => undefined,
  warn:  () => undefined,
  error: () => undefined,
};
