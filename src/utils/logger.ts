import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type Meta = Record<string, unknown>;

// Error instances stringify to {} otherwise
function serialize(meta: Meta): Meta {
  return Object.fromEntries(
    Object.entries(meta).map(([k, v]) => [k, v instanceof Error ? `${v.name}: ${v.message}` : v]),
  );
}

/**
 * Log lines go to stderr; stdout carries only the report lines the CLI
 * prints (listings, run summary), so it stays pipeable.
 */
function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? serialize(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  process.stderr.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: Meta) => log('debug', msg, meta),
  info:  (msg: string, meta?: Meta) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Meta) => log('warn',  msg, meta),
  error: (msg: string, meta?: Meta) => log('error', msg, meta),
};
