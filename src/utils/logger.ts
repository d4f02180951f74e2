export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function formatMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      return value.message;
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    return value;
  });
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;

  const parts = [`[${new Date().toISOString()}]`, `[${level.toUpperCase()}]`, message];
  if (meta && Object.keys(meta).length > 0) {
    parts.push(formatMeta(meta));
  }

  // stdout is reserved for MCP stdio traffic
  process.stderr.write(parts.join(' ') + '\n');
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => write('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => write('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => write('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => write('error', message, meta),
};
