// Scope-prefixed console logging with a LOG_LEVEL threshold

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  return {
    debug: (...args) => { if (enabled('debug')) console.log(prefix, ...args); },
    info: (...args) => { if (enabled('info')) console.log(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); },
  };
}

// Keep enough of a credential to tell keys apart in logs
export function redact(secret: string | undefined): string {
  if (!secret) return 'MISSING';
  return secret.length <= 8 ? '***' : `${secret.slice(0, 4)}...(${secret.length} chars)`;
}
