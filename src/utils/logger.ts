export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Namespace = 'Session' | 'Registry' | 'Tesseract';

export interface Logger {
  debug(msg: string, detail?: Record<string, unknown>): void;
  info(msg: string, detail?: Record<string, unknown>): void;
  warn(msg: string, detail?: Record<string, unknown>): void;
  error(msg: string, err?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function fmt(prefix: string, msg: string, detail?: Record<string, unknown>): string {
  if (!detail) return `${prefix} ${msg}`;
  const entries = Object.entries(detail)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return entries ? `${prefix} ${msg} ${entries}` : `${prefix} ${msg}`;
}

export function createLogger(namespace: Namespace, level: LogLevel = 'warn'): Logger {
  const prefix = `[recog:${namespace}]`;
  const enabled = (wanted: LogLevel): boolean => LEVEL_RANK[wanted] >= LEVEL_RANK[level];

  return {
    debug: (msg, detail) => {
      if (enabled('debug')) console.debug(fmt(prefix, msg, detail));
    },
    info: (msg, detail) => {
      if (enabled('info')) console.info(fmt(prefix, msg, detail));
    },
    warn: (msg, detail) => {
      if (enabled('warn')) console.warn(fmt(prefix, msg, detail));
    },
    error: (msg, err) => {
      if (!enabled('error')) return;
      if (err === undefined) {
        console.error(`${prefix} ${msg}`);
      } else {
        console.error(`${prefix} ${msg}`, err);
      }
    },
  };
}
