import { isLogLevel, type LogLevel } from '@/utils/logger';

export const LOG_LEVEL_ENV = 'RECOG_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Reads the minimum log level from the environment.
 * Unknown values fall back to the default rather than failing startup.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return DEFAULT_LOG_LEVEL;
}
