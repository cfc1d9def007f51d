import pino, { type Logger } from 'pino';
import { LOG_LEVELS, type LogLevel, type WebhookKitConfig } from './config.js';

export type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

/** Minimal logger surface; a pino logger satisfies it. */
export type LoggerLike = {
  debug?: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

export const LOGGER_NAME = 'webhook-message-kit';

export function createLogger(config: Pick<WebhookKitConfig, 'logLevel'>): Logger {
  return pino({ name: LOGGER_NAME, level: config.logLevel });
}

/** Lenient counterpart of `parseConfig`'s LOG_LEVEL check: anything unknown means `info`. */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

let fallback: Logger | undefined;

/** Shared logger for components constructed without one. */
export function fallbackLogger(): Logger {
  fallback ??= pino({ name: LOGGER_NAME, level: resolveLogLevel(process.env.LOG_LEVEL) });
  return fallback;
}
