/**
 * Логгер трекера: `[ts] [CONTEXT] message` в console.*, ошибки — ещё и в Sentry.
 *
 * Порог уровня: LOG_LEVEL, иначе debug вне production и info в production.
 * Терминальный хост переопределяет его через --log-level, чтобы служебные
 * строки не смешивались со строкой статуса.
 *
 * API key и полные payload не логируем.
 */

import { captureException } from './sentry';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export class Logger {
  constructor(private minLevel: LogLevel = defaultLogLevel()) {}

  get level(): LogLevel {
    return this.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(context: string, message: string, error?: unknown): string {
    const timestamp = new Date().toISOString();
    let cause = '';
    if (error instanceof Error) {
      cause = ` | Error: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
    } else if (error) {
      cause = ` | Error: ${String(error)}`;
    }
    return `[${timestamp}] [${context}] ${message}${cause}`;
  }

  debug(context: string, message: string, data?: unknown) {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage(context, message), data ?? '');
  }

  info(context: string, message: string, data?: unknown) {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage(context, message), data ?? '');
  }

  warn(context: string, message: string, data?: unknown) {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage(context, message), data ?? '');
  }

  error(context: string, message: string, error?: unknown) {
    console.error(this.formatMessage(context, message, error));

    if (error instanceof Error) {
      captureException(error, { logger: { context, message } });
    } else if (error) {
      // Не Error: оборачиваем, чтобы у события был stack trace
      captureException(new Error(message), { logger: { context, originalError: String(error) } });
    }
  }

  /** Для catch-блоков команд: сообщение по умолчанию "Unhandled error". */
  logError(context: string, error: unknown, additionalInfo?: string) {
    this.error(context, additionalInfo || 'Unhandled error', error);
  }
}

export const logger = new Logger();
