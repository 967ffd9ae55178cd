/**
 * PRODUCTION: Конфигурация Sentry для мониторинга ошибок
 *
 * Правила:
 * - Инициализируется только если задан DSN
 * - Фильтрует чувствительные данные (API key)
 * - Интегрирован с logger
 */

import * as Sentry from '@sentry/node';

export interface SentryOptions {
  dsn?: string;
  environment?: string;
  release?: string;
}

const SENSITIVE_KEYS = [
  'x-api-key',
  'apikey',
  'api_key',
  'authorization',
  'password',
  'payload',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Рекурсивно заменяет значения чувствительных ключей на '***' (in place). */
export function scrubSensitive(target: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(target)) {
    const keyLower = key.toLowerCase();
    if (SENSITIVE_KEYS.some((s) => keyLower.includes(s))) {
      target[key] = '***';
    } else if (Array.isArray(value)) {
      value.forEach((item) => {
        if (isRecord(item)) scrubSensitive(item);
      });
    } else if (isRecord(value)) {
      scrubSensitive(value);
    }
  }
}

/**
 * Инициализация Sentry.
 * Вызывается один раз при старте хоста; без DSN мониторинг выключен.
 */
export function initSentry(options: SentryOptions): boolean {
  if (!options.dsn) {
    return false;
  }

  const environment = options.environment ?? process.env.NODE_ENV ?? 'development';

  Sentry.init({
    dsn: options.dsn,
    environment,
    release: options.release,
    tracesSampleRate: environment === 'production' ? 0.1 : 1.0,

    beforeSend(event) {
      if (event.request?.headers) {
        scrubSensitive(event.request.headers);
      }

      if (event.breadcrumbs) {
        event.breadcrumbs.forEach((breadcrumb) => {
          if (breadcrumb.data) {
            scrubSensitive(breadcrumb.data);
          }
        });
      }

      if (event.extra) {
        scrubSensitive(event.extra);
      }

      if (event.contexts) {
        scrubSensitive(event.contexts);
      }

      return event;
    },
  });

  return true;
}

export function setSentryUser(user: { id: string; username?: string }) {
  Sentry.setUser({
    id: user.id,
    username: user.username,
  });
}

export function clearSentryUser() {
  Sentry.setUser(null);
}

export function setSentryContext(key: string, context: Record<string, unknown>) {
  Sentry.setContext(key, context);
}

export function captureException(error: Error, context?: Record<string, Record<string, unknown>>) {
  if (context) {
    Sentry.withScope((scope) => {
      Object.keys(context).forEach((key) => {
        scope.setContext(key, context[key]);
      });
      Sentry.captureException(error);
    });
  } else {
    Sentry.captureException(error);
  }
}
