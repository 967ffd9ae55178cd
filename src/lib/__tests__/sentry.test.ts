/**
 * Unit тесты для sentry функций
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  captureException,
  clearSentryUser,
  initSentry,
  scrubSensitive,
  setSentryContext,
  setSentryUser,
} from '../sentry';

const mockInit = vi.fn();
const mockSetUser = vi.fn();
const mockSetContext = vi.fn();
const mockCaptureException = vi.fn();
const mockWithScope = vi.fn((callback: (scope: unknown) => void) => {
  callback({ setContext: mockSetContext });
});

vi.mock('@sentry/node', () => ({
  init: (...args: unknown[]) => mockInit(...args),
  setUser: (...args: unknown[]) => mockSetUser(...args),
  setContext: (...args: unknown[]) => mockSetContext(...args),
  captureException: (...args: unknown[]) => mockCaptureException(...args),
  withScope: (callback: (scope: unknown) => void) => mockWithScope(callback),
}));

describe('sentry functions', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('initSentry does nothing without a DSN', () => {
    expect(initSentry({})).toBe(false);
    expect(mockInit).not.toHaveBeenCalled();
  });

  it('initSentry passes DSN, environment and release', () => {
    expect(initSentry({ dsn: 'https://public@example.invalid/1', environment: 'production', release: '0.1.0' })).toBe(
      true,
    );
    expect(mockInit).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: 'https://public@example.invalid/1',
        environment: 'production',
        release: '0.1.0',
        tracesSampleRate: 0.1,
      }),
    );
  });

  it('beforeSend strips the API key from request headers and extras', () => {
    initSentry({ dsn: 'https://public@example.invalid/1', environment: 'test' });
    const { beforeSend } = mockInit.mock.calls[0][0];
    const event = {
      request: { headers: { 'X-Api-Key': 'test-key', Accept: 'application/json' } },
      breadcrumbs: [{ data: { url: '/clients', authorization: 'test-secret' } }],
      extra: { nested: { api_key: 'test-key', workspace: 'ws1' } },
    };

    const result = beforeSend(event);

    expect(result.request.headers).toEqual({ 'X-Api-Key': '***', Accept: 'application/json' });
    expect(result.breadcrumbs[0].data).toEqual({ url: '/clients', authorization: '***' });
    expect(result.extra).toEqual({ nested: { api_key: '***', workspace: 'ws1' } });
  });

  it('scrubSensitive walks arrays of records', () => {
    const target: Record<string, unknown> = { items: [{ password: 'test-secret', name: 'a' }], other: 1 };
    scrubSensitive(target);
    expect(target).toEqual({ items: [{ password: '***', name: 'a' }], other: 1 });
  });

  it('setSentryUser calls Sentry.setUser', () => {
    setSentryUser({ id: 'u1', username: 'Test User' });
    expect(mockSetUser).toHaveBeenCalledWith({ id: 'u1', username: 'Test User' });
  });

  it('clearSentryUser calls Sentry.setUser with null', () => {
    clearSentryUser();
    expect(mockSetUser).toHaveBeenCalledWith(null);
  });

  it('setSentryContext calls Sentry.setContext', () => {
    setSentryContext('tracker', { workspace: 'ws1' });
    expect(mockSetContext).toHaveBeenCalledWith('tracker', { workspace: 'ws1' });
  });

  it('captureException calls Sentry.captureException without context', () => {
    const error = new Error('Test');
    captureException(error);
    expect(mockWithScope).not.toHaveBeenCalled();
    expect(mockCaptureException).toHaveBeenCalledWith(error);
  });

  it('captureException uses withScope when context provided', () => {
    const error = new Error('Test');
    captureException(error, { logger: { context: 'TASK' } });
    expect(mockWithScope).toHaveBeenCalled();
    expect(mockSetContext).toHaveBeenCalledWith('logger', { context: 'TASK' });
    expect(mockCaptureException).toHaveBeenCalledWith(error);
  });
});
