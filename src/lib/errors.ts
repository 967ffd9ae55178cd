/**
 * Таксономия ошибок трекера.
 *
 * Все удалённые ошибки в итоге превращаются в одну строку статуса
 * (см. describeFailure) и никогда не роняют процесс.
 */

import { isAxiosError } from 'axios';
import type { OperationKind } from '../queue/messages';

export type TrackerErrorCode =
  | 'NETWORK'
  | 'REMOTE_REJECTION'
  | 'DUPLICATE_OPERATION'
  | 'NO_ACTIVE_TIMER'
  | 'CONFIGURATION';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Transport failure or timeout. Reported, never retried. */
export class NetworkError extends TrackerError {
  constructor(message: string) {
    super('NETWORK', message);
  }
}

export class RemoteRejectionError extends TrackerError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super('REMOTE_REJECTION', body ? `${status} - ${body}` : String(status));
    this.status = status;
    this.body = body;
  }
}

export class DuplicateOperationError extends TrackerError {
  readonly operation: OperationKind;

  constructor(operation: OperationKind) {
    super('DUPLICATE_OPERATION', `Operation "${operation}" is already in progress`);
    this.operation = operation;
  }
}

export class NoActiveTimerError extends TrackerError {
  constructor() {
    super('NO_ACTIVE_TIMER', 'No timer is currently running');
  }
}

export class ConfigurationError extends TrackerError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

function extractBody(data: unknown): string {
  if (data === undefined || data === null || data === '') {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return JSON.stringify(data);
}

/**
 * Приводит ошибку axios к NetworkError / RemoteRejectionError.
 * Подключается как response interceptor в ApiClient.
 */
export function toApiError(error: unknown): Error {
  if (error instanceof TrackerError) {
    return error;
  }
  if (isAxiosError(error)) {
    if (error.response) {
      return new RemoteRejectionError(error.response.status, extractBody(error.response.data));
    }
    return new NetworkError(error.message || 'Request failed');
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

/** Human-readable status line for a failed remote operation. */
export function describeFailure(action: string, error: unknown): string {
  if (error instanceof RemoteRejectionError) {
    return `${action}: ${error.message}`;
  }
  if (error instanceof NetworkError) {
    return `Network error: ${error.message}`;
  }
  // Configuration and other expected failures read like rejections
  if (error instanceof TrackerError) {
    return `${action}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}
