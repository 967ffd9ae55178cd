import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import {
  ConfigurationError,
  DuplicateOperationError,
  NetworkError,
  RemoteRejectionError,
  TrackerError,
  describeFailure,
  toApiError,
} from '../errors';

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

function rejection(status: number, data: unknown): AxiosError {
  return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, null, {
    status,
    statusText: '',
    data,
    headers: {},
    config,
  });
}

describe('toApiError', () => {
  it('maps a response with a status to RemoteRejectionError', () => {
    const error = toApiError(rejection(400, { message: 'Project name exists', code: 501 }));
    expect(error).toBeInstanceOf(RemoteRejectionError);
    expect(error.message).toBe('400 - Project name exists');
  });

  it('keeps a plain-text body as is', () => {
    const error = toApiError(rejection(401, 'Unauthorized'));
    expect(error.message).toBe('401 - Unauthorized');
  });

  it('serialises a body without a message', () => {
    const error = toApiError(rejection(500, { reason: 'boom' }));
    expect(error.message).toBe('500 - {"reason":"boom"}');
  });

  it('maps a request without a response to NetworkError', () => {
    const error = toApiError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config));
    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('timeout of 10000ms exceeded');
  });

  it('passes tracker errors through untouched', () => {
    const original = new ConfigurationError('Workspace ID is not configured');
    expect(toApiError(original)).toBe(original);
  });
});

describe('describeFailure', () => {
  it('prefixes remote rejections with the action', () => {
    expect(describeFailure('Failed to fetch clients', new RemoteRejectionError(403, 'Forbidden'))).toBe(
      'Failed to fetch clients: 403 - Forbidden',
    );
  });

  it('prefixes configuration errors with the action', () => {
    expect(
      describeFailure('Failed to fetch clients', new ConfigurationError('Workspace ID is not configured')),
    ).toBe('Failed to fetch clients: Workspace ID is not configured');
  });

  it('reports network errors without the action', () => {
    expect(describeFailure('Failed to stop timer', new NetworkError('socket hang up'))).toBe(
      'Network error: socket hang up',
    );
  });

  it('reports anything else as unexpected', () => {
    expect(describeFailure('x', new Error('oops'))).toBe('Unexpected error: oops');
    expect(describeFailure('x', 'plain')).toBe('Unexpected error: plain');
  });
});

describe('error classes', () => {
  it('carry a code and their own name', () => {
    const error = new DuplicateOperationError('stop');
    expect(error).toBeInstanceOf(TrackerError);
    expect(error.code).toBe('DUPLICATE_OPERATION');
    expect(error.name).toBe('DuplicateOperationError');
    expect(error.operation).toBe('stop');
  });
});
