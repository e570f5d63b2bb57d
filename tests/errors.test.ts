import { describe, test, expect } from '@jest/globals';
import {
  AuthenticationError,
  AzureAPIError,
  ConfigurationError,
  InternalError,
  NetworkError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  formatErrorJSON,
  formatErrorMarkdown,
  normalizeError,
  readRestErrorFields,
} from '../src/errors.js';
import { restError } from './helpers/fakes.js';

describe('readRestErrorFields', () => {
  test('should read status, code and request ID from a REST error', () => {
    const error = Object.assign(restError(409, 'Conflict', 'busy'), { request: { requestId: 'req-1' } });
    expect(readRestErrorFields(error)).toEqual({ message: 'busy', statusCode: 409, code: 'Conflict', requestId: 'req-1' });
  });

  test('should read a request ID held on a non-enumerable property', () => {
    const error = restError(500, 'InternalServerError', 'boom');
    Object.defineProperty(error, 'request', { value: { requestId: 'req-2' }, enumerable: false });
    expect(readRestErrorFields(error).requestId).toBe('req-2');
  });

  test('should stringify non-errors', () => {
    expect(readRestErrorFields(42)).toEqual({ message: '42' });
  });
});

describe('normalizeError', () => {
  test('should pass toolkit errors through', () => {
    const error = new ValidationError('bad');
    expect(normalizeError(error)).toBe(error);
  });

  test('should map throttling to a retryable rate limit error', () => {
    const normalized = normalizeError(restError(429, 'TooManyRequests', 'slow down'));
    expect(normalized).toBeInstanceOf(RateLimitError);
    expect(normalized.retryable).toBe(true);
  });

  test('should map not-found responses', () => {
    const normalized = normalizeError(restError(404, undefined, 'gone'));
    expect(normalized).toBeInstanceOf(AzureAPIError);
    expect(normalized.code).toBe('RESOURCE_NOT_FOUND');
    expect(normalized.details?.statusCode).toBe(404);
  });

  test('should keep the Azure error code and mark 5xx as retryable', () => {
    const server = normalizeError(restError(503, 'ServiceUnavailable', 'down'));
    expect(server.code).toBe('ServiceUnavailable');
    expect(server.retryable).toBe(true);

    const client = normalizeError(restError(400, 'InvalidParameter', 'bad'));
    expect(client.code).toBe('InvalidParameter');
    expect(client.retryable).toBe(false);
  });

  test('should recognise timeouts and network failures by message', () => {
    expect(normalizeError(new Error('socket timeout'))).toBeInstanceOf(TimeoutError);
    expect(normalizeError(new Error('getaddrinfo ENOTFOUND management.azure.com'))).toBeInstanceOf(NetworkError);
  });

  test('should map unavailable credentials to an authentication error', () => {
    const error = new Error('Please run az login');
    error.name = 'CredentialUnavailableError';
    expect(normalizeError(error)).toBeInstanceOf(AuthenticationError);
  });

  test('should map credential failures that carry a status code to an authentication error', () => {
    const error = Object.assign(new Error('AADSTS7000215: Invalid client secret provided'), {
      name: 'AuthenticationError',
      statusCode: 401,
    });
    const normalized = normalizeError(error);
    expect(normalized).toBeInstanceOf(AuthenticationError);
    expect(normalized.details).toEqual({ statusCode: 401 });
  });

  test('should fall back to internal errors', () => {
    expect(normalizeError(new Error('odd'))).toBeInstanceOf(InternalError);
    const unknown = normalizeError('text');
    expect(unknown.message).toBe('An unknown error occurred');
    expect(unknown.details?.originalError).toBe('text');
  });
});

describe('Error formatting', () => {
  test('should point configuration errors at the setting', () => {
    const error = new ConfigurationError('Role not found', 'RBAC_ROLE_NAME');
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.remediation).toBe('Set configuration: RBAC_ROLE_NAME');
  });

  test('should render markdown with category, code and remediation', () => {
    const md = formatErrorMarkdown(new ConfigurationError('Role not found', 'RBAC_ROLE_NAME'));
    expect(md.startsWith('## ❌ Error: CONFIGURATION')).toBe(true);
    expect(md).toContain('**Code:** `CONFIG_ERROR`');
    expect(md).toContain('### 💡 Remediation\nSet configuration: RBAC_ROLE_NAME');
  });

  test('should wrap the structured error in JSON', () => {
    const parsed = JSON.parse(formatErrorJSON(new ValidationError('bad input')));
    expect(parsed.error.code).toBe('VALIDATION_ERROR');
    expect(parsed.error.message).toBe('bad input');
    expect(parsed.error.retryable).toBe(false);
  });
});
