/**
 * Tests for error types
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ConfigurationError,
  ManagerClosedError,
  SecretNotFoundError,
  StoreRequestError,
  StoreTimeoutError,
  StoreUnavailableError,
  UnauthorizedError,
  ValidationError,
  VaultAgentError,
  errorMessage,
  isRetryableError,
  isVaultAgentError,
  wrapError,
} from '../index.js';

describe('VaultAgentError', () => {
  it('should serialize to JSON', () => {
    const error = new StoreRequestError('Secret store rejected request with 400: bad input', 400);

    expect(error.toJSON()).toEqual({
      name: 'StoreRequestError',
      code: 'REQUEST',
      message: 'Secret store rejected request with 400: bad input',
      retryable: false,
      statusCode: 400,
      details: undefined,
    });
  });

  it('should keep the prototype chain for every subclass', () => {
    const errors = [
      new AuthenticationError('nope'),
      new UnauthorizedError(),
      new SecretNotFoundError('secret', 'app/config'),
      new StoreUnavailableError('down'),
      new StoreTimeoutError('read', 100),
      new ValidationError('readonly', 'probe failed'),
      new ConfigurationError('bad'),
      new ManagerClosedError('readonly'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(VaultAgentError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(new StoreTimeoutError('read', 100)).toBeInstanceOf(StoreUnavailableError);
  });
});

describe('error messages', () => {
  it('should describe missing secrets and roles', () => {
    expect(new SecretNotFoundError('secret', 'app/config').message).toBe('Secret not found at path: app/config');
    expect(new SecretNotFoundError('role', 'readonly').message).toBe('Database role not found: readonly');
    expect(new SecretNotFoundError('static role', 'reporting').message).toBe(
      'Database static role not found: reporting'
    );
  });

  it('should describe timeouts', () => {
    const error = new StoreTimeoutError('login', 250);

    expect(error.message).toBe('Store login timed out after 250ms');
    expect(error.code).toBe('TIMEOUT');
    expect(error.timeoutMs).toBe(250);
  });

  it('should default unauthorized responses to 403', () => {
    const error = new UnauthorizedError();

    expect(error.message).toBe('Permission denied');
    expect(error.statusCode).toBe(403);
  });
});

describe('retryability', () => {
  it('should inherit retryability from the cause of an authentication failure', () => {
    expect(new AuthenticationError('down', new StoreUnavailableError('down')).retryable).toBe(true);
    expect(new AuthenticationError('denied', new UnauthorizedError()).retryable).toBe(false);
    expect(new AuthenticationError('unknown', new Error('boom')).retryable).toBe(false);
  });

  it('should only report agent errors as retryable', () => {
    expect(isRetryableError(new StoreTimeoutError('read', 10))).toBe(true);
    expect(isRetryableError(new ValidationError('readonly', 'probe failed'))).toBe(true);
    expect(isRetryableError(new ConfigurationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('boom'))).toBe(false);
  });
});

describe('helpers', () => {
  it('should recognise agent errors', () => {
    expect(isVaultAgentError(new ConfigurationError('bad'))).toBe(true);
    expect(isVaultAgentError(new Error('bad'))).toBe(false);
    expect(isVaultAgentError('bad')).toBe(false);
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });

  it('should wrap foreign errors and pass agent errors through', () => {
    const agentError = new UnauthorizedError();
    const cause = new TypeError('fetch failed');

    expect(wrapError(agentError, 'read')).toBe(agentError);

    const wrapped = wrapError(cause, 'read');
    expect(wrapped).toBeInstanceOf(StoreUnavailableError);
    expect(wrapped.message).toBe('read: fetch failed');
    expect(wrapped.cause).toBe(cause);
  });
});
