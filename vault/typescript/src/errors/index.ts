/**
 * Vault agent error types.
 *
 * Every failure the agent surfaces is a {@link VaultAgentError} carrying a
 * stable code and a retryability flag. Store adapters raise the
 * store-level errors (`UnauthorizedError`, `SecretNotFoundError`,
 * `StoreUnavailableError`, `StoreTimeoutError`); the engine layers raise
 * `AuthenticationError`, `ValidationError` and friends.
 *
 * @module errors
 */

/**
 * Vault agent error codes.
 */
export type VaultAgentErrorCode =
  | 'AUTHENTICATION'     // Login or re-authentication failed
  | 'UNAUTHORIZED'       // Store rejected the token (permission denied / expired)
  | 'SECRET_NOT_FOUND'   // No such path or role
  | 'STORE_UNAVAILABLE'  // Network failure or 5xx from the store
  | 'TIMEOUT'            // Store call exceeded its deadline
  | 'REQUEST'            // Store rejected the request (other 4xx)
  | 'VALIDATION'         // Pool or connection failed the validation probe
  | 'CONFIGURATION'      // Invalid options at construction time
  | 'POOL_NOT_READY'     // No active pool for the role
  | 'MANAGER_CLOSED';    // Connection manager has been closed

/**
 * Base error for everything raised by the agent.
 */
export class VaultAgentError extends Error {
  /** Error code */
  readonly code: VaultAgentErrorCode;
  /** Whether the operation can be retried */
  readonly retryable: boolean;
  /** HTTP status code when the error came from a store response */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: VaultAgentErrorCode;
    message: string;
    retryable?: boolean;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'VaultAgentError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * Login or re-authentication against the store failed.
 *
 * Retryable when the underlying cause was (network failure, timeout).
 */
export class AuthenticationError extends VaultAgentError {
  constructor(message: string, cause?: unknown) {
    super({
      code: 'AUTHENTICATION',
      message: `Authentication failed: ${message}`,
      retryable: isRetryableError(cause),
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * The store rejected the token presented with a request.
 */
export class UnauthorizedError extends VaultAgentError {
  constructor(message = 'Permission denied', statusCode = 403) {
    super({
      code: 'UNAUTHORIZED',
      message,
      retryable: false,
      statusCode,
    });
    this.name = 'UnauthorizedError';
  }
}

// ============================================================================
// Store errors
// ============================================================================

/**
 * The store reports no such secret path or role.
 */
export class SecretNotFoundError extends VaultAgentError {
  constructor(kind: 'secret' | 'role' | 'static role', name: string) {
    super({
      code: 'SECRET_NOT_FOUND',
      message: kind === 'secret' ? `Secret not found at path: ${name}` : `Database ${kind} not found: ${name}`,
      retryable: false,
      statusCode: 404,
      details: { kind, name },
    });
    this.name = 'SecretNotFoundError';
  }
}

/**
 * The store could not be reached or answered with a server error.
 */
export class StoreUnavailableError extends VaultAgentError {
  constructor(message: string, options: { statusCode?: number; cause?: unknown; code?: 'STORE_UNAVAILABLE' | 'TIMEOUT' } = {}) {
    super({
      code: options.code ?? 'STORE_UNAVAILABLE',
      message,
      retryable: true,
      statusCode: options.statusCode,
      cause: options.cause,
    });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A store call exceeded its deadline. Handled exactly like a network failure.
 */
export class StoreTimeoutError extends StoreUnavailableError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Store ${operation} timed out after ${timeoutMs}ms`, { code: 'TIMEOUT' });
    this.name = 'StoreTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The store rejected the request for a reason other than authorization.
 */
export class StoreRequestError extends VaultAgentError {
  constructor(message: string, statusCode: number) {
    super({
      code: 'REQUEST',
      message,
      retryable: false,
      statusCode,
    });
    this.name = 'StoreRequestError';
  }
}

// ============================================================================
// Pool and configuration errors
// ============================================================================

/**
 * A freshly built pool (or one of its resources) failed the validation probe.
 */
export class ValidationError extends VaultAgentError {
  constructor(role: string, message: string, cause?: unknown) {
    super({
      code: 'VALIDATION',
      message: `Pool validation failed for role ${role}: ${message}`,
      retryable: true,
      details: { role },
      cause,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Invalid configuration supplied at construction time.
 */
export class ConfigurationError extends VaultAgentError {
  constructor(message: string) {
    super({
      code: 'CONFIGURATION',
      message: `Configuration error: ${message}`,
      retryable: false,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No pool has been adopted for the role yet.
 */
export class PoolNotReadyError extends VaultAgentError {
  constructor(role: string) {
    super({
      code: 'POOL_NOT_READY',
      message: `No active pool for role: ${role}`,
      retryable: true,
      details: { role },
    });
    this.name = 'PoolNotReadyError';
  }
}

/**
 * The connection manager has been closed.
 */
export class ManagerClosedError extends VaultAgentError {
  constructor(role: string) {
    super({
      code: 'MANAGER_CLOSED',
      message: `Connection manager for role ${role} is closed`,
      retryable: false,
      details: { role },
    });
    this.name = 'ManagerClosedError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for agent errors.
 */
export function isVaultAgentError(error: unknown): error is VaultAgentError {
  return error instanceof VaultAgentError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isVaultAgentError(error) && error.retryable;
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps an unknown error as a {@link StoreUnavailableError}, leaving agent
 * errors untouched.
 */
export function wrapError(error: unknown, context: string): VaultAgentError {
  if (isVaultAgentError(error)) {
    return error;
  }
  return new StoreUnavailableError(`${context}: ${errorMessage(error)}`, { cause: error });
}
