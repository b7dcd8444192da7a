/**
 * Authentication session with single-flight re-authentication.
 *
 * @module auth
 */

import { AuthenticationError, errorMessage } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import { withTimeout } from '../resilience/index.js';
import { systemClock, type Clock, type SecretStore } from '../types/index.js';

/**
 * Authentication states.
 */
export enum AuthState {
  Unauthenticated = 'unauthenticated',
  Valid = 'valid',
  Reauthenticating = 'reauthenticating',
}

/**
 * Options for {@link AuthSession}.
 */
export interface AuthSessionOptions {
  store: SecretStore;
  roleId: string;
  secretId: string;
  /** Deadline for a login call */
  requestTimeoutMs: number;
  clock?: Clock;
  observability?: Observability;
}

/**
 * Holds the current client token and its lease.
 *
 * `Unauthenticated --login--> Valid --expiry--> Reauthenticating --success--> Valid`.
 * A failed login returns the session to `Unauthenticated`.
 *
 * Concurrent callers of {@link ensureValid} share one in-flight login, so a
 * mass expiry produces a single request against the store. Failures are
 * surfaced once to every waiter; retrying is the caller's decision.
 *
 * @example
 * ```typescript
 * const session = new AuthSession({ store, roleId, secretId, requestTimeoutMs: 10000 });
 * const token = await session.ensureValid();
 * ```
 */
export class AuthSession {
  private readonly options: AuthSessionOptions;
  private readonly clock: Clock;
  private readonly observability: Observability;

  private state: AuthState = AuthState.Unauthenticated;
  private token: string | null = null;
  private issuedAt = 0;
  private leaseDuration = 0;
  private loginPromise: Promise<string> | null = null;

  constructor(options: AuthSessionOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Returns a valid token, logging in first when needed.
   *
   * @throws {AuthenticationError} If the login fails
   */
  async ensureValid(): Promise<string> {
    if (this.token !== null && this.isValid()) {
      return this.token;
    }

    if (this.loginPromise) {
      return this.loginPromise;
    }

    this.state = AuthState.Reauthenticating;
    this.loginPromise = this.login();

    try {
      return await this.loginPromise;
    } finally {
      this.loginPromise = null;
    }
  }

  /**
   * Forces the next {@link ensureValid} to log in.
   *
   * @param staleToken - Token the store rejected. When it is no longer the
   *   current token another caller already re-authenticated and nothing happens.
   */
  invalidate(staleToken?: string): void {
    if (staleToken !== undefined && staleToken !== this.token) {
      return;
    }
    if (this.loginPromise) {
      return;
    }
    this.observability.logger.info('Token invalidated, next request re-authenticates');
    this.token = null;
    this.state = AuthState.Unauthenticated;
  }

  /**
   * Whether the current token is usable right now.
   */
  isValid(): boolean {
    return this.state === AuthState.Valid && this.clock.now() < this.expiresAt();
  }

  getState(): AuthState {
    return this.state;
  }

  /**
   * Epoch milliseconds when the token expires; `Infinity` for non-expiring tokens.
   */
  expiresAt(): number {
    if (this.leaseDuration <= 0) {
      return this.state === AuthState.Valid ? Infinity : 0;
    }
    return this.issuedAt + this.leaseDuration * 1000;
  }

  private async login(): Promise<string> {
    const { store, roleId, secretId, requestTimeoutMs } = this.options;
    const { logger, metrics } = this.observability;

    try {
      const result = await withTimeout('login', requestTimeoutMs, () => store.login(roleId, secretId));

      this.token = result.token;
      this.issuedAt = this.clock.now();
      this.leaseDuration = result.leaseDuration;
      this.state = AuthState.Valid;

      metrics.increment(MetricNames.LOGINS_TOTAL);
      logger.info('Authenticated with secret store', { leaseDuration: result.leaseDuration });

      return result.token;
    } catch (error) {
      this.token = null;
      this.state = AuthState.Unauthenticated;

      metrics.increment(MetricNames.LOGIN_FAILURES_TOTAL);
      logger.error('Failed to authenticate with secret store', { error: errorMessage(error) });

      throw new AuthenticationError(errorMessage(error), error);
    }
  }
}
