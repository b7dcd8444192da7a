/**
 * Credential broker: store reads behind the cache and the auth session.
 *
 * @module broker
 */

import type { AuthSession } from '../auth/index.js';
import type { SecretCache } from '../cache/index.js';
import { AuthenticationError, UnauthorizedError, errorMessage } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import { SingleFlight, withTimeout } from '../resilience/index.js';
import {
  systemClock,
  type Clock,
  type Credential,
  type SecretStore,
  type SecretValue,
  type StaticCredential,
} from '../types/index.js';

/**
 * Values the broker keeps in the shared cache.
 */
export type CachedItem =
  | { readonly kind: 'secret'; readonly secret: SecretValue }
  | { readonly kind: 'list'; readonly keys: readonly string[] }
  | { readonly kind: 'static'; readonly credential: StaticCredential };

/**
 * Broker settings.
 */
export interface CredentialBrokerOptions {
  store: SecretStore;
  session: AuthSession;
  cache: SecretCache<CachedItem>;
  /** Deadline for a single store call */
  requestTimeoutMs: number;
  kvMountPoint: string;
  databaseMountPoint: string;
  /** TTL for cached listings in seconds */
  listCacheTTL: number;
  clock?: Clock;
  observability?: Observability;
}

/**
 * The two attempts allowed for an authenticated store call: the first with
 * the current token, the second after the session was invalidated.
 */
type AuthAttempt = 'initial' | 'reauthenticated';

const AUTH_ATTEMPTS: readonly AuthAttempt[] = ['initial', 'reauthenticated'];

/**
 * Default connection string template.
 */
export const DEFAULT_CONNECTION_TEMPLATE = 'postgresql://{username}:{password}@{host}/{database}';

/**
 * Reads secrets and issues credentials on behalf of the application.
 *
 * - KV reads and static credentials are cached for the configured TTL.
 * - Dynamic credentials bypass the cache; concurrent requests for the same
 *   role share one issue call.
 * - A store call rejected as unauthorized invalidates the session and is
 *   retried exactly once.
 */
export class CredentialBroker {
  private readonly options: CredentialBrokerOptions;
  private readonly clock: Clock;
  private readonly observability: Observability;
  private readonly issuance = new SingleFlight<string, Credential>();

  constructor(options: CredentialBrokerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Reads a KV secret, from the cache when possible.
   *
   * @throws {SecretNotFoundError} If the path does not exist
   * @throws {AuthenticationError} If the store keeps rejecting the token
   * @throws {StoreUnavailableError} On network failure or timeout
   */
  async read(path: string, version?: number): Promise<SecretValue> {
    const { cache, kvMountPoint, store } = this.options;
    const key = this.secretKey(path, version);

    const cached = cache.get(key);
    if (cached?.kind === 'secret') {
      this.recordCacheHit('secret');
      this.observability.logger.debug('Cache hit', { key });
      return cached.secret;
    }

    this.recordCacheMiss('secret');
    this.observability.logger.debug('Cache miss, reading from store', { key });

    const result = await this.authenticated('read', token =>
      store.read(token, path, { mount: kvMountPoint, version })
    );

    const secret: SecretValue = {
      path,
      data: result.data,
      ...(result.version !== undefined ? { version: result.version } : {}),
      ...(result.leaseDuration !== undefined ? { leaseDuration: result.leaseDuration } : {}),
    };

    cache.put(key, { kind: 'secret', secret }, this.secretTTL(result.leaseDuration), result.version);
    return secret;
  }

  /**
   * Lists secret names under a path. Listings are cached for `listCacheTTL`.
   */
  async listSecrets(path: string = ''): Promise<string[]> {
    const { cache, kvMountPoint, listCacheTTL, store } = this.options;
    const key = `kv:list:${kvMountPoint}:${path}`;

    const cached = cache.get(key);
    if (cached?.kind === 'list') {
      this.recordCacheHit('list');
      return [...cached.keys];
    }
    this.recordCacheMiss('list');

    const keys = await this.authenticated('list', token => store.list(token, path, { mount: kvMountPoint }));

    if (listCacheTTL > 0) {
      cache.put(key, { kind: 'list', keys: [...keys] }, Math.min(listCacheTTL, cache.getDefaultTTL()));
    }
    return keys;
  }

  /**
   * Issues a fresh dynamic credential for a database role.
   *
   * Never served from the cache. Concurrent calls for the same role await
   * the same issue call and receive the same lease.
   */
  issueCredential(role: string): Promise<Credential> {
    return this.issuance.run(role, async () => {
      const { databaseMountPoint, store } = this.options;
      this.observability.logger.info('Issuing database credentials', { role });

      const result = await this.authenticated('issueCredential', token =>
        store.issueCredential(token, role, { mount: databaseMountPoint })
      );

      this.observability.metrics.increment(MetricNames.CREDENTIALS_ISSUED_TOTAL, 1, { role });
      this.observability.logger.info('Database credentials issued', {
        role,
        leaseId: result.leaseId,
        leaseDuration: result.leaseDuration,
      });

      return Object.freeze({
        role,
        leaseId: result.leaseId,
        username: result.username,
        password: result.password,
        issuedAt: this.clock.now(),
        leaseDuration: result.leaseDuration,
        renewable: result.renewable ?? false,
      });
    });
  }

  /**
   * Reads static-role credentials; cached like KV reads since static roles do
   * not mint new leases.
   */
  async getStaticCredential(role: string): Promise<StaticCredential> {
    const { cache, databaseMountPoint, store } = this.options;
    const key = this.staticKey(role);

    const cached = cache.get(key);
    if (cached?.kind === 'static') {
      this.recordCacheHit('static');
      return cached.credential;
    }
    this.recordCacheMiss('static');

    const result = await this.authenticated('readStaticCredential', token =>
      store.readStaticCredential(token, role, { mount: databaseMountPoint })
    );

    const credential: StaticCredential = Object.freeze({ role, ...result });
    cache.put(key, { kind: 'static', credential });
    return credential;
  }

  /**
   * Issues a credential and renders it into a connection string.
   *
   * Placeholders are `{name}`; `username` and `password` come from the
   * credential, everything else from `params`. Substituted values are
   * URL-encoded.
   */
  async getConnectionString(
    role: string,
    template: string = DEFAULT_CONNECTION_TEMPLATE,
    params: Record<string, string> = {}
  ): Promise<string> {
    const credential = await this.issueCredential(role);
    const values: Record<string, string> = {
      host: 'localhost',
      database: 'postgres',
      ...params,
      username: credential.username,
      password: credential.password,
    };

    return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
      const value = values[name];
      return value === undefined ? placeholder : encodeURIComponent(value);
    });
  }

  /**
   * Drops cached database entries: one role's, or every role's on this mount.
   *
   * @returns Number of removed entries
   */
  clearCache(role?: string): number {
    const { cache, databaseMountPoint } = this.options;
    if (role !== undefined) {
      return cache.invalidate(this.staticKey(role)) ? 1 : 0;
    }
    const prefix = `db:static:${databaseMountPoint}:`;
    return cache.invalidateWhere(key => key.startsWith(prefix));
  }

  /**
   * Runs a store call with a valid token, retrying once after an
   * unauthorized response.
   */
  private async authenticated<T>(operation: string, call: (token: string) => Promise<T>): Promise<T> {
    const { session, requestTimeoutMs } = this.options;
    const { logger, metrics } = this.observability;
    let rejection: UnauthorizedError | undefined;

    for (const attempt of AUTH_ATTEMPTS) {
      const token = await session.ensureValid();
      const started = this.clock.now();

      try {
        const result = await withTimeout(operation, requestTimeoutMs, () => call(token));
        metrics.increment(MetricNames.STORE_REQUESTS_TOTAL, 1, { operation, outcome: 'success' });
        metrics.timing(MetricNames.STORE_REQUEST_DURATION_MS, this.clock.now() - started, { operation });
        return result;
      } catch (error) {
        metrics.increment(MetricNames.STORE_REQUESTS_TOTAL, 1, { operation, outcome: 'error' });
        if (!(error instanceof UnauthorizedError)) {
          throw error;
        }

        rejection = error;
        logger.warn('Store rejected token', { operation, attempt });
        session.invalidate(token);
      }
    }

    throw new AuthenticationError(
      `${operation} rejected after re-authentication: ${errorMessage(rejection)}`,
      rejection
    );
  }

  private secretTTL(leaseDuration: number | undefined): number {
    const ttl = this.options.cache.getDefaultTTL();
    if (leaseDuration !== undefined && leaseDuration > 0) {
      return Math.min(ttl, leaseDuration);
    }
    return ttl;
  }

  private secretKey(path: string, version?: number): string {
    const key = `kv:${this.options.kvMountPoint}:${path}`;
    return version !== undefined ? `${key}:v${version}` : key;
  }

  private staticKey(role: string): string {
    return `db:static:${this.options.databaseMountPoint}:${role}`;
  }

  private recordCacheHit(kind: CachedItem['kind']): void {
    this.observability.metrics.increment(MetricNames.CACHE_HITS_TOTAL, 1, { kind });
  }

  private recordCacheMiss(kind: CachedItem['kind']): void {
    this.observability.metrics.increment(MetricNames.CACHE_MISSES_TOTAL, 1, { kind });
  }
}
