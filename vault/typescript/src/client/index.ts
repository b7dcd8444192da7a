/**
 * Vault agent client.
 *
 * Wires configuration, cache, auth session and broker together and hands
 * out connection managers for dynamic database roles.
 *
 * @module client
 */

import { AuthSession } from '../auth/index.js';
import { CredentialBroker, type CachedItem } from '../broker/index.js';
import { SecretCache, type CacheStats } from '../cache/index.js';
import {
  configFromEnv,
  resolveConfig,
  type VaultAgentConfig,
  type VaultAgentOptions,
} from '../config/index.js';
import { HttpSecretStore, type Transport } from '../http/index.js';
import { createNoopObservability, type Observability } from '../observability/index.js';
import { BackgroundRefreshManager, ConnectionManager } from '../pool/manager.js';
import {
  systemClock,
  type Clock,
  type Credential,
  type PoolFactory,
  type PoolOptions,
  type SecretStore,
  type SecretValue,
  type StaticCredential,
} from '../types/index.js';

/**
 * Collaborators injected into the client. Anything left out gets its
 * production default.
 */
export interface VaultAgentClientDependencies {
  /** Secret store; an {@link HttpSecretStore} against `config.address` by default */
  store?: SecretStore;
  /** HTTP transport for the default store */
  transport?: Transport;
  clock?: Clock;
  observability?: Observability;
}

/**
 * Per-manager settings; unset values fall back to the client configuration.
 */
export interface ConnectionManagerSettings<O extends object = PoolOptions> {
  /** Passed to `factory.build` unchanged */
  poolOptions?: O;
  refreshBuffer?: number;
  validationProbe?: string;
  /** Probe every borrowed connection; see {@link ConnectionManager} */
  validateOnBorrow?: boolean;
  /** Called after a refreshed credential has been adopted */
  onRefresh?: (credential: Credential) => void;
}

/**
 * Settings for background-refreshed managers.
 */
export interface BackgroundRefreshSettings<O extends object = PoolOptions> extends ConnectionManagerSettings<O> {
  /** Seconds between background checks */
  checkInterval?: number;
}

/**
 * Entry point of the agent.
 *
 * @example
 * ```typescript
 * const client = VaultAgentClient.fromEnv();
 *
 * const secret = await client.read('app/config');
 * const keys = await client.listSecrets('app');
 *
 * const manager = client.createBackgroundRefreshManager(
 *   'readonly',
 *   new PgPoolFactory({ host: 'db.internal', database: 'app' })
 * );
 * await manager.start();
 * const rows = await manager.getConnection(async db => (await db.query('SELECT 1')).rows);
 *
 * await client.close();
 * ```
 */
export class VaultAgentClient {
  private readonly config: VaultAgentConfig;
  private readonly store: SecretStore;
  private readonly clock: Clock;
  private readonly observability: Observability;
  private readonly cache: SecretCache<CachedItem>;
  private readonly session: AuthSession;
  private readonly broker: CredentialBroker;
  private readonly managers: Set<{ close(): Promise<void> }> = new Set();

  /**
   * @throws {ConfigurationError} If the options are invalid
   */
  constructor(options: VaultAgentOptions, dependencies: VaultAgentClientDependencies = {}) {
    this.config = resolveConfig(options);
    this.clock = dependencies.clock ?? systemClock;
    this.observability = dependencies.observability ?? createNoopObservability();
    this.store =
      dependencies.store ??
      new HttpSecretStore({
        address: this.config.address,
        namespace: this.config.namespace,
        approleMountPoint: this.config.approleMountPoint,
        kvVersion: this.config.kvVersion,
        requestTimeoutMs: this.config.requestTimeoutMs,
        transport: dependencies.transport,
      });

    this.cache = new SecretCache<CachedItem>({
      defaultTTL: this.config.cacheTTL,
      maxSize: this.config.maxCacheSize,
      clock: this.clock,
    });

    this.session = new AuthSession({
      store: this.store,
      roleId: this.config.roleId,
      secretId: this.config.secretId,
      requestTimeoutMs: this.config.requestTimeoutMs,
      clock: this.clock,
      observability: this.observability,
    });

    this.broker = new CredentialBroker({
      store: this.store,
      session: this.session,
      cache: this.cache,
      requestTimeoutMs: this.config.requestTimeoutMs,
      kvMountPoint: this.config.kvMountPoint,
      databaseMountPoint: this.config.databaseMountPoint,
      listCacheTTL: this.config.listCacheTTL,
      clock: this.clock,
      observability: this.observability,
    });
  }

  /**
   * Builds a client from `VAULT_*` environment variables.
   *
   * @throws {ConfigurationError} If a required variable is missing
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    dependencies: VaultAgentClientDependencies = {},
    overrides: Partial<VaultAgentOptions> = {}
  ): VaultAgentClient {
    return new VaultAgentClient(configFromEnv(env, overrides), dependencies);
  }

  getConfig(): VaultAgentConfig {
    return this.config;
  }

  /**
   * Logs in now instead of on the first request.
   *
   * @throws {AuthenticationError} If the login fails
   */
  async authenticate(): Promise<void> {
    await this.session.ensureValid();
  }

  isAuthenticated(): boolean {
    return this.session.isValid();
  }

  /**
   * Reads a KV secret, from the cache when possible.
   */
  read(path: string, version?: number): Promise<SecretValue> {
    return this.broker.read(path, version);
  }

  /**
   * Lists secret names under a path.
   */
  listSecrets(path: string = ''): Promise<string[]> {
    return this.broker.listSecrets(path);
  }

  /**
   * Issues a fresh dynamic credential. Never cached.
   */
  issueCredential(role: string): Promise<Credential> {
    return this.broker.issueCredential(role);
  }

  getStaticCredential(role: string): Promise<StaticCredential> {
    return this.broker.getStaticCredential(role);
  }

  /**
   * Issues a credential and renders it into a connection string.
   *
   * @param template - `{username}`, `{password}` and any key of `params`
   */
  getConnectionString(role: string, template?: string, params?: Record<string, string>): Promise<string> {
    return this.broker.getConnectionString(role, template, params);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Empties the cache. Hit/miss counters are kept unless `resetStats` is set.
   */
  clearCache(resetStats: boolean = false): void {
    this.cache.clear(resetStats);
    this.observability.logger.info('Cache cleared', { resetStats });
  }

  /**
   * Drops cached static credentials: one role's, or all of them.
   *
   * @returns Number of removed entries
   */
  clearCredentialCache(role?: string): number {
    return this.broker.clearCache(role);
  }

  /**
   * Changes the default TTL for entries cached from now on.
   *
   * @throws {ConfigurationError} If the TTL is negative
   */
  setCacheTTL(seconds: number): void {
    this.cache.setDefaultTTL(seconds);
    this.observability.logger.info('Cache TTL updated', { ttl: seconds });
  }

  /**
   * Creates a manager that refreshes the role's credential inline when a
   * borrow finds it due.
   *
   * @throws {ConfigurationError} If a refresh setting is out of range
   */
  createConnectionManager<P, C, O extends object = PoolOptions>(
    role: string,
    factory: PoolFactory<P, C, O>,
    settings: ConnectionManagerSettings<O> = {}
  ): ConnectionManager<P, C, O> {
    const manager = new ConnectionManager<P, C, O>({
      role,
      broker: this.broker,
      factory,
      poolOptions: settings.poolOptions,
      refreshBuffer: settings.refreshBuffer ?? this.config.refreshBuffer,
      validationProbe: settings.validationProbe ?? this.config.validationProbe,
      validateOnBorrow: settings.validateOnBorrow,
      onRefresh: settings.onRefresh,
      clock: this.clock,
      observability: this.observability,
    });
    this.managers.add(manager);
    return manager;
  }

  /**
   * Creates a manager whose credential is renewed by a background timer.
   * Call `start()` on it to adopt the first pool.
   *
   * @throws {ConfigurationError} If a refresh setting is out of range
   */
  createBackgroundRefreshManager<P, C, O extends object = PoolOptions>(
    role: string,
    factory: PoolFactory<P, C, O>,
    settings: BackgroundRefreshSettings<O> = {}
  ): BackgroundRefreshManager<P, C, O> {
    const manager = new BackgroundRefreshManager<P, C, O>({
      role,
      broker: this.broker,
      factory,
      poolOptions: settings.poolOptions,
      refreshBuffer: settings.refreshBuffer ?? this.config.refreshBuffer,
      validationProbe: settings.validationProbe ?? this.config.validationProbe,
      validateOnBorrow: settings.validateOnBorrow,
      checkInterval: settings.checkInterval ?? this.config.checkInterval,
      onRefresh: settings.onRefresh,
      clock: this.clock,
      observability: this.observability,
    });
    this.managers.add(manager);
    return manager;
  }

  /**
   * Closes every manager created by this client and empties the cache.
   */
  async close(): Promise<void> {
    const managers = Array.from(this.managers);
    this.managers.clear();
    await Promise.all(managers.map(manager => manager.close()));
    this.cache.stopSweep();
    this.cache.clear();
    this.observability.logger.info('Vault agent client closed', { managers: managers.length });
  }
}
