/**
 * Vault Agent
 *
 * Credential lifecycle engine for applications that read secrets from a
 * Vault-compatible store:
 * - Cached KV reads with per-entry TTLs and bounded capacity
 * - AppRole session with transparent, single-flight re-authentication
 * - Dynamic database credentials refreshed before their lease elapses
 * - Connection pools rebuilt, validated and swapped on every rotation
 *
 * @example Reading secrets
 * ```typescript
 * import { VaultAgentClient } from 'vault-agent';
 *
 * const client = new VaultAgentClient({
 *   address: 'https://vault.internal:8200',
 *   roleId: process.env.VAULT_ROLE_ID ?? '',
 *   secretId: process.env.VAULT_SECRET_ID ?? '',
 * });
 *
 * const secret = await client.read('app/config');
 * console.log(secret.data.apiUrl);
 * ```
 *
 * @example Database pools with background refresh
 * ```typescript
 * import { VaultAgentClient, PgPoolFactory } from 'vault-agent';
 *
 * const client = VaultAgentClient.fromEnv();
 * const manager = client.createBackgroundRefreshManager(
 *   'readonly',
 *   new PgPoolFactory({ host: 'db.internal', database: 'app' }),
 *   { checkInterval: 30 }
 * );
 * await manager.start();
 *
 * const users = await manager.getConnection(async db => {
 *   const result = await db.query('SELECT id, email FROM users');
 *   return result.rows;
 * });
 *
 * await client.close();
 * ```
 *
 * @module vault-agent
 */

// Client exports
export { VaultAgentClient } from './client/index.js';
export type {
  VaultAgentClientDependencies,
  ConnectionManagerSettings,
  BackgroundRefreshSettings,
} from './client/index.js';

// Configuration exports
export {
  VaultAgentConfigBuilder,
  resolveConfig,
  validateConfig,
  validateRefreshSettings,
  configFromEnv,
  configSchema,
  VAULT_ENV_VARS,
  DEFAULT_CACHE_TTL,
  DEFAULT_MAX_CACHE_SIZE,
  DEFAULT_LIST_CACHE_TTL,
  DEFAULT_REFRESH_BUFFER,
  DEFAULT_CHECK_INTERVAL,
  DEFAULT_VALIDATION_PROBE,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './config/index.js';
export type { VaultAgentConfig, VaultAgentOptions, RefreshSettings } from './config/index.js';

// Error exports
export {
  VaultAgentError,
  AuthenticationError,
  UnauthorizedError,
  SecretNotFoundError,
  StoreUnavailableError,
  StoreTimeoutError,
  StoreRequestError,
  ValidationError,
  ConfigurationError,
  PoolNotReadyError,
  ManagerClosedError,
  isVaultAgentError,
  isRetryableError,
  wrapError,
  errorMessage,
} from './errors/index.js';
export type { VaultAgentErrorCode } from './errors/index.js';

// Type exports
export { systemClock, refreshDueAt, isRefreshDue } from './types/index.js';
export type {
  Clock,
  LoginResult,
  SecretData,
  ReadResult,
  IssueResult,
  StaticCredentialResult,
  ReadOptions,
  DatabaseOptions,
  SecretStore,
  SecretValue,
  Credential,
  StaticCredential,
  PoolOptions,
  PoolFactory,
} from './types/index.js';

// Component exports
export { SecretCache } from './cache/index.js';
export type { CacheEntry, CacheStats, SecretCacheConfig } from './cache/index.js';
export { AuthSession, AuthState } from './auth/index.js';
export type { AuthSessionOptions } from './auth/index.js';
export { CredentialBroker, DEFAULT_CONNECTION_TEMPLATE } from './broker/index.js';
export type { CachedItem, CredentialBrokerOptions } from './broker/index.js';
export { RefreshScheduler } from './scheduler/index.js';
export type { RefreshSchedulerOptions, RefreshStatus } from './scheduler/index.js';
export { PoolCoordinator, PoolHandle, PoolHandleState } from './pool/index.js';
export type { BorrowedResource, PoolCoordinatorOptions } from './pool/index.js';
export { ConnectionManager, BackgroundRefreshManager } from './pool/manager.js';
export type { ConnectionManagerOptions, BackgroundRefreshManagerOptions } from './pool/manager.js';
export { PgPoolFactory } from './pool/pg.js';
export { SingleFlight, withTimeout } from './resilience/index.js';

// Store exports
export { HttpSecretStore, FetchTransport, encodePath } from './http/index.js';
export type { HttpRequest, HttpResponse, HttpSecretStoreOptions, Transport, TransportOptions } from './http/index.js';
export { InMemorySecretStore } from './simulation/index.js';
export type {
  InMemorySecretStoreOptions,
  DatabaseRoleDefinition,
  StaticRoleDefinition,
  StoreMethod,
} from './simulation/index.js';
export { ManualClock, FakePoolFactory } from './testing/index.js';
export type { FakePool, FakeConnection } from './testing/index.js';

// Observability exports
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';
export type { Logger, LogEntry, MetricsCollector, MetricEntry, Observability } from './observability/index.js';
