/**
 * Configuration for the vault agent.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Default cache TTL in seconds.
 */
export const DEFAULT_CACHE_TTL = 300;

/**
 * Default maximum number of cache entries.
 */
export const DEFAULT_MAX_CACHE_SIZE = 1000;

/**
 * Default TTL for cached secret listings in seconds.
 */
export const DEFAULT_LIST_CACHE_TTL = 60;

/**
 * Default fraction of a lease after which a credential is refreshed.
 */
export const DEFAULT_REFRESH_BUFFER = 0.8;

/**
 * Default background check interval in seconds.
 */
export const DEFAULT_CHECK_INTERVAL = 60;

/**
 * Default validation probe for SQL pools.
 */
export const DEFAULT_VALIDATION_PROBE = 'SELECT 1';

/**
 * Default deadline for a single store call in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/**
 * Complete agent configuration.
 */
export interface VaultAgentConfig {
  /** Store base URL, e.g. https://vault.internal:8200 */
  readonly address: string;
  /** AppRole role ID */
  readonly roleId: string;
  /** AppRole secret ID */
  readonly secretId: string;
  /** Optional namespace sent with every request */
  readonly namespace?: string;
  /** Default cache TTL in seconds; 0 disables caching */
  readonly cacheTTL: number;
  /** Maximum number of cache entries */
  readonly maxCacheSize: number;
  /** TTL for cached listings in seconds */
  readonly listCacheTTL: number;
  /** Refresh at this fraction of the lease, in (0, 1] */
  readonly refreshBuffer: number;
  /** Background check interval in seconds */
  readonly checkInterval: number;
  /** Probe run against freshly built pools */
  readonly validationProbe: string;
  /** Deadline for a single store call */
  readonly requestTimeoutMs: number;
  /** KV engine mount point */
  readonly kvMountPoint: string;
  /** KV engine version */
  readonly kvVersion: 1 | 2;
  /** Database engine mount point */
  readonly databaseMountPoint: string;
  /** AppRole auth mount point */
  readonly approleMountPoint: string;
}

/**
 * Options accepted by {@link resolveConfig}: the three identity fields are
 * required, everything else defaults.
 */
export type VaultAgentOptions = Pick<VaultAgentConfig, 'address' | 'roleId' | 'secretId'> &
  Partial<Omit<VaultAgentConfig, 'address' | 'roleId' | 'secretId'>>;

/**
 * Zod schema for configuration validation.
 */
export const configSchema = z.object({
  address: z.string().url(),
  roleId: z.string().min(1),
  secretId: z.string().min(1),
  namespace: z.string().min(1).optional(),
  cacheTTL: z.number().finite().nonnegative(),
  maxCacheSize: z.number().int().positive(),
  listCacheTTL: z.number().finite().nonnegative(),
  refreshBuffer: z.number().gt(0).max(1),
  checkInterval: z.number().finite().positive(),
  validationProbe: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  kvMountPoint: z.string().min(1),
  kvVersion: z.union([z.literal(1), z.literal(2)]),
  databaseMountPoint: z.string().min(1),
  approleMountPoint: z.string().min(1),
});

/**
 * Validates a configuration.
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function validateConfig(config: VaultAgentConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
}

/**
 * Refresh settings a connection manager or scheduler may set per role.
 */
export type RefreshSettings = Partial<Pick<VaultAgentConfig, 'refreshBuffer' | 'checkInterval' | 'validationProbe'>>;

const refreshSettingsSchema = configSchema
  .pick({ refreshBuffer: true, checkInterval: true, validationProbe: true })
  .partial();

/**
 * Validates per-role refresh settings against the same rules as the
 * client configuration.
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function validateRefreshSettings(settings: RefreshSettings): void {
  const result = refreshSettingsSchema.safeParse(settings);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

/**
 * Applies defaults and validates.
 */
export function resolveConfig(options: VaultAgentOptions): VaultAgentConfig {
  const config: VaultAgentConfig = {
    cacheTTL: DEFAULT_CACHE_TTL,
    maxCacheSize: DEFAULT_MAX_CACHE_SIZE,
    listCacheTTL: DEFAULT_LIST_CACHE_TTL,
    refreshBuffer: DEFAULT_REFRESH_BUFFER,
    checkInterval: DEFAULT_CHECK_INTERVAL,
    validationProbe: DEFAULT_VALIDATION_PROBE,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    kvMountPoint: 'secret',
    kvVersion: 2,
    databaseMountPoint: 'database',
    approleMountPoint: 'approle',
    ...options,
  };
  validateConfig(config);
  return config;
}

/**
 * Environment variables read by {@link configFromEnv}.
 */
export const VAULT_ENV_VARS = {
  ADDRESS: 'VAULT_ADDR',
  ROLE_ID: 'VAULT_ROLE_ID',
  SECRET_ID: 'VAULT_SECRET_ID',
  NAMESPACE: 'VAULT_NAMESPACE',
  CACHE_TTL: 'VAULT_CACHE_TTL',
  MAX_CACHE_SIZE: 'VAULT_MAX_CACHE_SIZE',
} as const;

function parseNumberVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function requireVar(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is required`);
  }
  return value;
}

/**
 * Builds a configuration from environment variables.
 *
 * @param env - Environment to read, `process.env` by default
 * @param overrides - Options applied on top of the environment
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<VaultAgentOptions> = {}
): VaultAgentConfig {
  const options: VaultAgentOptions = {
    address: requireVar(env, VAULT_ENV_VARS.ADDRESS),
    roleId: requireVar(env, VAULT_ENV_VARS.ROLE_ID),
    secretId: requireVar(env, VAULT_ENV_VARS.SECRET_ID),
  };

  const namespace = env[VAULT_ENV_VARS.NAMESPACE];
  const cacheTTL = parseNumberVar(env, VAULT_ENV_VARS.CACHE_TTL);
  const maxCacheSize = parseNumberVar(env, VAULT_ENV_VARS.MAX_CACHE_SIZE);

  return resolveConfig({
    ...options,
    ...(namespace ? { namespace } : {}),
    ...(cacheTTL !== undefined ? { cacheTTL } : {}),
    ...(maxCacheSize !== undefined ? { maxCacheSize } : {}),
    ...overrides,
  });
}

/**
 * Fluent configuration builder.
 *
 * @example
 * ```typescript
 * const config = new VaultAgentConfigBuilder()
 *   .address('https://vault.internal:8200')
 *   .appRole('my-role-id', 'my-secret-id')
 *   .cacheTTL(120)
 *   .refreshBuffer(0.75)
 *   .build();
 * ```
 */
export class VaultAgentConfigBuilder {
  private options: Partial<VaultAgentOptions> = {};

  /** Sets the store base URL. */
  address(value: string): this {
    this.options = { ...this.options, address: value };
    return this;
  }

  /** Sets the AppRole credentials. */
  appRole(roleId: string, secretId: string): this {
    this.options = { ...this.options, roleId, secretId };
    return this;
  }

  namespace(value: string): this {
    this.options = { ...this.options, namespace: value };
    return this;
  }

  cacheTTL(seconds: number): this {
    this.options = { ...this.options, cacheTTL: seconds };
    return this;
  }

  maxCacheSize(entries: number): this {
    this.options = { ...this.options, maxCacheSize: entries };
    return this;
  }

  refreshBuffer(fraction: number): this {
    this.options = { ...this.options, refreshBuffer: fraction };
    return this;
  }

  checkInterval(seconds: number): this {
    this.options = { ...this.options, checkInterval: seconds };
    return this;
  }

  validationProbe(probe: string): this {
    this.options = { ...this.options, validationProbe: probe };
    return this;
  }

  requestTimeout(ms: number): this {
    this.options = { ...this.options, requestTimeoutMs: ms };
    return this;
  }

  /** Sets KV mount point and engine version. */
  kv(mountPoint: string, version: 1 | 2 = 2): this {
    this.options = { ...this.options, kvMountPoint: mountPoint, kvVersion: version };
    return this;
  }

  databaseMountPoint(value: string): this {
    this.options = { ...this.options, databaseMountPoint: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigurationError} If a required field is missing or a value is invalid
   */
  build(): VaultAgentConfig {
    const { address, roleId, secretId, ...rest } = this.options;
    if (address === undefined || roleId === undefined || secretId === undefined) {
      throw new ConfigurationError('address, roleId and secretId are required');
    }
    return resolveConfig({ address, roleId, secretId, ...rest });
  }
}
