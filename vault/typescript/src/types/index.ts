/**
 * Core types for the vault agent.
 *
 * Lease durations and TTLs are in seconds, as the store reports them.
 * Timestamps are epoch milliseconds read from a {@link Clock}.
 *
 * @module types
 */

// ============================================================================
// Clock
// ============================================================================

/**
 * Source of the current time in epoch milliseconds.
 */
export interface Clock {
  now(): number;
}

/**
 * Clock backed by `Date.now()`.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

// ============================================================================
// Secret Store (consumed)
// ============================================================================

/**
 * Result of a successful login.
 */
export interface LoginResult {
  /** Client token */
  token: string;
  /** Token lease in seconds; 0 means the token does not expire */
  leaseDuration: number;
  /** Whether the token can be renewed */
  renewable?: boolean;
}

/**
 * Arbitrary key/value payload of a secret.
 */
export type SecretData = Record<string, unknown>;

/**
 * Result of a secret read.
 */
export interface ReadResult {
  data: SecretData;
  /** Version of the secret that was read (versioned engines only) */
  version?: number;
  /** Lease in seconds when the store attaches one */
  leaseDuration?: number;
}

/**
 * Result of a dynamic credential issue.
 */
export interface IssueResult {
  leaseId: string;
  username: string;
  password: string;
  leaseDuration: number;
  renewable?: boolean;
}

/**
 * Result of a static credential read.
 */
export interface StaticCredentialResult {
  username: string;
  password: string;
  /** ISO timestamp of the last rotation performed by the store */
  lastRotation?: string;
  /** Rotation period in seconds */
  rotationPeriod?: number;
  /** Seconds until the next rotation */
  ttl?: number;
}

/**
 * Options for KV reads.
 */
export interface ReadOptions {
  /** KV mount point */
  mount: string;
  /** Specific version to read */
  version?: number;
}

/**
 * Options for database engine calls.
 */
export interface DatabaseOptions {
  /** Database engine mount point */
  mount: string;
}

/**
 * Authenticated request surface of the remote secret store.
 *
 * Implementations fail with `UnauthorizedError`, `SecretNotFoundError`,
 * `StoreUnavailableError` or `StoreTimeoutError`.
 */
export interface SecretStore {
  login(roleId: string, secretId: string): Promise<LoginResult>;
  read(token: string, path: string, options: ReadOptions): Promise<ReadResult>;
  list(token: string, path: string, options: ReadOptions): Promise<string[]>;
  issueCredential(token: string, role: string, options: DatabaseOptions): Promise<IssueResult>;
  readStaticCredential(token: string, role: string, options: DatabaseOptions): Promise<StaticCredentialResult>;
}

// ============================================================================
// Produced values
// ============================================================================

/**
 * A secret value returned to the application.
 */
export interface SecretValue {
  path: string;
  data: SecretData;
  version?: number;
  leaseDuration?: number;
}

/**
 * A dynamic database credential. Immutable once issued; a refresh produces a
 * new one.
 */
export interface Credential {
  readonly role: string;
  readonly leaseId: string;
  readonly username: string;
  readonly password: string;
  /** Epoch milliseconds when the credential was issued */
  readonly issuedAt: number;
  /** Lease in seconds */
  readonly leaseDuration: number;
  readonly renewable: boolean;
}

/**
 * A static-role database credential.
 */
export interface StaticCredential {
  readonly role: string;
  readonly username: string;
  readonly password: string;
  readonly lastRotation?: string;
  readonly rotationPeriod?: number;
  readonly ttl?: number;
}

/**
 * Milliseconds timestamp at which a credential should be refreshed.
 *
 * @param refreshBuffer - Fraction of the lease after which renewal begins
 */
export function refreshDueAt(credential: Credential, refreshBuffer: number): number {
  return credential.issuedAt + credential.leaseDuration * refreshBuffer * 1000;
}

/**
 * Whether a credential has reached its refresh point.
 */
export function isRefreshDue(credential: Credential, refreshBuffer: number, now: number): boolean {
  return now >= refreshDueAt(credential, refreshBuffer);
}

// ============================================================================
// Pool factory (consumed)
// ============================================================================

/**
 * Options passed through to the pool factory unchanged.
 */
export type PoolOptions = Record<string, unknown>;

/**
 * Application-supplied factory for downstream resource pools.
 *
 * @typeParam P - Pool type
 * @typeParam C - Borrowed resource (connection) type
 * @typeParam O - Pool options accepted by `build`
 */
export interface PoolFactory<P, C, O extends object = PoolOptions> {
  /** Builds a new pool authenticated with the credential. */
  build(credential: Credential, options?: O): P | Promise<P>;
  /** Runs the validation probe against at least one fresh resource of the pool. */
  validate(pool: P, probe: string): Promise<boolean>;
  /**
   * Runs the validation probe on a borrowed resource. Needed only by managers
   * that validate on borrow.
   */
  validateConnection?(connection: C, probe: string): Promise<boolean>;
  /** Borrows a resource from the pool. */
  acquire(pool: P): Promise<C>;
  /** Returns a resource to the pool; `error` marks it broken. */
  release(pool: P, connection: C, error?: Error): void | Promise<void>;
  /** Closes the pool and all of its resources. */
  close(pool: P): Promise<void>;
}
