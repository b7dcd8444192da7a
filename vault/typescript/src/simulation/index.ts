/**
 * In-memory secret store for tests and local development.
 *
 * Mimics the store's login, KV, and database engine behaviour closely enough
 * to drive the agent end to end without a server: token leases expire,
 * dynamic roles mint a new lease per call, and failures can be injected per
 * method.
 *
 * @module simulation
 */

import {
  SecretNotFoundError,
  StoreRequestError,
  UnauthorizedError,
} from '../errors/index.js';
import {
  systemClock,
  type Clock,
  type DatabaseOptions,
  type IssueResult,
  type LoginResult,
  type ReadOptions,
  type ReadResult,
  type SecretData,
  type SecretStore,
  type StaticCredentialResult,
} from '../types/index.js';

/**
 * Methods of the {@link SecretStore} surface.
 */
export type StoreMethod = keyof SecretStore;

/**
 * Simulation settings.
 */
export interface InMemorySecretStoreOptions {
  /** Accepted AppRole role ID; any value is accepted when unset */
  roleId?: string;
  /** Accepted AppRole secret ID; any value is accepted when unset */
  secretId?: string;
  /** Lease of issued tokens in seconds; 0 never expires (default: 3600) */
  tokenLeaseDuration?: number;
  /** Artificial latency added to every call in milliseconds */
  latencyMs?: number;
  clock?: Clock;
}

/**
 * Dynamic role definition.
 */
export interface DatabaseRoleDefinition {
  /** Lease of issued credentials in seconds */
  leaseDuration: number;
  renewable?: boolean;
  /** Database engine mount (default: database) */
  mount?: string;
}

/**
 * Static role definition.
 */
export interface StaticRoleDefinition {
  username: string;
  password: string;
  /** Rotation period in seconds */
  rotationPeriod?: number;
  /** Database engine mount (default: database) */
  mount?: string;
}

interface StoredSecret {
  versions: SecretData[];
  leaseDuration?: number;
}

interface StaticRoleState {
  username: string;
  password: string;
  rotationPeriod?: number;
  lastRotation: string;
}

/**
 * Deterministic in-process {@link SecretStore}.
 *
 * @example
 * ```typescript
 * const store = new InMemorySecretStore({ roleId: 'test-role', secretId: 'test-secret' });
 * store.putSecret('app/config', { apiKey: 'placeholder' });
 * store.addDatabaseRole('readonly', { leaseDuration: 3600 });
 *
 * const client = new VaultAgentClient(
 *   { address: 'http://127.0.0.1:8200', roleId: 'test-role', secretId: 'test-secret' },
 *   { store }
 * );
 * ```
 */
export class InMemorySecretStore implements SecretStore {
  private readonly options: InMemorySecretStoreOptions;
  private readonly clock: Clock;
  private readonly secrets: Map<string, StoredSecret> = new Map();
  private readonly dynamicRoles: Map<string, DatabaseRoleDefinition> = new Map();
  private readonly staticRoles: Map<string, StaticRoleState> = new Map();
  /** token -> expiry in epoch ms (Infinity for non-expiring tokens) */
  private readonly tokens: Map<string, number> = new Map();
  private readonly failures: Map<StoreMethod, Error[]> = new Map();
  private readonly calls: Map<StoreMethod, number> = new Map();
  private readonly issuedLeases: IssueResult[] = [];
  private tokenSeq = 0;
  private leaseSeq = 0;

  constructor(options: InMemorySecretStoreOptions = {}) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  // ==========================================================================
  // Seeding
  // ==========================================================================

  /**
   * Writes a new version of a secret.
   *
   * @returns The version number just written
   */
  putSecret(path: string, data: SecretData, options: { mount?: string; leaseDuration?: number } = {}): number {
    const key = secretKey(options.mount ?? 'secret', path);
    const existing = this.secrets.get(key);
    const stored: StoredSecret = existing ?? { versions: [] };
    stored.versions.push({ ...data });
    if (options.leaseDuration !== undefined) {
      stored.leaseDuration = options.leaseDuration;
    }
    this.secrets.set(key, stored);
    return stored.versions.length;
  }

  /**
   * Removes a secret with all of its versions.
   */
  deleteSecret(path: string, mount: string = 'secret'): boolean {
    return this.secrets.delete(secretKey(mount, path));
  }

  /**
   * Defines a dynamic database role.
   */
  addDatabaseRole(role: string, definition: DatabaseRoleDefinition): void {
    this.dynamicRoles.set(roleKey(definition.mount ?? 'database', role), { ...definition });
  }

  /**
   * Defines a static database role.
   */
  addStaticRole(role: string, definition: StaticRoleDefinition): void {
    this.staticRoles.set(roleKey(definition.mount ?? 'database', role), {
      username: definition.username,
      password: definition.password,
      rotationPeriod: definition.rotationPeriod,
      lastRotation: new Date(this.clock.now()).toISOString(),
    });
  }

  /**
   * Rotates a static role's password, as the store does on its schedule.
   */
  rotateStaticRole(role: string, password: string, mount: string = 'database'): void {
    const state = this.staticRoles.get(roleKey(mount, role));
    if (!state) {
      throw new SecretNotFoundError('static role', role);
    }
    state.password = password;
    state.lastRotation = new Date(this.clock.now()).toISOString();
  }

  // ==========================================================================
  // Failure injection and inspection
  // ==========================================================================

  /**
   * Makes the next call of `method` fail with `error`. Queued failures are
   * consumed in order.
   */
  failNext(method: StoreMethod, error: Error): void {
    const queue = this.failures.get(method) ?? [];
    queue.push(error);
    this.failures.set(method, queue);
  }

  /**
   * Revokes a token; subsequent calls with it are rejected as unauthorized.
   */
  revokeToken(token: string): void {
    this.tokens.delete(token);
  }

  /**
   * Revokes every token issued so far.
   */
  revokeAllTokens(): void {
    this.tokens.clear();
  }

  /**
   * Number of calls made to `method`, failed calls included.
   */
  callCount(method: StoreMethod): number {
    return this.calls.get(method) ?? 0;
  }

  resetCallCounts(): void {
    this.calls.clear();
  }

  /**
   * Every dynamic credential issued so far, oldest first.
   */
  getIssuedLeases(): readonly IssueResult[] {
    return this.issuedLeases;
  }

  // ==========================================================================
  // SecretStore
  // ==========================================================================

  async login(roleId: string, secretId: string): Promise<LoginResult> {
    await this.enter('login');

    const { roleId: expectedRoleId, secretId: expectedSecretId } = this.options;
    if (
      (expectedRoleId !== undefined && roleId !== expectedRoleId) ||
      (expectedSecretId !== undefined && secretId !== expectedSecretId)
    ) {
      throw new StoreRequestError('invalid role or secret ID', 400);
    }

    const leaseDuration = this.options.tokenLeaseDuration ?? 3600;
    const token = `sim-token-${++this.tokenSeq}`;
    this.tokens.set(token, leaseDuration > 0 ? this.clock.now() + leaseDuration * 1000 : Infinity);
    return { token, leaseDuration, renewable: true };
  }

  async read(token: string, path: string, options: ReadOptions): Promise<ReadResult> {
    await this.enter('read');
    this.authorize(token);

    const stored = this.secrets.get(secretKey(options.mount, path));
    if (!stored) {
      throw new SecretNotFoundError('secret', path);
    }

    const version = options.version ?? stored.versions.length;
    const data = stored.versions[version - 1];
    if (data === undefined) {
      throw new SecretNotFoundError('secret', `${path}?version=${version}`);
    }

    return {
      data: { ...data },
      version,
      ...(stored.leaseDuration !== undefined ? { leaseDuration: stored.leaseDuration } : {}),
    };
  }

  async list(token: string, path: string, options: ReadOptions): Promise<string[]> {
    await this.enter('list');
    this.authorize(token);

    const prefix = normalize(path);
    const scope = `${options.mount}:${prefix === '' ? '' : `${prefix}/`}`;
    const keys = new Set<string>();

    for (const key of this.secrets.keys()) {
      if (!key.startsWith(scope)) {
        continue;
      }
      const rest = key.slice(scope.length);
      const slash = rest.indexOf('/');
      keys.add(slash === -1 ? rest : rest.slice(0, slash + 1));
    }

    if (keys.size === 0) {
      throw new SecretNotFoundError('secret', path);
    }
    return Array.from(keys).sort();
  }

  async issueCredential(token: string, role: string, options: DatabaseOptions): Promise<IssueResult> {
    await this.enter('issueCredential');
    this.authorize(token);

    const definition = this.dynamicRoles.get(roleKey(options.mount, role));
    if (!definition) {
      throw new SecretNotFoundError('role', role);
    }

    const seq = ++this.leaseSeq;
    const result: IssueResult = {
      leaseId: `${options.mount}/creds/${role}/lease-${seq}`,
      username: `v-approle-${role}-${seq}`,
      password: `sim-password-${seq}`,
      leaseDuration: definition.leaseDuration,
      renewable: definition.renewable ?? true,
    };
    this.issuedLeases.push(result);
    return { ...result };
  }

  async readStaticCredential(token: string, role: string, options: DatabaseOptions): Promise<StaticCredentialResult> {
    await this.enter('readStaticCredential');
    this.authorize(token);

    const state = this.staticRoles.get(roleKey(options.mount, role));
    if (!state) {
      throw new SecretNotFoundError('static role', role);
    }

    const result: StaticCredentialResult = {
      username: state.username,
      password: state.password,
      lastRotation: state.lastRotation,
    };
    if (state.rotationPeriod !== undefined) {
      const elapsed = Math.floor((this.clock.now() - Date.parse(state.lastRotation)) / 1000);
      result.rotationPeriod = state.rotationPeriod;
      result.ttl = Math.max(0, state.rotationPeriod - elapsed);
    }
    return result;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async enter(method: StoreMethod): Promise<void> {
    this.calls.set(method, this.callCount(method) + 1);

    const latency = this.options.latencyMs ?? 0;
    if (latency > 0) {
      await new Promise<void>(resolve => setTimeout(resolve, latency));
    }

    const injected = this.failures.get(method)?.shift();
    if (injected) {
      throw injected;
    }
  }

  private authorize(token: string): void {
    const expiresAt = this.tokens.get(token);
    if (expiresAt === undefined) {
      throw new UnauthorizedError('permission denied', 403);
    }
    if (this.clock.now() >= expiresAt) {
      this.tokens.delete(token);
      throw new UnauthorizedError('permission denied', 403);
    }
  }
}

function normalize(path: string): string {
  return path.split('/').filter(segment => segment.length > 0).join('/');
}

function secretKey(mount: string, path: string): string {
  return `${mount}:${normalize(path)}`;
}

function roleKey(mount: string, role: string): string {
  return `${mount}:${role}`;
}
