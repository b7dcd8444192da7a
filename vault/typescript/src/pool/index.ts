/**
 * Pool coordination: credential-bound pools that are validated, swapped
 * atomically and drained.
 *
 * @module pool
 */

import { ManagerClosedError, PoolNotReadyError, ValidationError, errorMessage } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import type { Credential, PoolFactory, PoolOptions } from '../types/index.js';

/**
 * Lifecycle of a pool handle.
 */
export enum PoolHandleState {
  /** Receives new borrows */
  Active = 'active',
  /** Superseded; serves outstanding borrows only */
  Draining = 'draining',
  /** Closed */
  Retired = 'retired',
}

/**
 * A pool together with the credential it was built from.
 */
export class PoolHandle<P> {
  readonly id: number;
  readonly role: string;
  readonly pool: P;
  readonly credential: Credential;
  readonly createdAt: Date;
  private currentState: PoolHandleState = PoolHandleState.Active;
  private borrowed = 0;

  constructor(id: number, role: string, pool: P, credential: Credential) {
    this.id = id;
    this.role = role;
    this.pool = pool;
    this.credential = credential;
    this.createdAt = new Date();
  }

  get state(): PoolHandleState {
    return this.currentState;
  }

  /** Number of resources currently lent out. */
  get borrowCount(): number {
    return this.borrowed;
  }

  /** @internal */
  checkout(): void {
    this.borrowed++;
  }

  /** @internal */
  checkin(): number {
    this.borrowed = Math.max(0, this.borrowed - 1);
    return this.borrowed;
  }

  /** @internal */
  transition(state: PoolHandleState): void {
    this.currentState = state;
  }
}

/**
 * A resource on loan from a pool handle.
 */
export interface BorrowedResource<C> {
  readonly connection: C;
  /** Handle the resource belongs to */
  readonly handleId: number;
  /**
   * Returns the resource. Idempotent; pass the error that broke the
   * resource so the pool can discard it.
   */
  release(error?: Error): Promise<void>;
}

/**
 * Coordinator settings.
 */
export interface PoolCoordinatorOptions<P, C, O extends object = PoolOptions> {
  factory: PoolFactory<P, C, O>;
  /** Passed to `factory.build` unchanged */
  poolOptions?: O;
  /** Probe run by `factory.validate` against each new pool */
  validationProbe: string;
  observability?: Observability;
}

/**
 * Owns at most one active pool per role.
 *
 * `adopt` builds and validates a pool for a new credential before the swap;
 * the swap itself is a single map assignment, so borrowers see either the
 * old pool or the new one, never a half-built pool. Superseded pools keep
 * serving their outstanding borrows and are closed when the last one is
 * returned.
 *
 * @example
 * ```typescript
 * const coordinator = new PoolCoordinator({
 *   factory: new PgPoolFactory(),
 *   poolOptions: { host: 'db.internal', database: 'app' },
 *   validationProbe: 'SELECT 1',
 * });
 * await coordinator.adopt('readonly', credential);
 * const rows = await coordinator.withResource('readonly', client => client.query('SELECT now()'));
 * ```
 */
export class PoolCoordinator<P, C, O extends object = PoolOptions> {
  private readonly options: PoolCoordinatorOptions<P, C, O>;
  private readonly observability: Observability;
  private readonly active: Map<string, PoolHandle<P>> = new Map();
  private readonly draining: Set<PoolHandle<P>> = new Set();
  private nextHandleId = 1;
  private closed = false;

  constructor(options: PoolCoordinatorOptions<P, C, O>) {
    this.options = options;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Returns the active handle for a role.
   */
  currentHandle(role: string): PoolHandle<P> | undefined {
    return this.active.get(role);
  }

  /**
   * Handles that were superseded and still have resources on loan.
   */
  drainingHandles(role?: string): PoolHandle<P>[] {
    return Array.from(this.draining).filter(h => role === undefined || h.role === role);
  }

  /**
   * Builds, validates and activates a pool for the credential.
   *
   * @throws {ValidationError} If the new pool fails its probe; the previous
   *   handle stays active.
   * @throws {ManagerClosedError} If the coordinator was closed meanwhile; the
   *   new pool is closed again.
   */
  async adopt(role: string, credential: Credential): Promise<PoolHandle<P>> {
    const { factory, poolOptions, validationProbe } = this.options;
    const { logger, metrics } = this.observability;

    if (this.closed) {
      throw new ManagerClosedError(role);
    }

    let pool: P;
    try {
      pool = await factory.build(credential, poolOptions);
    } catch (error) {
      metrics.increment(MetricNames.POOL_VALIDATION_FAILURES_TOTAL, 1, { role });
      throw new ValidationError(role, `pool build failed: ${errorMessage(error)}`, error);
    }

    let valid: boolean;
    try {
      valid = await factory.validate(pool, validationProbe);
    } catch (error) {
      await this.discard(role, pool);
      metrics.increment(MetricNames.POOL_VALIDATION_FAILURES_TOTAL, 1, { role });
      throw new ValidationError(role, errorMessage(error), error);
    }

    if (!valid) {
      await this.discard(role, pool);
      metrics.increment(MetricNames.POOL_VALIDATION_FAILURES_TOTAL, 1, { role });
      throw new ValidationError(role, `probe "${validationProbe}" failed`);
    }

    if (this.closed) {
      await this.discard(role, pool);
      throw new ManagerClosedError(role);
    }

    const handle = new PoolHandle(this.nextHandleId++, role, pool, credential);
    const previous = this.active.get(role);
    this.active.set(role, handle);

    metrics.increment(MetricNames.POOL_ADOPTIONS_TOTAL, 1, { role });
    logger.info('Connection pool adopted', { role, handleId: handle.id, leaseId: credential.leaseId });

    if (previous) {
      await this.drain(previous);
    }

    return handle;
  }

  /**
   * Borrows a resource from the role's active pool.
   *
   * @throws {PoolNotReadyError} If no pool has been adopted for the role
   */
  async borrow(role: string): Promise<BorrowedResource<C>> {
    const handle = this.active.get(role);
    if (!handle) {
      throw new PoolNotReadyError(role);
    }

    // Counted before the await so a concurrent swap cannot retire the pool
    // while the acquire is pending.
    handle.checkout();
    let connection: C;
    try {
      connection = await this.options.factory.acquire(handle.pool);
    } catch (error) {
      await this.checkin(handle);
      throw error;
    }
    this.observability.metrics.gauge(MetricNames.POOL_BORROWED, handle.borrowCount, { role });

    let released = false;
    return {
      connection,
      handleId: handle.id,
      release: async (error?: Error) => {
        if (released) {
          return;
        }
        released = true;
        try {
          await this.options.factory.release(handle.pool, connection, error);
        } finally {
          await this.checkin(handle);
        }
      },
    };
  }

  /**
   * Borrows a resource for the duration of `fn`.
   */
  async withResource<T>(role: string, fn: (connection: C) => Promise<T>): Promise<T> {
    return this.use(await this.borrow(role), fn);
  }

  /**
   * Lends an already borrowed resource to `fn`, then releases it, marking it
   * broken when `fn` throws.
   */
  async use<T>(resource: BorrowedResource<C>, fn: (connection: C) => Promise<T>): Promise<T> {
    try {
      const result = await fn(resource.connection);
      await resource.release();
      return result;
    } catch (error) {
      await resource.release(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  /**
   * Drains pools, every role's by default. Idle pools close immediately, the
   * rest when their last resource is returned.
   *
   * Closing every role also closes the coordinator: later adoptions fail.
   */
  async close(role?: string): Promise<void> {
    if (role === undefined) {
      this.closed = true;
    }
    const handles = Array.from(this.active.values()).filter(h => role === undefined || h.role === role);
    for (const handle of handles) {
      this.active.delete(handle.role);
    }
    await Promise.all(handles.map(handle => this.drain(handle)));
  }

  private async drain(handle: PoolHandle<P>): Promise<void> {
    handle.transition(PoolHandleState.Draining);
    this.draining.add(handle);
    this.observability.logger.info('Draining connection pool', {
      role: handle.role,
      handleId: handle.id,
      borrowed: handle.borrowCount,
    });
    if (handle.borrowCount === 0) {
      await this.retire(handle);
    }
  }

  private async checkin(handle: PoolHandle<P>): Promise<void> {
    const remaining = handle.checkin();
    this.observability.metrics.gauge(MetricNames.POOL_BORROWED, remaining, { role: handle.role });
    if (remaining === 0 && handle.state === PoolHandleState.Draining) {
      await this.retire(handle);
    }
  }

  private async retire(handle: PoolHandle<P>): Promise<void> {
    if (handle.state === PoolHandleState.Retired) {
      return;
    }
    handle.transition(PoolHandleState.Retired);
    this.draining.delete(handle);

    try {
      await this.options.factory.close(handle.pool);
      this.observability.metrics.increment(MetricNames.POOL_RETIREMENTS_TOTAL, 1, { role: handle.role });
      this.observability.logger.info('Connection pool retired', { role: handle.role, handleId: handle.id });
    } catch (error) {
      this.observability.logger.warn('Error closing retired pool', {
        role: handle.role,
        handleId: handle.id,
        error: errorMessage(error),
      });
    }
  }

  private async discard(role: string, pool: P): Promise<void> {
    try {
      await this.options.factory.close(pool);
    } catch (error) {
      this.observability.logger.warn('Error closing rejected pool', { role, error: errorMessage(error) });
    }
  }
}
