/**
 * Connection managers for dynamic database credentials.
 *
 * {@link ConnectionManager} checks credential freshness on every borrow and
 * refreshes inline when due. {@link BackgroundRefreshManager} delegates that
 * to a {@link RefreshScheduler} so borrowers never wait on a refresh.
 *
 * @module pool/manager
 */

import type { CredentialBroker } from '../broker/index.js';
import { validateRefreshSettings } from '../config/index.js';
import { ConfigurationError, ManagerClosedError, ValidationError, errorMessage } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import { SingleFlight } from '../resilience/index.js';
import { RefreshScheduler, type RefreshStatus } from '../scheduler/index.js';
import { isRefreshDue, systemClock, type Clock, type Credential, type PoolFactory, type PoolOptions } from '../types/index.js';
import { PoolCoordinator, type BorrowedResource, type PoolHandle } from './index.js';

/**
 * Options shared by both managers.
 */
export interface ConnectionManagerOptions<P, C, O extends object = PoolOptions> {
  role: string;
  broker: CredentialBroker;
  factory: PoolFactory<P, C, O>;
  /** Passed to `factory.build` unchanged */
  poolOptions?: O;
  /** Refresh at this fraction of the lease, in (0, 1] */
  refreshBuffer: number;
  /** Probe run against each new pool */
  validationProbe: string;
  /**
   * Also probe every borrowed connection with `factory.validateConnection`.
   * A failed probe refreshes the credential and retries the borrow once.
   */
  validateOnBorrow?: boolean;
  /** Called after a refreshed credential has been adopted */
  onRefresh?: (credential: Credential) => void;
  clock?: Clock;
  observability?: Observability;
}

/**
 * Keeps a pool for one role built from a fresh dynamic credential.
 *
 * When a borrow finds the credential past its refresh point, the borrower
 * issues a new credential and adopts a new pool before proceeding; concurrent
 * borrowers share that refresh.
 *
 * @example
 * ```typescript
 * const manager = client.createConnectionManager('readonly', new PgPoolFactory());
 * await manager.initialize();
 * const rows = await manager.getConnection(async client => {
 *   const result = await client.query('SELECT id FROM users');
 *   return result.rows;
 * });
 * await manager.close();
 * ```
 */
export class ConnectionManager<P, C, O extends object = PoolOptions> {
  protected readonly options: ConnectionManagerOptions<P, C, O>;
  protected readonly coordinator: PoolCoordinator<P, C, O>;
  protected readonly clock: Clock;
  protected readonly observability: Observability;
  private readonly refreshes = new SingleFlight<string, Credential>();
  protected closing = false;

  /**
   * @throws {ConfigurationError} If the refresh settings are out of range, or
   *   `validateOnBorrow` is set for a factory without `validateConnection`
   */
  constructor(options: ConnectionManagerOptions<P, C, O>) {
    validateRefreshSettings({ refreshBuffer: options.refreshBuffer, validationProbe: options.validationProbe });
    if (options.validateOnBorrow && !options.factory.validateConnection) {
      throw new ConfigurationError('validateOnBorrow needs a pool factory that implements validateConnection');
    }
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.observability = options.observability ?? createNoopObservability();
    this.coordinator = new PoolCoordinator({
      factory: options.factory,
      poolOptions: options.poolOptions,
      validationProbe: options.validationProbe,
      observability: this.observability,
    });
  }

  get role(): string {
    return this.options.role;
  }

  /**
   * Issues the first credential and adopts the first pool.
   */
  async initialize(): Promise<Credential> {
    this.assertOpen();
    const handle = this.coordinator.currentHandle(this.role);
    if (handle) {
      return handle.credential;
    }
    return this.refresh();
  }

  /**
   * Lends a connection to `fn` and returns it afterwards.
   *
   * @throws {ManagerClosedError} Once the manager is closed
   */
  async getConnection<T>(fn: (connection: C) => Promise<T>): Promise<T> {
    this.assertOpen();
    await this.ensureFresh();
    if (!this.options.validateOnBorrow) {
      return this.coordinator.withResource(this.role, fn);
    }
    return this.coordinator.use(await this.borrowValidated(), fn);
  }

  /**
   * Issues a new credential and swaps in a new pool now.
   */
  async refreshNow(): Promise<Credential> {
    this.assertOpen();
    this.observability.logger.info('Forcing credential refresh', { role: this.role });
    return this.refresh();
  }

  /**
   * Credential behind the active pool.
   */
  currentCredential(): Credential | undefined {
    return this.coordinator.currentHandle(this.role)?.credential;
  }

  currentHandle(): PoolHandle<P> | undefined {
    return this.coordinator.currentHandle(this.role);
  }

  /**
   * Stops lending connections and drains the pools.
   */
  async close(): Promise<void> {
    if (this.closing) {
      return;
    }
    this.closing = true;
    await this.refreshes.wait(this.role);
    await this.coordinator.close();
    this.observability.logger.info('Connection manager closed', { role: this.role });
  }

  /**
   * Refreshes inline when no pool exists or the credential is due.
   */
  protected async ensureFresh(): Promise<void> {
    const credential = this.currentCredential();
    if (credential && !isRefreshDue(credential, this.options.refreshBuffer, this.clock.now())) {
      return;
    }
    this.observability.logger.info('Credentials due for refresh before borrow', { role: this.role });
    await this.refresh();
  }

  /**
   * Replaces the credential after a borrowed connection failed its probe.
   */
  protected renew(): Promise<Credential> {
    return this.refresh();
  }

  protected assertOpen(): void {
    if (this.closing) {
      throw new ManagerClosedError(this.role);
    }
  }

  private refresh(): Promise<Credential> {
    return this.refreshes.run(this.role, async () => {
      const credential = await this.options.broker.issueCredential(this.role);
      await this.coordinator.adopt(this.role, credential);
      this.notify(credential);
      return credential;
    });
  }

  private async borrowValidated(): Promise<BorrowedResource<C>> {
    const first = await this.coordinator.borrow(this.role);
    if (await this.checkConnection(first)) {
      return first;
    }

    this.observability.logger.info('Connection validation failed, refreshing credentials', { role: this.role });
    await this.renew();

    const second = await this.coordinator.borrow(this.role);
    if (await this.checkConnection(second)) {
      return second;
    }
    throw new ValidationError(this.role, 'borrowed connection failed validation after refresh');
  }

  /**
   * Probes a borrowed connection; a failing one is released as broken.
   */
  private async checkConnection(resource: BorrowedResource<C>): Promise<boolean> {
    const { factory, validationProbe } = this.options;
    let valid = false;
    try {
      valid = factory.validateConnection ? await factory.validateConnection(resource.connection, validationProbe) : true;
    } catch (error) {
      this.observability.logger.warn('Connection validation probe threw', {
        role: this.role,
        error: errorMessage(error),
      });
    }

    if (!valid) {
      this.observability.metrics.increment(MetricNames.POOL_VALIDATION_FAILURES_TOTAL, 1, { role: this.role });
      await resource.release(new ValidationError(this.role, `probe "${validationProbe}" failed on a borrowed connection`));
    }
    return valid;
  }

  private notify(credential: Credential): void {
    try {
      this.options.onRefresh?.(credential);
    } catch (error) {
      this.observability.logger.warn('onRefresh callback failed', {
        role: this.role,
        error: errorMessage(error),
      });
    }
  }
}

/**
 * Options for {@link BackgroundRefreshManager}.
 */
export interface BackgroundRefreshManagerOptions<P, C, O extends object = PoolOptions>
  extends ConnectionManagerOptions<P, C, O> {
  /** Seconds between background checks */
  checkInterval: number;
}

/**
 * Connection manager whose credentials are renewed by a background timer.
 *
 * Borrowers never trigger a refresh; a failed background refresh leaves the
 * current pool serving until the next tick succeeds.
 */
export class BackgroundRefreshManager<P, C, O extends object = PoolOptions> extends ConnectionManager<P, C, O> {
  private readonly scheduler: RefreshScheduler<P, C, O>;

  constructor(options: BackgroundRefreshManagerOptions<P, C, O>) {
    super(options);
    this.scheduler = new RefreshScheduler({
      role: options.role,
      broker: options.broker,
      coordinator: this.coordinator,
      refreshBuffer: options.refreshBuffer,
      checkInterval: options.checkInterval,
      onRefresh: options.onRefresh,
      clock: this.clock,
      observability: this.observability,
    });
  }

  /**
   * Adopts the first pool and starts the background loop.
   */
  async start(): Promise<Credential> {
    const credential = await this.initialize();
    this.scheduler.start();
    return credential;
  }

  /**
   * Stops the background loop, letting an in-flight refresh finish.
   */
  async stop(): Promise<void> {
    await this.scheduler.stop();
  }

  override async refreshNow(): Promise<Credential> {
    this.assertOpen();
    return this.scheduler.refreshNow();
  }

  protected override renew(): Promise<Credential> {
    return this.scheduler.refreshNow();
  }

  status(): RefreshStatus {
    return this.scheduler.status();
  }

  override async close(): Promise<void> {
    if (this.closing) {
      return;
    }
    await this.stop();
    await super.close();
  }

  /**
   * Only adopts when no pool exists yet; staleness is the scheduler's job.
   */
  protected override async ensureFresh(): Promise<void> {
    if (!this.currentCredential()) {
      await this.initialize();
    }
  }
}
