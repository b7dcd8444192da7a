/**
 * Background credential refresh for one database role.
 *
 * @module scheduler
 */

import type { CredentialBroker } from '../broker/index.js';
import { validateRefreshSettings } from '../config/index.js';
import { ManagerClosedError, errorMessage } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import type { PoolCoordinator } from '../pool/index.js';
import { isRefreshDue, systemClock, type Clock, type Credential, type PoolOptions } from '../types/index.js';

/**
 * Scheduler settings.
 */
export interface RefreshSchedulerOptions<P, C, O extends object = PoolOptions> {
  role: string;
  broker: CredentialBroker;
  coordinator: PoolCoordinator<P, C, O>;
  /** Refresh at this fraction of the lease, in (0, 1] */
  refreshBuffer: number;
  /** Seconds between checks */
  checkInterval: number;
  /** Called after a refreshed credential has been adopted */
  onRefresh?: (credential: Credential) => void;
  clock?: Clock;
  observability?: Observability;
}

/**
 * Reportable refresh state.
 */
export interface RefreshStatus {
  role: string;
  /** Whether the timer loop is running */
  running: boolean;
  /** Epoch milliseconds of the last successful refresh */
  lastSuccessAt?: number;
  /** Epoch milliseconds of the last attempt */
  lastAttemptAt?: number;
  lastError?: string;
  consecutiveFailures: number;
  refreshCount: number;
}

/**
 * Proactively renews a role's credential before its lease elapses.
 *
 * Every `checkInterval` seconds the active credential is compared with
 * `issuedAt + leaseDuration * refreshBuffer`; once due, a new credential is
 * issued and handed to the coordinator. Ticks are chained, never
 * overlapping, and refreshes for the role are serialised whether they come
 * from a tick or from {@link refreshNow}.
 *
 * A failed refresh is recorded and retried on the next tick. The current
 * credential and pool keep serving.
 *
 * @example
 * ```typescript
 * const scheduler = new RefreshScheduler({
 *   role: 'readonly',
 *   broker,
 *   coordinator,
 *   refreshBuffer: 0.8,
 *   checkInterval: 60,
 * });
 * scheduler.start();
 * // ...
 * await scheduler.stop();
 * ```
 */
export class RefreshScheduler<P, C, O extends object = PoolOptions> {
  private readonly options: RefreshSchedulerOptions<P, C, O>;
  private readonly clock: Clock;
  private readonly observability: Observability;

  private timer?: NodeJS.Timeout;
  private running = false;
  private stopped = false;
  private currentTick: Promise<void> | null = null;
  private refreshChain: Promise<unknown> = Promise.resolve();

  private lastSuccessAt?: number;
  private lastAttemptAt?: number;
  private lastError?: string;
  private consecutiveFailures = 0;
  private refreshCount = 0;

  /**
   * @throws {ConfigurationError} If the buffer or interval is out of range
   */
  constructor(options: RefreshSchedulerOptions<P, C, O>) {
    validateRefreshSettings({ refreshBuffer: options.refreshBuffer, checkInterval: options.checkInterval });
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Starts the timer loop. Has no effect once stopped or already running.
   */
  start(): void {
    if (this.running || this.stopped) {
      return;
    }
    this.running = true;
    this.observability.logger.info('Background credential refresh started', {
      role: this.options.role,
      checkInterval: this.options.checkInterval,
    });
    this.schedule();
  }

  /**
   * Runs one check, refreshing when the credential is due.
   *
   * Never throws: failures are recorded in {@link status}.
   */
  async tick(): Promise<void> {
    if (this.stopped || !this.isDue()) {
      return;
    }

    try {
      // A refreshNow queued ahead of this tick may already have renewed the lease
      await this.enqueue(async () => {
        if (!this.stopped && this.isDue()) {
          await this.refresh();
        }
      });
    } catch (error) {
      this.observability.logger.error('Background refresh failed, keeping current credential', {
        role: this.options.role,
        error: errorMessage(error),
        consecutiveFailures: this.consecutiveFailures,
      });
    }
  }

  /**
   * Forces a refresh outside the timer cycle, after any refresh in progress.
   *
   * @throws The refresh failure; the current credential stays in place
   */
  async refreshNow(): Promise<Credential> {
    this.observability.logger.info('Forcing credential refresh', { role: this.options.role });
    return this.enqueue(() => this.refresh());
  }

  /**
   * Stops the loop. Waits for an in-flight refresh; none starts afterwards.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    await this.currentTick;
    await this.refreshChain.catch(() => undefined);
    this.observability.logger.info('Background credential refresh stopped', { role: this.options.role });
  }

  status(): RefreshStatus {
    return {
      role: this.options.role,
      running: this.running,
      lastSuccessAt: this.lastSuccessAt,
      lastAttemptAt: this.lastAttemptAt,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      refreshCount: this.refreshCount,
    };
  }

  private schedule(): void {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      this.currentTick = this.tick().finally(() => {
        this.currentTick = null;
        this.schedule();
      });
    }, this.options.checkInterval * 1000);
    this.timer.unref();
  }

  private isDue(): boolean {
    const handle = this.options.coordinator.currentHandle(this.options.role);
    return !handle || isRefreshDue(handle.credential, this.options.refreshBuffer, this.clock.now());
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.refreshChain.catch(() => undefined).then(task);
    this.refreshChain = next;
    return next;
  }

  private async refresh(): Promise<Credential> {
    const { role, broker, coordinator } = this.options;
    const { metrics, logger } = this.observability;

    if (this.stopped) {
      throw new ManagerClosedError(role);
    }

    this.lastAttemptAt = this.clock.now();
    try {
      const credential = await broker.issueCredential(role);
      await coordinator.adopt(role, credential);

      this.lastSuccessAt = this.clock.now();
      this.lastError = undefined;
      this.consecutiveFailures = 0;
      this.refreshCount++;
      metrics.increment(MetricNames.REFRESH_SUCCESS_TOTAL, 1, { role });
      logger.info('Credentials refreshed', {
        role,
        leaseId: credential.leaseId,
        nextRefreshInSeconds: credential.leaseDuration * this.options.refreshBuffer,
      });

      this.notify(credential);
      return credential;
    } catch (error) {
      this.lastError = errorMessage(error);
      this.consecutiveFailures++;
      metrics.increment(MetricNames.REFRESH_FAILURES_TOTAL, 1, { role });
      throw error;
    }
  }

  private notify(credential: Credential): void {
    if (!this.options.onRefresh) {
      return;
    }
    try {
      this.options.onRefresh(credential);
    } catch (error) {
      this.observability.logger.warn('onRefresh callback failed', {
        role: this.options.role,
        error: errorMessage(error),
      });
    }
  }
}
