/**
 * Tests for RefreshScheduler
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { RefreshScheduler, type RefreshSchedulerOptions } from '../index.js';
import { AuthSession } from '../../auth/index.js';
import { CredentialBroker, type CachedItem } from '../../broker/index.js';
import { SecretCache } from '../../cache/index.js';
import { ConfigurationError, ManagerClosedError, StoreUnavailableError } from '../../errors/index.js';
import { LogLevel, MetricNames, createInMemoryObservability } from '../../observability/index.js';
import { PoolCoordinator } from '../../pool/index.js';
import { InMemorySecretStore } from '../../simulation/index.js';
import { FakePoolFactory, ManualClock, type FakeConnection, type FakePool } from '../../testing/index.js';
import type { PoolOptions } from '../../types/index.js';

type Options = RefreshSchedulerOptions<FakePool, FakeConnection, PoolOptions>;

function setup(overrides: Partial<Options> = {}) {
  const clock = new ManualClock(0);
  const store = new InMemorySecretStore({ roleId: 'test-role', secretId: 'test-secret', clock });
  store.addDatabaseRole('readonly', { leaseDuration: 100 });
  const observability = createInMemoryObservability();
  const session = new AuthSession({
    store,
    roleId: 'test-role',
    secretId: 'test-secret',
    requestTimeoutMs: 1000,
    clock,
    observability,
  });
  const broker = new CredentialBroker({
    store,
    session,
    cache: new SecretCache<CachedItem>({ defaultTTL: 300, maxSize: 100, clock }),
    requestTimeoutMs: 1000,
    kvMountPoint: 'secret',
    databaseMountPoint: 'database',
    listCacheTTL: 60,
    clock,
    observability,
  });
  const factory = new FakePoolFactory();
  const coordinator = new PoolCoordinator<FakePool, FakeConnection, PoolOptions>({
    factory,
    validationProbe: 'SELECT 1',
    observability,
  });
  const scheduler = new RefreshScheduler<FakePool, FakeConnection, PoolOptions>({
    role: 'readonly',
    broker,
    coordinator,
    refreshBuffer: 0.8,
    checkInterval: 10,
    clock,
    observability,
    ...overrides,
  });
  const currentLease = () => coordinator.currentHandle('readonly')?.credential.leaseId;
  return { clock, store, observability, factory, coordinator, scheduler, currentLease };
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve: () => resolve() };
}

describe('RefreshScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('tick', () => {
    it('should adopt a first credential when no pool exists', async () => {
      const { store, scheduler, currentLease } = setup();

      await scheduler.tick();

      expect(store.callCount('issueCredential')).toBe(1);
      expect(currentLease()).toBe('database/creds/readonly/lease-1');
    });

    it('should refresh at 80% of a 100 second lease and not before', async () => {
      const { clock, store, scheduler, currentLease } = setup();
      await scheduler.tick();

      clock.set(79_999);
      await scheduler.tick();
      expect(store.callCount('issueCredential')).toBe(1);

      clock.set(80_000);
      await scheduler.tick();
      expect(store.callCount('issueCredential')).toBe(2);
      expect(currentLease()).toBe('database/creds/readonly/lease-2');

      clock.set(159_999);
      await scheduler.tick();
      expect(store.callCount('issueCredential')).toBe(2);
    });

    it('should keep the current credential when a refresh fails and retry on the next tick', async () => {
      const { clock, store, observability, scheduler, currentLease } = setup();
      await scheduler.tick();

      clock.set(80_000);
      store.failNext('issueCredential', new StoreUnavailableError('store down'));
      await scheduler.tick();

      expect(currentLease()).toBe('database/creds/readonly/lease-1');
      expect(scheduler.status()).toEqual({
        role: 'readonly',
        running: false,
        lastSuccessAt: 0,
        lastAttemptAt: 80_000,
        lastError: 'store down',
        consecutiveFailures: 1,
        refreshCount: 1,
      });
      expect(observability.metrics.getCounter(MetricNames.REFRESH_FAILURES_TOTAL, { role: 'readonly' })).toBe(1);
      expect(observability.logger.getEntriesAtLevel(LogLevel.ERROR).map(e => e.message)).toEqual([
        'Background refresh failed, keeping current credential',
      ]);

      clock.set(90_000);
      await scheduler.tick();

      expect(currentLease()).toBe('database/creds/readonly/lease-2');
      expect(scheduler.status()).toMatchObject({
        lastSuccessAt: 90_000,
        lastError: undefined,
        consecutiveFailures: 0,
        refreshCount: 2,
      });
    });

    it('should keep the current pool when the new one fails validation', async () => {
      const { clock, factory, scheduler, currentLease } = setup();
      await scheduler.tick();

      clock.set(80_000);
      factory.failNextValidation();
      await scheduler.tick();

      expect(currentLease()).toBe('database/creds/readonly/lease-1');
      expect(scheduler.status().lastError).toBe('Pool validation failed for role readonly: probe "SELECT 1" failed');

      await scheduler.tick();
      expect(currentLease()).toBe('database/creds/readonly/lease-3');
    });
  });

  describe('refreshNow', () => {
    it('should refresh even when the credential is not due', async () => {
      const { clock, scheduler, currentLease } = setup();
      await scheduler.tick();

      clock.set(10_000);
      const credential = await scheduler.refreshNow();

      expect(credential.leaseId).toBe('database/creds/readonly/lease-2');
      expect(credential.issuedAt).toBe(10_000);
      expect(currentLease()).toBe('database/creds/readonly/lease-2');
    });

    it('should surface a failed forced refresh', async () => {
      const { store, scheduler, currentLease } = setup();
      await scheduler.tick();
      store.failNext('issueCredential', new StoreUnavailableError('store down'));

      await expect(scheduler.refreshNow()).rejects.toThrow(StoreUnavailableError);
      expect(currentLease()).toBe('database/creds/readonly/lease-1');
    });

    it('should run concurrent forced refreshes one after the other', async () => {
      const { store, factory, scheduler, currentLease } = setup();

      const [first, second] = await Promise.all([scheduler.refreshNow(), scheduler.refreshNow()]);

      expect(first.leaseId).toBe('database/creds/readonly/lease-1');
      expect(second.leaseId).toBe('database/creds/readonly/lease-2');
      expect(store.callCount('issueCredential')).toBe(2);
      expect(currentLease()).toBe('database/creds/readonly/lease-2');
      expect(factory.closed.map(pool => pool.credential.leaseId)).toEqual(['database/creds/readonly/lease-1']);
    });

    it('should not let a due tick queued behind it refresh again', async () => {
      const { clock, store, scheduler, currentLease } = setup();
      await scheduler.tick();
      clock.set(80_000);

      const forced = scheduler.refreshNow();
      const ticked = scheduler.tick();
      await Promise.all([forced, ticked]);

      expect(store.callCount('issueCredential')).toBe(2);
      expect(currentLease()).toBe('database/creds/readonly/lease-2');
    });
  });

  describe('onRefresh', () => {
    it('should be called with each adopted credential', async () => {
      const onRefresh = vi.fn();
      const { scheduler } = setup({ onRefresh });

      const credential = await scheduler.refreshNow();

      expect(onRefresh).toHaveBeenCalledTimes(1);
      expect(onRefresh).toHaveBeenCalledWith(credential);
    });

    it('should not count a throwing callback as a failed refresh', async () => {
      const { observability, scheduler } = setup({
        onRefresh: () => {
          throw new Error('listener crashed');
        },
      });

      await expect(scheduler.refreshNow()).resolves.toMatchObject({ leaseId: 'database/creds/readonly/lease-1' });

      expect(scheduler.status().consecutiveFailures).toBe(0);
      expect(scheduler.status().refreshCount).toBe(1);
      const warnings = observability.logger.getEntriesAtLevel(LogLevel.WARN);
      expect(warnings.map(w => w.message)).toEqual(['onRefresh callback failed']);
      expect(warnings[0]?.context).toMatchObject({ role: 'readonly', error: 'listener crashed' });
    });
  });

  describe('timer loop', () => {
    it('should check on every interval and refresh once due', async () => {
      vi.useFakeTimers();
      const { clock, store, scheduler, currentLease } = setup();
      await scheduler.refreshNow();

      scheduler.start();
      expect(scheduler.status().running).toBe(true);

      clock.set(80_000);
      await vi.advanceTimersByTimeAsync(9_999);
      expect(store.callCount('issueCredential')).toBe(1);

      await vi.advanceTimersByTimeAsync(1);
      await scheduler.stop();

      expect(store.callCount('issueCredential')).toBe(2);
      expect(currentLease()).toBe('database/creds/readonly/lease-2');
      expect(scheduler.status().running).toBe(false);
    });
  });

  describe('settings', () => {
    it('should reject a check interval that is not positive', () => {
      expect(() => setup({ checkInterval: 0 })).toThrow(
        new ConfigurationError('checkInterval: Number must be greater than 0')
      );
    });

    it('should reject a refresh buffer above 1', () => {
      expect(() => setup({ refreshBuffer: 7 })).toThrow(
        new ConfigurationError('refreshBuffer: Number must be less than or equal to 1')
      );
    });
  });

  describe('stop', () => {
    it('should wait for the refresh in flight and start none afterwards', async () => {
      const { clock, store, factory, scheduler, currentLease } = setup();
      const gate = deferred();
      vi.spyOn(factory, 'validate').mockImplementationOnce(async () => {
        await gate.promise;
        return true;
      });
      const stopped = vi.fn();

      const ticking = scheduler.tick();
      await vi.waitFor(() => expect(factory.built).toHaveLength(1));
      const stopping = scheduler.stop().then(stopped);
      await Promise.resolve();
      expect(stopped).not.toHaveBeenCalled();

      gate.resolve();
      await stopping;
      await ticking;

      expect(currentLease()).toBe('database/creds/readonly/lease-1');
      expect(scheduler.status().refreshCount).toBe(1);

      clock.set(200_000);
      await scheduler.tick();
      expect(store.callCount('issueCredential')).toBe(1);
    });

    it('should refuse refreshes once stopped', async () => {
      const { store, scheduler } = setup();
      await scheduler.tick();

      await scheduler.stop();

      await expect(scheduler.refreshNow()).rejects.toThrow(new ManagerClosedError('readonly'));
      await scheduler.tick();
      expect(store.callCount('issueCredential')).toBe(1);
    });

    it('should not restart after stopping', async () => {
      const { scheduler } = setup();

      await scheduler.stop();
      scheduler.start();

      expect(scheduler.status().running).toBe(false);
    });
  });
});
