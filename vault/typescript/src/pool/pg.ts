/**
 * PostgreSQL pool factory built on `pg`.
 *
 * @module pool/pg
 */

import { Pool, type PoolClient, type PoolConfig } from 'pg';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { Credential, PoolFactory } from '../types/index.js';

/**
 * Builds `pg` pools authenticated with dynamic credentials.
 *
 * Pool options are the usual `pg.PoolConfig` fields (host, port, database,
 * max, idleTimeoutMillis, ...); `user` and `password` always come from the
 * credential.
 *
 * @example
 * ```typescript
 * const factory = new PgPoolFactory({ host: 'db.internal', database: 'app', max: 10 });
 * const manager = client.createBackgroundRefreshManager('readonly', factory);
 * await manager.start();
 * ```
 */
export class PgPoolFactory implements PoolFactory<Pool, PoolClient, PoolConfig> {
  private readonly defaults: PoolConfig;
  private readonly logger: Logger;

  constructor(defaults: PoolConfig = {}, logger: Logger = new NoopLogger()) {
    this.defaults = defaults;
    this.logger = logger;
  }

  build(credential: Credential, options: PoolConfig = {}): Pool {
    const pool = new Pool({
      ...this.defaults,
      ...options,
      user: credential.username,
      password: credential.password,
    });

    // Idle clients error when the server drops them; an unhandled 'error'
    // event would crash the process.
    pool.on('error', error => {
      this.logger.warn('Idle database client error', { role: credential.role, error: error.message });
    });
    return pool;
  }

  async validate(pool: Pool, probe: string): Promise<boolean> {
    const client = await pool.connect();
    try {
      await client.query(probe);
      client.release();
      return true;
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      this.logger.warn('Validation probe failed', {
        probe,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async validateConnection(client: PoolClient, probe: string): Promise<boolean> {
    try {
      await client.query(probe);
      return true;
    } catch (error) {
      this.logger.warn('Connection probe failed', {
        probe,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  acquire(pool: Pool): Promise<PoolClient> {
    return pool.connect();
  }

  release(_pool: Pool, connection: PoolClient, error?: Error): void {
    connection.release(error);
  }

  close(pool: Pool): Promise<void> {
    return pool.end();
  }
}
