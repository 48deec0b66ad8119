import type { BootConfig } from '../config/env.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { createLockPool, type AdvisoryLockClient, type AdvisoryLockPool } from '../db/connection.js';

export interface LockHandle {
  /** False when no mutual exclusion is in place. */
  readonly exclusive: boolean;
  release(): Promise<void>;
}

export interface IngestLock {
  acquire(): Promise<LockHandle>;
}

export class NoopIngestLock implements IngestLock {
  async acquire(): Promise<LockHandle> {
    return { exclusive: false, release: async () => {} };
  }
}

/**
 * Serializes ingestion across replicas with a session-level Postgres
 * advisory lock. The pool is closed on release, so a handle is single use.
 */
export class PostgresIngestLock implements IngestLock {
  constructor(
    private readonly pool: AdvisoryLockPool,
    private readonly key: number,
    private readonly log: Logger = defaultLogger,
  ) {}

  async acquire(): Promise<LockHandle> {
    let client: AdvisoryLockClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      await this.pool.end();
      throw error;
    }

    try {
      this.log.info('Waiting for ingestion lock', { key: this.key });
      await client.query('SELECT pg_advisory_lock($1)', [this.key]);
    } catch (error) {
      client.release();
      await this.pool.end();
      throw error;
    }

    this.log.info('Ingestion lock acquired', { key: this.key });
    return {
      exclusive: true,
      release: async () => {
        try {
          await client.query('SELECT pg_advisory_unlock($1)', [this.key]);
          this.log.info('Ingestion lock released', { key: this.key });
        } finally {
          client.release();
          await this.pool.end();
        }
      },
    };
  }
}

export function createIngestLock(config: Pick<BootConfig, 'ingestLock'>, log: Logger = defaultLogger): IngestLock {
  switch (config.ingestLock.kind) {
    case 'none':
      return new NoopIngestLock();
    case 'postgres':
      return new PostgresIngestLock(createLockPool(config.ingestLock.databaseUrl, log), config.ingestLock.key, log);
  }
}
