import pg from 'pg';
import { logger as defaultLogger, type Logger } from '../core/logger.js';

export interface AdvisoryLockClient {
  query(text: string, values: unknown[]): Promise<unknown>;
  release(): void;
}

export interface AdvisoryLockPool {
  connect(): Promise<AdvisoryLockClient>;
  end(): Promise<void>;
}

type ErrorListener = (error: Error) => void;

/** The slice of pg's PoolClient the lock relies on. */
export interface PgClientLike {
  query(text: string, values: unknown[]): Promise<unknown>;
  release(destroy?: Error | boolean): void;
  on(event: 'error', listener: ErrorListener): unknown;
  off(event: 'error', listener: ErrorListener): unknown;
}

/** The slice of pg's Pool the lock relies on. */
export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
  on(event: 'error', listener: ErrorListener): unknown;
}

export const createPool = (connectionString: string) =>
  new pg.Pool({
    connectionString,
    // The advisory lock is session scoped, one connection is all it takes
    max: 1,
    connectionTimeoutMillis: 10000,
  });

/**
 * Adapts a pg pool for the ingestion lock.
 *
 * pg-pool stops listening for 'error' on a client once it is checked out, and
 * an unhandled 'error' event would kill the process mid-ingestion. A dropped
 * connection is logged instead; the lost client is destroyed on release.
 */
export const wrapLockPool = (pool: PgPoolLike, log: Logger = defaultLogger): AdvisoryLockPool => {
  pool.on('error', (error) => {
    log.warn('Idle database client error', { error });
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      let lost: Error | undefined;
      const onError: ErrorListener = (error) => {
        lost = error;
        log.warn('Database connection lost while holding ingestion lock', { error });
      };
      client.on('error', onError);

      return {
        query: async (text, values) => client.query(text, values),
        release: () => {
          client.off('error', onError);
          client.release(lost);
        },
      };
    },
    end: () => pool.end(),
  };
};

export const createLockPool = (connectionString: string, log: Logger = defaultLogger): AdvisoryLockPool =>
  wrapLockPool(createPool(connectionString), log);
