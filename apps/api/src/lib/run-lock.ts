import { pool } from '@statbridge/db';

export type RunLockHandle = { release(): Promise<void> };

export interface RunLock {
  /** Null when another holder already has the key. */
  acquire(key: string): Promise<RunLockHandle | null>;
}

export function ingestLockKey(fileSeq: number) {
  return `ingest:${fileSeq}`;
}

/**
 * PG advisory locks are session scoped, so the lock keeps its own pooled
 * connection until released.
 */
export const advisoryRunLock: RunLock = {
  async acquire(key) {
    const client = await pool.connect();
    try {
      const res = await client.query<{ locked: boolean }>(
        'SELECT pg_try_advisory_lock(hashtext($1)) AS locked',
        [key]
      );
      if (res.rows[0]?.locked !== true) {
        client.release();
        return null;
      }
    } catch (err) {
      client.release();
      throw err;
    }

    return {
      async release() {
        try {
          await client.query('SELECT pg_advisory_unlock(hashtext($1))', [key]);
        } finally {
          client.release();
        }
      },
    };
  },
};
