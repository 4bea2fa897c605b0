import { beforeEach, describe, expect, it, vi } from 'vitest';
import { advisoryRunLock, ingestLockKey } from '../run-lock.js';

const { client, connect } = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() };
  return { client, connect: vi.fn(async () => client) };
});

vi.mock('@statbridge/db', () => ({
  pool: { connect },
}));

describe('run-lock', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('keys locks by file sequence', () => {
    expect(ingestLockKey(7)).toBe('ingest:7');
  });

  it('holds the connection until the handle is released', async () => {
    client.query.mockResolvedValueOnce({ rows: [{ locked: true }] }).mockResolvedValueOnce({ rows: [] });

    const handle = await advisoryRunLock.acquire('ingest:7');

    expect(handle).not.toBeNull();
    expect(client.query).toHaveBeenCalledWith(
      'SELECT pg_try_advisory_lock(hashtext($1)) AS locked',
      ['ingest:7']
    );
    expect(client.release).not.toHaveBeenCalled();

    await handle?.release();

    expect(client.query).toHaveBeenLastCalledWith('SELECT pg_advisory_unlock(hashtext($1))', [
      'ingest:7',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('returns null and frees the connection when another session holds the key', async () => {
    client.query.mockResolvedValueOnce({ rows: [{ locked: false }] });

    await expect(advisoryRunLock.acquire('ingest:7')).resolves.toBeNull();
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('frees the connection when the lock query fails', async () => {
    client.query.mockRejectedValueOnce(new Error('connection reset'));

    await expect(advisoryRunLock.acquire('ingest:7')).rejects.toThrow('connection reset');
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
