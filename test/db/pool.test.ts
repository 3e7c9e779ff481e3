import { describe, expect, it, vi } from 'vitest';
import { CONFIG } from '../../src/config';
import { APPLICATION_NAME, closePool, getPool } from '../../src/db/pool';
import { logger } from '../../src/utils/logger';

const { FakePool } = vi.hoisted(() => {
  class FakePool {
    static created: FakePool[] = [];
    readonly handlers = new Map<string, (error: Error) => void>();
    ended = false;

    constructor(readonly config: Record<string, unknown>) {
      FakePool.created.push(this);
    }

    on(event: string, handler: (error: Error) => void) {
      this.handlers.set(event, handler);
      return this;
    }

    async end() {
      this.ended = true;
    }
  }
  return { FakePool };
});

vi.mock('pg', () => ({ default: { Pool: FakePool } }));

describe('getPool', () => {
  it('creates one named pool, logs idle client errors and closes it', async () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const first = getPool();
    expect(getPool()).toBe(first);
    expect(FakePool.created).toHaveLength(1);

    const [created] = FakePool.created;
    expect(created.config).toEqual({ connectionString: CONFIG.PG_URL, application_name: APPLICATION_NAME });

    created.handlers.get('error')?.(new Error('terminated'));
    expect(error).toHaveBeenCalledWith(
      'pg_pool_idle_error',
      expect.objectContaining({ event: 'pg_pool_idle_error', error: expect.objectContaining({ message: 'terminated' }) })
    );

    await closePool();
    expect(created.ended).toBe(true);
    expect(getPool()).not.toBe(first);
    expect(FakePool.created).toHaveLength(2);
    await closePool();
  });
});
