import test from 'node:test';
import assert from 'node:assert/strict';

import { instrumentPool } from '../server/lib/dbMonitor.js';

function createFakePool(impl: (...args: unknown[]) => Promise<{ rows: unknown[]; rowCount: number }>) {
  const calls: unknown[][] = [];
  const pool = {
    query: async (...args: unknown[]) => {
      calls.push(args);
      return impl(...args);
    },
  };
  return { pool, calls };
}

test('instrumentPool passes results through', async () => {
  const { pool, calls } = createFakePool(async () => ({ rows: [{ id: 1 }], rowCount: 1 }));
  instrumentPool(pool, { poolName: 'test' });
  const result = await pool.query('SELECT 1');
  assert.equal(calls.length, 1);
  assert.equal(result.rowCount, 1);
});

test('instrumentPool logs slow queries with the collapsed SQL text', async () => {
  const warnings: string[] = [];
  const { pool } = createFakePool(async () => ({ rows: [], rowCount: 0 }));
  instrumentPool(pool, { poolName: 'market', slowQueryThresholdMs: 0, warn: (m) => warnings.push(m) });
  await pool.query('SELECT *\n   FROM market_history');
  assert.equal(warnings.length, 1);
  assert.match(warnings[0], /^\[slow-query\] pool=market duration=\d+ms sql=SELECT \* FROM market_history$/);
});

test('instrumentPool logs and rethrows query errors', async () => {
  const errors: string[] = [];
  const { pool } = createFakePool(async () => {
    throw new Error('connection refused');
  });
  instrumentPool(pool, { poolName: 'market', error: (m) => errors.push(m) });
  await assert.rejects(() => pool.query('SELECT 1'), { message: 'connection refused' });
  assert.equal(errors.length, 1);
  assert.match(errors[0], /^\[query-error\] pool=market duration=\d+ms sql=SELECT 1 error=connection refused$/);
});

test('instrumentPool is a no-op for a missing pool', () => {
  assert.equal(instrumentPool(null), null);
  assert.equal(instrumentPool(undefined), undefined);
});

test('instrumentPool forwards the config object query form', async () => {
  const warnings: string[] = [];
  const { pool, calls } = createFakePool(async () => ({ rows: [], rowCount: 0 }));
  instrumentPool(pool, { slowQueryThresholdMs: 0, warn: (m) => warnings.push(m) });
  const config = { text: 'SELECT $1', values: [42] };
  await pool.query(config);
  assert.deepEqual(calls, [[config]]);
  assert.match(warnings[0], /sql=SELECT \$1$/);
});
