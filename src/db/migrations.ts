import type { Queryable } from './pool';

const MIGRATION_QUERIES: string[] = [
  `CREATE TABLE IF NOT EXISTS grid_cycles (
      id SERIAL PRIMARY KEY,
      account_id TEXT NOT NULL,
      symbol TEXT NOT NULL,
      cycle_number INTEGER NOT NULL,
      base_amount NUMERIC NOT NULL,
      start_balance NUMERIC NOT NULL,
      end_balance NUMERIC NOT NULL,
      cycle_pnl NUMERIC NOT NULL,
      max_drawdown NUMERIC NOT NULL DEFAULT 0,
      started_at TIMESTAMPTZ NOT NULL,
      completed_at TIMESTAMPTZ NOT NULL
    );`,
  `CREATE INDEX IF NOT EXISTS idx_grid_cycles_account ON grid_cycles(account_id, cycle_number);`,
  `CREATE TABLE IF NOT EXISTS engine_settings (
      account_id TEXT PRIMARY KEY,
      base_amount_override NUMERIC,
      thresholds_json JSONB NOT NULL DEFAULT '{}'::jsonb,
      withdrawal_threshold NUMERIC,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
];

const ranPools = new WeakSet<Queryable>();

export async function runMigrations(pool: Queryable) {
  if (ranPools.has(pool)) return;
  for (const query of MIGRATION_QUERIES) {
    await pool.query(query);
  }
  ranPools.add(pool);
}
