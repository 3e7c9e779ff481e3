import { GUARD_THRESHOLD_NAMES, GuardThresholds } from '../guard/gridGuards';
import type { EngineSettingsStore, PersistedEngineSettings } from '../strategies/gridCycle/types';
import type { Queryable } from './pool';

function nullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function parseThresholds(value: unknown): GuardThresholds {
  const raw: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  const thresholds: GuardThresholds = {};
  if (typeof raw !== 'object' || raw === null) return thresholds;
  for (const name of GUARD_THRESHOLD_NAMES) {
    const entry = Object.getOwnPropertyDescriptor(raw, name)?.value;
    const num = nullableNumber(entry);
    if (num !== null) thresholds[name] = num;
  }
  return thresholds;
}

export class EngineSettingsRepository implements EngineSettingsStore {
  constructor(private pool: Queryable) {}

  async load(accountId: string): Promise<PersistedEngineSettings | null> {
    const res = await this.pool.query('SELECT * FROM engine_settings WHERE account_id = $1', [accountId]);
    const row = res.rows[0];
    if (!row) return null;
    return {
      baseAmountOverride: nullableNumber(row.base_amount_override),
      thresholds: parseThresholds(row.thresholds_json),
      withdrawalThreshold: nullableNumber(row.withdrawal_threshold),
    };
  }

  async save(accountId: string, settings: PersistedEngineSettings): Promise<void> {
    await this.pool.query(
      `INSERT INTO engine_settings (account_id, base_amount_override, thresholds_json, withdrawal_threshold, updated_at)
       VALUES ($1, $2, $3::jsonb, $4, NOW())
       ON CONFLICT (account_id) DO UPDATE
       SET base_amount_override = EXCLUDED.base_amount_override,
           thresholds_json = EXCLUDED.thresholds_json,
           withdrawal_threshold = EXCLUDED.withdrawal_threshold,
           updated_at = NOW()`,
      [accountId, settings.baseAmountOverride, JSON.stringify(settings.thresholds), settings.withdrawalThreshold]
    );
  }
}
