import type { CycleHistoryStore, CycleRecord } from '../strategies/gridCycle/types';
import type { Queryable } from './pool';

export class CycleHistoryRepository implements CycleHistoryStore {
  constructor(private pool: Queryable) {}

  async recordCycle(record: CycleRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO grid_cycles (account_id, symbol, cycle_number, base_amount, start_balance, end_balance, cycle_pnl, max_drawdown, started_at, completed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.accountId,
        record.symbol,
        record.cycleNumber,
        record.baseAmount,
        record.startBalance,
        record.endBalance,
        record.cyclePnl,
        record.maxDrawdown,
        record.startedAt.toISOString(),
        record.completedAt.toISOString(),
      ]
    );
  }

  async lastCycleNumber(accountId: string): Promise<number> {
    const res = await this.pool.query(
      'SELECT MAX(cycle_number) AS last_cycle FROM grid_cycles WHERE account_id = $1',
      [accountId]
    );
    const last = res.rows[0]?.last_cycle;
    return last === null || last === undefined ? 0 : Number(last);
  }
}
