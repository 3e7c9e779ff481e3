import { describe, expect, it } from 'vitest';
import type { VenueDeal, VenuePosition } from '../../../src/exchanges/venue';
import { pollFills } from '../../../src/strategies/gridCycle/fillTracker';
import { createGridState } from '../../../src/strategies/gridCycle/gridState';
import type { GridOrder } from '../../../src/strategies/gridCycle/types';

function placed(venueOrderId: string, index = 0): GridOrder {
  return {
    key: { side: 'buy', index },
    status: 'placed',
    entryPrice: 2000.8,
    targetPrice: 2002.8,
    volume: 0.1,
    tag: `grid:c1:buy_${index}`,
    venueOrderId,
    placedAt: 1,
  };
}

function deal(positionId: string, entry: 'in' | 'out', profit: number, time: number): VenueDeal {
  return {
    dealId: `${positionId}-${entry}-${time}`,
    orderId: positionId,
    positionId,
    type: entry === 'in' ? 'buy' : 'sell',
    entry,
    price: 2000.8,
    volume: 0.1,
    profit,
    time,
  };
}

function position(id: string): VenuePosition {
  return { id, symbol: 'XAUUSD', side: 'buy', volume: 0.1, openPrice: 2000.8, profit: 0 };
}

function stateWith(...orders: GridOrder[]) {
  const state = createGridState({
    cycleNumber: 1,
    baseAmount: 0.1,
    cycleTargetProfit: 100,
    cycleStartBalance: 10_000,
    startedAt: 0,
  });
  orders.forEach((order) => state.orders.set(`${order.key.side}_${order.key.index}`, order));
  return state;
}

describe('pollFills', () => {
  it('marks an order filled when its position opens', () => {
    const state = stateWith(placed('1001'));
    const result = pollFills(state, [deal('1001', 'in', 0, 10)], [position('1001')], 50);
    expect(result.newlyFilled.map((order) => order.venueOrderId)).toEqual(['1001']);
    expect(result.newlyClosed).toEqual([]);
    expect(state.orders.get('buy_0')).toMatchObject({ status: 'filled', filledAt: 50 });
    expect(state.filledSet.has('1001')).toBe(true);
  });

  it('accepts an open position without a deal as a fill', () => {
    const state = stateWith(placed('1001'));
    const result = pollFills(state, [], [position('1001')], 50);
    expect(result.newlyFilled).toHaveLength(1);
  });

  it('is idempotent for unchanged venue state', () => {
    const state = stateWith(placed('1001'));
    pollFills(state, [deal('1001', 'in', 0, 10)], [position('1001')], 50);
    const again = pollFills(state, [deal('1001', 'in', 0, 10)], [position('1001')], 60);
    expect(again).toEqual({ newlyFilled: [], newlyClosed: [] });
  });

  it('closes a filled order once its position is gone, using the last deal profit', () => {
    const state = stateWith(placed('1001'));
    pollFills(state, [deal('1001', 'in', 0, 10)], [position('1001')], 50);
    const history = [deal('1001', 'in', 0, 10), deal('1001', 'out', 0.2, 20)];
    const result = pollFills(state, history, [], 60);
    expect(result.newlyClosed.map(({ pnl }) => pnl)).toEqual([0.2]);
    expect(state.orders.get('buy_0')).toMatchObject({ status: 'closed', closedAt: 60, realizedPnl: 0.2 });
    expect(pollFills(state, history, [], 70)).toEqual({ newlyFilled: [], newlyClosed: [] });
  });

  it('fills and closes in a single poll when both deals are already in history', () => {
    const state = stateWith(placed('1001'));
    const result = pollFills(state, [deal('1001', 'in', 0, 10), deal('1001', 'out', -0.3, 20)], [], 30);
    expect(result.newlyFilled).toHaveLength(1);
    expect(result.newlyClosed.map(({ pnl }) => pnl)).toEqual([-0.3]);
  });

  it('breaks equal timestamps in favour of the later deal', () => {
    const state = stateWith(placed('1001'));
    const result = pollFills(state, [deal('1001', 'in', 0, 10), deal('1001', 'out', 0.5, 10)], [], 30);
    expect(result.newlyClosed[0].pnl).toBe(0.5);
  });

  it('waits for a deal before closing a fill inferred from a vanished position', () => {
    const state = stateWith(placed('1001'));
    pollFills(state, [], [position('1001')], 50);
    expect(pollFills(state, [], [], 60).newlyClosed).toEqual([]);
    expect(state.orders.get('buy_0')?.status).toBe('filled');
  });

  it('ignores deals for positions it never placed', () => {
    const state = stateWith(placed('1001'));
    expect(pollFills(state, [deal('9999', 'in', 0, 10)], [position('9999')], 50)).toEqual({
      newlyFilled: [],
      newlyClosed: [],
    });
  });
});
