import { describe, expect, it, vi } from 'vitest';
import { GridNotifier, formatEvent } from '../../src/alerts/notifier';
import type { GridOrder } from '../../src/strategies/gridCycle/types';

const placed: GridOrder = {
  key: { side: 'buy', index: 0 },
  status: 'placed',
  entryPrice: 2000.8,
  targetPrice: 2002.8,
  volume: 0.1,
  tag: 'grid:c1:buy_0',
  venueOrderId: '1001',
};

describe('formatEvent', () => {
  it('lists placed orders under the anchor', () => {
    expect(formatEvent({ type: 'order_placed', anchorIndex: 0, referencePrice: 2000, orders: [placed] })).toBe(
      'Grid placed at anchor 0 (ref 2000.000)\no Buy 0: 2000.800 x 0.10'
    );
  });

  it('summarises a completed cycle', () => {
    const text = formatEvent({
      type: 'cycle_completed',
      cycleNumber: 3,
      startBalance: 10_000,
      endBalance: 10_100.5,
      cyclePnl: 100.5,
      sessionProfit: 250,
      durationMs: 45 * 60_000,
      maxDrawdown: 12.5,
      nextBaseAmount: 0.05,
      quietHours: true,
    });
    expect(text).toBe(
      [
        'Cycle #3 complete',
        'P&L: 100.50 (10000.00 -> 10100.50)',
        'Session profit: 250.00',
        'Max drawdown: 12.50',
        'Duration: 45 min',
        'Next base amount: 0.05 (quiet hours)',
      ].join('\n')
    );
  });

  it('spells out an emergency stop', () => {
    const text = formatEvent({
      type: 'emergency_stop',
      context: {
        reason: 'max_reduce_breached',
        cycleStartBalance: 10_000,
        balance: 10_000,
        equity: 9_900,
        threshold: null,
        triggeredAt: '2024-01-03T03:00:00.000Z',
      },
      flatten: { cancelled: 6, closed: 1, failures: 0, openPositions: [], pendingOrders: [], complete: true },
    });
    expect(text?.split('\n')).toEqual([
      'EMERGENCY STOP',
      'Reason: max_reduce_breached',
      'Cycle start balance: 10000.00',
      'Balance: 10000.00  Equity: 9900.00',
      'Threshold: -',
      'At: 2024-01-03T03:00:00.000Z',
      'All positions closed.',
      'Send /ack, then /start to resume.',
    ]);
  });

  it('lists what an emergency flatten left open', () => {
    const text = formatEvent({
      type: 'emergency_stop',
      context: {
        reason: 'max_reduce_breached',
        cycleStartBalance: 10_000,
        balance: 10_000,
        equity: 9_900,
        threshold: 50,
        triggeredAt: '2024-01-03T03:00:00.000Z',
      },
      flatten: { cancelled: 5, closed: 0, failures: 1, openPositions: ['1001'], pendingOrders: [], complete: false },
    });
    expect(text?.split('\n').slice(-4)).toEqual([
      'Flatten incomplete.',
      'Still open: 1001',
      'Venue failures: 1',
      'Send /ack, then /start to resume.',
    ]);
  });

  it('reports an incomplete flatten', () => {
    const report = { cancelled: 4, closed: 1, failures: 2, openPositions: ['1003'], pendingOrders: ['1005'], complete: false };
    expect(formatEvent({ type: 'flatten_incomplete', reason: 'cycle_target_reached', report })).toBe(
      'Flatten incomplete (cycle_target_reached)\nStill open: 1003\nStill pending: 1005\nVenue failures: 2\nRetrying each tick.'
    );
    expect(formatEvent({ type: 'flatten_incomplete', reason: 'panic', report })?.split('\n').at(-1)).toBe(
      'Send /panic confirm to retry.'
    );
  });

  it('renders short one-line events', () => {
    expect(formatEvent({ type: 'guard_blocked', reason: 'spread_too_wide', detail: {} })).toBe(
      'Trading blocked: spread_too_wide'
    );
    expect(formatEvent({ type: 'state_changed', from: 'paused', to: 'running', reason: 'started' })).toBe(
      'State paused -> running (started)'
    );
    expect(formatEvent({ type: 'command_rejected', command: 'start', reason: 'already_running' })).toBe(
      'Command start rejected: already_running'
    );
    expect(formatEvent({ type: 'base_amount_changed', previous: 0.1, next: 0.2, override: true })).toBe(
      'Base amount 0.1 -> 0.2 (override)'
    );
    expect(
      formatEvent({ type: 'order_rejected', key: { side: 'sell', index: -1 }, entryPrice: 1997.2, reason: 'invalid_stop_price' })
    ).toBe('Order sell -1 at 1997.200 rejected: invalid_stop_price');
  });
});

describe('GridNotifier', () => {
  it('sends formatted events to the chat', async () => {
    const send = vi.fn(async (_text: string) => {});
    const notifier = new GridNotifier(send);
    await notifier.publish({ type: 'guard_blocked', reason: 'blackout', detail: { window: 'news' } });
    expect(send).toHaveBeenCalledWith('Trading blocked: blackout');
  });
});
