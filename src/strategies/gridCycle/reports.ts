import type { EngineSnapshot } from './events';
import type { GridOrder } from './types';

const STATUS_MARK: Record<GridOrder['status'], string> = {
  unplaced: '?',
  placed: 'o',
  filled: '*',
  closed: 'x',
};

function fixed(value: number | undefined, digits: number) {
  return value === undefined || !Number.isFinite(value) ? '-' : value.toFixed(digits);
}

export function formatOrderLine(order: GridOrder): string {
  const side = order.key.side === 'buy' ? 'Buy' : 'Sell';
  return `${STATUS_MARK[order.status]} ${side} ${order.key.index}: ${fixed(order.entryPrice, 3)} x ${fixed(order.volume, 2)}`;
}

function byLayer(a: GridOrder, b: GridOrder) {
  if (a.key.side !== b.key.side) return a.key.side === 'buy' ? -1 : 1;
  return a.key.index - b.key.index;
}

/** One line per slot that has reached the venue, buys first, ascending index. */
export function formatOrderBook(orders: readonly GridOrder[]): string {
  return orders
    .filter((order) => order.status !== 'unplaced')
    .sort(byLayer)
    .map(formatOrderLine)
    .join('\n');
}

export function formatFilledSummary(orders: readonly GridOrder[]): string {
  const filled = orders.filter((order) => order.status === 'filled').sort(byLayer);
  if (!filled.length) return 'No filled orders.';
  const lines = [`Filled orders (${filled.length})`];
  for (const side of ['buy', 'sell'] as const) {
    const group = filled.filter((order) => order.key.side === side);
    if (!group.length) continue;
    lines.push(side === 'buy' ? 'BUY:' : 'SELL:');
    for (const order of group) {
      lines.push(`  ${order.tag} | price ${fixed(order.entryPrice, 3)} | vol ${fixed(order.volume, 2)}`);
    }
  }
  return lines.join('\n');
}

export function formatDrawdownReport(startBalance: number, maxDrawdown: number): string {
  const pct = startBalance > 0 ? (maxDrawdown / startBalance) * 100 : 0;
  return [
    'Drawdown report',
    `Start balance: ${startBalance.toFixed(2)}`,
    `Max drawdown: ${maxDrawdown.toFixed(2)}`,
    `Drawdown pct: ${pct.toFixed(2)}%`,
  ].join('\n');
}

export function formatStatusReport(snapshot: EngineSnapshot): string {
  const cyclePnl = snapshot.cycleRealizedPnl + snapshot.unrealizedPnl;
  const lines = [
    `[${snapshot.accountId}] ${snapshot.symbol} ${snapshot.state}${snapshot.pauseReason ? ` (${snapshot.pauseReason})` : ''}`,
    `Cycle #${snapshot.cycleNumber} anchor ${snapshot.anchorIndex}`,
    `Base amount: ${snapshot.baseAmount}${snapshot.baseAmountOverride !== null ? ' (override)' : ''}`,
    `Cycle P&L: ${cyclePnl.toFixed(2)} / ${snapshot.cycleTargetProfit.toFixed(2)}`,
    `Session profit: ${snapshot.sessionProfit.toFixed(2)}`,
  ];
  if (snapshot.emergency) {
    lines.push(`Emergency stop since ${snapshot.emergency.triggeredAt} (${snapshot.emergency.reason})`);
  }
  if (snapshot.resetPending) lines.push('Cycle reset pending: flatten incomplete');
  if (snapshot.blackoutWindows.length) lines.push(`Blackout: ${snapshot.blackoutWindows.join(', ')}`);
  if (snapshot.stopAfterCycle) lines.push('Stopping after this cycle');
  if (snapshot.scheduledPauseAt !== null) {
    lines.push(`Pause scheduled at ${new Date(snapshot.scheduledPauseAt).toISOString()}`);
  }
  const book = formatOrderBook(snapshot.orders);
  if (book) lines.push('', book);
  lines.push('', formatDrawdownReport(snapshot.cycleStartBalance, snapshot.maxDrawdownObserved));
  return lines.join('\n');
}
