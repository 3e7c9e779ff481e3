import type { EngineEvent, EngineEventSink, FlattenReport } from '../strategies/gridCycle/events';
import { formatFilledSummary, formatOrderLine, formatStatusReport } from '../strategies/gridCycle/reports';
import { logger } from '../utils/logger';
import { Telegram } from './telegram';

type Send = (text: string) => Promise<void>;

function money(value: number) {
  return value.toFixed(2);
}

function leftOpen(report: FlattenReport) {
  const lines: string[] = [];
  if (report.openPositions.length) lines.push(`Still open: ${report.openPositions.join(', ')}`);
  if (report.pendingOrders.length) lines.push(`Still pending: ${report.pendingOrders.join(', ')}`);
  lines.push(`Venue failures: ${report.failures}`);
  return lines;
}

export function formatEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'order_placed':
      return [
        `Grid placed at anchor ${event.anchorIndex} (ref ${event.referencePrice.toFixed(3)})`,
        ...event.orders.map(formatOrderLine),
      ].join('\n');
    case 'order_rejected':
      return `Order ${event.key.side} ${event.key.index} at ${event.entryPrice.toFixed(3)} rejected: ${event.reason}`;
    case 'order_filled': {
      const lines = [`Filled: ${formatOrderLine(event.order)}`];
      if (event.pattern.suppressNextBuy || event.pattern.suppressNextSell) {
        lines.push(`Run detected (buy ${event.pattern.buyRun}, sell ${event.pattern.sellRun})`);
      }
      lines.push(formatFilledSummary(event.snapshot.orders));
      return lines.join('\n');
    }
    case 'position_closed':
      return `Closed ${event.order.key.side} ${event.order.key.index}: ${money(event.pnl)}, anchor now ${event.anchorIndex}`;
    case 'cycle_completed':
      return [
        `Cycle #${event.cycleNumber} complete`,
        `P&L: ${money(event.cyclePnl)} (${money(event.startBalance)} -> ${money(event.endBalance)})`,
        `Session profit: ${money(event.sessionProfit)}`,
        `Max drawdown: ${money(event.maxDrawdown)}`,
        `Duration: ${Math.round(event.durationMs / 60_000)} min`,
        `Next base amount: ${event.nextBaseAmount}${event.quietHours ? ' (quiet hours)' : ''}`,
      ].join('\n');
    case 'guard_blocked':
      return `Trading blocked: ${event.reason}`;
    case 'emergency_stop': {
      const { context } = event;
      return [
        'EMERGENCY STOP',
        `Reason: ${context.reason}`,
        `Cycle start balance: ${money(context.cycleStartBalance)}`,
        `Balance: ${money(context.balance)}  Equity: ${money(context.equity)}`,
        `Threshold: ${context.threshold === null ? '-' : money(context.threshold)}`,
        `At: ${context.triggeredAt}`,
        ...(event.flatten.complete ? ['All positions closed.'] : ['Flatten incomplete.', ...leftOpen(event.flatten)]),
        'Send /ack, then /start to resume.',
      ].join('\n');
    }
    case 'flatten_incomplete':
      return [
        `Flatten incomplete (${event.reason})`,
        ...leftOpen(event.report),
        event.reason === 'cycle_target_reached' ? 'Retrying each tick.' : 'Send /panic confirm to retry.',
      ].join('\n');
    case 'state_changed':
      return `State ${event.from} -> ${event.to} (${event.reason})`;
    case 'command_rejected':
      return `Command ${event.command} rejected: ${event.reason}`;
    case 'status_report':
      return formatStatusReport(event.snapshot);
    case 'base_amount_changed':
      return `Base amount ${event.previous} -> ${event.next}${event.override ? ' (override)' : ''}`;
    default:
      return null;
  }
}

/** Forwards engine events to the operator chat. */
export class GridNotifier implements EngineEventSink {
  constructor(private readonly send: Send = (text) => Telegram.sendMessage(text)) {}

  async publish(event: EngineEvent): Promise<void> {
    const text = formatEvent(event);
    if (!text) return;
    logger.debug('grid_notification', { event: 'grid_notification', type: event.type });
    await this.send(text);
  }
}
