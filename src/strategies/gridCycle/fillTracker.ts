import type { VenueDeal, VenuePosition } from '../../exchanges/venue';
import { transitionOrder } from './gridState';
import type { GridOrder, GridState } from './types';

export interface ClosedFill {
  order: GridOrder;
  pnl: number;
}

export interface PollResult {
  newlyFilled: GridOrder[];
  newlyClosed: ClosedFill[];
}

function lastDealFor(history: readonly VenueDeal[], positionId: string): VenueDeal | undefined {
  let latest: VenueDeal | undefined;
  for (const deal of history) {
    if (deal.positionId !== positionId) continue;
    if (!latest || deal.time >= latest.time) latest = deal;
  }
  return latest;
}

/**
 * Reconciles tracked orders against venue history and open positions.
 *
 * Positions must be fetched before history: a position that closes between the
 * two calls then still has its closing deal in the history passed here. Calling
 * again with unchanged venue state reports nothing new.
 */
export function pollFills(
  state: GridState,
  history: readonly VenueDeal[],
  openPositions: readonly VenuePosition[],
  now: number
): PollResult {
  const result: PollResult = { newlyFilled: [], newlyClosed: [] };
  const dealPositions = new Set(history.map((deal) => deal.positionId));
  const openIds = new Set(openPositions.map((position) => position.id));

  for (const [slot, order] of state.orders) {
    const venueId = order.venueOrderId;
    if (!venueId || order.status !== 'placed') continue;
    if (!dealPositions.has(venueId) && !openIds.has(venueId)) continue;
    if (state.filledSet.has(venueId)) continue;
    const filled = transitionOrder(order, 'filled', now);
    state.orders.set(slot, filled);
    state.filledSet.add(venueId);
    result.newlyFilled.push(filled);
  }

  for (const [slot, order] of state.orders) {
    const venueId = order.venueOrderId;
    if (!venueId || order.status !== 'filled') continue;
    if (openIds.has(venueId) || state.closedSet.has(venueId)) continue;
    const deal = lastDealFor(history, venueId);
    // Fill was inferred from an open position that has since vanished; wait for its deal.
    if (!deal) continue;
    const pnl = deal.profit;
    const closed: GridOrder = { ...transitionOrder(order, 'closed', now), realizedPnl: pnl };
    state.orders.set(slot, closed);
    state.closedSet.add(venueId);
    result.newlyClosed.push({ order: closed, pnl });
  }

  return result;
}
