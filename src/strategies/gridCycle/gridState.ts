import type { OrderSide } from '../types';
import type { GridOrder, GridState, LayerKey, OrderStatus } from './types';

const STATUS_RANK: Record<OrderStatus, number> = {
  unplaced: 0,
  placed: 1,
  filled: 2,
  closed: 3,
};

export function layerKeyId(key: LayerKey): string {
  return `${key.side}_${key.index}`;
}

export function layerTag(prefix: string, key: LayerKey, cycleNumber: number): string {
  return `${prefix}:c${cycleNumber}:${layerKeyId(key)}`;
}

export function createGridState(params: {
  cycleNumber: number;
  baseAmount: number;
  cycleTargetProfit: number;
  cycleStartBalance: number;
  startedAt: number;
}): GridState {
  return {
    cycleNumber: params.cycleNumber,
    anchorIndex: 0,
    orders: new Map(),
    filledSet: new Set(),
    closedSet: new Set(),
    closedOrders: [],
    baseAmount: params.baseAmount,
    cycleTargetProfit: params.cycleTargetProfit,
    cycleStartBalance: params.cycleStartBalance,
    cycleStartedAt: params.startedAt,
    cycleRealizedPnl: 0,
    maxDrawdownObserved: 0,
  };
}

/**
 * Moves an order forward in its lifecycle. Backward or repeated transitions
 * are refused; only a full cycle reset discards orders.
 */
export function transitionOrder(order: GridOrder, next: OrderStatus, at: number): GridOrder {
  if (STATUS_RANK[next] <= STATUS_RANK[order.status]) {
    throw new Error(`illegal_order_transition:${layerKeyId(order.key)}:${order.status}->${next}`);
  }
  const updated: GridOrder = { ...order, status: next };
  if (next === 'placed') updated.placedAt = at;
  if (next === 'filled') updated.filledAt = at;
  if (next === 'closed') updated.closedAt = at;
  return updated;
}

export function trackedOrders(state: GridState): GridOrder[] {
  return Array.from(state.orders.values());
}

/** A cycle is in flight while any of its orders is resting or open. */
export function hasLiveCycle(state: GridState): boolean {
  return trackedOrders(state).some((order) => order.status === 'placed' || order.status === 'filled');
}

/** Venue ids the engine placed during this cycle, including archived ones. */
export function knownVenueIds(state: GridState): Set<string> {
  const ids = new Set<string>();
  for (const order of state.orders.values()) {
    if (order.venueOrderId) ids.add(order.venueOrderId);
  }
  for (const order of state.closedOrders) {
    if (order.venueOrderId) ids.add(order.venueOrderId);
  }
  return ids;
}

/**
 * Archives a closed order and frees its slot so the layer can be rebuilt.
 */
export function releaseSlot(state: GridState, closed: GridOrder): void {
  state.closedOrders.push(closed);
  state.orders.set(layerKeyId(closed.key), {
    key: closed.key,
    status: 'unplaced',
    entryPrice: closed.entryPrice,
    targetPrice: closed.targetPrice,
    volume: closed.volume,
    tag: closed.tag,
  });
}

export function anchorAfterClose(side: OrderSide, layerIndex: number): number {
  return side === 'buy' ? layerIndex + 1 : layerIndex - 1;
}
