import type { OrderSide } from '../strategies/types';

export interface VenueTick {
  symbol: string;
  bid: number;
  ask: number;
  timestamp: number;
}

export interface AccountSnapshot {
  balance: number;
  equity: number;
  freeMargin: number;
}

export interface ConditionalOrderRequest {
  symbol: string;
  side: OrderSide;
  /** trigger price of the stop order */
  price: number;
  targetPrice: number;
  volume: number;
  /** opaque label, never parsed back by the engine */
  tag: string;
}

export interface ConditionalOrderAck {
  venueOrderId: string;
}

export interface VenuePosition {
  id: string;
  symbol: string;
  side: OrderSide;
  volume: number;
  openPrice: number;
  profit: number;
  tag?: string;
}

export interface VenuePendingOrder {
  id: string;
  symbol: string;
  side: OrderSide;
  openPrice: number;
  volume: number;
  tag?: string;
}

export type DealType = 'buy' | 'sell';

export interface VenueDeal {
  dealId: string;
  orderId: string;
  positionId: string;
  type: DealType;
  entry: 'in' | 'out';
  price: number;
  volume: number;
  profit: number;
  time: number;
}

/**
 * Capability surface the grid engine needs from a trading venue. Every method
 * may reject; callers treat a rejection as "nothing changed on the venue".
 */
export interface TradingVenue {
  readonly id: string;
  getTick(symbol: string): Promise<VenueTick>;
  getAccountSnapshot(): Promise<AccountSnapshot>;
  placeConditionalOrder(request: ConditionalOrderRequest): Promise<ConditionalOrderAck>;
  cancelOrder(venueOrderId: string, symbol: string): Promise<void>;
  listOpenPositions(symbol: string): Promise<VenuePosition[]>;
  listPendingOrders(symbol: string): Promise<VenuePendingOrder[]>;
  listTradeHistory(since: Date, until: Date): Promise<VenueDeal[]>;
  closePosition(positionId: string, symbol: string): Promise<void>;
}
