import { OrderRejectedError } from '../strategies/gridCycle/errors';
import type { OrderSide } from '../strategies/types';
import { logger } from '../utils/logger';
import type {
  AccountSnapshot,
  ConditionalOrderAck,
  ConditionalOrderRequest,
  TradingVenue,
  VenueDeal,
  VenuePendingOrder,
  VenuePosition,
  VenueTick,
} from './venue';

export interface PaperVenueOptions {
  startBalance: number;
  /** units of the underlying per 1.0 of volume */
  contractSize: number;
  marginRate: number;
  clock?: () => number;
}

interface PaperOrder extends VenuePendingOrder {
  targetPrice: number;
}

interface PaperPosition extends VenuePosition {
  targetPrice: number;
}

/**
 * In-process venue with stop-entry orders and attached take-profit targets.
 * Prices move only through setQuote; a buy stop triggers once ask reaches its
 * price and a sell stop once bid reaches it. Positions take the order id as
 * their id.
 */
export class PaperTradingVenue implements TradingVenue {
  readonly id = 'paper';
  private readonly quotes = new Map<string, { bid: number; ask: number; timestamp: number }>();
  private readonly pending = new Map<string, PaperOrder>();
  private readonly positions = new Map<string, PaperPosition>();
  private readonly deals: VenueDeal[] = [];
  private readonly clock: () => number;
  private balance: number;
  private nextId = 1000;

  constructor(private readonly options: PaperVenueOptions) {
    this.balance = options.startBalance;
    this.clock = options.clock ?? Date.now;
  }

  setQuote(symbol: string, bid: number, ask: number) {
    if (!(bid > 0) || ask < bid) {
      throw new Error(`invalid_quote:${bid}/${ask}`);
    }
    this.quotes.set(symbol, { bid, ask, timestamp: this.clock() });
    this.triggerStops(symbol, bid, ask);
    this.hitTargets(symbol, bid, ask);
  }

  /** Opens a position directly, bypassing the stop book. */
  seedPosition(position: Omit<VenuePosition, 'id' | 'profit'> & { targetPrice?: number }): string {
    const id = this.allocateId();
    this.positions.set(id, {
      ...position,
      id,
      profit: 0,
      targetPrice: position.targetPrice ?? Number.NaN,
    });
    return id;
  }

  private allocateId() {
    this.nextId += 1;
    return String(this.nextId);
  }

  private profitOf(side: OrderSide, openPrice: number, closePrice: number, volume: number) {
    const move = side === 'buy' ? closePrice - openPrice : openPrice - closePrice;
    return move * volume * this.options.contractSize;
  }

  private record(deal: Omit<VenueDeal, 'dealId' | 'time'>) {
    this.deals.push({ ...deal, dealId: this.allocateId(), time: this.clock() });
  }

  private triggerStops(symbol: string, bid: number, ask: number) {
    for (const order of Array.from(this.pending.values())) {
      if (order.symbol !== symbol) continue;
      const triggered = order.side === 'buy' ? ask >= order.openPrice : bid <= order.openPrice;
      if (!triggered) continue;
      this.pending.delete(order.id);
      this.positions.set(order.id, {
        id: order.id,
        symbol,
        side: order.side,
        volume: order.volume,
        openPrice: order.openPrice,
        profit: 0,
        tag: order.tag,
        targetPrice: order.targetPrice,
      });
      this.record({
        orderId: order.id,
        positionId: order.id,
        type: order.side,
        entry: 'in',
        price: order.openPrice,
        volume: order.volume,
        profit: 0,
      });
      logger.debug('paper_stop_triggered', { event: 'paper_stop_triggered', orderId: order.id, price: order.openPrice });
    }
  }

  private hitTargets(symbol: string, bid: number, ask: number) {
    for (const position of Array.from(this.positions.values())) {
      if (position.symbol !== symbol || !Number.isFinite(position.targetPrice)) continue;
      const reached = position.side === 'buy' ? bid >= position.targetPrice : ask <= position.targetPrice;
      if (reached) this.settle(position, position.targetPrice);
    }
  }

  private settle(position: PaperPosition, exitPrice: number) {
    const profit = this.profitOf(position.side, position.openPrice, exitPrice, position.volume);
    this.positions.delete(position.id);
    this.balance += profit;
    this.record({
      orderId: this.allocateId(),
      positionId: position.id,
      type: position.side === 'buy' ? 'sell' : 'buy',
      entry: 'out',
      price: exitPrice,
      volume: position.volume,
      profit,
    });
  }

  private quote(symbol: string) {
    const quote = this.quotes.get(symbol);
    if (!quote) throw new Error(`no_quote:${symbol}`);
    return quote;
  }

  private markToMarket(position: PaperPosition): number {
    const quote = this.quotes.get(position.symbol);
    if (!quote) return 0;
    const exit = position.side === 'buy' ? quote.bid : quote.ask;
    return this.profitOf(position.side, position.openPrice, exit, position.volume);
  }

  async getTick(symbol: string): Promise<VenueTick> {
    const quote = this.quote(symbol);
    return { symbol, bid: quote.bid, ask: quote.ask, timestamp: quote.timestamp };
  }

  async getAccountSnapshot(): Promise<AccountSnapshot> {
    let unrealized = 0;
    let margin = 0;
    for (const position of this.positions.values()) {
      unrealized += this.markToMarket(position);
      margin += position.openPrice * position.volume * this.options.contractSize * this.options.marginRate;
    }
    const equity = this.balance + unrealized;
    return { balance: this.balance, equity, freeMargin: equity - margin };
  }

  async placeConditionalOrder(request: ConditionalOrderRequest): Promise<ConditionalOrderAck> {
    if (!(request.volume > 0)) {
      throw new OrderRejectedError('invalid_volume', { volume: request.volume });
    }
    const quote = this.quote(request.symbol);
    const wrongSide = request.side === 'buy' ? request.price <= quote.ask : request.price >= quote.bid;
    if (wrongSide) {
      throw new OrderRejectedError('invalid_stop_price', {
        side: request.side,
        price: request.price,
        bid: quote.bid,
        ask: quote.ask,
      });
    }
    const id = this.allocateId();
    this.pending.set(id, {
      id,
      symbol: request.symbol,
      side: request.side,
      openPrice: request.price,
      volume: request.volume,
      tag: request.tag,
      targetPrice: request.targetPrice,
    });
    return { venueOrderId: id };
  }

  async cancelOrder(venueOrderId: string): Promise<void> {
    if (!this.pending.delete(venueOrderId)) {
      throw new Error(`order_not_found:${venueOrderId}`);
    }
  }

  async listOpenPositions(symbol: string): Promise<VenuePosition[]> {
    return Array.from(this.positions.values())
      .filter((position) => position.symbol === symbol)
      .map((position) => {
        const { targetPrice: _target, ...open } = position;
        return { ...open, profit: this.markToMarket(position) };
      });
  }

  async listPendingOrders(symbol: string): Promise<VenuePendingOrder[]> {
    return Array.from(this.pending.values())
      .filter((order) => order.symbol === symbol)
      .map(({ targetPrice: _target, ...order }) => order);
  }

  async listTradeHistory(since: Date, until: Date): Promise<VenueDeal[]> {
    const from = since.getTime();
    const to = until.getTime();
    return this.deals.filter((deal) => deal.time >= from && deal.time <= to).map((deal) => ({ ...deal }));
  }

  async closePosition(positionId: string): Promise<void> {
    const position = this.positions.get(positionId);
    if (!position) throw new Error(`position_not_found:${positionId}`);
    const quote = this.quote(position.symbol);
    this.settle(position, position.side === 'buy' ? quote.bid : quote.ask);
  }
}
