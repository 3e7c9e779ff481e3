import { describe, expect, it } from 'vitest';
import { PaperTradingVenue } from '../../src/exchanges/paperVenue';
import { OrderRejectedError } from '../../src/strategies/gridCycle/errors';

const SYMBOL = 'XAUUSD';

function venue(contractSize = 100) {
  const clock = { now: 1_000 };
  const paper = new PaperTradingVenue({ startBalance: 10_000, contractSize, marginRate: 0.01, clock: () => clock.now });
  paper.setQuote(SYMBOL, 1999.5, 2000.5);
  return { paper, clock };
}

describe('PaperTradingVenue', () => {
  it('rejects stops on the wrong side of the market', async () => {
    const { paper } = venue();
    const base = { symbol: SYMBOL, targetPrice: 2010, volume: 0.1, tag: 't' };
    await expect(paper.placeConditionalOrder({ ...base, side: 'buy', price: 2000.5 })).rejects.toThrow(
      OrderRejectedError
    );
    await expect(paper.placeConditionalOrder({ ...base, side: 'sell', price: 1999.5 })).rejects.toThrow(
      'invalid_stop_price'
    );
    await expect(paper.placeConditionalOrder({ ...base, side: 'buy', price: 2001, volume: 0 })).rejects.toThrow(
      'invalid_volume'
    );
  });

  it('triggers a buy stop on the ask and settles at its target on the bid', async () => {
    const { paper, clock } = venue();
    const { venueOrderId } = await paper.placeConditionalOrder({
      symbol: SYMBOL,
      side: 'buy',
      price: 2001,
      targetPrice: 2003,
      volume: 0.1,
      tag: 'grid:c1:buy_0',
    });
    expect(venueOrderId).toBe('1001');

    clock.now = 2_000;
    paper.setQuote(SYMBOL, 2000.5, 2001);
    const [position] = await paper.listOpenPositions(SYMBOL);
    expect(position).toMatchObject({ id: '1001', side: 'buy', openPrice: 2001, tag: 'grid:c1:buy_0' });
    expect(position.profit).toBeCloseTo(-5);
    expect(await paper.listPendingOrders(SYMBOL)).toEqual([]);

    clock.now = 3_000;
    paper.setQuote(SYMBOL, 2003, 2004);
    expect(await paper.listOpenPositions(SYMBOL)).toEqual([]);
    const account = await paper.getAccountSnapshot();
    expect(account.balance).toBeCloseTo(10_020);

    const deals = await paper.listTradeHistory(new Date(0), new Date(10_000));
    expect(deals.map((deal) => [deal.positionId, deal.entry, deal.type, deal.time])).toEqual([
      ['1001', 'in', 'buy', 2_000],
      ['1001', 'out', 'sell', 3_000],
    ]);
    expect(deals[1].profit).toBeCloseTo(20);
    expect(await paper.listTradeHistory(new Date(2_500), new Date(10_000))).toHaveLength(1);
  });

  it('triggers a sell stop on the bid', async () => {
    const { paper } = venue();
    await paper.placeConditionalOrder({ symbol: SYMBOL, side: 'sell', price: 1999, targetPrice: 1997, volume: 0.1, tag: 's' });
    paper.setQuote(SYMBOL, 1999.2, 2000);
    expect(await paper.listOpenPositions(SYMBOL)).toEqual([]);
    paper.setQuote(SYMBOL, 1998.5, 1999);
    expect(await paper.listOpenPositions(SYMBOL)).toHaveLength(1);
  });

  it('marks equity and free margin to market', async () => {
    const { paper } = venue();
    paper.seedPosition({ symbol: SYMBOL, side: 'sell', volume: 0.5, openPrice: 2001 });
    const account = await paper.getAccountSnapshot();
    expect(account.balance).toBe(10_000);
    // short from 2001, marked at ask 2000.5
    expect(account.equity).toBeCloseTo(10_025);
    expect(account.freeMargin).toBeCloseTo(10_025 - 2001 * 0.5 * 100 * 0.01);
  });

  it('cancels and closes on request', async () => {
    const { paper } = venue();
    const { venueOrderId } = await paper.placeConditionalOrder({
      symbol: SYMBOL,
      side: 'buy',
      price: 2002,
      targetPrice: 2004,
      volume: 0.1,
      tag: 'b',
    });
    await paper.cancelOrder(venueOrderId);
    await expect(paper.cancelOrder(venueOrderId)).rejects.toThrow(`order_not_found:${venueOrderId}`);

    const id = paper.seedPosition({ symbol: SYMBOL, side: 'buy', volume: 0.1, openPrice: 1999 });
    await paper.closePosition(id);
    expect((await paper.getAccountSnapshot()).balance).toBeCloseTo(10_005);
    await expect(paper.closePosition(id)).rejects.toThrow(`position_not_found:${id}`);
  });

  it('refuses crossed quotes', () => {
    const { paper } = venue();
    expect(() => paper.setQuote(SYMBOL, 2001, 2000)).toThrow('invalid_quote:2001/2000');
  });
});
