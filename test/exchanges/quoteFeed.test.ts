import { describe, expect, it, vi } from 'vitest';
import type { CcxtTicker, TickerSource } from '../../src/exchanges/ccxtClient';
import { PaperTradingVenue } from '../../src/exchanges/paperVenue';
import { QuoteFeed, sanitizeQuote } from '../../src/services/marketData/quoteFeed';

function setup() {
  const fetchTicker = vi.fn(async (_symbol: string): Promise<CcxtTicker> => ({ bid: 2000, ask: 2000.5 }));
  const source: TickerSource = { id: 'mock', fetchTicker };
  const venue = new PaperTradingVenue({ startBalance: 1_000, contractSize: 1, marginRate: 0.01 });
  const feed = new QuoteFeed(source, venue, { symbol: 'XAUUSD', marketSymbol: 'XAU/USDT:USDT', intervalMs: 10 });
  return { fetchTicker, venue, feed };
}

describe('sanitizeQuote', () => {
  it('prefers a valid bid and ask, then falls back to last', () => {
    expect(sanitizeQuote({ bid: 1, ask: 2, last: 1.5 })).toEqual({ bid: 1, ask: 2 });
    expect(sanitizeQuote({ bid: 2, ask: 1, last: 1.5 })).toEqual({ bid: 1.5, ask: 1.5 });
    expect(sanitizeQuote({ bid: null, ask: undefined, last: 3 })).toEqual({ bid: 3, ask: 3 });
    expect(sanitizeQuote({ bid: Number.NaN, last: 0 })).toBeNull();
  });
});

describe('QuoteFeed', () => {
  it('pushes exchange quotes into the paper venue', async () => {
    const { feed, fetchTicker, venue } = setup();
    expect(await feed.pollOnce()).toBe(true);
    expect(fetchTicker).toHaveBeenCalledWith('XAU/USDT:USDT');
    expect(await venue.getTick('XAUUSD')).toMatchObject({ symbol: 'XAUUSD', bid: 2000, ask: 2000.5 });
  });

  it('reports incomplete tickers and fetch failures as misses', async () => {
    const { feed, fetchTicker, venue } = setup();
    fetchTicker.mockResolvedValueOnce({ bid: null, ask: null, last: null });
    expect(await feed.pollOnce()).toBe(false);
    fetchTicker.mockRejectedValueOnce(new Error('rate limited'));
    expect(await feed.pollOnce()).toBe(false);
    await expect(venue.getTick('XAUUSD')).rejects.toThrow('no_quote:XAUUSD');
  });

  it('polls on an interval until stopped', async () => {
    const { feed, fetchTicker } = setup();
    feed.start();
    await vi.waitFor(() => expect(fetchTicker).toHaveBeenCalled());
    feed.stop();
  });
});
