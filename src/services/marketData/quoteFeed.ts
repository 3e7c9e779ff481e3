import type { CcxtTicker, TickerSource } from '../../exchanges/ccxtClient';
import type { PaperTradingVenue } from '../../exchanges/paperVenue';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/formatError';

export interface QuoteFeedOptions {
  /** symbol the engine trades, as known to the paper venue */
  symbol: string;
  /** market symbol on the exchange, e.g. XAU/USDT:USDT */
  marketSymbol: string;
  intervalMs: number;
}

function finiteOrNull(value: number | null | undefined) {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function sanitizeQuote(ticker: CcxtTicker): { bid: number; ask: number } | null {
  const bid = finiteOrNull(ticker.bid);
  const ask = finiteOrNull(ticker.ask);
  if (bid !== null && ask !== null && bid > 0 && ask >= bid) return { bid, ask };
  const last = finiteOrNull(ticker.last);
  if (last !== null && last > 0) return { bid: last, ask: last };
  return null;
}

/**
 * Drives the paper venue with live quotes polled from an exchange, so paper
 * runs trade against the real market.
 */
export class QuoteFeed {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;

  constructor(
    private readonly source: TickerSource,
    private readonly venue: PaperTradingVenue,
    private readonly options: QuoteFeedOptions
  ) {}

  async pollOnce(): Promise<boolean> {
    const { symbol, marketSymbol } = this.options;
    try {
      const quote = sanitizeQuote(await this.source.fetchTicker(marketSymbol));
      if (!quote) {
        logger.warn('quote_feed_incomplete_ticker', { event: 'quote_feed_incomplete_ticker', marketSymbol });
        return false;
      }
      this.venue.setQuote(symbol, quote.bid, quote.ask);
      return true;
    } catch (error) {
      logger.warn('quote_feed_poll_failed', {
        event: 'quote_feed_poll_failed',
        exchange: this.source.id ?? 'unknown',
        marketSymbol,
        error: formatError(error),
      });
      return false;
    }
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = true;
      void this.pollOnce().finally(() => {
        this.inFlight = false;
      });
    }, this.options.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
