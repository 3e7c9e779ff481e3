import ccxt from 'ccxt';
import { CONFIG } from '../config';
import { InvalidConfigurationError } from '../strategies/gridCycle/errors';

export interface CcxtTicker {
  bid?: number | null;
  ask?: number | null;
  last?: number | null;
  timestamp?: number | null;
}

/** The slice of a ccxt exchange the quote feed reads. */
export interface TickerSource {
  readonly id?: string;
  fetchTicker(symbol: string): Promise<CcxtTicker>;
}

type ExchangeConstructor = new (config: Record<string, unknown>) => TickerSource;

export interface ExchangeConnectionOptions {
  exchangeId?: string;
  apiKey?: string;
  apiSecret?: string;
  passphrase?: string | null;
}

export function getExchange(options: ExchangeConnectionOptions = {}): TickerSource {
  const id = options.exchangeId || CONFIG.EXCHANGE.ID;
  const registry = ccxt as unknown as Record<string, ExchangeConstructor | undefined>;
  const ExchangeClass = registry[id];
  if (typeof ExchangeClass !== 'function') {
    throw new InvalidConfigurationError(`Exchange ${id} is not supported by ccxt`, { exchangeId: id });
  }
  return new ExchangeClass({
    apiKey: options.apiKey || undefined,
    secret: options.apiSecret || undefined,
    password: options.passphrase ?? undefined,
    enableRateLimit: true,
    options: { adjustForTimeDifference: true },
  });
}
