export type OrderSide = 'buy' | 'sell';

export type StrategyRunMode = 'paper' | 'live';

export interface StrategyRunContext {
  accountId: string;
  symbol: string;
  runMode: StrategyRunMode;
}
