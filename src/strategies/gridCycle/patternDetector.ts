import type { OrderSide } from '../types';
import { InvalidConfigurationError } from './errors';
import type { GridOrder, PatternPolicy, PatternSignal } from './types';

export const DEFAULT_PATTERN_POLICY: PatternPolicy = {
  minRunLength: 2,
  suppressSide: 'opposite',
};

/** A run of one is every fill, so the shortest meaningful run is two. */
export function validatePatternPolicy(policy: PatternPolicy): void {
  if (!Number.isInteger(policy.minRunLength) || policy.minRunLength < 2) {
    throw new InvalidConfigurationError('pattern run length must be an integer of at least 2', {
      minRunLength: policy.minRunLength,
    });
  }
}

// Longest chain of indices stepping by one in the side's direction of travel.
function longestRun(indices: number[], side: OrderSide): number {
  if (!indices.length) return 0;
  const sorted = [...new Set(indices)].sort((a, b) => (side === 'buy' ? a - b : b - a));
  const step = side === 'buy' ? 1 : -1;
  let best = 1;
  let current = 1;
  for (let i = 1; i < sorted.length; i += 1) {
    if (sorted[i] - sorted[i - 1] === step) {
      current += 1;
      best = Math.max(best, current);
    } else {
      current = 1;
    }
  }
  return best;
}

export function detectPattern(
  filledOrders: readonly GridOrder[],
  policy: PatternPolicy = DEFAULT_PATTERN_POLICY
): PatternSignal {
  const buyIndices: number[] = [];
  const sellIndices: number[] = [];
  for (const order of filledOrders) {
    if (order.status !== 'filled') continue;
    if (order.key.side === 'buy') buyIndices.push(order.key.index);
    else sellIndices.push(order.key.index);
  }

  const buyRun = longestRun(buyIndices, 'buy');
  const sellRun = longestRun(sellIndices, 'sell');
  const buyStreak = buyRun >= policy.minRunLength;
  const sellStreak = sellRun >= policy.minRunLength;

  if (policy.suppressSide === 'same') {
    return { suppressNextBuy: buyStreak, suppressNextSell: sellStreak, buyRun, sellRun };
  }
  return { suppressNextBuy: sellStreak, suppressNextSell: buyStreak, buyRun, sellRun };
}
