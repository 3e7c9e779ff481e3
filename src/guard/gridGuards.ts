import type { AccountSnapshot, VenueTick } from '../exchanges/venue';
import { TimeWindow, isWithinWindow } from './timeWindows';

export const GuardReason = {
  Ok: 'ok',
  Blackout: 'blackout',
  MaxReduceBreached: 'max_reduce_breached',
  MaxDrawdown: 'max_drawdown',
  LowMargin: 'low_margin',
  SpreadTooWide: 'spread_too_wide',
  CapacityReached: 'capacity_reached',
  ExposureCap: 'exposure_cap',
} as const;

export type GuardReason = (typeof GuardReason)[keyof typeof GuardReason];

export type GuardThresholdName =
  | 'maxDrawdown'
  | 'maxReduceBalance'
  | 'minFreeMargin'
  | 'maxSpread'
  | 'maxPositions'
  | 'maxOrders'
  | 'maxTotalExposure';

export const GUARD_THRESHOLD_NAMES: readonly GuardThresholdName[] = [
  'maxDrawdown',
  'maxReduceBalance',
  'minFreeMargin',
  'maxSpread',
  'maxPositions',
  'maxOrders',
  'maxTotalExposure',
];

export interface QuietHours {
  window: TimeWindow;
  /** multiplier applied to the base amount when a cycle starts inside the window */
  factor: number;
}

export type GuardThresholds = { [K in GuardThresholdName]?: number };

export interface GuardConfig extends GuardThresholds {
  blackoutWindows: TimeWindow[];
  allowCycleCompletionInBlackout: boolean;
  quietHours?: QuietHours;
  timezoneOffsetMinutes: number;
}

export interface StrategyExposure {
  cycleStartBalance: number;
  ownedPositions: number;
  ownedPendingOrders: number;
  ownedOpenVolume: number;
  /** volume the next ladder build would add */
  proposedVolume: number;
}

export interface GuardInput {
  market: Pick<VenueTick, 'bid' | 'ask'>;
  account: AccountSnapshot;
  strategy: StrategyExposure;
  config: GuardConfig;
  now: Date;
  cycleInFlight: boolean;
}

export interface GuardDecision {
  allowed: boolean;
  reason: GuardReason;
  /** only layers of the live cycle may be placed; no new cycle may start */
  continuationOnly: boolean;
  emergencyStop: boolean;
  pause: boolean;
  detail: Record<string, unknown>;
}

const ALLOWED: GuardDecision = {
  allowed: true,
  reason: GuardReason.Ok,
  continuationOnly: false,
  emergencyStop: false,
  pause: false,
  detail: {},
};

function blocked(reason: GuardReason, detail: Record<string, unknown>, flags: Partial<GuardDecision> = {}): GuardDecision {
  return {
    allowed: false,
    reason,
    continuationOnly: false,
    emergencyStop: false,
    pause: false,
    detail,
    ...flags,
  };
}

export function activeBlackout(config: GuardConfig, now: Date): TimeWindow | null {
  for (const window of config.blackoutWindows) {
    if (isWithinWindow(window, now, config.timezoneOffsetMinutes)) {
      return window;
    }
  }
  return null;
}

export function isQuietHours(config: GuardConfig, now: Date): boolean {
  if (!config.quietHours) return false;
  return isWithinWindow(config.quietHours.window, now, config.timezoneOffsetMinutes);
}

/** True when a decision lets a fresh cycle (or the first ladder of one) start. */
export function allowsNewCycle(decision: GuardDecision): boolean {
  return decision.allowed && !decision.continuationOnly;
}

export function evaluateGuards(input: GuardInput): GuardDecision {
  const { market, account, strategy, config, now } = input;

  const blackout = activeBlackout(config, now);
  let continuationOnly = false;
  if (blackout) {
    const detail = { window: blackout.label, cycleInFlight: input.cycleInFlight };
    if (!(input.cycleInFlight && config.allowCycleCompletionInBlackout)) {
      return blocked(GuardReason.Blackout, detail);
    }
    continuationOnly = true;
  }

  const reduction = strategy.cycleStartBalance - account.equity;
  if (config.maxReduceBalance !== undefined && reduction > config.maxReduceBalance) {
    return blocked(
      GuardReason.MaxReduceBreached,
      {
        cycleStartBalance: strategy.cycleStartBalance,
        equity: account.equity,
        threshold: config.maxReduceBalance,
      },
      { emergencyStop: true }
    );
  }

  if (config.maxDrawdown !== undefined && reduction >= config.maxDrawdown) {
    return blocked(
      GuardReason.MaxDrawdown,
      { drawdown: reduction, threshold: config.maxDrawdown },
      { pause: true }
    );
  }

  if (config.minFreeMargin !== undefined && account.freeMargin < config.minFreeMargin) {
    return blocked(GuardReason.LowMargin, { freeMargin: account.freeMargin, threshold: config.minFreeMargin });
  }

  const spread = market.ask - market.bid;
  if (config.maxSpread !== undefined && spread > config.maxSpread) {
    return blocked(GuardReason.SpreadTooWide, { spread, threshold: config.maxSpread });
  }

  const positionsFull = config.maxPositions !== undefined && strategy.ownedPositions >= config.maxPositions;
  const ordersFull = config.maxOrders !== undefined && strategy.ownedPendingOrders >= config.maxOrders;
  if (positionsFull || ordersFull) {
    return blocked(GuardReason.CapacityReached, {
      positions: strategy.ownedPositions,
      maxPositions: config.maxPositions ?? null,
      orders: strategy.ownedPendingOrders,
      maxOrders: config.maxOrders ?? null,
    });
  }

  if (
    config.maxTotalExposure !== undefined &&
    strategy.ownedOpenVolume + strategy.proposedVolume > config.maxTotalExposure
  ) {
    return blocked(GuardReason.ExposureCap, {
      openVolume: strategy.ownedOpenVolume,
      proposedVolume: strategy.proposedVolume,
      threshold: config.maxTotalExposure,
    });
  }

  if (continuationOnly && blackout) {
    return { ...ALLOWED, reason: GuardReason.Blackout, continuationOnly: true, detail: { window: blackout.label } };
  }
  return { ...ALLOWED, detail: {} };
}
