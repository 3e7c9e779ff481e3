import type { CONFIG } from '../../config';
import type { GuardConfig } from '../../guard/gridGuards';
import { TimeWindow, createTimeWindow } from '../../guard/timeWindows';
import { TRADING_HALT_LABEL } from './cycleController';
import { DEFAULT_DUPLICATE_TOLERANCE } from './gridBuilder';
import { validatePatternPolicy } from './patternDetector';
import { validateScalingTable } from './positionSizer';
import type { GridEngineSettings } from './types';

type AppConfig = typeof CONFIG;

// Equity-reduction ceiling used when none is configured.
const DEFAULT_REDUCE_MULTIPLIER = 10 * 2000;

function blackoutWindows(guard: AppConfig['GUARD']): TimeWindow[] {
  const windows = guard.BLACKOUT_WINDOWS.map((entry) =>
    createTimeWindow(entry.label, entry.range, { weekdays: entry.weekdays })
  );
  if (guard.TRADING_HALT_ENABLED) {
    windows.push(createTimeWindow(TRADING_HALT_LABEL, guard.TRADING_HALT));
  }
  return windows;
}

export function buildGuardConfig(config: AppConfig): GuardConfig {
  const guard = config.GUARD;
  return {
    maxDrawdown: guard.MAX_DRAWDOWN,
    maxReduceBalance: guard.MAX_REDUCE_BALANCE ?? config.GRID.BASE_AMOUNT * DEFAULT_REDUCE_MULTIPLIER,
    minFreeMargin: guard.MIN_FREE_MARGIN,
    maxSpread: guard.MAX_SPREAD,
    maxPositions: guard.MAX_POSITIONS,
    maxOrders: guard.MAX_ORDERS,
    maxTotalExposure: guard.MAX_TOTAL_EXPOSURE,
    blackoutWindows: blackoutWindows(guard),
    allowCycleCompletionInBlackout: guard.ALLOW_CYCLE_COMPLETION_IN_BLACKOUT,
    quietHours: guard.QUIET_HOURS
      ? { window: createTimeWindow('quiet_hours', guard.QUIET_HOURS), factor: guard.QUIET_HOURS_FACTOR }
      : undefined,
    timezoneOffsetMinutes: guard.TIMEZONE_OFFSET_MINUTES,
  };
}

export function buildEngineSettings(config: AppConfig): GridEngineSettings {
  const grid = config.GRID;
  validateScalingTable(grid.SCALING_TABLE);
  const pattern = { minRunLength: grid.PATTERN_MIN_RUN, suppressSide: grid.PATTERN_SUPPRESS_SIDE };
  validatePatternPolicy(pattern);
  return {
    accountId: config.ACCOUNT_ID,
    symbol: grid.SYMBOL,
    tagPrefix: grid.TAG_PREFIX,
    baseAmount: grid.BASE_AMOUNT,
    cycleTargetProfit: grid.CYCLE_TARGET_PROFIT,
    targetMultiplier: grid.TARGET_MULTIPLIER,
    ladder: {
      entryDelta: grid.ENTRY_DELTA,
      profitDistance: grid.PROFIT_DISTANCE,
      percentScale: grid.PERCENT_SCALE,
      scalingTable: grid.SCALING_TABLE,
      duplicateTolerance: DEFAULT_DUPLICATE_TOLERANCE,
    },
    pattern,
    reanchorOnFill: grid.REANCHOR_ON_FILL,
    guard: buildGuardConfig(config),
    loopIntervalMs: config.LOOP.INTERVAL_MS,
    pausedIntervalMs: config.LOOP.PAUSED_INTERVAL_MS,
  };
}
