import { describe, expect, it } from 'vitest';
import { CONFIG } from '../../../src/config';
import { InvalidConfigurationError } from '../../../src/strategies/gridCycle/errors';
import { buildEngineSettings, buildGuardConfig } from '../../../src/strategies/gridCycle/settings';

type AppConfig = typeof CONFIG;

function config(grid: Partial<AppConfig['GRID']> = {}, guard: Partial<AppConfig['GUARD']> = {}): AppConfig {
  return {
    ...CONFIG,
    GRID: { ...CONFIG.GRID, ...grid },
    GUARD: { ...CONFIG.GUARD, ...guard },
  };
}

describe('settings', () => {
  it('adds the trading halt as a blackout window when enabled', () => {
    const guard = buildGuardConfig(
      config({}, { TRADING_HALT_ENABLED: true, TRADING_HALT: '04:30-06:15', BLACKOUT_WINDOWS: [] })
    );
    expect(guard.blackoutWindows).toEqual([
      { label: 'trading_halt', enabled: true, startMinute: 270, endMinute: 375 },
    ]);
    const off = buildGuardConfig(config({}, { TRADING_HALT_ENABLED: false, BLACKOUT_WINDOWS: [] }));
    expect(off.blackoutWindows).toEqual([]);
  });

  it('derives the reduction ceiling from the base amount unless configured', () => {
    expect(buildGuardConfig(config({ BASE_AMOUNT: 0.1 }, { MAX_REDUCE_BALANCE: undefined })).maxReduceBalance).toBe(2000);
    expect(buildGuardConfig(config({}, { MAX_REDUCE_BALANCE: 300 })).maxReduceBalance).toBe(300);
  });

  it('builds quiet hours only when a range is set', () => {
    const quiet = buildGuardConfig(config({}, { QUIET_HOURS: '19:00-24:00', QUIET_HOURS_FACTOR: 0.5 }));
    expect(quiet.quietHours).toEqual({
      window: { label: 'quiet_hours', enabled: true, startMinute: 1140, endMinute: 1440 },
      factor: 0.5,
    });
    expect(buildGuardConfig(config({}, { QUIET_HOURS: '' })).quietHours).toBeUndefined();
  });

  it('maps grid settings and rejects a bad scaling table', () => {
    const settings = buildEngineSettings(config({ SYMBOL: 'XAUUSD', SCALING_TABLE: [1, 2, 3], PATTERN_SUPPRESS_SIDE: 'same' }));
    expect(settings.symbol).toBe('XAUUSD');
    expect(settings.ladder.scalingTable).toEqual([1, 2, 3]);
    expect(settings.pattern.suppressSide).toBe('same');
    expect(() => buildEngineSettings(config({ SCALING_TABLE: [] }))).toThrow(InvalidConfigurationError);
  });

  it('rejects a pattern run length below two', () => {
    expect(() => buildEngineSettings(config({ PATTERN_MIN_RUN: 1 }))).toThrow(InvalidConfigurationError);
    expect(buildEngineSettings(config({ PATTERN_MIN_RUN: 3 })).pattern.minRunLength).toBe(3);
  });
});
