import { PaperTradingVenue } from '../src/exchanges/paperVenue';
import type { GuardConfig } from '../src/guard/gridGuards';
import { CycleController, CycleControllerOptions } from '../src/strategies/gridCycle/cycleController';
import type { EngineEvent, EngineEventSink, EngineEventType } from '../src/strategies/gridCycle/events';
import type {
  CycleHistoryStore,
  CycleRecord,
  GridEngineSettings,
  LadderParams,
} from '../src/strategies/gridCycle/types';

export const SYMBOL = 'XAUUSD';

// 2024-01-03 03:00 UTC is 10:00 on a Wednesday at GMT+7
export const T0 = Date.UTC(2024, 0, 3, 3, 0, 0);

export class MemoryEventSink implements EngineEventSink {
  readonly events: EngineEvent[] = [];

  async publish(event: EngineEvent): Promise<void> {
    this.events.push(event);
  }

  ofType<T extends EngineEventType>(type: T): Extract<EngineEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<EngineEvent, { type: T }> => event.type === type);
  }

  clear() {
    this.events.length = 0;
  }
}

export class MemoryHistoryStore implements CycleHistoryStore {
  readonly records: CycleRecord[] = [];

  async recordCycle(record: CycleRecord): Promise<void> {
    this.records.push(record);
  }

  async lastCycleNumber(): Promise<number> {
    return this.records.reduce((max, record) => Math.max(max, record.cycleNumber), 0);
  }
}

export function ladderParams(overrides: Partial<LadderParams> = {}): LadderParams {
  return {
    entryDelta: 0.8,
    profitDistance: 2,
    percentScale: 0,
    scalingTable: [1, 1, 2, 2, 3, 3, 5, 5, 8, 8, 13],
    duplicateTolerance: 1e-4,
    ...overrides,
  };
}

export function guardConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
  return {
    blackoutWindows: [],
    allowCycleCompletionInBlackout: true,
    timezoneOffsetMinutes: 420,
    ...overrides,
  };
}

export function engineSettings(overrides: Partial<GridEngineSettings> = {}): GridEngineSettings {
  return {
    accountId: 'acct-test',
    symbol: SYMBOL,
    tagPrefix: 'grid',
    baseAmount: 0.1,
    targetMultiplier: 1000,
    ladder: ladderParams(),
    pattern: { minRunLength: 2, suppressSide: 'opposite' },
    reanchorOnFill: true,
    guard: guardConfig(),
    loopIntervalMs: 1,
    pausedIntervalMs: 1,
    ...overrides,
  };
}

export interface Harness {
  venue: PaperTradingVenue;
  sink: MemoryEventSink;
  history: MemoryHistoryStore;
  controller: CycleController;
  clock: { now: number };
}

export function createHarness(
  settings: Partial<GridEngineSettings> = {},
  options: Partial<Pick<CycleControllerOptions, 'settingsStore'>> & { contractSize?: number } = {}
): Harness {
  const clock = { now: T0 };
  const venue = new PaperTradingVenue({
    startBalance: 10_000,
    contractSize: options.contractSize ?? 1,
    marginRate: 0.01,
    clock: () => clock.now,
  });
  venue.setQuote(SYMBOL, 1999.9, 2000.1);
  const sink = new MemoryEventSink();
  const history = new MemoryHistoryStore();
  const controller = new CycleController({
    venue,
    settings: engineSettings(settings),
    events: sink,
    history,
    settingsStore: options.settingsStore,
    clock: () => clock.now,
  });
  return { venue, sink, history, controller, clock };
}

/** Starts the controller and runs the first tick, which seeds the ladder at mid 2000. */
export async function startAndSeed(harness: Harness) {
  harness.controller.enqueue({ type: 'start' });
  await harness.controller.tick();
}

export function placedKeys(harness: Harness): string[] {
  return harness.controller
    .snapshot()
    .orders.filter((order) => order.status === 'placed')
    .map((order) => `${order.key.side}_${order.key.index}`)
    .sort();
}
