import { describe, expect, it } from 'vitest';
import { createTimeWindow } from '../../src/guard/timeWindows';
import { controllerStateGauge, gridOrdersPlacedCounter, guardBlockCounter } from '../../src/telemetry/metrics';
import { createHarness, guardConfig, startAndSeed } from '../helpers';

describe('grid metrics', () => {
  it('counts placed orders by side and tracks the controller state', async () => {
    const h = createHarness();
    await startAndSeed(h);
    const placed = await gridOrdersPlacedCounter.get();
    expect(placed.values.map((entry) => [entry.labels.side, entry.value]).sort()).toEqual([
      ['buy', 3],
      ['sell', 3],
    ]);
    const state = await controllerStateGauge.get();
    expect(state.values[0]?.value).toBe(1);
  });

  it('counts every blocked tick by reason', async () => {
    const h = createHarness({ guard: guardConfig({ blackoutWindows: [createTimeWindow('news', '09:00-11:00')] }) });
    await startAndSeed(h);
    await h.controller.tick();
    const blocks = await guardBlockCounter.get();
    expect(blocks.values.map((entry) => [entry.labels.reason, entry.value])).toEqual([['blackout', 2]]);
  });
});
