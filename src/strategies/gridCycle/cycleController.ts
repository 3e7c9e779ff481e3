import { setTimeout as sleep } from 'timers/promises';
import type { AccountSnapshot, TradingVenue, VenueDeal, VenuePendingOrder, VenuePosition, VenueTick } from '../../exchanges/venue';
import { EmergencyStop } from '../../guard/emergencyStop';
import { describeWindow } from '../../guard/timeWindows';
import {
  GuardConfig,
  GuardDecision,
  GuardReason,
  GuardThresholds,
  GUARD_THRESHOLD_NAMES,
  allowsNewCycle,
  evaluateGuards,
  isQuietHours,
} from '../../guard/gridGuards';
import {
  anchorIndexGauge,
  controllerStateGauge,
  cycleCompletedCounter,
  cyclePnlGauge,
  guardBlockCounter,
  gridCloseCounter,
  gridFillCounter,
  sessionProfitGauge,
  venueErrorCounter,
} from '../../telemetry/metrics';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/formatError';
import { CommandQueue, EngineCommand } from './commands';
import { InvalidConfigurationError, MaxReduceBreachedError, VenueUnavailableError, callVenue } from './errors';
import type { EngineEvent, EngineEventSink, EngineSnapshot, FlattenReason, FlattenReport } from './events';
import { pollFills } from './fillTracker';
import { GridBuilder } from './gridBuilder';
import {
  anchorAfterClose,
  createGridState,
  hasLiveCycle,
  knownVenueIds,
  releaseSlot,
  trackedOrders,
} from './gridState';
import { detectPattern, validatePatternPolicy } from './patternDetector';
import { validateScalingTable } from './positionSizer';
import type {
  ControllerState,
  CycleHistoryStore,
  EngineSettingsStore,
  GridEngineSettings,
  GridState,
  PauseReason,
} from './types';

export const TRADING_HALT_LABEL = 'trading_halt';

// Tolerates clock drift between the host and the venue when reading deal history.
const HISTORY_SKEW_MS = 60_000;

// Volumes are quoted in hundredths of a lot.
const LOTS_PER_UNIT = 100;

function roundLots(volume: number) {
  return Math.max(1, Math.round(volume * LOTS_PER_UNIT)) / LOTS_PER_UNIT;
}

export interface CycleControllerOptions {
  venue: TradingVenue;
  settings: GridEngineSettings;
  events: EngineEventSink;
  commands?: CommandQueue;
  history?: CycleHistoryStore;
  settingsStore?: EngineSettingsStore;
  clock?: () => number;
}

interface OwnedBook {
  pending: VenuePendingOrder[];
  positions: VenuePosition[];
}

interface VenueView {
  tick: VenueTick;
  account: AccountSnapshot;
  positions: VenuePosition[];
  pending: VenuePendingOrder[];
  history: VenueDeal[];
}

type TransitionReason = PauseReason | 'started' | 'acknowledged';

export class CycleController {
  readonly commands: CommandQueue;
  private readonly venue: TradingVenue;
  private readonly settings: GridEngineSettings;
  private readonly events: EngineEventSink;
  private readonly builder: GridBuilder;
  private readonly emergency = new EmergencyStop();
  private readonly clock: () => number;
  private readonly guard: GuardConfig;

  private state: ControllerState = 'paused';
  private pauseReason: PauseReason | null = 'awaiting_start';
  private grid: GridState;
  private baseAmountOverride: number | null = null;
  private withdrawalThreshold: number | null = null;
  private withdrawalPending = false;
  private stopAfterCycle = false;
  private resetPending = false;
  private scheduledPauseAt: number | null = null;
  private sessionProfit = 0;
  private unrealizedPnl = 0;
  private lastBlockReason: GuardReason | null = null;
  private initialized = false;
  private stopped = false;

  constructor(private readonly options: CycleControllerOptions) {
    const { settings } = options;
    if (!Number.isFinite(settings.baseAmount) || settings.baseAmount <= 0) {
      throw new InvalidConfigurationError('base amount must be positive', { baseAmount: settings.baseAmount });
    }
    if (settings.targetMultiplier <= 0 && settings.cycleTargetProfit === undefined) {
      throw new InvalidConfigurationError('cycle target must be positive', {
        targetMultiplier: settings.targetMultiplier,
      });
    }
    validateScalingTable(settings.ladder.scalingTable);
    validatePatternPolicy(settings.pattern);

    this.venue = options.venue;
    this.settings = settings;
    this.events = options.events;
    this.commands = options.commands ?? new CommandQueue();
    this.clock = options.clock ?? Date.now;
    this.guard = {
      ...settings.guard,
      blackoutWindows: [...settings.guard.blackoutWindows],
    };
    this.builder = new GridBuilder({
      venue: this.venue,
      symbol: settings.symbol,
      tagPrefix: settings.tagPrefix,
      accountId: settings.accountId,
      ladder: settings.ladder,
      events: { publish: (event) => this.emit(event) },
      clock: this.clock,
    });
    this.grid = this.freshGrid(1, 0);
  }

  get controllerState(): ControllerState {
    return this.state;
  }

  get guardConfig(): Readonly<GuardConfig> {
    return this.guard;
  }

  enqueue(command: EngineCommand) {
    this.commands.push(command);
  }

  /** Restores persisted operator overrides. Safe to call more than once. */
  async init(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    await this.restoreCycleNumber();
    const store = this.options.settingsStore;
    if (!store) return;
    try {
      const saved = await store.load(this.settings.accountId);
      if (!saved) return;
      this.baseAmountOverride = saved.baseAmountOverride;
      this.withdrawalThreshold = saved.withdrawalThreshold;
      for (const name of GUARD_THRESHOLD_NAMES) {
        const value = saved.thresholds[name];
        if (value !== undefined) this.guard[name] = value;
      }
      if (!hasLiveCycle(this.grid)) {
        this.grid = this.freshGrid(this.grid.cycleNumber, this.grid.cycleStartBalance);
      }
      logger.info('grid_settings_restored', {
        event: 'grid_settings_restored',
        accountId: this.settings.accountId,
        baseAmountOverride: saved.baseAmountOverride,
        thresholds: saved.thresholds,
      });
    } catch (error) {
      logger.warn('grid_settings_restore_failed', {
        event: 'grid_settings_restore_failed',
        accountId: this.settings.accountId,
        error: formatError(error),
      });
    }
  }

  private async restoreCycleNumber() {
    const history = this.options.history;
    if (!history || hasLiveCycle(this.grid)) return;
    try {
      const last = await history.lastCycleNumber(this.settings.accountId);
      if (last >= this.grid.cycleNumber) this.grid.cycleNumber = last + 1;
    } catch (error) {
      logger.warn('grid_cycle_number_restore_failed', {
        event: 'grid_cycle_number_restore_failed',
        accountId: this.settings.accountId,
        error: formatError(error),
      });
    }
  }

  async run(): Promise<void> {
    this.stopped = false;
    await this.init();
    logger.info('grid_loop_started', {
      event: 'grid_loop_started',
      accountId: this.settings.accountId,
      symbol: this.settings.symbol,
    });
    while (!this.stopped) {
      try {
        await this.tick();
      } catch (error) {
        logger.error('grid_tick_failed', {
          event: 'grid_tick_failed',
          accountId: this.settings.accountId,
          error: formatError(error),
        });
      }
      if (this.stopped) break;
      await sleep(this.state === 'running' ? this.settings.loopIntervalMs : this.settings.pausedIntervalMs);
    }
    logger.info('grid_loop_stopped', { event: 'grid_loop_stopped', accountId: this.settings.accountId });
  }

  stop() {
    this.stopped = true;
  }

  snapshot(): EngineSnapshot {
    const grid = this.grid;
    return {
      accountId: this.settings.accountId,
      symbol: this.settings.symbol,
      state: this.state,
      pauseReason: this.pauseReason,
      cycleNumber: grid.cycleNumber,
      anchorIndex: grid.anchorIndex,
      baseAmount: grid.baseAmount,
      baseAmountOverride: this.baseAmountOverride,
      cycleTargetProfit: grid.cycleTargetProfit,
      cycleStartBalance: grid.cycleStartBalance,
      cycleStartedAt: grid.cycleStartedAt,
      cycleRealizedPnl: grid.cycleRealizedPnl,
      unrealizedPnl: this.unrealizedPnl,
      maxDrawdownObserved: grid.maxDrawdownObserved,
      sessionProfit: this.sessionProfit,
      orders: trackedOrders(grid).map((order) => ({ ...order })),
      closedOrders: grid.closedOrders.map((order) => ({ ...order })),
      stopAfterCycle: this.stopAfterCycle,
      scheduledPauseAt: this.scheduledPauseAt,
      resetPending: this.resetPending,
      emergency: this.emergency.getContext(),
      blackoutWindows: this.guard.blackoutWindows.map(describeWindow),
    };
  }

  async tick(): Promise<void> {
    for (const command of this.commands.drain()) {
      await this.handleCommand(command);
    }
    if (this.state !== 'running') return;

    const now = this.clock();
    if (this.scheduledPauseAt !== null && now >= this.scheduledPauseAt) {
      this.scheduledPauseAt = null;
      await this.transition('paused', 'scheduled');
      return;
    }

    const view = await this.readVenue(now);
    if (!view) return;

    const grid = this.grid;
    const owned = this.ownership();
    const ownedPositions = view.positions.filter(owned);
    const ownedPending = view.pending.filter(owned);
    const mid = (view.tick.bid + view.tick.ask) / 2;

    const decision = evaluateGuards({
      market: view.tick,
      account: view.account,
      strategy: {
        cycleStartBalance: grid.cycleStartBalance,
        ownedPositions: ownedPositions.length,
        ownedPendingOrders: ownedPending.length,
        ownedOpenVolume: ownedPositions.reduce((sum, position) => sum + position.volume, 0),
        proposedVolume: this.builder.proposedVolume(grid, grid.anchorIndex, mid),
      },
      config: this.guard,
      now: new Date(now),
      cycleInFlight: hasLiveCycle(grid),
    });

    if (decision.emergencyStop) {
      await this.triggerEmergency(decision, view.account);
      return;
    }
    await this.noteGuardDecision(decision);
    if (decision.pause) {
      await this.transition('paused', 'max_drawdown');
      return;
    }
    if (this.resetPending) {
      await this.completeCycle(decision, view.account);
      return;
    }

    const polled = pollFills(grid, view.history, view.positions, now);

    for (const filled of polled.newlyFilled) {
      gridFillCounter.labels(this.settings.accountId, filled.key.side).inc();
      const pattern = detectPattern(trackedOrders(grid), this.settings.pattern);
      logger.info('grid_order_filled', {
        event: 'grid_order_filled',
        accountId: this.settings.accountId,
        side: filled.key.side,
        index: filled.key.index,
        venueOrderId: filled.venueOrderId,
        entryPrice: filled.entryPrice,
      });
      await this.emit({ type: 'order_filled', order: filled, pattern, snapshot: this.snapshot() });
      if (this.settings.reanchorOnFill) {
        await this.builder.buildAt({
          state: grid,
          anchorIndex: grid.anchorIndex,
          referencePrice: filled.entryPrice,
          decision,
          pattern,
        });
      }
    }

    for (const { order, pnl } of polled.newlyClosed) {
      grid.cycleRealizedPnl += pnl;
      grid.anchorIndex = anchorAfterClose(order.key.side, order.key.index);
      releaseSlot(grid, order);
      gridCloseCounter.labels(this.settings.accountId, order.key.side).inc();
      logger.info('grid_position_closed', {
        event: 'grid_position_closed',
        accountId: this.settings.accountId,
        side: order.key.side,
        index: order.key.index,
        pnl,
        anchorIndex: grid.anchorIndex,
      });
      await this.emit({ type: 'position_closed', order, pnl, anchorIndex: grid.anchorIndex, snapshot: this.snapshot() });
      await this.builder.buildAt({
        state: grid,
        anchorIndex: grid.anchorIndex,
        referencePrice: mid,
        decision,
        pattern: detectPattern(trackedOrders(grid), this.settings.pattern),
      });
    }

    if (allowsNewCycle(decision) && !hasLiveCycle(grid)) {
      await this.builder.buildAt({
        state: grid,
        anchorIndex: grid.anchorIndex,
        referencePrice: mid,
        decision,
        pattern: detectPattern(trackedOrders(grid), this.settings.pattern),
      });
    }

    this.unrealizedPnl = ownedPositions.reduce((sum, position) => sum + position.profit, 0);
    grid.maxDrawdownObserved = Math.max(grid.maxDrawdownObserved, grid.cycleStartBalance - view.account.equity);
    const cyclePnl = grid.cycleRealizedPnl + this.unrealizedPnl;
    cyclePnlGauge.labels(this.settings.accountId).set(cyclePnl);
    anchorIndexGauge.labels(this.settings.accountId).set(grid.anchorIndex);

    if (cyclePnl >= grid.cycleTargetProfit) {
      await this.completeCycle(decision, view.account);
    }
  }

  private async readVenue(now: number): Promise<VenueView | null> {
    const { symbol } = this.settings;
    try {
      const tick = await callVenue('getTick', () => this.venue.getTick(symbol));
      const account = await callVenue('getAccountSnapshot', () => this.venue.getAccountSnapshot());
      // positions before history: a close between the two reads keeps its deal
      const positions = await callVenue('listOpenPositions', () => this.venue.listOpenPositions(symbol));
      const pending = await callVenue('listPendingOrders', () => this.venue.listPendingOrders(symbol));
      const history = await callVenue('listTradeHistory', () =>
        this.venue.listTradeHistory(
          new Date(this.grid.cycleStartedAt - HISTORY_SKEW_MS),
          new Date(now + HISTORY_SKEW_MS)
        )
      );
      return { tick, account, positions, pending, history };
    } catch (error) {
      const operation = error instanceof VenueUnavailableError ? error.operation : 'unknown';
      venueErrorCounter.labels(this.settings.accountId, operation).inc();
      logger.warn('grid_tick_skipped', {
        event: 'grid_tick_skipped',
        accountId: this.settings.accountId,
        operation,
        error: formatError(error),
      });
      return null;
    }
  }

  private ownership() {
    const prefix = `${this.settings.tagPrefix}:`;
    const known = knownVenueIds(this.grid);
    return (item: { id: string; tag?: string }) => known.has(item.id) || (item.tag?.startsWith(prefix) ?? false);
  }

  private targetFor(baseAmount: number) {
    return this.settings.cycleTargetProfit ?? baseAmount * this.settings.targetMultiplier;
  }

  private nextBaseAmount(now: number) {
    if (this.baseAmountOverride !== null) return this.baseAmountOverride;
    const quiet = this.guard.quietHours;
    if (quiet && isQuietHours(this.guard, new Date(now))) {
      return roundLots(this.settings.baseAmount * quiet.factor);
    }
    return this.settings.baseAmount;
  }

  private freshGrid(cycleNumber: number, startBalance: number): GridState {
    const now = this.clock();
    const baseAmount = this.nextBaseAmount(now);
    return createGridState({
      cycleNumber,
      baseAmount,
      cycleTargetProfit: this.targetFor(baseAmount),
      cycleStartBalance: startBalance,
      startedAt: now,
    });
  }

  private async noteGuardDecision(decision: GuardDecision) {
    if (decision.allowed) {
      this.lastBlockReason = null;
      return;
    }
    guardBlockCounter.labels(this.settings.accountId, decision.reason).inc();
    if (this.lastBlockReason === decision.reason) return;
    this.lastBlockReason = decision.reason;
    logger.warn('grid_guard_blocked', {
      event: 'grid_guard_blocked',
      accountId: this.settings.accountId,
      reason: decision.reason,
      detail: decision.detail,
    });
    await this.emit({ type: 'guard_blocked', reason: decision.reason, detail: decision.detail });
  }

  private async listOwned(reason: FlattenReason): Promise<OwnedBook | null> {
    const { symbol } = this.settings;
    const owned = this.ownership();
    try {
      const pending = await callVenue('listPendingOrders', () => this.venue.listPendingOrders(symbol));
      const positions = await callVenue('listOpenPositions', () => this.venue.listOpenPositions(symbol));
      return { pending: pending.filter(owned), positions: positions.filter(owned) };
    } catch (error) {
      logger.error('grid_flatten_lookup_failed', {
        event: 'grid_flatten_lookup_failed',
        accountId: this.settings.accountId,
        reason,
        error: formatError(error),
      });
      return null;
    }
  }

  /**
   * Cancels owned pending orders, closes owned positions, then reads both
   * books back. Complete only when every call succeeded and nothing owned is
   * left on the venue.
   */
  private async flatten(reason: FlattenReason): Promise<FlattenReport> {
    const { symbol, accountId } = this.settings;
    const report: FlattenReport = {
      cancelled: 0,
      closed: 0,
      failures: 0,
      openPositions: [],
      pendingOrders: [],
      complete: false,
    };
    const book = await this.listOwned(reason);
    if (!book) {
      report.failures += 1;
      return report;
    }

    for (const order of book.pending) {
      try {
        await callVenue('cancelOrder', () => this.venue.cancelOrder(order.id, symbol));
        report.cancelled += 1;
      } catch (error) {
        report.failures += 1;
        logger.error('grid_cancel_failed', {
          event: 'grid_cancel_failed',
          accountId,
          venueOrderId: order.id,
          error: formatError(error),
        });
      }
    }
    for (const position of book.positions) {
      try {
        await callVenue('closePosition', () => this.venue.closePosition(position.id, symbol));
        report.closed += 1;
      } catch (error) {
        report.failures += 1;
        logger.error('grid_close_failed', {
          event: 'grid_close_failed',
          accountId,
          positionId: position.id,
          error: formatError(error),
        });
      }
    }

    const left = await this.listOwned(reason);
    if (left) {
      report.pendingOrders = left.pending.map((order) => order.id);
      report.openPositions = left.positions.map((position) => position.id);
    } else {
      report.failures += 1;
    }
    report.complete = report.failures === 0 && !report.pendingOrders.length && !report.openPositions.length;
    if (report.complete) {
      logger.info('grid_flattened', { event: 'grid_flattened', accountId, reason, ...report });
    } else {
      logger.warn('grid_flatten_incomplete', { event: 'grid_flatten_incomplete', accountId, reason, ...report });
    }
    return report;
  }

  private async balanceAfterFlatten(fallback: AccountSnapshot): Promise<AccountSnapshot> {
    try {
      return await callVenue('getAccountSnapshot', () => this.venue.getAccountSnapshot());
    } catch (error) {
      logger.warn('grid_balance_refresh_failed', {
        event: 'grid_balance_refresh_failed',
        accountId: this.settings.accountId,
        error: formatError(error),
      });
      return fallback;
    }
  }

  private async completeCycle(decision: GuardDecision, account: AccountSnapshot) {
    const previous = this.grid;
    const flat = await this.flatten('cycle_target_reached');
    if (!flat.complete) {
      // keep the grid as is; the next tick retries the flatten before tracking fills
      const firstAttempt = !this.resetPending;
      this.resetPending = true;
      logger.warn('grid_cycle_reset_deferred', {
        event: 'grid_cycle_reset_deferred',
        accountId: this.settings.accountId,
        cycleNumber: previous.cycleNumber,
        openPositions: flat.openPositions,
        pendingOrders: flat.pendingOrders,
        failures: flat.failures,
      });
      if (firstAttempt) await this.emit({ type: 'flatten_incomplete', reason: 'cycle_target_reached', report: flat });
      return;
    }
    this.resetPending = false;
    const after = await this.balanceAfterFlatten(account);
    const now = this.clock();
    const cyclePnl = after.balance - previous.cycleStartBalance;
    this.sessionProfit += cyclePnl;
    sessionProfitGauge.labels(this.settings.accountId).set(this.sessionProfit);
    cycleCompletedCounter.labels(this.settings.accountId).inc();

    const history = this.options.history;
    if (history) {
      await history
        .recordCycle({
          accountId: this.settings.accountId,
          symbol: this.settings.symbol,
          cycleNumber: previous.cycleNumber,
          baseAmount: previous.baseAmount,
          startBalance: previous.cycleStartBalance,
          endBalance: after.balance,
          cyclePnl,
          maxDrawdown: previous.maxDrawdownObserved,
          startedAt: new Date(previous.cycleStartedAt),
          completedAt: new Date(now),
        })
        .catch((error) => {
          logger.warn('grid_cycle_record_failed', {
            event: 'grid_cycle_record_failed',
            accountId: this.settings.accountId,
            cycleNumber: previous.cycleNumber,
            error: formatError(error),
          });
        });
    }

    this.grid = this.freshGrid(previous.cycleNumber + 1, after.balance);
    this.unrealizedPnl = 0;
    const quiet = isQuietHours(this.guard, new Date(now));
    logger.info('grid_cycle_completed', {
      event: 'grid_cycle_completed',
      accountId: this.settings.accountId,
      cycleNumber: previous.cycleNumber,
      cyclePnl,
      sessionProfit: this.sessionProfit,
      nextBaseAmount: this.grid.baseAmount,
    });
    await this.emit({
      type: 'cycle_completed',
      cycleNumber: previous.cycleNumber,
      startBalance: previous.cycleStartBalance,
      endBalance: after.balance,
      cyclePnl,
      sessionProfit: this.sessionProfit,
      durationMs: now - previous.cycleStartedAt,
      maxDrawdown: previous.maxDrawdownObserved,
      nextBaseAmount: this.grid.baseAmount,
      quietHours: quiet,
    });
    if (this.grid.baseAmount !== previous.baseAmount) {
      await this.emit({
        type: 'base_amount_changed',
        previous: previous.baseAmount,
        next: this.grid.baseAmount,
        override: this.baseAmountOverride !== null,
      });
    }

    if (this.stopAfterCycle) {
      this.stopAfterCycle = false;
      await this.transition('paused', 'cycle_completed');
      return;
    }
    if (this.withdrawalThreshold !== null && this.sessionProfit >= this.withdrawalThreshold) {
      this.withdrawalPending = true;
      await this.transition('paused', 'profit_withdrawal');
      return;
    }
    if (!allowsNewCycle(decision)) return;

    try {
      const tick = await callVenue('getTick', () => this.venue.getTick(this.settings.symbol));
      await this.builder.buildAt({
        state: this.grid,
        anchorIndex: this.grid.anchorIndex,
        referencePrice: (tick.bid + tick.ask) / 2,
        decision,
        pattern: detectPattern([], this.settings.pattern),
      });
    } catch (error) {
      // the seed step of the next tick builds the ladder instead
      logger.warn('grid_reseed_deferred', {
        event: 'grid_reseed_deferred',
        accountId: this.settings.accountId,
        error: formatError(error),
      });
    }
  }

  private async triggerEmergency(decision: GuardDecision, account: AccountSnapshot) {
    const threshold = this.guard.maxReduceBalance ?? null;
    const context = {
      reason: decision.reason,
      cycleStartBalance: this.grid.cycleStartBalance,
      balance: account.balance,
      equity: account.equity,
      threshold,
      triggeredAt: new Date(this.clock()).toISOString(),
    };
    if (!this.emergency.activate(context)) return;

    logger.error('grid_emergency_stop', {
      event: 'grid_emergency_stop',
      accountId: this.settings.accountId,
      error: formatError(
        new MaxReduceBreachedError({
          cycleStartBalance: context.cycleStartBalance,
          equity: context.equity,
          threshold: threshold ?? 0,
        })
      ),
    });
    const flat = await this.flatten('emergency_stop');
    const after = await this.balanceAfterFlatten(account);
    this.grid = this.freshGrid(this.grid.cycleNumber, after.balance);
    this.unrealizedPnl = 0;
    this.resetPending = false;
    await this.transition('emergency_stopped', 'emergency_stop');
    await this.emit({ type: 'emergency_stop', context, flatten: flat });
  }

  private async transition(to: ControllerState, reason: TransitionReason) {
    const from = this.state;
    if (from === to && (to !== 'paused' || this.pauseReason === reason)) return;
    this.state = to;
    if (to === 'running') {
      this.pauseReason = null;
    } else if (reason === 'started' || reason === 'acknowledged') {
      this.pauseReason = 'manual';
    } else {
      this.pauseReason = reason;
    }
    controllerStateGauge.labels(this.settings.accountId).set(to === 'running' ? 1 : to === 'paused' ? 0 : -1);
    logger.info('grid_state_changed', {
      event: 'grid_state_changed',
      accountId: this.settings.accountId,
      from,
      to,
      reason,
    });
    await this.emit({ type: 'state_changed', from, to, reason });
  }

  private async reject(command: EngineCommand, reason: string) {
    logger.warn('grid_command_rejected', {
      event: 'grid_command_rejected',
      accountId: this.settings.accountId,
      command: command.type,
      reason,
    });
    await this.emit({ type: 'command_rejected', command: command.type, reason });
  }

  /** Snapshots the balance for a new cycle when nothing of the old one is live. */
  private async resume(command: EngineCommand): Promise<boolean> {
    if (!hasLiveCycle(this.grid)) {
      try {
        const account = await callVenue('getAccountSnapshot', () => this.venue.getAccountSnapshot());
        this.grid = this.freshGrid(this.grid.cycleNumber, account.balance);
      } catch (error) {
        logger.warn('grid_start_balance_failed', {
          event: 'grid_start_balance_failed',
          accountId: this.settings.accountId,
          error: formatError(error),
        });
        await this.reject(command, 'venue_unavailable');
        return false;
      }
    }
    this.lastBlockReason = null;
    await this.transition('running', 'started');
    return true;
  }

  private async persistSettings() {
    const store = this.options.settingsStore;
    if (!store) return;
    const thresholds: GuardThresholds = {};
    for (const name of GUARD_THRESHOLD_NAMES) {
      const value = this.guard[name];
      if (value !== undefined) thresholds[name] = value;
    }
    await store
      .save(this.settings.accountId, {
        baseAmountOverride: this.baseAmountOverride,
        thresholds,
        withdrawalThreshold: this.withdrawalThreshold,
      })
      .catch((error) => {
        logger.warn('grid_settings_persist_failed', {
          event: 'grid_settings_persist_failed',
          accountId: this.settings.accountId,
          error: formatError(error),
        });
      });
  }

  private async handleCommand(command: EngineCommand): Promise<void> {
    logger.info('grid_command_received', {
      event: 'grid_command_received',
      accountId: this.settings.accountId,
      command: command.type,
    });
    switch (command.type) {
      case 'start': {
        if (this.state === 'emergency_stopped') return this.reject(command, 'emergency_stop_active');
        if (this.state === 'running') return this.reject(command, 'already_running');
        if (this.withdrawalPending) return this.reject(command, 'withdrawal_pending');
        await this.resume(command);
        return;
      }
      case 'pause': {
        if (this.state !== 'running') return this.reject(command, 'not_running');
        await this.transition('paused', 'manual');
        return;
      }
      case 'stop_after_cycle': {
        if (this.state !== 'running') return this.reject(command, 'not_running');
        this.stopAfterCycle = true;
        return;
      }
      case 'panic': {
        const flat = await this.flatten('panic');
        const after = await this.balanceAfterFlatten({
          balance: this.grid.cycleStartBalance,
          equity: this.grid.cycleStartBalance,
          freeMargin: 0,
        });
        this.grid = this.freshGrid(this.grid.cycleNumber, after.balance);
        this.unrealizedPnl = 0;
        this.resetPending = false;
        if (!flat.complete) await this.emit({ type: 'flatten_incomplete', reason: 'panic', report: flat });
        if (this.state === 'running') await this.transition('paused', 'panic');
        return;
      }
      case 'status': {
        await this.emit({ type: 'status_report', snapshot: this.snapshot() });
        return;
      }
      case 'acknowledge_emergency': {
        if (this.state !== 'emergency_stopped') return this.reject(command, 'not_emergency_stopped');
        const cleared = this.emergency.acknowledge();
        logger.info('grid_emergency_acknowledged', {
          event: 'grid_emergency_acknowledged',
          accountId: this.settings.accountId,
          triggeredAt: cleared?.triggeredAt ?? null,
        });
        await this.transition('paused', 'acknowledged');
        return;
      }
      case 'set_base_amount': {
        if (command.amount !== null && !(Number.isFinite(command.amount) && command.amount > 0)) {
          return this.reject(command, 'invalid_amount');
        }
        const previous = this.grid.baseAmount;
        this.baseAmountOverride = command.amount;
        await this.persistSettings();
        // a live cycle keeps its sizing; the change applies at the next reset
        if (!hasLiveCycle(this.grid)) {
          this.grid.baseAmount = this.nextBaseAmount(this.clock());
          this.grid.cycleTargetProfit = this.targetFor(this.grid.baseAmount);
        }
        await this.emit({
          type: 'base_amount_changed',
          previous,
          next: command.amount ?? this.settings.baseAmount,
          override: command.amount !== null,
        });
        return;
      }
      case 'set_guard_threshold': {
        if (command.value !== null && !(Number.isFinite(command.value) && command.value >= 0)) {
          return this.reject(command, 'invalid_threshold');
        }
        if (command.value === null) delete this.guard[command.guard];
        else this.guard[command.guard] = command.value;
        await this.persistSettings();
        return;
      }
      case 'set_blackout_window': {
        const rest = this.guard.blackoutWindows.filter((window) => window.label !== command.window.label);
        this.guard.blackoutWindows = [...rest, command.window];
        return;
      }
      case 'clear_blackout_windows': {
        this.guard.blackoutWindows = this.guard.blackoutWindows.filter((window) => window.label === TRADING_HALT_LABEL);
        return;
      }
      case 'set_quiet_hours': {
        if (command.window === null) {
          delete this.guard.quietHours;
          return;
        }
        const factor = command.factor ?? this.guard.quietHours?.factor ?? 0.5;
        if (!(factor > 0)) return this.reject(command, 'invalid_factor');
        this.guard.quietHours = { window: command.window, factor };
        return;
      }
      case 'schedule_pause': {
        this.scheduledPauseAt = command.at ? command.at.getTime() : null;
        return;
      }
      case 'set_withdrawal_threshold': {
        if (command.amount !== null && !(Number.isFinite(command.amount) && command.amount > 0)) {
          return this.reject(command, 'invalid_amount');
        }
        this.withdrawalThreshold = command.amount;
        await this.persistSettings();
        return;
      }
      case 'withdrawal_complete': {
        if (!this.withdrawalPending) return this.reject(command, 'no_withdrawal_pending');
        this.withdrawalPending = false;
        this.sessionProfit = 0;
        sessionProfitGauge.labels(this.settings.accountId).set(0);
        await this.resume(command);
        return;
      }
    }
  }

  private async emit(event: EngineEvent) {
    await this.events.publish(event).catch((error) => {
      logger.warn('grid_event_publish_failed', {
        event: 'grid_event_publish_failed',
        accountId: this.settings.accountId,
        type: event.type,
        error: formatError(error),
      });
    });
  }
}
