import type { OrderSide } from '../types';
import type { GuardConfig, GuardThresholds } from '../../guard/gridGuards';

export type OrderStatus = 'unplaced' | 'placed' | 'filled' | 'closed';

export interface LayerKey {
  side: OrderSide;
  index: number;
}

export interface GridOrder {
  key: LayerKey;
  status: OrderStatus;
  entryPrice: number;
  targetPrice: number;
  volume: number;
  tag: string;
  venueOrderId?: string;
  placedAt?: number;
  filledAt?: number;
  closedAt?: number;
  realizedPnl?: number;
}

export interface GridState {
  cycleNumber: number;
  anchorIndex: number;
  orders: Map<string, GridOrder>;
  filledSet: Set<string>;
  closedSet: Set<string>;
  closedOrders: GridOrder[];
  baseAmount: number;
  cycleTargetProfit: number;
  cycleStartBalance: number;
  cycleStartedAt: number;
  cycleRealizedPnl: number;
  maxDrawdownObserved: number;
}

export type ScalingTable = readonly number[];

export type SuppressSidePolicy = 'same' | 'opposite';

export interface PatternPolicy {
  minRunLength: number;
  suppressSide: SuppressSidePolicy;
}

export interface PatternSignal {
  suppressNextBuy: boolean;
  suppressNextSell: boolean;
  buyRun: number;
  sellRun: number;
}

export interface LadderParams {
  entryDelta: number;
  profitDistance: number;
  percentScale: number;
  scalingTable: ScalingTable;
  duplicateTolerance: number;
}

export interface GridEngineSettings {
  accountId: string;
  symbol: string;
  tagPrefix: string;
  baseAmount: number;
  /** explicit cycle target; when unset the target is baseAmount * targetMultiplier */
  cycleTargetProfit?: number;
  targetMultiplier: number;
  ladder: LadderParams;
  pattern: PatternPolicy;
  reanchorOnFill: boolean;
  guard: GuardConfig;
  loopIntervalMs: number;
  pausedIntervalMs: number;
}

export type ControllerState = 'paused' | 'running' | 'emergency_stopped';

export type PauseReason =
  | 'awaiting_start'
  | 'manual'
  | 'panic'
  | 'scheduled'
  | 'max_drawdown'
  | 'cycle_completed'
  | 'profit_withdrawal'
  | 'emergency_stop';

export interface CycleRecord {
  accountId: string;
  symbol: string;
  cycleNumber: number;
  baseAmount: number;
  startBalance: number;
  endBalance: number;
  cyclePnl: number;
  maxDrawdown: number;
  startedAt: Date;
  completedAt: Date;
}

export interface CycleHistoryStore {
  recordCycle(record: CycleRecord): Promise<void>;
  /** 0 when the account has no recorded cycles */
  lastCycleNumber(accountId: string): Promise<number>;
}

/** Operator overrides that outlive a restart. */
export interface PersistedEngineSettings {
  baseAmountOverride: number | null;
  thresholds: GuardThresholds;
  withdrawalThreshold: number | null;
}

export interface EngineSettingsStore {
  load(accountId: string): Promise<PersistedEngineSettings | null>;
  save(accountId: string, settings: PersistedEngineSettings): Promise<void>;
}
