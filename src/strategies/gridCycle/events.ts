import type { EmergencyContext } from '../../guard/emergencyStop';
import type { GuardReason } from '../../guard/gridGuards';
import type { EngineCommandType } from './commands';
import type { ControllerState, GridOrder, LayerKey, PatternSignal, PauseReason } from './types';

export interface EngineSnapshot {
  accountId: string;
  symbol: string;
  state: ControllerState;
  pauseReason: PauseReason | null;
  cycleNumber: number;
  anchorIndex: number;
  baseAmount: number;
  baseAmountOverride: number | null;
  cycleTargetProfit: number;
  cycleStartBalance: number;
  cycleStartedAt: number;
  cycleRealizedPnl: number;
  unrealizedPnl: number;
  maxDrawdownObserved: number;
  sessionProfit: number;
  orders: GridOrder[];
  closedOrders: GridOrder[];
  stopAfterCycle: boolean;
  scheduledPauseAt: number | null;
  resetPending: boolean;
  emergency: EmergencyContext | null;
  blackoutWindows: string[];
}

export type FlattenReason = 'cycle_target_reached' | 'emergency_stop' | 'panic';

/** What a flatten left behind, read back from the venue after cancelling and closing. */
export interface FlattenReport {
  cancelled: number;
  closed: number;
  failures: number;
  openPositions: string[];
  pendingOrders: string[];
  complete: boolean;
}

export type EngineEvent =
  | { type: 'order_placed'; anchorIndex: number; referencePrice: number; orders: GridOrder[] }
  | { type: 'order_rejected'; key: LayerKey; entryPrice: number; reason: string }
  | { type: 'order_filled'; order: GridOrder; pattern: PatternSignal; snapshot: EngineSnapshot }
  | {
      type: 'position_closed';
      order: GridOrder;
      pnl: number;
      anchorIndex: number;
      snapshot: EngineSnapshot;
    }
  | {
      type: 'cycle_completed';
      cycleNumber: number;
      startBalance: number;
      endBalance: number;
      cyclePnl: number;
      sessionProfit: number;
      durationMs: number;
      maxDrawdown: number;
      nextBaseAmount: number;
      quietHours: boolean;
    }
  | { type: 'guard_blocked'; reason: GuardReason; detail: Record<string, unknown> }
  | { type: 'emergency_stop'; context: EmergencyContext; flatten: FlattenReport }
  | { type: 'flatten_incomplete'; reason: FlattenReason; report: FlattenReport }
  | { type: 'state_changed'; from: ControllerState; to: ControllerState; reason: PauseReason | 'started' | 'acknowledged' }
  | { type: 'command_rejected'; command: EngineCommandType; reason: string }
  | { type: 'status_report'; snapshot: EngineSnapshot }
  | { type: 'base_amount_changed'; previous: number; next: number; override: boolean };

export type EngineEventType = EngineEvent['type'];

export interface EngineEventSink {
  publish(event: EngineEvent): Promise<void>;
}
