import type { GuardThresholdName } from '../../guard/gridGuards';
import type { TimeWindow } from '../../guard/timeWindows';

export type EngineCommand =
  | { type: 'start' }
  | { type: 'pause' }
  | { type: 'stop_after_cycle' }
  | { type: 'panic' }
  | { type: 'status' }
  | { type: 'acknowledge_emergency' }
  | { type: 'set_base_amount'; amount: number | null }
  | { type: 'set_guard_threshold'; guard: GuardThresholdName; value: number | null }
  | { type: 'set_blackout_window'; window: TimeWindow }
  | { type: 'clear_blackout_windows' }
  | { type: 'set_quiet_hours'; window: TimeWindow | null; factor?: number }
  | { type: 'schedule_pause'; at: Date | null }
  | { type: 'set_withdrawal_threshold'; amount: number | null }
  | { type: 'withdrawal_complete' };

export type EngineCommandType = EngineCommand['type'];

/**
 * Hand-off point between the command surface and the tick loop. Producers only
 * push; the controller drains at the start of a tick.
 */
export class CommandQueue {
  private readonly pending: EngineCommand[] = [];

  push(command: EngineCommand) {
    this.pending.push(command);
  }

  drain(): EngineCommand[] {
    return this.pending.splice(0, this.pending.length);
  }

  get size() {
    return this.pending.length;
  }
}
