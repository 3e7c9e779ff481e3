import type { GuardThresholdName } from '../guard/gridGuards';
import { MINUTES_PER_DAY, createTimeWindow, localClock } from '../guard/timeWindows';
import type { EngineCommand } from '../strategies/gridCycle/commands';
import { TRADING_HALT_LABEL } from '../strategies/gridCycle/cycleController';
import { GridEngineError } from '../strategies/gridCycle/errors';

export type ParseResult =
  | { kind: 'command'; command: EngineCommand }
  | { kind: 'reply'; text: string }
  | { kind: 'ignored' };

export interface ParseOptions {
  now: Date;
  timezoneOffsetMinutes: number;
  tradingHaltRange: string;
}

const THRESHOLD_COMMANDS: Record<string, GuardThresholdName> = {
  '/setmaxdd': 'maxDrawdown',
  '/setmaxreducebalance': 'maxReduceBalance',
  '/setminmargin': 'minFreeMargin',
  '/setspread': 'maxSpread',
  '/setmaxpos': 'maxPositions',
  '/setmaxorders': 'maxOrders',
  '/setmaxexposure': 'maxTotalExposure',
};

export const HELP_TEXT = [
  'Control',
  '/start, /resume - start trading',
  '/pause - pause now',
  '/stop - pause after the current cycle',
  '/stopat HH:MM | off - schedule a pause',
  '/panic confirm - flatten everything and pause',
  '/ack - acknowledge an emergency stop',
  '',
  'Configuration',
  '/setamount X | /clearamount - base amount override',
  '/setmaxdd, /setmaxreducebalance, /setminmargin, /setspread X | off',
  '/setmaxpos, /setmaxorders N | off',
  '/setmaxexposure X | off',
  '/blackout HH:MM-HH:MM | off',
  '/tradinghalt on | off',
  '/quiethours HH:MM-HH:MM [factor] | off',
  '/setwithdrawal X | off, /withdrawalcomplete',
  '',
  '/status - engine status',
].join('\n');

const command = (value: EngineCommand): ParseResult => ({ kind: 'command', command: value });
const reply = (text: string): ParseResult => ({ kind: 'reply', text });

function parseAmount(raw: string | undefined): number | null | undefined {
  if (raw === undefined) return undefined;
  if (raw.toLowerCase() === 'off') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function nextOccurrence(clock: string, options: ParseOptions): Date | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(clock);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  const target = hours * 60 + minutes;
  const current = localClock(options.now, options.timezoneOffsetMinutes).minuteOfDay;
  const delta = (target - current + MINUTES_PER_DAY) % MINUTES_PER_DAY || MINUTES_PER_DAY;
  const minuteStart = Math.floor(options.now.getTime() / 60_000) * 60_000;
  return new Date(minuteStart + delta * 60_000);
}

/** Maps one chat message to an engine command, a direct reply, or nothing. */
export function parseCommand(text: string, options: ParseOptions): ParseResult {
  const parts = text.trim().split(/\s+/);
  // group chats address bots as /cmd@botname
  const name = (parts[0] ?? '').toLowerCase().split('@')[0];
  const args = parts.slice(1);
  if (!name.startsWith('/')) return { kind: 'ignored' };

  try {
    switch (name) {
      case '/start':
      case '/resume':
        return command({ type: 'start' });
      case '/pause':
        return command({ type: 'pause' });
      case '/stop':
        return command({ type: 'stop_after_cycle' });
      case '/status':
        return command({ type: 'status' });
      case '/ack':
        return command({ type: 'acknowledge_emergency' });
      case '/help':
        return reply(HELP_TEXT);
      case '/panic':
        return args[0]?.toLowerCase() === 'confirm'
          ? command({ type: 'panic' })
          : reply('Send /panic confirm to close every position and pause.');
      case '/setamount': {
        const amount = parseAmount(args[0]);
        if (amount === undefined || (amount !== null && amount <= 0)) return reply('Usage: /setamount X.XX');
        return command({ type: 'set_base_amount', amount });
      }
      case '/clearamount':
        return command({ type: 'set_base_amount', amount: null });
      case '/stopat': {
        const arg = args[0];
        if (arg?.toLowerCase() === 'off') return command({ type: 'schedule_pause', at: null });
        const at = arg ? nextOccurrence(arg, options) : null;
        return at ? command({ type: 'schedule_pause', at }) : reply('Usage: /stopat HH:MM or /stopat off');
      }
      case '/blackout': {
        const arg = args[0];
        if (!arg) return reply('Usage: /blackout HH:MM-HH:MM or /blackout off');
        if (arg.toLowerCase() === 'off') return command({ type: 'clear_blackout_windows' });
        return command({ type: 'set_blackout_window', window: createTimeWindow('manual', arg) });
      }
      case '/tradinghalt': {
        const arg = args[0]?.toLowerCase();
        if (arg !== 'on' && arg !== 'off') return reply('Usage: /tradinghalt on|off');
        return command({
          type: 'set_blackout_window',
          window: createTimeWindow(TRADING_HALT_LABEL, options.tradingHaltRange, { enabled: arg === 'on' }),
        });
      }
      case '/quiethours': {
        const arg = args[0];
        if (!arg) return reply('Usage: /quiethours HH:MM-HH:MM [factor] or /quiethours off');
        if (arg.toLowerCase() === 'off') return command({ type: 'set_quiet_hours', window: null });
        const factor = args[1] !== undefined ? Number(args[1]) : undefined;
        if (factor !== undefined && !(factor > 0)) return reply('Quiet-hours factor must be positive.');
        return command({ type: 'set_quiet_hours', window: createTimeWindow('quiet_hours', arg), factor });
      }
      case '/setwithdrawal': {
        const amount = parseAmount(args[0]);
        if (amount === undefined || (amount !== null && amount <= 0)) return reply('Usage: /setwithdrawal X or off');
        return command({ type: 'set_withdrawal_threshold', amount });
      }
      case '/withdrawalcomplete':
        return command({ type: 'withdrawal_complete' });
      default: {
        const guard = THRESHOLD_COMMANDS[name];
        if (!guard) return reply(`Unknown command ${name}. Send /help for the list.`);
        const value = parseAmount(args[0]);
        if (value === undefined || (value !== null && value < 0)) return reply(`Usage: ${name} X or ${name} off`);
        return command({ type: 'set_guard_threshold', guard, value });
      }
    }
  } catch (error) {
    if (error instanceof GridEngineError) return reply(error.message);
    throw error;
  }
}
