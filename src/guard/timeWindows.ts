import { InvalidConfigurationError } from '../strategies/gridCycle/errors';

export const MINUTES_PER_DAY = 24 * 60;

export interface TimeWindow {
  label: string;
  enabled: boolean;
  /** minute of the local day, inclusive */
  startMinute: number;
  /** minute of the local day, exclusive; may be 1440 */
  endMinute: number;
  /** local weekdays (0 = Sunday) the window applies to; all days when absent */
  weekdays?: number[];
}

export interface LocalClock {
  minuteOfDay: number;
  weekday: number;
  hour: number;
  minute: number;
}

export function localClock(now: Date, offsetMinutes: number): LocalClock {
  const shifted = new Date(now.getTime() + offsetMinutes * 60_000);
  const hour = shifted.getUTCHours();
  const minute = shifted.getUTCMinutes();
  return {
    hour,
    minute,
    minuteOfDay: hour * 60 + minute,
    weekday: shifted.getUTCDay(),
  };
}

function parseClock(value: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new InvalidConfigurationError(`invalid clock time "${value}"`, { value });
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59 || hours > 24 || (hours === 24 && minutes > 0)) {
    throw new InvalidConfigurationError(`invalid clock time "${value}"`, { value });
  }
  return hours * 60 + minutes;
}

/** Parses `HH:MM-HH:MM`. A start later than the end wraps past midnight. */
export function parseClockRange(range: string): { startMinute: number; endMinute: number } {
  const parts = range.split('-');
  if (parts.length !== 2) {
    throw new InvalidConfigurationError(`invalid time range "${range}"`, { range });
  }
  const startMinute = parseClock(parts[0]);
  const endMinute = parseClock(parts[1]);
  if (startMinute === endMinute) {
    throw new InvalidConfigurationError(`empty time range "${range}"`, { range });
  }
  return { startMinute, endMinute };
}

export function createTimeWindow(
  label: string,
  range: string,
  options: { weekdays?: number[]; enabled?: boolean } = {}
): TimeWindow {
  const { startMinute, endMinute } = parseClockRange(range);
  const weekdays = options.weekdays?.filter((day) => Number.isInteger(day) && day >= 0 && day <= 6);
  return {
    label,
    enabled: options.enabled ?? true,
    startMinute,
    endMinute,
    ...(weekdays && weekdays.length ? { weekdays } : {}),
  };
}

export function isWithinWindow(window: TimeWindow, now: Date, offsetMinutes: number): boolean {
  if (!window.enabled) return false;
  const clock = localClock(now, offsetMinutes);
  if (window.weekdays && !window.weekdays.includes(clock.weekday)) {
    return false;
  }
  const { startMinute, endMinute } = window;
  if (startMinute < endMinute) {
    return clock.minuteOfDay >= startMinute && clock.minuteOfDay < endMinute;
  }
  return clock.minuteOfDay >= startMinute || clock.minuteOfDay < endMinute;
}

export function formatMinute(minuteOfDay: number): string {
  const hours = Math.floor(minuteOfDay / 60);
  const minutes = minuteOfDay % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function describeWindow(window: TimeWindow): string {
  const days = window.weekdays ? ` days=${window.weekdays.join(',')}` : '';
  return `${window.label} ${formatMinute(window.startMinute)}-${formatMinute(window.endMinute)}${days}`;
}
