import { DateTime } from 'luxon';
import { SLOT_MINUTES, SLOTS_PER_DAY, SlotWindow } from '../types';
import { InvalidInputError } from './error-handler';

export const DEFAULT_ZONE = 'Europe/London';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Resolve a YYYY-MM-DD settlement date to local midnight in the given zone.
 */
export function startOfSettlementDay(date: string, zone: string = DEFAULT_ZONE): DateTime {
  if (!ISO_DATE_PATTERN.test(date)) {
    throw new InvalidInputError('date', `Invalid date: expected YYYY-MM-DD, got '${date}'`);
  }

  const start = DateTime.fromISO(date, { zone }).startOf('day');
  if (!start.isValid) {
    throw new InvalidInputError('date', `Invalid date '${date}' in zone ${zone}: ${start.invalidExplanation ?? start.invalidReason ?? 'unknown reason'}`);
  }
  return start;
}

function toZonedDateTime(timestamp: string | Date, zone: string): DateTime {
  return typeof timestamp === 'string'
    ? DateTime.fromISO(timestamp, { zone })
    : DateTime.fromJSDate(timestamp, { zone });
}

/**
 * Map a timestamp onto its settlement slot for the given day.
 * Uses the local wall clock, so the repeated hour on a clock-change day
 * lands in the same two slots. Returns null when the timestamp is invalid
 * or falls on another day.
 */
export function slotIndexOf(timestamp: string | Date, date: string, zone: string = DEFAULT_ZONE): number | null {
  const local = toZonedDateTime(timestamp, zone);
  if (!local.isValid || local.toISODate() !== date) {
    return null;
  }
  return Math.floor((local.hour * 60 + local.minute) / SLOT_MINUTES);
}

export function slotStart(date: string, index: number, zone: string = DEFAULT_ZONE): DateTime {
  const minutes = index * SLOT_MINUTES;
  return startOfSettlementDay(date, zone).set({ hour: Math.floor(minutes / 60), minute: minutes % 60 });
}

/**
 * UTC instants bounding the settlement day, for querying upstream feeds.
 */
export function settlementDayBoundsUtc(date: string, zone: string = DEFAULT_ZONE): { from: string; to: string } {
  const start = startOfSettlementDay(date, zone);
  const end = start.plus({ days: 1 });
  return {
    from: start.toUTC().toISO({ suppressMilliseconds: true }) ?? '',
    to: end.toUTC().toISO({ suppressMilliseconds: true }) ?? ''
  };
}

function minutesOfDay(time: string): number {
  const match = CLOCK_TIME_PATTERN.exec(time.trim());
  if (!match) {
    throw new InvalidInputError('time', `Invalid time: expected HH:mm, got '${time}'`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Convert an "HH:mm" clock time to the slot that contains it.
 */
export function timeToSlot(time: string): number {
  return Math.floor(minutesOfDay(time) / SLOT_MINUTES);
}

/**
 * First slot that starts at or after an "HH:mm" clock time. Times after
 * 23:30 roll over to slot 0.
 */
export function firstSlotFrom(time: string): number {
  return Math.ceil(minutesOfDay(time) / SLOT_MINUTES) % SLOTS_PER_DAY;
}

export function isSlotIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < SLOTS_PER_DAY;
}

/**
 * Slot indices covered by a window, in window order. A window with
 * start > end wraps past midnight.
 */
export function windowSlots(window: SlotWindow): number[] {
  const slots: number[] = [];
  if (window.start <= window.end) {
    for (let i = window.start; i <= window.end; i++) {
      slots.push(i);
    }
    return slots;
  }

  for (let i = window.start; i < SLOTS_PER_DAY; i++) {
    slots.push(i);
  }
  for (let i = 0; i <= window.end; i++) {
    slots.push(i);
  }
  return slots;
}

export function windowLength(window: SlotWindow): number {
  return window.start <= window.end
    ? window.end - window.start + 1
    : SLOTS_PER_DAY - window.start + window.end + 1;
}
