import {
  CarbonIndex,
  CarbonReading,
  GenerationMixReading,
  GridDay,
  RawReading,
  SettlementSlot,
  SLOTS_PER_DAY
} from '../types';
import { DataUnavailableError } from '../util/error-handler';
import { DEFAULT_ZONE, slotIndexOf, slotStart, startOfSettlementDay } from '../util/settlement-time';

export interface NormalizeOptions {
  zone?: string;
  /** Series name used in DataUnavailable errors, e.g. "price" */
  series?: string;
}

/**
 * Carry each known slot forward over the gaps after it. Slots before the
 * first known value take that value. Returns null when nothing is known.
 */
function fillGaps<T>(slots: ReadonlyArray<T | undefined>): T[] | null {
  const first = slots.find((value): value is T => value !== undefined);
  if (first === undefined) {
    return null;
  }

  let previous = first;
  return slots.map((value) => {
    if (value !== undefined) {
      previous = value;
    }
    return previous;
  });
}

function averageBySlot(readings: readonly RawReading[], date: string, zone: string): Array<number | undefined> {
  const sums = new Array<number>(SLOTS_PER_DAY).fill(0);
  const counts = new Array<number>(SLOTS_PER_DAY).fill(0);

  for (const reading of readings) {
    if (typeof reading.value !== 'number' || !Number.isFinite(reading.value)) {
      continue;
    }
    const index = slotIndexOf(reading.timestamp, date, zone);
    if (index === null) {
      continue;
    }
    sums[index] += reading.value;
    counts[index] += 1;
  }

  return sums.map((total, i) => (counts[i] > 0 ? total / counts[i] : undefined));
}

/**
 * Align raw readings onto the 48 settlement slots of one day.
 *
 * Readings in the same slot are averaged. Empty slots take the nearest
 * earlier slot's value, or the nearest later one when nothing precedes them.
 */
export function normalizeDailySeries(
  readings: readonly RawReading[],
  date: string,
  options: NormalizeOptions = {}
): number[] {
  const zone = options.zone ?? DEFAULT_ZONE;
  startOfSettlementDay(date, zone);

  const values = fillGaps(averageBySlot(readings, date, zone));
  if (!values) {
    throw new DataUnavailableError(options.series ?? 'reading', date);
  }
  return values;
}

/**
 * Like normalizeDailySeries for series the schedule does not depend on:
 * an empty day yields null instead of an error.
 */
export function normalizeOptionalSeries(readings: readonly RawReading[], date: string, zone: string = DEFAULT_ZONE): number[] | null {
  startOfSettlementDay(date, zone);
  return fillGaps(averageBySlot(readings, date, zone));
}

/**
 * Slot-aligned carbon index bands. The latest band published inside a
 * slot wins; gaps fill the same way as numeric series.
 */
export function normalizeCarbonIndex(readings: readonly CarbonReading[], date: string, zone: string = DEFAULT_ZONE): Array<CarbonIndex | null> {
  const bands = new Array<CarbonIndex | undefined>(SLOTS_PER_DAY).fill(undefined);
  for (const reading of readings) {
    const index = reading.index === undefined ? null : slotIndexOf(reading.timestamp, date, zone);
    if (index !== null) {
      bands[index] = reading.index;
    }
  }
  return fillGaps(bands) ?? new Array<CarbonIndex | null>(SLOTS_PER_DAY).fill(null);
}

/**
 * Normalize every feed and zip them into settlement slots. Price and carbon
 * intensity are required; generation mix and carbon bands are optional.
 */
export function buildGridDay(
  priceReadings: readonly RawReading[],
  carbonReadings: readonly CarbonReading[],
  date: string,
  zone: string = DEFAULT_ZONE,
  generationMix: readonly GenerationMixReading[] = []
): GridDay {
  const prices = normalizeDailySeries(priceReadings, date, { zone, series: 'price' });
  const carbon = normalizeDailySeries(carbonReadings, date, { zone, series: 'carbon intensity' });
  const bands = normalizeCarbonIndex(carbonReadings, date, zone);
  const wind = normalizeOptionalSeries(
    generationMix.map((reading) => ({ timestamp: reading.timestamp, value: reading.windShare })),
    date,
    zone
  );
  const solar = normalizeOptionalSeries(
    generationMix.map((reading) => ({ timestamp: reading.timestamp, value: reading.solarShare })),
    date,
    zone
  );

  const slots: SettlementSlot[] = prices.map((price, index) => ({
    index,
    start: slotStart(date, index, zone).toISO() ?? '',
    price,
    carbonIntensity: carbon[index],
    carbonIndex: bands[index],
    windShare: wind ? wind[index] : null,
    solarShare: solar ? solar[index] : null
  }));

  return { date, zone, slots };
}

export function priceSeries(day: GridDay): number[] {
  return day.slots.map((slot) => slot.price);
}

export function carbonSeries(day: GridDay): number[] {
  return day.slots.map((slot) => slot.carbonIntensity);
}

/**
 * Wind plus solar share per slot, or null when the day has no mix data.
 */
export function renewableShareSeries(day: GridDay): Array<number | null> {
  return day.slots.map((slot) =>
    slot.windShare === null || slot.solarShare === null ? null : slot.windShare + slot.solarShare
  );
}
