import { DateTime } from 'luxon';
import { EvScenario, FlexibleLoad, HeatPumpScenario, SLOT_HOURS, SLOTS_PER_DAY, SlotWindow } from '../types';
import { InvalidInputError } from '../util/error-handler';
import { firstSlotFrom, timeToSlot } from '../util/settlement-time';
import { validateNumber } from '../util/validation';

export const DEFAULT_CHARGER_KW = 7;
export const DEFAULT_HEAT_PUMP_COP = 3;
export const DEFAULT_HEAT_PUMP_KW = 3;

// Always-on household load and its daily bumps (kWh)
const HOUSEHOLD_SLOT_KWH = 0.125;
const MORNING_BUMP = { from: '06:00', until: '08:00', kwh: 0.5 };
const EVENING_BUMP = { from: '17:00', until: '21:00', kwh: 1.0 };

// Thermal kWh per day by calendar month (1-12)
const MONTHLY_HEAT_DEMAND_KWH: Record<number, number> = {
  1: 18, 2: 18, 3: 12, 4: 12, 5: 7, 6: 4,
  7: 4, 8: 4, 9: 6, 10: 7, 11: 12, 12: 18
};

/**
 * Slots whose start falls in [from, until). A slot that is already under
 * way at `from` is left out. Wraps past midnight when `until` is not after
 * `from`.
 *
 * @param field reported in the error when no slot starts inside the range
 */
export function windowBetween(from: string, until: string, field: string = 'window'): SlotWindow {
  const start = firstSlotFrom(from);
  const stop = firstSlotFrom(until);
  if (start === stop) {
    throw new InvalidInputError(field, `Invalid ${field}: no settlement slot starts between ${from} and ${until}`);
  }
  return { start, end: (stop - 1 + SLOTS_PER_DAY) % SLOTS_PER_DAY };
}

export function buildEvLoad(scenario: EvScenario, id: string = 'ev'): FlexibleLoad {
  const chargerKw = validateNumber(scenario.chargerKw ?? DEFAULT_CHARGER_KW, 'chargerKw', { exclusiveMin: 0 });
  const energyKwh = validateNumber(scenario.energyKwh, 'energyKwh', { exclusiveMin: 0 });
  return {
    id,
    kind: 'ev',
    totalEnergyRequired: energyKwh,
    allowedWindow: windowBetween(scenario.arrival, scenario.departure, 'departure'),
    maxPowerPerSlot: chargerKw * SLOT_HOURS
  };
}

/**
 * Rough seasonal thermal demand for a residential heat pump.
 */
export function estimateDailyHeatDemandKwh(date: string): number {
  const parsed = DateTime.fromISO(date);
  if (!parsed.isValid) {
    throw new InvalidInputError('date', `Invalid date: '${date}'`);
  }
  return MONTHLY_HEAT_DEMAND_KWH[parsed.month];
}

export function buildHeatPumpLoad(scenario: HeatPumpScenario, date: string, id: string = 'heat_pump'): FlexibleLoad {
  const cop = validateNumber(scenario.cop ?? DEFAULT_HEAT_PUMP_COP, 'cop', { exclusiveMin: 0 });
  const ratedKw = validateNumber(scenario.ratedKw ?? DEFAULT_HEAT_PUMP_KW, 'ratedKw', { exclusiveMin: 0 });
  const thermalKwh = scenario.heatDemandKwh ?? estimateDailyHeatDemandKwh(date);
  validateNumber(thermalKwh, 'heatDemandKwh', { exclusiveMin: 0 });
  return {
    id,
    kind: 'heat_pump',
    totalEnergyRequired: thermalKwh / cop,
    allowedWindow: windowBetween(scenario.allowedFrom, scenario.allowedUntil, 'allowedUntil'),
    maxPowerPerSlot: ratedKw * SLOT_HOURS
  };
}

/**
 * Fixed, non-shiftable household consumption per slot. Reported for context
 * and never scheduled.
 */
export function buildHouseholdBaseload(): number[] {
  const profile = new Array<number>(SLOTS_PER_DAY).fill(HOUSEHOLD_SLOT_KWH);
  for (const bump of [MORNING_BUMP, EVENING_BUMP]) {
    const start = timeToSlot(bump.from);
    const end = timeToSlot(bump.until);
    const perSlot = bump.kwh / (end - start);
    for (let i = start; i < end; i++) {
      profile[i] += perSlot;
    }
  }
  return profile;
}
