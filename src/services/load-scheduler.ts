import {
  BaselineStrategy,
  FlexibleLoad,
  OptimizationGoal,
  Savings,
  ScheduleMetrics,
  ScheduleOptions,
  ScheduleResult,
  SLOTS_PER_DAY
} from '../types';
import { InfeasibleScheduleError, InvalidInputError } from '../util/error-handler';
import { Logger } from '../util/logger';
import { isSlotIndex, windowLength, windowSlots } from '../util/settlement-time';
import { isFiniteNumber, validateArray, validateNumber, validateString } from '../util/validation';

/** Price-only scoring unless the caller asks for carbon */
export const DEFAULT_PRICE_WEIGHT = 1.0;
export const DEFAULT_BASELINE: BaselineStrategy = 'uniform';

const ENERGY_EPSILON = 1e-9;

const GOAL_WEIGHTS: Record<OptimizationGoal, number> = {
  cheapest: 1,
  lowest_carbon: 0,
  balanced: 0.5
};

export function weightForGoal(goal: OptimizationGoal): number {
  return GOAL_WEIGHTS[goal];
}

/**
 * Min-max rescale to [0, 1]. A flat series maps to 0.5 everywhere.
 */
export function minMaxNormalize(values: readonly number[]): number[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) {
    return values.map(() => 0.5);
  }
  return values.map((value) => (value - min) / (max - min));
}

export interface SlotScore {
  index: number;
  score: number;
}

/**
 * Score each window slot; lower is better. Both series are normalized over
 * the window only, so slots outside it never shift the scale.
 */
export function computeSlotScores(
  prices: readonly number[],
  carbon: readonly number[],
  slots: readonly number[],
  weight: number
): SlotScore[] {
  const priceN = minMaxNormalize(slots.map((i) => prices[i]));
  const carbonN = minMaxNormalize(slots.map((i) => carbon[i]));
  return slots.map((index, k) => ({
    index,
    score: weight * priceN[k] + (1 - weight) * carbonN[k]
  }));
}

/**
 * Cheapest/cleanest first, earliest slot index on ties.
 */
export function rankSlots(scores: readonly SlotScore[]): number[] {
  return [...scores]
    .sort((a, b) => (a.score !== b.score ? a.score - b.score : a.index - b.index))
    .map((entry) => entry.index);
}

export function validateLoad(load: FlexibleLoad): void {
  validateString(load.id, 'load.id', { minLength: 1 });
  validateNumber(load.totalEnergyRequired, 'totalEnergyRequired', { exclusiveMin: 0 });
  validateNumber(load.maxPowerPerSlot, 'maxPowerPerSlot', { exclusiveMin: 0 });

  const { start, end } = load.allowedWindow;
  if (!isSlotIndex(start) || !isSlotIndex(end)) {
    throw new InvalidInputError(
      'allowedWindow',
      `Invalid allowedWindow for ${load.id}: [${start}, ${end}] must be integer slots within 0-${SLOTS_PER_DAY - 1}`
    );
  }
}

function validateSeries(values: readonly number[], name: string): number[] {
  return validateArray(values, name, {
    minLength: SLOTS_PER_DAY,
    maxLength: SLOTS_PER_DAY,
    elementValidator: isFiniteNumber
  });
}

function resolveOptions(options: ScheduleOptions): { weight: number; baseline: BaselineStrategy } {
  const weight = validateNumber(options.weight ?? DEFAULT_PRICE_WEIGHT, 'weight', { min: 0, max: 1 });
  const baseline = options.baseline ?? DEFAULT_BASELINE;
  if (baseline !== 'uniform' && baseline !== 'asap') {
    throw new InvalidInputError('baseline', `Invalid baseline: unknown strategy '${String(baseline)}'`);
  }
  return { weight, baseline };
}

/**
 * Place energy into slots in the given order, up to the per-slot cap.
 * Returns the allocation and whatever energy could not be placed.
 */
function fillInOrder(order: readonly number[], load: FlexibleLoad): { allocation: number[]; remaining: number } {
  const allocation = new Array<number>(SLOTS_PER_DAY).fill(0);
  let remaining = load.totalEnergyRequired;

  for (const index of order) {
    if (remaining <= ENERGY_EPSILON) {
      break;
    }
    const energy = Math.min(load.maxPowerPerSlot, remaining);
    allocation[index] = energy;
    remaining -= energy;
  }

  return { allocation, remaining: remaining > ENERGY_EPSILON ? remaining : 0 };
}

export function buildBaselineAllocation(load: FlexibleLoad, strategy: BaselineStrategy = DEFAULT_BASELINE): number[] {
  const slots = windowSlots(load.allowedWindow);

  if (strategy === 'asap') {
    return fillInOrder(slots, load).allocation;
  }

  const allocation = new Array<number>(SLOTS_PER_DAY).fill(0);
  const perSlot = load.totalEnergyRequired / slots.length;
  for (const index of slots) {
    allocation[index] = perSlot;
  }
  return allocation;
}

export function computeMetrics(
  allocation: readonly number[],
  prices: readonly number[],
  carbon: readonly number[]
): ScheduleMetrics {
  let energy = 0;
  let cost = 0;
  let emissions = 0;
  for (let i = 0; i < allocation.length; i++) {
    energy += allocation[i];
    cost += allocation[i] * prices[i];
    emissions += allocation[i] * carbon[i];
  }
  return { energy, cost, carbon: emissions };
}

/**
 * Percentage of the baseline saved. Baselines can be negative on plunge
 * pricing days, so the magnitude is used as the denominator.
 */
export function savingsPercent(saved: number, baseline: number): number {
  return baseline === 0 ? 0 : (saved / Math.abs(baseline)) * 100;
}

export function computeSavings(baseline: ScheduleMetrics, optimized: ScheduleMetrics): Savings {
  const cost = baseline.cost - optimized.cost;
  const carbon = baseline.carbon - optimized.carbon;
  return {
    cost,
    carbon,
    costPercent: savingsPercent(cost, baseline.cost),
    carbonPercent: savingsPercent(carbon, baseline.carbon)
  };
}

/**
 * Schedule one flexible load against a day's price and carbon series.
 *
 * @throws InvalidInputError when the load, series or options are malformed
 * @throws InfeasibleScheduleError when the window cannot hold the load's energy
 */
export function scheduleLoad(
  prices: readonly number[],
  carbon: readonly number[],
  load: FlexibleLoad,
  options: ScheduleOptions = {},
  logger?: Logger
): ScheduleResult {
  validateLoad(load);
  const priceValues = validateSeries(prices, 'prices');
  const carbonValues = validateSeries(carbon, 'carbon');
  const { weight, baseline } = resolveOptions(options);

  const slots = windowSlots(load.allowedWindow);
  const order = rankSlots(computeSlotScores(priceValues, carbonValues, slots, weight));
  const { allocation, remaining } = fillInOrder(order, load);

  if (remaining > 0) {
    throw new InfeasibleScheduleError(load.id, remaining, load.maxPowerPerSlot * windowLength(load.allowedWindow));
  }

  const baselineAllocation = buildBaselineAllocation(load, baseline);
  const baselineMetrics = computeMetrics(baselineAllocation, priceValues, carbonValues);
  const optimizedMetrics = computeMetrics(allocation, priceValues, carbonValues);
  const savings = computeSavings(baselineMetrics, optimizedMetrics);

  logger?.debug(`Scheduled ${load.id} into ${allocation.filter((energy) => energy > 0).length} of ${slots.length} window slots`, {
    weight,
    baseline,
    costSaved: savings.cost,
    carbonSaved: savings.carbon
  });

  return {
    loadId: load.id,
    kind: load.kind,
    weight,
    baselineStrategy: baseline,
    allocation,
    baselineAllocation,
    baseline: baselineMetrics,
    optimized: optimizedMetrics,
    savings
  };
}
