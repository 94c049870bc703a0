import { FlexibleLoad, PortfolioResult, PortfolioTotals, ScheduleMetrics, ScheduleOptions, ScheduleResult } from '../types';
import { Logger } from '../util/logger';
import { computeSavings, scheduleLoad } from './load-scheduler';

function emptyMetrics(): ScheduleMetrics {
  return { energy: 0, cost: 0, carbon: 0 };
}

function addMetrics(a: ScheduleMetrics, b: ScheduleMetrics): ScheduleMetrics {
  return {
    energy: a.energy + b.energy,
    cost: a.cost + b.cost,
    carbon: a.carbon + b.carbon
  };
}

/**
 * Sum per-load metrics. Percentages are derived from the summed absolute
 * values rather than averaged.
 */
export function aggregateResults(results: readonly ScheduleResult[]): PortfolioTotals {
  let baseline = emptyMetrics();
  let optimized = emptyMetrics();
  for (const result of results) {
    baseline = addMetrics(baseline, result.baseline);
    optimized = addMetrics(optimized, result.optimized);
  }
  return { baseline, optimized, savings: computeSavings(baseline, optimized) };
}

/**
 * Schedule every load on its own against the same series.
 * Loads do not compete for slots: two loads may both take the cheapest one.
 */
export function schedulePortfolio(
  prices: readonly number[],
  carbon: readonly number[],
  loads: readonly FlexibleLoad[],
  options: ScheduleOptions = {},
  logger?: Logger
): PortfolioResult {
  const results = loads.map((load) => scheduleLoad(prices, carbon, load, options, logger));
  const totals = aggregateResults(results);

  logger?.optimization(`Scheduled ${results.length} flexible load(s)`, {
    costSaved: totals.savings.cost,
    carbonSaved: totals.savings.carbon
  });

  return { results, totals };
}
