export * from './types';
export { FlexOptimiser, createFlexOptimiser } from './flex-optimiser';
export type { GridDayLoader, ScenarioDefaults } from './flex-optimiser';
export {
  normalizeDailySeries,
  normalizeOptionalSeries,
  normalizeCarbonIndex,
  buildGridDay,
  priceSeries,
  carbonSeries,
  renewableShareSeries
} from './services/time-series-normalizer';
export {
  scheduleLoad,
  validateLoad,
  weightForGoal,
  computeSlotScores,
  rankSlots,
  buildBaselineAllocation,
  computeMetrics,
  computeSavings,
  DEFAULT_PRICE_WEIGHT,
  DEFAULT_BASELINE
} from './services/load-scheduler';
export { schedulePortfolio, aggregateResults } from './services/portfolio';
export {
  buildEvLoad,
  buildHeatPumpLoad,
  buildHouseholdBaseload,
  estimateDailyHeatDemandKwh,
  windowBetween
} from './services/scenario-builder';
export { GridDataService } from './services/grid-data-service';
export type { PriceSource, CarbonSource, GenerationMixSource } from './services/grid-data-service';
export { CarbonIntensityApi } from './services/carbon-intensity-api';
export { GenerationMixApi } from './services/generation-mix-api';
export { OctopusPriceApi } from './services/octopus-price-api';
export { ConfigurationService, EnvSettingsStore } from './services/configuration-service';
export type { SettingsStore, AppConfiguration } from './services/configuration-service';
export { DailySeriesCache } from './util/cache';
export type { DayCache } from './util/cache';
export {
  AppError,
  ErrorCategory,
  ErrorHandler,
  DataUnavailableError,
  InfeasibleScheduleError,
  InvalidInputError
} from './util/error-handler';
export { ConsoleLogger, LogLevel, LogCategory, createFallbackLogger } from './util/logger';
export type { Logger } from './util/logger';
export { timeToSlot, windowSlots, slotIndexOf, DEFAULT_ZONE } from './util/settlement-time';
