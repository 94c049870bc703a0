import { BaselineStrategy, DemoScenario, FlexibleLoad, GridDay, OptimizationGoal, ScenarioReport } from './types';
import { ServiceBase } from './services/base/service-base';
import { CarbonIntensityApi } from './services/carbon-intensity-api';
import { ConfigurationService, EnvSettingsStore, SettingsStore } from './services/configuration-service';
import { GenerationMixApi } from './services/generation-mix-api';
import { GridDataService } from './services/grid-data-service';
import { weightForGoal } from './services/load-scheduler';
import { OctopusPriceApi } from './services/octopus-price-api';
import { schedulePortfolio } from './services/portfolio';
import { buildEvLoad, buildHeatPumpLoad, buildHouseholdBaseload } from './services/scenario-builder';
import { carbonSeries, priceSeries, renewableShareSeries } from './services/time-series-normalizer';
import { DailySeriesCache } from './util/cache';
import { ErrorHandler } from './util/error-handler';
import { createHttpClient } from './util/http';
import { ConsoleLogger, Logger } from './util/logger';

export interface GridDayLoader {
  loadGridDay(date: string): Promise<GridDay>;
}

export interface ScenarioDefaults {
  goal?: OptimizationGoal;
  baseline?: BaselineStrategy;
}

/**
 * Runs a demo scenario end to end: load the day's grid data, build the
 * scenario's flexible loads and schedule them.
 */
export class FlexOptimiser extends ServiceBase {
  private readonly errorHandler: ErrorHandler;
  private readonly defaultGoal: OptimizationGoal;
  private readonly defaultBaseline: BaselineStrategy;

  constructor(
    private readonly gridData: GridDayLoader,
    logger: Logger,
    defaults: ScenarioDefaults = {}
  ) {
    super(logger);
    this.errorHandler = new ErrorHandler(logger);
    this.defaultGoal = defaults.goal ?? 'cheapest';
    this.defaultBaseline = defaults.baseline ?? 'uniform';
  }

  buildLoads(scenario: DemoScenario, date: string): FlexibleLoad[] {
    const loads: FlexibleLoad[] = [];
    if (scenario.ev) {
      loads.push(buildEvLoad(scenario.ev));
    }
    if (scenario.heatPump) {
      loads.push(buildHeatPumpLoad(scenario.heatPump, date));
    }
    return loads;
  }

  async runScenario(date: string, scenario: DemoScenario): Promise<ScenarioReport> {
    const goal = scenario.goal ?? this.defaultGoal;
    const baseline = scenario.baseline ?? this.defaultBaseline;
    this.logger.marker(`Scenario ${date} (${goal})`);

    try {
      const gridDay = await this.gridData.loadGridDay(date);
      const loads = this.buildLoads(scenario, date);
      const { results, totals } = schedulePortfolio(
        priceSeries(gridDay),
        carbonSeries(gridDay),
        loads,
        { weight: weightForGoal(goal), baseline },
        this.logger
      );

      this.logger.optimization(`Scenario ${date} complete`, {
        goal,
        loads: loads.map((load) => load.id),
        costSavedPercent: Number(totals.savings.costPercent.toFixed(1)),
        carbonSavedPercent: Number(totals.savings.carbonPercent.toFixed(1))
      });

      return {
        gridDay,
        goal,
        loads,
        results,
        totals,
        household: buildHouseholdBaseload(),
        renewableShare: renewableShareSeries(gridDay)
      };
    } catch (error) {
      throw this.errorHandler.logError(error, { date, goal });
    }
  }
}

/**
 * Wire the optimiser against the live GB feeds using the given settings.
 */
export function createFlexOptimiser(
  settings: SettingsStore = new EnvSettingsStore(),
  logger?: Logger
): FlexOptimiser {
  const bootstrapLogger = logger ?? new ConsoleLogger(console);
  const config = new ConfigurationService(settings, bootstrapLogger).getAll();
  if (!logger) {
    bootstrapLogger.setLogLevel(config.logging.level);
  }

  const httpDefaults = {
    logger: bootstrapLogger,
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.maxRetries,
    retryDelayMs: config.http.retryDelayMs
  };

  const prices = new OctopusPriceApi(
    createHttpClient({ ...httpDefaults, name: 'octopus', baseURL: config.grid.octopusBaseUrl }),
    bootstrapLogger,
    { productCode: config.grid.productCode, tariffCode: config.grid.tariffCode }
  );
  // carbon intensity and generation mix share one host
  const carbonHttp = createHttpClient({ ...httpDefaults, name: 'carbon-intensity', baseURL: config.grid.carbonIntensityBaseUrl });
  const carbon = new CarbonIntensityApi(carbonHttp, bootstrapLogger);
  const generation = new GenerationMixApi(carbonHttp, bootstrapLogger);
  const cache = new DailySeriesCache<GridDay>({ maxEntries: config.optimization.cacheDays });
  const gridData = new GridDataService(prices, carbon, generation, cache, bootstrapLogger, config.grid.zone);

  return new FlexOptimiser(gridData, bootstrapLogger, {
    goal: config.optimization.goal,
    baseline: config.optimization.baseline
  });
}
