import { CarbonReading, GenerationMixReading, GridDay, RawReading } from '../types';
import { DayCache } from '../util/cache';
import { Logger } from '../util/logger';
import { settlementDayBoundsUtc, startOfSettlementDay } from '../util/settlement-time';
import { ServiceBase } from './base/service-base';
import { buildGridDay } from './time-series-normalizer';

export interface PriceSource {
  getUnitRates(periodFrom: string, periodTo: string): Promise<RawReading[]>;
}

export interface CarbonSource {
  getIntensityForDate(date: string): Promise<CarbonReading[]>;
}

export interface GenerationMixSource {
  getGenerationMix(periodFrom: string, periodTo: string): Promise<GenerationMixReading[]>;
}

function copyGridDay(day: GridDay): GridDay {
  return { ...day, slots: day.slots.map((slot) => ({ ...slot })) };
}

/**
 * Fetches and normalizes one settlement day of grid data.
 * Normalized days are kept in the injected cache; a different date or zone
 * always goes back to the feeds. Callers get their own copy, so edits to a
 * returned day never reach the cache.
 */
export class GridDataService extends ServiceBase {
  constructor(
    private readonly prices: PriceSource,
    private readonly carbon: CarbonSource,
    private readonly generation: GenerationMixSource,
    private readonly cache: DayCache<GridDay>,
    logger: Logger,
    private readonly zone: string
  ) {
    super(logger);
  }

  async loadGridDay(date: string): Promise<GridDay> {
    startOfSettlementDay(date, this.zone);

    const cached = this.cache.get(date, this.zone);
    if (cached) {
      this.logDebug(`Cache hit for ${date}`);
      return copyGridDay(cached);
    }

    const { from, to } = settlementDayBoundsUtc(date, this.zone);
    const [priceReadings, carbonReadings, mixReadings] = await Promise.all([
      this.prices.getUnitRates(from, to),
      this.carbon.getIntensityForDate(date),
      this.generation.getGenerationMix(from, to)
    ]);

    this.logInfo(`Fetched grid data for ${date}`, {
      priceReadings: priceReadings.length,
      carbonReadings: carbonReadings.length,
      mixReadings: mixReadings.length
    });

    // throws DataUnavailableError when price or carbon is empty for the day
    const day = buildGridDay(priceReadings, carbonReadings, date, this.zone, mixReadings);
    this.cache.set(date, this.zone, day);
    return copyGridDay(day);
  }
}
