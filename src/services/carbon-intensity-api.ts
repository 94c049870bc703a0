import { CarbonIndex, CarbonReading } from '../types';
import { AppError, ErrorCategory } from '../util/error-handler';
import { HttpClient } from '../util/http';
import { Logger } from '../util/logger';
import { BaseApiService, isRecord, toFiniteNumber } from './base-api-service';

export const CARBON_INTENSITY_BASE_URL = 'https://api.carbonintensity.org.uk';

const CARBON_INDEX_BANDS: readonly CarbonIndex[] = ['very low', 'low', 'moderate', 'high', 'very high'];

function toCarbonIndex(value: unknown): CarbonIndex | undefined {
  return CARBON_INDEX_BANDS.find((band) => band === value);
}

/**
 * GB national carbon intensity feed (gCO2/kWh, half-hourly).
 */
export class CarbonIntensityApi extends BaseApiService {
  constructor(http: HttpClient, logger: Logger) {
    super('CarbonIntensity', http, logger);
  }

  /**
   * Fetch the half-hourly readings published for a date. Actual values are
   * preferred; the forecast stands in where no actual has been published.
   * The published index band is kept when it is one of the known bands.
   */
  async getIntensityForDate(date: string): Promise<CarbonReading[]> {
    const endpoint = `intensity/date/${date}`;
    this.logApiCall('GET', endpoint);

    let payload: unknown;
    try {
      payload = await this.http.get(endpoint);
    } catch (error) {
      throw this.createApiError(error, { date });
    }

    return this.parseIntensityResponse(payload, date);
  }

  parseIntensityResponse(payload: unknown, date: string): CarbonReading[] {
    if (!isRecord(payload) || !Array.isArray(payload.data)) {
      throw new AppError('Unexpected carbon intensity response format', ErrorCategory.DATA, undefined, {
        service: this.serviceName,
        date
      });
    }

    const readings: CarbonReading[] = [];
    for (const entry of payload.data) {
      if (!isRecord(entry) || typeof entry.from !== 'string' || !isRecord(entry.intensity)) {
        continue;
      }
      const value = toFiniteNumber(entry.intensity.actual) ?? toFiniteNumber(entry.intensity.forecast);
      if (value === null) {
        continue;
      }
      const index = toCarbonIndex(entry.intensity.index);
      readings.push(index ? { timestamp: entry.from, value, index } : { timestamp: entry.from, value });
    }

    this.logger.debug(`Carbon intensity: ${readings.length} readings for ${date}`);
    return readings;
  }
}
