import { DateTime } from 'luxon';
import { GenerationMixReading } from '../types';
import { AppError, ErrorCategory, InvalidInputError } from '../util/error-handler';
import { HttpClient } from '../util/http';
import { Logger } from '../util/logger';
import { BaseApiService, isRecord, toFiniteNumber } from './base-api-service';

// The generation endpoint takes minute-precision UTC instants in the path
const PATH_INSTANT_FORMAT = "yyyy-LL-dd'T'HH:mm'Z'";

function fuelShare(mix: unknown[], fuel: string): number | null {
  for (const entry of mix) {
    if (isRecord(entry) && entry.fuel === fuel) {
      return toFiniteNumber(entry.perc);
    }
  }
  return null;
}

/**
 * GB half-hourly generation mix, served by the carbon intensity API.
 * Only the wind and solar shares are kept.
 */
export class GenerationMixApi extends BaseApiService {
  constructor(http: HttpClient, logger: Logger) {
    super('GenerationMix', http, logger);
  }

  async getGenerationMix(periodFrom: string, periodTo: string): Promise<GenerationMixReading[]> {
    const endpoint = `generation/${this.toPathInstant(periodFrom, 'periodFrom')}/${this.toPathInstant(periodTo, 'periodTo')}`;
    this.logApiCall('GET', endpoint);

    let payload: unknown;
    try {
      payload = await this.http.get(endpoint);
    } catch (error) {
      throw this.createApiError(error, { periodFrom, periodTo });
    }

    return this.parseGenerationResponse(payload);
  }

  parseGenerationResponse(payload: unknown): GenerationMixReading[] {
    if (!isRecord(payload) || !Array.isArray(payload.data)) {
      throw new AppError('Unexpected generation mix response format', ErrorCategory.DATA, undefined, {
        service: this.serviceName
      });
    }

    const readings: GenerationMixReading[] = [];
    for (const entry of payload.data) {
      if (!isRecord(entry) || typeof entry.from !== 'string' || !Array.isArray(entry.generationmix)) {
        continue;
      }
      const windShare = fuelShare(entry.generationmix, 'wind');
      const solarShare = fuelShare(entry.generationmix, 'solar');
      if (windShare === null || solarShare === null) {
        continue;
      }
      readings.push({ timestamp: entry.from, windShare, solarShare });
    }

    this.logger.debug(`Generation mix: ${readings.length} readings`);
    return readings;
  }

  private toPathInstant(instant: string, field: string): string {
    const parsed = DateTime.fromISO(instant, { zone: 'utc' });
    if (!parsed.isValid) {
      throw new InvalidInputError(field, `Invalid ${field}: '${instant}' is not an ISO timestamp`);
    }
    return parsed.toFormat(PATH_INSTANT_FORMAT);
  }
}
