import { RawReading } from '../types';
import { AppError, ErrorCategory } from '../util/error-handler';
import { HttpClient } from '../util/http';
import { Logger } from '../util/logger';
import { BaseApiService, isRecord, toFiniteNumber } from './base-api-service';

export const OCTOPUS_BASE_URL = 'https://api.octopus.energy/v1';
export const DEFAULT_AGILE_PRODUCT = 'AGILE-24-10-01';
export const DEFAULT_AGILE_TARIFF = 'E-1R-AGILE-24-10-01-C';

// Upper bound on followed `next` links for one day's query
const MAX_PAGES = 10;

export interface OctopusTariff {
  productCode: string;
  tariffCode: string;
}

/**
 * Half-hourly unit rates (p/kWh) for an Octopus Agile tariff.
 */
export class OctopusPriceApi extends BaseApiService {
  private readonly tariff: OctopusTariff;

  constructor(http: HttpClient, logger: Logger, tariff: Partial<OctopusTariff> = {}) {
    super('Octopus', http, logger);
    this.tariff = {
      productCode: tariff.productCode ?? DEFAULT_AGILE_PRODUCT,
      tariffCode: tariff.tariffCode ?? DEFAULT_AGILE_TARIFF
    };
  }

  /**
   * Fetch every unit rate valid between two UTC instants, following
   * pagination. VAT-inclusive prices are used when present.
   */
  async getUnitRates(periodFrom: string, periodTo: string): Promise<RawReading[]> {
    const { productCode, tariffCode } = this.tariff;
    const endpoint = `products/${productCode}/electricity-tariffs/${tariffCode}/standard-unit-rates/`;
    const readings: RawReading[] = [];

    let next: string | null = endpoint;
    let params: Record<string, string> | undefined = { period_from: periodFrom, period_to: periodTo };
    let pages = 0;

    while (next && pages < MAX_PAGES) {
      this.logApiCall('GET', next, params);
      let payload: unknown;
      try {
        payload = await this.http.get(next, { params });
      } catch (error) {
        throw this.createApiError(error, { periodFrom, periodTo, page: pages + 1 });
      }

      const page = this.parseUnitRatePage(payload);
      readings.push(...page.readings);
      next = page.next;
      // `next` links already carry the query string
      params = undefined;
      pages += 1;
    }

    if (next) {
      this.logger.warn(`Octopus pagination stopped after ${MAX_PAGES} pages`, { periodFrom, periodTo });
    }

    readings.sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
    this.logger.debug(`Octopus: ${readings.length} unit rates between ${periodFrom} and ${periodTo}`);
    return readings;
  }

  parseUnitRatePage(payload: unknown): { readings: RawReading[]; next: string | null } {
    if (!isRecord(payload) || !Array.isArray(payload.results)) {
      throw new AppError('Unexpected Octopus unit rate response format', ErrorCategory.DATA, undefined, {
        service: this.serviceName
      });
    }

    const readings: RawReading[] = [];
    for (const entry of payload.results) {
      if (!isRecord(entry) || typeof entry.valid_from !== 'string') {
        continue;
      }
      const value = toFiniteNumber(entry.value_inc_vat) ?? toFiniteNumber(entry.value_exc_vat);
      if (value === null) {
        continue;
      }
      readings.push({ timestamp: entry.valid_from, value });
    }

    const next = typeof payload.next === 'string' && payload.next.length > 0 ? payload.next : null;
    return { readings, next };
  }
}
