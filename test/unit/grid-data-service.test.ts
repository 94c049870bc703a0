import { GridDataService } from '../../src/services/grid-data-service';
import { GridDay } from '../../src/types';
import { DailySeriesCache } from '../../src/util/cache';
import { DataUnavailableError, InvalidInputError } from '../../src/util/error-handler';
import { createMockLogger } from '../mocks/logger.mock';
import { halfHourlyReadings, series } from '../helpers/series';

const DATE = '2025-01-15';

describe('GridDataService', () => {
  const getUnitRates = jest.fn();
  const getIntensityForDate = jest.fn();
  const getGenerationMix = jest.fn();
  const logger = createMockLogger();
  let cache: DailySeriesCache<GridDay>;
  let service: GridDataService;

  beforeEach(() => {
    jest.clearAllMocks();
    getUnitRates.mockReset();
    getIntensityForDate.mockReset();
    getGenerationMix.mockReset();
    getUnitRates.mockResolvedValue(halfHourlyReadings(DATE, series((i) => 10 + i)));
    getIntensityForDate.mockResolvedValue(halfHourlyReadings(DATE, series((i) => 200 - i)));
    getGenerationMix.mockResolvedValue([]);
    cache = new DailySeriesCache<GridDay>();
    service = new GridDataService({ getUnitRates }, { getIntensityForDate }, { getGenerationMix }, cache, logger, 'Europe/London');
  });

  test('fetches every feed for the settlement day and normalizes them', async () => {
    const day = await service.loadGridDay(DATE);

    expect(getUnitRates).toHaveBeenCalledWith('2025-01-15T00:00:00Z', '2025-01-16T00:00:00Z');
    expect(getIntensityForDate).toHaveBeenCalledWith(DATE);
    expect(getGenerationMix).toHaveBeenCalledWith('2025-01-15T00:00:00Z', '2025-01-16T00:00:00Z');
    expect(day.slots).toHaveLength(48);
    expect(day.slots[10]).toMatchObject({ index: 10, price: 20, carbonIntensity: 190, windShare: null, solarShare: null });
    expect(logger.info).toHaveBeenCalledWith(
      'GridDataService: Fetched grid data for 2025-01-15',
      '{"priceReadings":48,"carbonReadings":48,"mixReadings":0}'
    );
  });

  test('carries the generation mix onto the slots', async () => {
    getGenerationMix.mockResolvedValue([{ timestamp: '2025-01-15T06:00:00Z', windShare: 35, solarShare: 4 }]);

    const day = await service.loadGridDay(DATE);

    expect(day.slots[0]).toMatchObject({ windShare: 35, solarShare: 4 });
    expect(day.slots[47]).toMatchObject({ windShare: 35, solarShare: 4 });
  });

  test('serves repeat requests from the cache', async () => {
    const first = await service.loadGridDay(DATE);
    const second = await service.loadGridDay(DATE);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(getUnitRates).toHaveBeenCalledTimes(1);
    expect(getIntensityForDate).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('GridDataService: Cache hit for 2025-01-15');
  });

  test('keeps the cached day intact when a caller edits its copy', async () => {
    const first = await service.loadGridDay(DATE);
    first.slots[20].price = -999;
    first.slots.pop();

    const second = await service.loadGridDay(DATE);

    expect(second.slots).toHaveLength(48);
    expect(second.slots[20].price).toBe(30);
    expect(getUnitRates).toHaveBeenCalledTimes(1);
  });

  test('misses the cache for another zone', async () => {
    await service.loadGridDay(DATE);
    const oslo = new GridDataService({ getUnitRates }, { getIntensityForDate }, { getGenerationMix }, cache, logger, 'Europe/Oslo');

    const day = await oslo.loadGridDay(DATE);

    expect(day.zone).toBe('Europe/Oslo');
    expect(getUnitRates).toHaveBeenCalledTimes(2);
    expect(getUnitRates).toHaveBeenLastCalledWith('2025-01-14T23:00:00Z', '2025-01-15T23:00:00Z');
  });

  test('raises DataUnavailableError and caches nothing when a feed is empty', async () => {
    getIntensityForDate.mockResolvedValue([]);

    await expect(service.loadGridDay(DATE)).rejects.toBeInstanceOf(DataUnavailableError);
    expect(cache.size).toBe(0);

    await expect(service.loadGridDay(DATE)).rejects.toMatchObject({ series: 'carbon intensity', date: DATE });
    expect(getIntensityForDate).toHaveBeenCalledTimes(2);
  });

  test('propagates feed failures', async () => {
    const failure = new Error('HTTP 503 Service Unavailable');
    getUnitRates.mockRejectedValue(failure);

    await expect(service.loadGridDay(DATE)).rejects.toBe(failure);
  });

  test('validates the date before fetching', async () => {
    await expect(service.loadGridDay('tomorrow')).rejects.toBeInstanceOf(InvalidInputError);
    expect(getUnitRates).not.toHaveBeenCalled();
  });
});
