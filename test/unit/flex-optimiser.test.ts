import fetch, { Response } from 'node-fetch';
import { FlexOptimiser, GridDayLoader, createFlexOptimiser } from '../../src/flex-optimiser';
import { buildGridDay } from '../../src/services/time-series-normalizer';
import { SettingsStore } from '../../src/services/configuration-service';
import { DataUnavailableError, InfeasibleScheduleError, InvalidInputError } from '../../src/util/error-handler';
import { createMockLogger } from '../mocks/logger.mock';
import { flat, halfHourlyReadings, series, sum } from '../helpers/series';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});
const mockedFetch = jest.mocked(fetch);

const DATE = '2025-01-15';

// Cheap overnight (slots 0-13) with a 1p dip in slots 4-5, 30p otherwise
const prices = series((i) => (i === 4 || i === 5 ? 1 : i < 14 ? 5 : 30));
const gridDay = buildGridDay(halfHourlyReadings(DATE, prices), halfHourlyReadings(DATE, flat(100)), DATE);

const evening = { arrival: '18:00', departure: '07:00', energyKwh: 7 };
const heating = { allowedFrom: '06:00', allowedUntil: '22:00' };

describe('FlexOptimiser', () => {
  const logger = createMockLogger();
  const loadGridDay = jest.fn();
  const loader: GridDayLoader = { loadGridDay };

  beforeEach(() => {
    jest.clearAllMocks();
    loadGridDay.mockReset();
    loadGridDay.mockResolvedValue(gridDay);
  });

  test('schedules the EV and heat pump against the day', async () => {
    const optimiser = new FlexOptimiser(loader, logger);
    const report = await optimiser.runScenario(DATE, { ev: evening, heatPump: heating });

    expect(loadGridDay).toHaveBeenCalledWith(DATE);
    expect(report.goal).toBe('cheapest');
    expect(report.gridDay).toBe(gridDay);
    expect(report.loads.map((load) => load.id)).toEqual(['ev', 'heat_pump']);

    const [ev, heatPump] = report.results;
    expect(ev.allocation[4]).toBe(3.5);
    expect(ev.allocation[5]).toBe(3.5);
    expect(ev.optimized.cost).toBe(7);
    expect(ev.baseline.cost).toBeCloseTo((7 / 26) * 422, 9);

    expect(heatPump.allocation.slice(12, 16)).toEqual([1.5, 1.5, 1.5, 1.5]);
    expect(heatPump.optimized.cost).toBe(105);

    expect(report.totals.optimized.cost).toBe(112);
    expect(report.totals.optimized.energy).toBe(13);
    expect(sum(report.household)).toBeCloseTo(7.5, 9);
  });

  test('logs a marker and an optimization summary', async () => {
    const optimiser = new FlexOptimiser(loader, logger);
    await optimiser.runScenario(DATE, { ev: evening });

    expect(logger.marker).toHaveBeenCalledWith('Scenario 2025-01-15 (cheapest)');
    expect(logger.optimization).toHaveBeenCalledWith('Scenario 2025-01-15 complete', expect.objectContaining({
      goal: 'cheapest',
      loads: ['ev']
    }));
  });

  test('maps the scenario goal to a price weight', async () => {
    const optimiser = new FlexOptimiser(loader, logger);
    const report = await optimiser.runScenario(DATE, { goal: 'lowest_carbon', ev: evening });

    expect(report.goal).toBe('lowest_carbon');
    expect(report.results[0].weight).toBe(0);
  });

  test('uses constructor defaults when the scenario sets none', async () => {
    const optimiser = new FlexOptimiser(loader, logger, { goal: 'balanced', baseline: 'asap' });
    const report = await optimiser.runScenario(DATE, { ev: evening });

    expect(report.results[0].weight).toBe(0.5);
    expect(report.results[0].baselineStrategy).toBe('asap');
  });

  test('returns empty results for a scenario without loads', async () => {
    const report = await new FlexOptimiser(loader, logger).runScenario(DATE, {});

    expect(report.results).toEqual([]);
    expect(report.totals.savings.costPercent).toBe(0);
  });

  test('logs and rethrows missing data', async () => {
    loadGridDay.mockRejectedValue(new DataUnavailableError('price', DATE));

    await expect(new FlexOptimiser(loader, logger).runScenario(DATE, { ev: evening }))
      .rejects.toBeInstanceOf(DataUnavailableError);
    expect(logger.warn).toHaveBeenCalledWith('DATA Error: No price data available for 2025-01-15', {
      category: 'DATA',
      recoverable: true,
      series: 'price',
      date: DATE,
      goal: 'cheapest'
    });
  });

  test('surfaces infeasible loads', async () => {
    const optimiser = new FlexOptimiser(loader, logger);

    await expect(optimiser.runScenario(DATE, { ev: { ...evening, energyKwh: 200 } }))
      .rejects.toBeInstanceOf(InfeasibleScheduleError);
  });
});

describe('createFlexOptimiser', () => {
  const logger = createMockLogger();
  const values: Record<string, string> = {
    octopus_api_url: 'https://octopus.example.test/v1',
    carbon_api_url: 'https://carbon.example.test',
    http_retry_delay_ms: '0'
  };
  const settings: SettingsStore = { get: (key: string) => values[key] };

  beforeEach(() => {
    jest.clearAllMocks();
    mockedFetch.mockReset();
    mockedFetch.mockImplementation(async (url) => {
      const target = typeof url === 'string' ? url : '';
      let body: unknown;
      if (target.startsWith('https://octopus.example.test/')) {
        body = {
          next: null,
          results: halfHourlyReadings(DATE, prices).map((reading) => ({
            valid_from: reading.timestamp,
            value_inc_vat: reading.value
          }))
        };
      } else if (target.includes('/generation/')) {
        body = {
          data: halfHourlyReadings(DATE, flat(30)).map((reading) => ({
            from: reading.timestamp,
            generationmix: [{ fuel: 'gas', perc: 65 }, { fuel: 'solar', perc: 5 }, { fuel: 'wind', perc: reading.value }]
          }))
        };
      } else {
        body = {
          data: halfHourlyReadings(DATE, flat(100)).map((reading) => ({
            from: reading.timestamp,
            intensity: { forecast: reading.value, actual: null, index: 'moderate' }
          }))
        };
      }
      return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
    });
  });

  test('wires the live feeds through the day cache', async () => {
    const optimiser = createFlexOptimiser(settings, logger);

    const first = await optimiser.runScenario(DATE, { ev: evening });
    const second = await optimiser.runScenario(DATE, { ev: evening });

    expect(first.results[0].optimized.cost).toBe(7);
    expect(first.gridDay.slots[0]).toMatchObject({ carbonIndex: 'moderate', windShare: 30, solarShare: 5 });
    expect(first.renewableShare).toEqual(new Array(48).fill(35));
    expect(second.gridDay).toEqual(first.gridDay);
    expect(mockedFetch).toHaveBeenCalledTimes(3);
    expect(mockedFetch).toHaveBeenCalledWith(
      'https://octopus.example.test/v1/products/AGILE-24-10-01/electricity-tariffs/E-1R-AGILE-24-10-01-C/standard-unit-rates/?period_from=2025-01-15T00%3A00%3A00Z&period_to=2025-01-16T00%3A00%3A00Z',
      expect.objectContaining({ method: 'GET' })
    );
    expect(mockedFetch).toHaveBeenCalledWith(
      'https://carbon.example.test/intensity/date/2025-01-15',
      expect.objectContaining({ method: 'GET' })
    );
    expect(mockedFetch).toHaveBeenCalledWith(
      'https://carbon.example.test/generation/2025-01-15T00:00Z/2025-01-16T00:00Z',
      expect.objectContaining({ method: 'GET' })
    );
  });

  test('prints debug output when log_level is debug', async () => {
    const print = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const optimiser = createFlexOptimiser({ get: (key: string) => (key === 'log_level' ? 'debug' : values[key]) });
      await optimiser.runScenario(DATE, { ev: evening });

      expect(print).toHaveBeenCalledWith(
        expect.stringMatching(/^DEBUG: .*Scheduled ev into 2 of 26 window slots$/),
        expect.objectContaining({ weight: 1 })
      );
    } finally {
      print.mockRestore();
    }
  });

  test('rejects invalid settings up front', () => {
    expect(() => createFlexOptimiser({ get: (key: string) => (key === 'goal' ? 'fastest' : undefined) }, logger))
      .toThrow(InvalidInputError);
  });
});
