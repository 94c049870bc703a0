import { BaselineStrategy, OptimizationGoal } from '../types';
import { InvalidInputError } from '../util/error-handler';
import { LogLevel, Logger, parseLogLevel } from '../util/logger';
import { DEFAULT_ZONE } from '../util/settlement-time';
import { ServiceBase } from './base/service-base';
import { CARBON_INTENSITY_BASE_URL } from './carbon-intensity-api';
import { DEFAULT_AGILE_PRODUCT, DEFAULT_AGILE_TARIFF, OCTOPUS_BASE_URL } from './octopus-price-api';

/**
 * Read-only key/value source for settings
 */
export interface SettingsStore {
  get(key: string): string | undefined;
}

/**
 * Settings backed by environment variables, e.g. FLEX_TIMEZONE
 */
export class EnvSettingsStore implements SettingsStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    const raw = this.env[`FLEX_${key.toUpperCase()}`];
    return typeof raw === 'string' && raw.trim().length > 0 ? raw.trim() : undefined;
  }
}

export interface GridConfig {
  zone: string;
  carbonIntensityBaseUrl: string;
  octopusBaseUrl: string;
  productCode: string;
  tariffCode: string;
}

export interface HttpConfig {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface OptimizationConfig {
  goal: OptimizationGoal;
  baseline: BaselineStrategy;
  cacheDays: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfiguration {
  grid: GridConfig;
  http: HttpConfig;
  optimization: OptimizationConfig;
  logging: LoggingConfig;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const GOALS: readonly OptimizationGoal[] = ['cheapest', 'lowest_carbon', 'balanced'];
const BASELINES: readonly BaselineStrategy[] = ['uniform', 'asap'];

function isGoal(value: string): value is OptimizationGoal {
  return GOALS.some((goal) => goal === value);
}

function isBaseline(value: string): value is BaselineStrategy {
  return BASELINES.some((baseline) => baseline === value);
}

export class ConfigurationService extends ServiceBase {
  private readonly configCache: Partial<AppConfiguration> = {};

  constructor(private readonly settings: SettingsStore, logger: Logger) {
    super(logger);
  }

  getConfig<T extends keyof AppConfiguration>(section: T): AppConfiguration[T] {
    const cached = this.configCache[section];
    if (cached) {
      return cached;
    }

    const loaded = this.loadConfigSection(section);
    const validation = this.validateConfigSection(section, loaded);
    validation.warnings.forEach((warning) => this.logWarn(warning, { section }));
    if (!validation.isValid) {
      throw new InvalidInputError(
        section,
        `Configuration validation failed for ${section}: ${validation.errors.join(', ')}`
      );
    }

    this.configCache[section] = loaded;
    this.logDebug(`Loaded configuration section: ${section}`);
    return loaded;
  }

  getAll(): AppConfiguration {
    return {
      grid: this.getConfig('grid'),
      http: this.getConfig('http'),
      optimization: this.getConfig('optimization'),
      logging: this.getConfig('logging')
    };
  }

  private numberSetting(key: string, fallback: number): number {
    const raw = this.settings.get(key);
    return raw === undefined ? fallback : Number(raw);
  }

  private loadConfigSection<T extends keyof AppConfiguration>(section: T): AppConfiguration[T];
  private loadConfigSection(section: keyof AppConfiguration): AppConfiguration[keyof AppConfiguration] {
    switch (section) {
      case 'grid':
        return {
          zone: this.settings.get('timezone') ?? DEFAULT_ZONE,
          carbonIntensityBaseUrl: this.settings.get('carbon_api_url') ?? CARBON_INTENSITY_BASE_URL,
          octopusBaseUrl: this.settings.get('octopus_api_url') ?? OCTOPUS_BASE_URL,
          productCode: this.settings.get('octopus_product') ?? DEFAULT_AGILE_PRODUCT,
          tariffCode: this.settings.get('octopus_tariff') ?? DEFAULT_AGILE_TARIFF
        };

      case 'http':
        return {
          timeoutMs: this.numberSetting('http_timeout_ms', 15_000),
          maxRetries: this.numberSetting('http_max_retries', 2),
          retryDelayMs: this.numberSetting('http_retry_delay_ms', 1000)
        };

      case 'optimization': {
        const goal = this.settings.get('goal') ?? 'cheapest';
        const baseline = this.settings.get('baseline') ?? 'uniform';
        if (!isGoal(goal)) {
          throw new InvalidInputError('goal', `Invalid goal '${goal}': expected one of ${GOALS.join(', ')}`);
        }
        if (!isBaseline(baseline)) {
          throw new InvalidInputError('baseline', `Invalid baseline '${baseline}': expected one of ${BASELINES.join(', ')}`);
        }
        return {
          goal,
          baseline,
          cacheDays: this.numberSetting('cache_days', 7)
        };
      }

      case 'logging':
        return {
          level: parseLogLevel(this.settings.get('log_level'))
        };
    }
  }

  validateConfigSection<T extends keyof AppConfiguration>(section: T, config: AppConfiguration[T]): ValidationResult;
  validateConfigSection(section: keyof AppConfiguration, config: AppConfiguration[keyof AppConfiguration]): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (section === 'grid' && 'zone' in config) {
      try {
        Intl.DateTimeFormat(undefined, { timeZone: config.zone });
      } catch {
        errors.push(`Unknown IANA timezone '${config.zone}'`);
      }
      if (config.zone !== DEFAULT_ZONE) {
        warnings.push(`Settlement slots follow ${config.zone}; GB feeds are published for ${DEFAULT_ZONE}`);
      }
    }

    if (section === 'http' && 'timeoutMs' in config) {
      if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
        errors.push('HTTP timeout must be a positive number of milliseconds');
      }
      if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
        errors.push('HTTP max retries must be a non-negative integer');
      }
      if (!Number.isFinite(config.retryDelayMs) || config.retryDelayMs < 0) {
        errors.push('HTTP retry delay must be a non-negative number');
      }
    }

    if (section === 'optimization' && 'cacheDays' in config) {
      if (!Number.isInteger(config.cacheDays) || config.cacheDays < 1) {
        errors.push('Cache size must be a positive whole number of days');
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
