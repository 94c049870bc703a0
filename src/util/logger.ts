export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  API = 'api',
  OPTIMIZATION = 'optimization'
}

/**
 * Destination for formatted log lines. `console` satisfies it.
 */
export interface LogSink {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
}

/**
 * Logger interface for standardized logging across the library
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: Record<string, unknown>): void;
  api(message: string, context?: Record<string, unknown>): void;
  optimization(message: string, context?: Record<string, unknown>): void;
  marker(message: string): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
}

export function isRunningInDevMode(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Map a level name such as "debug" or "WARN" onto a LogLevel.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value ?? '').trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'NONE':
      return LogLevel.NONE;
    default:
      return fallback;
  }
}

function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value);
    } catch {
      return '[Object: circular or too complex to stringify]';
    }
  }

  return String(value);
}

export class ConsoleLogger implements Logger {
  private sink: LogSink;
  private logLevel: LogLevel;
  private logPrefix: string;
  private enabledCategories: Set<LogCategory>;
  private includeTimestamps: boolean;

  constructor(sink: LogSink = console, options: LoggerConfig = {}) {
    this.sink = sink;
    // development runs start at DEBUG unless a level is given
    this.logLevel = options.level ?? (isRunningInDevMode() ? LogLevel.DEBUG : LogLevel.INFO);
    this.logPrefix = options.prefix ? `[${options.prefix}] ` : '';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  private getLogPrefix(): string {
    const timestamp = this.includeTimestamps ? `[${getFormattedTimestamp()}] ` : '';
    return timestamp + this.logPrefix;
  }

  private withContext(message: string, context?: Record<string, unknown>): string {
    return context ? `${message} ${this.formatValue(context)}` : message;
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.info(`Log level set to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
    this.debug(`Enabled log category: ${category}`);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
    this.debug(`Disabled log category: ${category}`);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`DEBUG: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`INFO: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public api(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.API)) {
      this.sink.log(`API: ${this.getLogPrefix()}${this.withContext(message, context)}`);
    }
  }

  public optimization(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.OPTIMIZATION)) {
      this.sink.log(`OPTIMIZATION: ${this.getLogPrefix()}${this.withContext(message, context)}`);
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`WARN: ${this.getLogPrefix()}${this.withContext(message, context)}`);
    }
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      const line = `ERROR: ${this.getLogPrefix()}${this.withContext(message, context)}`;
      if (error !== undefined) {
        this.sink.error(line, error);
      } else {
        this.sink.error(line);
      }
    }
  }

  public marker(message: string): void {
    this.sink.log(`${this.getLogPrefix()}===== ${message} =====`);
  }
}

/**
 * Create a plain console logger for callers that do not inject one
 */
export function createFallbackLogger(prefix: string = 'FlexOptimiser'): Logger {
  let currentLogLevel = LogLevel.INFO;
  const enabledCategories = new Set<LogCategory>(Object.values(LogCategory));

  const fallbackLogger: Logger = {
    log: (message: string, ...args: unknown[]) => console.log(`[${prefix}] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => console.log(`[${prefix}] INFO: ${message}`, ...args),
    error: (message: string, error?: unknown, context?: Record<string, unknown>) => {
      console.error(`[${prefix}] ERROR: ${message}`, error, context);
    },
    debug: (message: string, ...args: unknown[]) => {
      if (currentLogLevel <= LogLevel.DEBUG) {
        console.log(`[${prefix}] DEBUG: ${message}`, ...args);
      }
    },
    warn: (message: string, context?: Record<string, unknown>) => console.warn(`[${prefix}] WARN: ${message}`, context),
    api: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] API: ${message}`, context),
    optimization: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] OPT: ${message}`, context),
    marker: (message: string) => console.log(`[${prefix}] MARKER: ${message}`),
    setLogLevel: (level: LogLevel) => {
      currentLogLevel = level;
    },
    getLogLevel: () => currentLogLevel,
    enableCategory: (category: LogCategory) => {
      enabledCategories.add(category);
    },
    disableCategory: (category: LogCategory) => {
      enabledCategories.delete(category);
    },
    isCategoryEnabled: (category: LogCategory) => enabledCategories.has(category),
    formatValue: (value: unknown) => formatValue(value)
  };

  return fallbackLogger;
}
