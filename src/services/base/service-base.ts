import { Logger } from '../../util/logger';

export abstract class ServiceBase {
  protected readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  protected logInfo(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(`${this.constructor.name}: ${message}`, this.logger.formatValue(data));
    } else {
      this.logger.info(`${this.constructor.name}: ${message}`);
    }
  }

  protected logDebug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(`${this.constructor.name}: ${message}`, this.logger.formatValue(data));
    } else {
      this.logger.debug(`${this.constructor.name}: ${message}`);
    }
  }

  protected logWarn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(`${this.constructor.name}: ${message}`, data);
  }
}
