import { ExchangeConfig } from '../config.js';
import { logger } from '../lib/logger.js';

/**
 * One exchange's funding-rate feed. Subclasses supply the rate lookup;
 * `baseUrl` and the credential placeholders travel with the config.
 */
export abstract class BaseConnector {
  protected constructor(protected readonly cfg: ExchangeConfig) {}

  get name(): string {
    return this.cfg.name;
  }

  get baseUrl(): string {
    return this.cfg.baseUrl;
  }

  async start(): Promise<void> {
    await this.bootstrap();
    logger.info('Connector started', { exchange: this.name, baseUrl: this.baseUrl });
  }

  async stop(): Promise<void> {
    await this.teardown();
    logger.info('Connector stopped', { exchange: this.name });
  }

  protected async bootstrap(): Promise<void> {
    // Hook for real API connections.
  }

  protected async teardown(): Promise<void> {
    // Hook for cleanup.
  }

  abstract fetchFundingRate(symbol: string): Promise<number>;
}
