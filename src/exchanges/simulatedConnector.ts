import { ExchangeConfig } from '../config.js';
import { logger } from '../lib/logger.js';
import { mathRandom, RandomSource } from '../lib/random.js';
import { BaseConnector } from './baseConnector.js';

/**
 * Synthetic funding rates in `[rateFloor, rateFloor + rateSpread)`.
 * Stand-in until a live feed is wired for the exchange.
 */
export class SimulatedConnector extends BaseConnector {
  constructor(
    cfg: ExchangeConfig,
    private readonly random: RandomSource = mathRandom
  ) {
    super(cfg);
  }

  async fetchFundingRate(symbol: string): Promise<number> {
    const rate = this.cfg.rateFloor + this.random() * this.cfg.rateSpread;

    logger.debug('Simulated funding rate', {
      exchange: this.name,
      symbol,
      rate
    });

    return rate;
  }
}
