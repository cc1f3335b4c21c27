import { EventEmitter } from 'eventemitter3';
import { UnsupportedExchangeError } from '../core/errors.js';
import { RateObservation } from '../core/types.js';
import { BaseConnector } from '../exchanges/baseConnector.js';

export interface RateSource {
  getRate(exchangeId: string, symbol: string): Promise<number>;
}

type RouterEvents = {
  rate: (observation: RateObservation) => void;
};

/**
 * Resolves exchange identifiers to registered connectors. The registry is
 * filled once at startup and only read afterwards.
 */
export class RateRouter extends EventEmitter<RouterEvents> implements RateSource {
  private readonly connectors = new Map<string, BaseConnector>();

  registerConnector(connector: BaseConnector): void {
    this.connectors.set(connector.name, connector);
  }

  has(exchangeId: string): boolean {
    return this.connectors.has(exchangeId);
  }

  get exchangeIds(): string[] {
    return [...this.connectors.keys()];
  }

  get registered(): BaseConnector[] {
    return [...this.connectors.values()];
  }

  async getRate(exchangeId: string, symbol: string): Promise<number> {
    const connector = this.connectors.get(exchangeId);
    if (!connector) {
      throw new UnsupportedExchangeError(exchangeId);
    }

    const rate = await connector.fetchFundingRate(symbol);
    this.emit('rate', {
      exchange: exchangeId,
      symbol,
      rate,
      observedAt: Date.now()
    });

    return rate;
  }
}
