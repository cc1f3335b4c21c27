import { ArbitrageError, errorMessage, RequestTimeoutError } from '../core/errors.js';
import { formatDuration } from '../core/math.js';
import {
  ArbitrageRequest,
  ArbitrageResponse,
  ErrorResponse,
  ExecutionReport
} from '../core/types.js';
import { RateSource } from '../feeds/rateRouter.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { ExecutionStrategy } from '../strategy/fundingSpread.js';
import { GasOptimizer } from './gasOptimizer.js';

export type EngineOptions = {
  /** 0 disables the timeout. */
  requestTimeoutMs: number;
};

export const errorResponse = (message: string): ErrorResponse => ({
  status: 'error',
  execution_time: formatDuration(0),
  error_message: message
});

export class ArbitrageEngine {
  constructor(
    private readonly rates: RateSource,
    private readonly strategy: ExecutionStrategy,
    private readonly gas: GasOptimizer,
    private readonly options: EngineOptions = { requestTimeoutMs: 0 },
    private readonly bus: EventBus = eventBus
  ) {}

  /** Never rejects: every failure becomes an error response. */
  async execute(request: ArbitrageRequest): Promise<ArbitrageResponse> {
    const startedAt = performance.now();

    logger.info('Executing arbitrage request', {
      strategyId: request.strategy_id,
      symbol: request.symbol,
      primaryExchange: request.primary_exchange,
      secondaryExchange: request.secondary_exchange,
      amount: request.amount,
      priority: request.priority
    });

    try {
      const profit = await this.withTimeout(this.perform(request));
      const durationMs = performance.now() - startedAt;

      logger.info('Arbitrage executed', {
        strategyId: request.strategy_id,
        profit,
        durationMs: Number(durationMs.toFixed(3))
      });
      this.emitReport(request, { success: true, profit, durationMs });

      return {
        status: 'success',
        profit,
        execution_time: formatDuration(durationMs),
        gas_used: this.gas.currentGasPrice
      };
    } catch (error) {
      const message = errorMessage(error);
      const errorCode = error instanceof ArbitrageError ? error.code : undefined;

      if (error instanceof ArbitrageError) {
        logger.warn('Arbitrage rejected', {
          strategyId: request.strategy_id,
          code: errorCode,
          error: message
        });
      } else {
        logger.error('Arbitrage execution fault', {
          strategyId: request.strategy_id,
          error: message
        });
      }

      this.emitReport(request, {
        success: false,
        errorCode,
        message,
        durationMs: performance.now() - startedAt
      });

      return errorResponse(message);
    }
  }

  private async perform(request: ArbitrageRequest): Promise<number> {
    const [primaryRate, secondaryRate] = await Promise.all([
      this.rates.getRate(request.primary_exchange, request.symbol),
      this.rates.getRate(request.secondary_exchange, request.symbol)
    ]);

    logger.debug('Funding rates', {
      strategyId: request.strategy_id,
      primaryRate,
      secondaryRate
    });

    return this.strategy.evaluate(primaryRate, secondaryRate, request.amount);
  }

  private async withTimeout<T>(work: Promise<T>): Promise<T> {
    const { requestTimeoutMs } = this.options;
    if (requestTimeoutMs <= 0) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new RequestTimeoutError(requestTimeoutMs)),
        requestTimeoutMs
      );
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emitReport(
    request: ArbitrageRequest,
    outcome: Pick<ExecutionReport, 'success' | 'profit' | 'errorCode' | 'message' | 'durationMs'>
  ): void {
    this.bus.emit('execution', {
      strategyId: request.strategy_id,
      symbol: request.symbol,
      primaryExchange: request.primary_exchange,
      secondaryExchange: request.secondary_exchange,
      timestamp: Date.now(),
      ...outcome
    });
  }
}
