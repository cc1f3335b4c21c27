import { StrategyConfig } from '../config.js';
import { BelowThresholdError, ExecutionFailedError } from '../core/errors.js';
import { expectedProfit, rateDifference } from '../core/math.js';
import { logger } from '../lib/logger.js';
import { mathRandom, RandomSource } from '../lib/random.js';

export interface ExecutionStrategy {
  /**
   * Resolves with the realised profit, or rejects with
   * `BelowThresholdError` / `ExecutionFailedError`.
   */
  evaluate(rateA: number, rateB: number, amount: number): Promise<number>;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Acts on the funding-rate gap between two venues. Execution is simulated:
 * it succeeds with `successProbability` and keeps `efficiencyFactor` of the
 * expected profit to account for slippage and fees.
 */
export class FundingSpreadStrategy implements ExecutionStrategy {
  constructor(
    private readonly cfg: StrategyConfig,
    private readonly random: RandomSource = mathRandom
  ) {}

  async evaluate(rateA: number, rateB: number, amount: number): Promise<number> {
    const diff = rateDifference(rateA, rateB);
    const magnitude = Math.abs(diff);

    if (magnitude < this.cfg.threshold) {
      throw new BelowThresholdError(magnitude, this.cfg.threshold);
    }

    const expected = expectedProfit(amount, diff);
    logger.debug('Attempting execution', { rateA, rateB, amount, expected });

    await sleep(this.cfg.executionLatencyMs);

    if (this.random() >= this.cfg.successProbability) {
      throw new ExecutionFailedError();
    }

    return expected * this.cfg.efficiencyFactor;
  }
}
