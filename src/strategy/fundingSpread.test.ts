import { describe, it, expect } from 'vitest';
import { BelowThresholdError, ExecutionFailedError } from '../core/errors.js';
import { fixedRandom, scriptedRandom } from '../lib/random.js';
import { FundingSpreadStrategy } from './fundingSpread.js';

const cfg = {
  threshold: 0.0001,
  successProbability: 0.9,
  efficiencyFactor: 0.95,
  executionLatencyMs: 0
};

describe('FundingSpreadStrategy', () => {
  it('keeps the efficiency share of the expected profit on success', async () => {
    const strategy = new FundingSpreadStrategy(cfg, fixedRandom(0));

    const profit = await strategy.evaluate(0.0005, 0.0002, 10_000);

    expect(profit).toBeCloseTo(2.85, 10);
  });

  it('uses the absolute rate difference', async () => {
    const strategy = new FundingSpreadStrategy(cfg, fixedRandom(0));

    const profit = await strategy.evaluate(0.0002, 0.0005, 10_000);

    expect(profit).toBeCloseTo(2.85, 10);
  });

  it('rejects differences below the threshold without drawing', async () => {
    let draws = 0;
    const strategy = new FundingSpreadStrategy(cfg, () => {
      draws += 1;
      return 0;
    });

    const result = strategy.evaluate(0.0001, 0.00011, 10_000);

    await expect(result).rejects.toBeInstanceOf(BelowThresholdError);
    await expect(result).rejects.toThrow(/^Funding rate difference too small/);
    expect(draws).toBe(0);
  });

  it('proceeds when the difference equals the threshold', async () => {
    const strategy = new FundingSpreadStrategy(cfg, fixedRandom(0));

    const profit = await strategy.evaluate(0.0001, 0, 1_000);

    expect(profit).toBeCloseTo(0.095, 10);
  });

  it('fails the execution when the draw reaches the success probability', async () => {
    const strategy = new FundingSpreadStrategy(cfg, fixedRandom(0.9));

    const result = strategy.evaluate(0.0005, 0.0002, 10_000);

    await expect(result).rejects.toBeInstanceOf(ExecutionFailedError);
    await expect(result).rejects.toThrow('Arbitrage execution failed');
  });

  it('draws once per attempt', async () => {
    const strategy = new FundingSpreadStrategy(cfg, scriptedRandom([0.1, 0.99]));

    await expect(strategy.evaluate(0.0005, 0.0002, 100)).resolves.toBeCloseTo(0.0285, 10);
    await expect(strategy.evaluate(0.0005, 0.0002, 100)).rejects.toBeInstanceOf(
      ExecutionFailedError
    );
  });

  it('never succeeds with a zero success probability', async () => {
    const strategy = new FundingSpreadStrategy(
      { ...cfg, successProbability: 0 },
      fixedRandom(0)
    );

    await expect(strategy.evaluate(0.0005, 0.0002, 100)).rejects.toBeInstanceOf(
      ExecutionFailedError
    );
  });
});
