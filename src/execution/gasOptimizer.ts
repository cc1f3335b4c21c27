import { GasConfig } from '../config.js';

export interface GasOptimizer {
  /** wei */
  readonly currentGasPrice: number;
  readonly maxGasLimit: number;
}

/** Read-only after startup; requests never adjust it. */
export const createGasOptimizer = (cfg: GasConfig): GasOptimizer =>
  Object.freeze({
    currentGasPrice: cfg.currentGasPrice,
    maxGasLimit: cfg.maxGasLimit
  });
