export type ArbitrageErrorCode =
  | 'UNSUPPORTED_EXCHANGE'
  | 'BELOW_THRESHOLD'
  | 'EXECUTION_FAILED'
  | 'DECODE_ERROR'
  | 'REQUEST_TIMEOUT';

export class ArbitrageError extends Error {
  constructor(
    readonly code: ArbitrageErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedExchangeError extends ArbitrageError {
  constructor(readonly exchangeId: string) {
    super('UNSUPPORTED_EXCHANGE', `Unsupported exchange: ${exchangeId}`);
  }
}

export class BelowThresholdError extends ArbitrageError {
  constructor(
    readonly difference: number,
    readonly threshold: number
  ) {
    super(
      'BELOW_THRESHOLD',
      `Funding rate difference too small: ${difference} < ${threshold}`
    );
  }
}

export class ExecutionFailedError extends ArbitrageError {
  constructor(message = 'Arbitrage execution failed') {
    super('EXECUTION_FAILED', message);
  }
}

/** Raised for payloads that are not a well-formed request. */
export class DecodeError extends ArbitrageError {
  constructor(detail: string) {
    super('DECODE_ERROR', `Invalid request: ${detail}`);
  }
}

export class RequestTimeoutError extends ArbitrageError {
  constructor(readonly timeoutMs: number) {
    super('REQUEST_TIMEOUT', `Request timed out after ${timeoutMs}ms`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
