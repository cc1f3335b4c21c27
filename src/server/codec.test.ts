import { describe, it, expect } from 'vitest';
import { DecodeError } from '../core/errors.js';
import { ArbitrageResponse } from '../core/types.js';
import { decodeRequest, decodeResponse, encodeRequest, encodeResponse } from './codec.js';

const valid = {
  strategy_id: 'strategy-1',
  symbol: 'BTCUSDT',
  primary_exchange: 'binance',
  secondary_exchange: 'bybit',
  amount: 10_000,
  priority: 1,
  timestamp: '2026-01-01T00:00:00Z'
};

const decodeFailure = (text: string): DecodeError => {
  try {
    decodeRequest(text);
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a decode failure');
};

describe('decodeRequest', () => {
  it('decodes a complete request', () => {
    expect(decodeRequest(JSON.stringify(valid))).toEqual(valid);
  });

  it('round-trips through encodeRequest', () => {
    expect(decodeRequest(encodeRequest(valid))).toEqual(valid);
  });

  it('rejects malformed JSON', () => {
    const error = decodeFailure('{"strategy_id": "s1"');

    expect(error.code).toBe('DECODE_ERROR');
    expect(error.message).toMatch(/^Invalid request: malformed JSON \(/);
  });

  it('rejects missing fields instead of defaulting them', () => {
    const { amount: _amount, ...rest } = valid;

    const error = decodeFailure(JSON.stringify(rest));

    expect(error.message).toBe('Invalid request: amount: Required');
  });

  it('rejects unknown fields', () => {
    const error = decodeFailure(JSON.stringify({ ...valid, leverage: 5 }));

    expect(error.message).toBe("Invalid request: Unrecognized key(s) in object: 'leverage'");
  });

  it('rejects non-positive amounts', () => {
    expect(decodeFailure(JSON.stringify({ ...valid, amount: 0 })).message).toMatch(
      /^Invalid request: amount: /
    );
    expect(decodeFailure(JSON.stringify({ ...valid, amount: -5 })).message).toMatch(
      /^Invalid request: amount: /
    );
  });

  it('rejects fractional priorities', () => {
    expect(decodeFailure(JSON.stringify({ ...valid, priority: 1.5 })).message).toMatch(
      /^Invalid request: priority: /
    );
  });

  it('rejects payloads that are not objects', () => {
    expect(decodeFailure('[1, 2, 3]').message).toMatch(/^Invalid request: /);
    expect(decodeFailure('').message).toMatch(/^Invalid request: malformed JSON/);
  });
});

describe('encodeResponse', () => {
  it('writes only the success fields', () => {
    const response: ArbitrageResponse = {
      status: 'success',
      profit: 2.85,
      execution_time: '3ms',
      gas_used: 20_000_000_000
    };

    expect(encodeResponse(response)).toBe(
      '{"status":"success","profit":2.85,"execution_time":"3ms","gas_used":20000000000}'
    );
  });

  it('writes only the error fields', () => {
    expect(
      encodeResponse({
        status: 'error',
        execution_time: '0ms',
        error_message: 'Unsupported exchange: kraken'
      })
    ).toBe('{"status":"error","execution_time":"0ms","error_message":"Unsupported exchange: kraken"}');
  });
});

describe('decodeResponse', () => {
  it('restores encoded responses', () => {
    const success: ArbitrageResponse = {
      status: 'success',
      profit: 1.5,
      execution_time: '12ms',
      gas_used: 7
    };
    const failure: ArbitrageResponse = {
      status: 'error',
      execution_time: '0ms',
      error_message: 'Arbitrage execution failed'
    };

    expect(decodeResponse(encodeResponse(success))).toEqual(success);
    expect(decodeResponse(encodeResponse(failure))).toEqual(failure);
  });

  it('accepts null placeholders for absent fields', () => {
    const text =
      '{"status":"error","profit":null,"execution_time":"0ms","gas_used":null,"error_message":"boom"}';

    expect(decodeResponse(text)).toEqual({
      status: 'error',
      execution_time: '0ms',
      error_message: 'boom'
    });
  });

  it('accepts a success without gas usage', () => {
    expect(decodeResponse('{"status":"success","profit":0,"execution_time":"1ms"}')).toEqual({
      status: 'success',
      profit: 0,
      execution_time: '1ms'
    });
  });

  it('rejects responses mixing profit and an error message', () => {
    expect(() =>
      decodeResponse('{"status":"success","profit":1,"execution_time":"1ms","error_message":"x"}')
    ).toThrow(/^Malformed response: /);
    expect(() =>
      decodeResponse('{"status":"error","profit":1,"execution_time":"0ms","error_message":"x"}')
    ).toThrow(/^Malformed response: /);
  });

  it('rejects unknown statuses', () => {
    expect(() => decodeResponse('{"status":"pending","execution_time":"0ms"}')).toThrow(
      /^Malformed response: /
    );
  });
});
