import { z } from 'zod';
import { DecodeError, errorMessage } from '../core/errors.js';
import { ArbitrageRequest, ArbitrageResponse } from '../core/types.js';

const requestSchema = z
  .object({
    strategy_id: z.string(),
    symbol: z.string().min(1),
    primary_exchange: z.string().min(1),
    secondary_exchange: z.string().min(1),
    amount: z.number().positive().finite(),
    priority: z.number().int(),
    timestamp: z.string()
  })
  .strict();

const successSchema = z.object({
  status: z.literal('success'),
  profit: z.number().nonnegative(),
  execution_time: z.string(),
  gas_used: z.number().nonnegative().nullish(),
  error_message: z.null().optional()
});

const errorSchema = z.object({
  status: z.literal('error'),
  execution_time: z.string(),
  error_message: z.string(),
  profit: z.null().optional(),
  gas_used: z.null().optional()
});

const responseSchema = z.discriminatedUnion('status', [successSchema, errorSchema]);

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`malformed JSON (${errorMessage(error)})`);
  }
};

export const decodeRequest = (text: string): ArbitrageRequest => {
  const parsed = requestSchema.safeParse(parseJson(text));
  if (!parsed.success) {
    throw new DecodeError(describeIssues(parsed.error));
  }
  return parsed.data;
};

export const encodeRequest = (request: ArbitrageRequest): string =>
  JSON.stringify(request);

/** Absent optional fields are left out of the text rather than written as null. */
export const encodeResponse = (response: ArbitrageResponse): string => {
  if (response.status === 'success') {
    return JSON.stringify({
      status: response.status,
      profit: response.profit,
      execution_time: response.execution_time,
      gas_used: response.gas_used
    });
  }

  return JSON.stringify({
    status: response.status,
    execution_time: response.execution_time,
    error_message: response.error_message
  });
};

export const decodeResponse = (text: string): ArbitrageResponse => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Malformed response: ${errorMessage(error)}`);
  }

  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed response: ${describeIssues(parsed.error)}`);
  }

  const data = parsed.data;
  if (data.status === 'success') {
    return {
      status: 'success',
      profit: data.profit,
      execution_time: data.execution_time,
      ...(data.gas_used != null ? { gas_used: data.gas_used } : {})
    };
  }

  return {
    status: 'error',
    execution_time: data.execution_time,
    error_message: data.error_message
  };
};
