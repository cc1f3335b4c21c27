import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const exchangeSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().optional().default(''),
  apiSecret: z.string().optional().default(''),
  rateFloor: z.number().finite(),
  rateSpread: z.number().nonnegative()
});

const strategySchema = z.object({
  threshold: z.number().nonnegative(),
  successProbability: z.number().min(0).max(1),
  efficiencyFactor: z.number().min(0).max(1),
  executionLatencyMs: z.number().nonnegative()
});

const serverSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65_535),
  framing: z.enum(['line', 'chunk']),
  maxFrameBytes: z.number().int().positive(),
  maxConnections: z.number().int().nonnegative(),
  maxPendingFrames: z.number().int().positive(),
  idleTimeoutMs: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().nonnegative()
});

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  server: serverSchema,
  exchanges: z
    .record(exchangeSchema)
    .refine((registry) => Object.keys(registry).length > 0, {
      message: 'At least one exchange must be configured'
    }),
  flashLoanProviders: z.array(z.string().min(1)),
  gas: z.object({
    currentGasPrice: z.number().int().nonnegative(),
    maxGasLimit: z.number().int().positive()
  }),
  strategy: strategySchema,
  metricsIntervalMs: z.number().int().nonnegative()
});

export type AppConfig = z.infer<typeof configSchema>;
export type ExchangeConfig = AppConfig['exchanges'][string];
export type StrategyConfig = AppConfig['strategy'];
export type ServerConfig = AppConfig['server'];
export type GasConfig = AppConfig['gas'];

type Env = Record<string, string | undefined>;

const EXCHANGE_DEFAULTS: Record<string, { baseUrl: string; rateFloor: number }> = {
  binance: { baseUrl: 'https://fapi.binance.com', rateFloor: 0.0001 },
  bybit: { baseUrl: 'https://api.bybit.com', rateFloor: 0.0002 },
  okx: { baseUrl: 'https://www.okx.com', rateFloor: 0.0003 }
};

const list = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const rawExchange = (id: string, env: Env) => {
  const prefix = id.toUpperCase().replace(/[^A-Z0-9]/g, '_');
  const defaults = EXCHANGE_DEFAULTS[id];

  return {
    name: id,
    baseUrl: env[`${prefix}_BASE_URL`] ?? defaults?.baseUrl,
    apiKey: env[`${prefix}_API_KEY`],
    apiSecret: env[`${prefix}_API_SECRET`],
    rateFloor: Number(env[`${prefix}_RATE_FLOOR`] ?? defaults?.rateFloor ?? 0.0001),
    rateSpread: Number(env[`${prefix}_RATE_SPREAD`] ?? 0.0002)
  };
};

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

export const buildConfig = (env: Env): AppConfig => {
  const exchangeIds = list(env.EXCHANGES ?? 'binance,bybit,okx');

  const rawConfig = {
    env: env.NODE_ENV,
    server: {
      host: env.ENGINE_HOST ?? '127.0.0.1',
      port: Number(env.ENGINE_PORT ?? 8080),
      framing: env.ENGINE_FRAMING ?? 'line',
      maxFrameBytes: Number(env.ENGINE_MAX_FRAME_BYTES ?? 65_536),
      maxConnections: Number(env.ENGINE_MAX_CONNECTIONS ?? 0),
      maxPendingFrames: Number(env.ENGINE_MAX_PENDING_FRAMES ?? 32),
      idleTimeoutMs: Number(env.ENGINE_IDLE_TIMEOUT_MS ?? 300_000),
      requestTimeoutMs: Number(env.ENGINE_REQUEST_TIMEOUT_MS ?? 30_000)
    },
    exchanges: Object.fromEntries(
      exchangeIds.map((id) => [id, rawExchange(id, env)])
    ),
    flashLoanProviders: list(env.FLASH_LOAN_PROVIDERS ?? 'aave,dydx,compound'),
    gas: {
      // 20 gwei
      currentGasPrice: Number(env.GAS_PRICE_WEI ?? 20_000_000_000),
      maxGasLimit: Number(env.GAS_LIMIT ?? 5_000_000)
    },
    strategy: {
      threshold: Number(env.STRATEGY_THRESHOLD ?? 0.0001),
      successProbability: Number(env.STRATEGY_SUCCESS_PROBABILITY ?? 0.9),
      efficiencyFactor: Number(env.STRATEGY_EFFICIENCY_FACTOR ?? 0.95),
      executionLatencyMs: Number(env.STRATEGY_LATENCY_MS ?? 0)
    },
    metricsIntervalMs: Number(env.METRICS_INTERVAL_MS ?? 10_000)
  };

  const parsed = configSchema.safeParse(rawConfig);

  if (!parsed.success) {
    console.error('Invalid configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Configuration validation failed');
  }

  return deepFreeze(parsed.data);
};

export const config: AppConfig = buildConfig(process.env);
