import { describe, it, expect, afterEach } from 'vitest';
import { App, createApp } from './app.js';
import { ArbitrageClient } from './client/arbitrageClient.js';
import { buildConfig } from './config.js';
import { EventBus } from './lib/eventBus.js';
import { fixedRandom } from './lib/random.js';

const request = {
  strategy_id: 'strategy-app',
  symbol: 'ETHUSDT',
  primary_exchange: 'okx',
  secondary_exchange: 'binance',
  amount: 10_000,
  priority: 0,
  timestamp: '2026-01-01T00:00:00Z'
};

describe('createApp', () => {
  let app: App | undefined;
  let client: ArbitrageClient | undefined;

  afterEach(async () => {
    await client?.close();
    await app?.stop();
    client = undefined;
    app = undefined;
  });

  const boot = async (executionDraw: number) => {
    const running = createApp(buildConfig({ ENGINE_PORT: '0', METRICS_INTERVAL_MS: '0' }), {
      rateRandom: fixedRandom(0),
      executionRandom: fixedRandom(executionDraw),
      bus: new EventBus()
    });
    app = running;
    const address = await running.start();

    const conn = new ArbitrageClient({ host: '127.0.0.1', port: address.port });
    client = conn;
    await conn.connect();
    return { app: running, client: conn };
  };

  it('serves requests against the configured exchanges', async () => {
    const { app: running, client: conn } = await boot(0);

    const response = await conn.send(request);

    // okx floor 0.0003 against binance floor 0.0001
    expect(response.status).toBe('success');
    if (response.status !== 'success') return;
    expect(response.profit).toBeCloseTo(10_000 * 0.0002 * 0.95, 9);
    expect(response.gas_used).toBe(20_000_000_000);
    expect(running.metrics.snapshot()).toMatchObject({
      requests: 1,
      successes: 1,
      rateLookups: 2,
      openConnections: 1
    });
  });

  it('reports simulated execution failures', async () => {
    const { client: conn } = await boot(0.95);

    await expect(conn.send(request)).resolves.toEqual({
      status: 'error',
      execution_time: '0ms',
      error_message: 'Arbitrage execution failed'
    });
  });

  it('rejects exchanges outside the registry', async () => {
    const { client: conn } = await boot(0);

    await expect(conn.send({ ...request, primary_exchange: 'kraken' })).resolves.toEqual({
      status: 'error',
      execution_time: '0ms',
      error_message: 'Unsupported exchange: kraken'
    });
  });
});
