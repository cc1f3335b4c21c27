#!/usr/bin/env node
import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import { v4 as uuid } from 'uuid';
import { ArbitrageClient } from '../client/arbitrageClient.js';
import { errorMessage } from '../core/errors.js';
import { ArbitrageRequest } from '../core/types.js';

dotenv.config();

const { values } = parseArgs({
  options: {
    host: { type: 'string' },
    port: { type: 'string' },
    framing: { type: 'string' },
    symbol: { type: 'string' },
    primary: { type: 'string' },
    secondary: { type: 'string' },
    amount: { type: 'string' },
    priority: { type: 'string' },
    'strategy-id': { type: 'string' }
  }
});

const framing =
  (values.framing ?? process.env.ENGINE_FRAMING) === 'chunk' ? 'chunk' : 'line';

const request: ArbitrageRequest = {
  strategy_id: values['strategy-id'] ?? uuid(),
  symbol: values.symbol ?? 'BTCUSDT',
  primary_exchange: values.primary ?? 'binance',
  secondary_exchange: values.secondary ?? 'bybit',
  amount: Number(values.amount ?? 10_000),
  priority: Number(values.priority ?? 1),
  timestamp: new Date().toISOString()
};

const client = new ArbitrageClient({
  host: values.host ?? process.env.ENGINE_HOST ?? '127.0.0.1',
  port: Number(values.port ?? process.env.ENGINE_PORT ?? 8080),
  framing
});

async function main(): Promise<void> {
  await client.connect();
  try {
    const response = await client.send(request);
    console.log(JSON.stringify({ request, response }, null, 2));
    process.exitCode = response.status === 'success' ? 0 : 2;
  } finally {
    await client.close();
  }
}

main().catch((error) => {
  console.error('Request failed:', errorMessage(error));
  process.exit(1);
});
