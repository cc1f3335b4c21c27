import { AddressInfo } from 'node:net';
import { AppConfig } from './config.js';
import { SimulatedConnector } from './exchanges/simulatedConnector.js';
import { ArbitrageEngine } from './execution/engine.js';
import { createGasOptimizer } from './execution/gasOptimizer.js';
import { RateRouter } from './feeds/rateRouter.js';
import { EventBus, eventBus } from './lib/eventBus.js';
import { logger } from './lib/logger.js';
import { mathRandom, RandomSource } from './lib/random.js';
import { MetricsTracker } from './monitoring/metrics.js';
import { ConnectionServer } from './server/connectionServer.js';
import { FundingSpreadStrategy } from './strategy/fundingSpread.js';

export type AppDeps = {
  /** Feeds the simulated rates. */
  rateRandom?: RandomSource;
  /** Decides simulated execution outcomes. */
  executionRandom?: RandomSource;
  bus?: EventBus;
};

export type App = {
  router: RateRouter;
  engine: ArbitrageEngine;
  server: ConnectionServer;
  metrics: MetricsTracker;
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
};

export const createApp = (cfg: AppConfig, deps: AppDeps = {}): App => {
  const bus = deps.bus ?? eventBus;
  const router = new RateRouter();

  for (const exchange of Object.values(cfg.exchanges)) {
    router.registerConnector(
      new SimulatedConnector(exchange, deps.rateRandom ?? mathRandom)
    );
  }
  router.on('rate', (observation) => bus.emit('rate', observation));

  const engine = new ArbitrageEngine(
    router,
    new FundingSpreadStrategy(cfg.strategy, deps.executionRandom ?? mathRandom),
    createGasOptimizer(cfg.gas),
    { requestTimeoutMs: cfg.server.requestTimeoutMs },
    bus
  );
  const server = new ConnectionServer(engine, cfg.server, bus);
  const metrics = new MetricsTracker(cfg.metricsIntervalMs, bus);

  return {
    router,
    engine,
    server,
    metrics,
    async start() {
      await Promise.all(router.registered.map((connector) => connector.start()));
      metrics.start();
      const address = await server.start();

      logger.info('Arbitrage execution engine running', {
        exchanges: router.exchangeIds,
        flashLoanProviders: cfg.flashLoanProviders,
        gasPrice: cfg.gas.currentGasPrice,
        gasLimit: cfg.gas.maxGasLimit
      });

      return address;
    },
    async stop() {
      await server.stop();
      metrics.stop();
      await Promise.all(router.registered.map((connector) => connector.stop()));
    }
  };
};
