import { ExecutionReport, MetricsSnapshot } from '../core/types.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';

interface Counters {
  requests: number;
  successes: number;
  failures: number;
  profit: number;
  rateLookups: number;
  openConnections: number;
}

export class MetricsTracker {
  private readonly counters: Counters = {
    requests: 0,
    successes: 0,
    failures: 0,
    profit: 0,
    rateLookups: 0,
    openConnections: 0
  };

  private timer?: NodeJS.Timeout;

  private readonly onExecution = (report: ExecutionReport) => {
    this.counters.requests += 1;
    if (report.success) {
      this.counters.successes += 1;
      this.counters.profit += report.profit ?? 0;
    } else {
      this.counters.failures += 1;
    }
  };

  private readonly onRate = () => {
    this.counters.rateLookups += 1;
  };

  private readonly onOpened = () => {
    this.counters.openConnections += 1;
  };

  private readonly onClosed = () => {
    this.counters.openConnections = Math.max(0, this.counters.openConnections - 1);
  };

  constructor(
    private readonly intervalMs: number,
    private readonly bus: EventBus = eventBus
  ) {}

  start(): void {
    this.bus.on('execution', this.onExecution);
    this.bus.on('rate', this.onRate);
    this.bus.on('connectionOpened', this.onOpened);
    this.bus.on('connectionClosed', this.onClosed);

    if (this.intervalMs > 0) {
      this.timer = setInterval(() => this.flush(), this.intervalMs);
      this.timer.unref();
    }
  }

  stop(): void {
    this.bus.off('execution', this.onExecution);
    this.bus.off('rate', this.onRate);
    this.bus.off('connectionOpened', this.onOpened);
    this.bus.off('connectionClosed', this.onClosed);

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counters, timestamp: Date.now() };
  }

  flush(): void {
    const snapshot = this.snapshot();
    logger.info('Metrics snapshot', { ...snapshot });
    this.bus.emit('metrics', snapshot);
  }
}
