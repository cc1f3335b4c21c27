import { Socket } from 'node:net';
import { v4 as uuid } from 'uuid';
import { DecodeError, errorMessage } from '../core/errors.js';
import { ArbitrageRequest, ArbitrageResponse, ConnectionEvent } from '../core/types.js';
import { errorResponse } from '../execution/engine.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { decodeRequest, encodeResponse } from './codec.js';
import { Frame, MessageFramer } from './framing.js';

export interface RequestExecutor {
  execute(request: ArbitrageRequest): Promise<ArbitrageResponse>;
}

export type HandlerOptions = {
  /** 0 disables the idle timeout. Paused while requests are in flight. */
  idleTimeoutMs: number;
  /** Reading pauses once this many frames are waiting or running. */
  maxPendingFrames: number;
};

/**
 * Serves one connection. Frames are processed strictly in arrival order;
 * business failures become error responses and only transport problems,
 * peer shutdown or idleness close the socket.
 */
export class ConnectionHandler {
  readonly id = uuid();
  readonly remoteAddress: string;
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;
  private readonly done: Promise<void>;

  constructor(
    private readonly socket: Socket,
    private readonly framer: MessageFramer,
    private readonly executor: RequestExecutor,
    private readonly options: HandlerOptions,
    private readonly bus: EventBus = eventBus
  ) {
    this.remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.done = new Promise((resolve) => {
      socket.once('close', () => {
        this.closed = true;
        resolve();
        logger.info('Connection closed', { connectionId: this.id });
        this.bus.emit('connectionClosed', this.event());
      });
    });
  }

  /**
   * Attaches the socket listeners. The returned promise resolves when the
   * socket closes, for whatever reason; it never rejects. `close()` returns
   * the same promise.
   */
  start(): Promise<void> {
    logger.info('Connection opened', {
      connectionId: this.id,
      remoteAddress: this.remoteAddress
    });
    this.bus.emit('connectionOpened', this.event());

    this.armIdleTimer();

    this.socket.on('data', (chunk: Buffer) => {
      for (const frame of this.framer.push(chunk)) {
        this.enqueue(frame);
      }
    });

    this.socket.on('end', () => {
      logger.debug('Peer finished sending', { connectionId: this.id });
      this.queue = this.queue.then(() => {
        if (!this.closed) {
          this.socket.end();
        }
      });
    });

    this.socket.on('timeout', () => {
      logger.info('Connection idle, closing', {
        connectionId: this.id,
        idleTimeoutMs: this.options.idleTimeoutMs
      });
      this.socket.destroy();
    });

    this.socket.on('error', (error) => {
      logger.warn('Connection I/O error', {
        connectionId: this.id,
        error: error.message
      });
      this.socket.destroy();
    });

    return this.done;
  }

  /** Destroys the socket; resolves like `start()`. */
  close(): Promise<void> {
    this.socket.destroy();
    return this.done;
  }

  private enqueue(frame: Frame): void {
    this.pending += 1;
    if (this.pending === 1) {
      this.socket.setTimeout(0);
    }
    if (this.pending >= this.options.maxPendingFrames && !this.socket.isPaused()) {
      logger.debug('Backlog full, pausing reads', {
        connectionId: this.id,
        pending: this.pending
      });
      this.socket.pause();
    }

    this.queue = this.queue
      .then(() => this.process(frame))
      .finally(() => this.settle());
  }

  private settle(): void {
    this.pending -= 1;
    if (this.closed) {
      return;
    }
    if (this.pending < this.options.maxPendingFrames && this.socket.isPaused()) {
      this.socket.resume();
    }
    if (this.pending === 0) {
      this.armIdleTimer();
    }
  }

  private armIdleTimer(): void {
    if (this.options.idleTimeoutMs > 0) {
      this.socket.setTimeout(this.options.idleTimeoutMs);
    }
  }

  private async process(frame: Frame): Promise<void> {
    if (this.closed) {
      return;
    }

    const response = await this.respond(frame);
    if (this.closed) {
      return;
    }

    try {
      await this.write(encodeResponse(response) + this.framer.delimiter);
    } catch (error) {
      logger.warn('Failed to write response', {
        connectionId: this.id,
        error: errorMessage(error)
      });
      this.socket.destroy();
    }
  }

  private async respond(frame: Frame): Promise<ArbitrageResponse> {
    if (frame.kind === 'oversized') {
      const error = new DecodeError(`frame exceeds ${frame.limit} bytes`);
      logger.warn('Oversized frame dropped', { connectionId: this.id, limit: frame.limit });
      return errorResponse(error.message);
    }

    let request: ArbitrageRequest;
    try {
      request = decodeRequest(frame.text);
    } catch (error) {
      logger.warn('Failed to decode request', {
        connectionId: this.id,
        error: errorMessage(error)
      });
      return errorResponse(errorMessage(error));
    }

    try {
      return await this.executor.execute(request);
    } catch (error) {
      logger.error('Executor rejected', {
        connectionId: this.id,
        strategyId: request.strategy_id,
        error: errorMessage(error)
      });
      return errorResponse(errorMessage(error));
    }
  }

  private write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private event(): ConnectionEvent {
    return {
      connectionId: this.id,
      remoteAddress: this.remoteAddress,
      timestamp: Date.now()
    };
  }
}
