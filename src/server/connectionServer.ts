import net, { AddressInfo, Server, Socket } from 'node:net';
import { ServerConfig } from '../config.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { ConnectionHandler, RequestExecutor } from './connectionHandler.js';
import { createFramer } from './framing.js';

export type ServerOptions = Pick<
  ServerConfig,
  | 'host'
  | 'port'
  | 'framing'
  | 'maxFrameBytes'
  | 'maxConnections'
  | 'maxPendingFrames'
  | 'idleTimeoutMs'
>;

/**
 * Accepts connections until stopped and gives each one its own handler.
 * A failing connection never affects the listener or its siblings.
 */
export class ConnectionServer {
  private server?: Server;
  private readonly handlers = new Set<ConnectionHandler>();

  constructor(
    private readonly executor: RequestExecutor,
    private readonly options: ServerOptions,
    private readonly bus: EventBus = eventBus
  ) {}

  get connectionCount(): number {
    return this.handlers.size;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Server already started');
    }

    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.accept(socket);
    });

    if (this.options.maxConnections > 0) {
      server.maxConnections = this.options.maxConnections;
    }

    server.on('drop', (dropped) => {
      logger.warn('Connection refused, limit reached', {
        remoteAddress: dropped?.remoteAddress,
        maxConnections: this.options.maxConnections
      });
    });

    server.on('error', (error) => {
      logger.error('Listener error', { error: error.message });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    this.server = server;
    const address = this.address();
    logger.info('Execution server listening', {
      host: address.address,
      port: address.port,
      framing: this.options.framing
    });

    return address;
  }

  address(): AddressInfo {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP address');
    }
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });

    await Promise.all([...this.handlers].map((handler) => handler.close()));
    await closed;
    logger.info('Execution server stopped');
  }

  private accept(socket: Socket): void {
    const handler = new ConnectionHandler(
      socket,
      createFramer(this.options.framing, this.options.maxFrameBytes),
      this.executor,
      {
        idleTimeoutMs: this.options.idleTimeoutMs,
        maxPendingFrames: this.options.maxPendingFrames
      },
      this.bus
    );

    this.handlers.add(handler);
    // start() settles when the socket closes
    void handler.start().then(() => {
      this.handlers.delete(handler);
    });
  }
}
