import net, { Socket } from 'node:net';
import { errorMessage } from '../core/errors.js';
import { ArbitrageRequest, ArbitrageResponse } from '../core/types.js';
import { logger } from '../lib/logger.js';
import { decodeResponse, encodeRequest } from '../server/codec.js';
import { createFramer, FramingMode, MessageFramer } from '../server/framing.js';

export type ClientOptions = {
  host: string;
  port: number;
  framing?: FramingMode;
  maxFrameBytes?: number;
  /** Per request; the connection is dropped when it expires. */
  timeoutMs?: number;
};

type Pending = {
  resolve: (response: ArbitrageResponse) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
};

/**
 * Talks to the execution server over one TCP connection. Responses arrive
 * in request order, so pending calls are settled first in, first out.
 */
export class ArbitrageClient {
  private socket?: Socket;
  private readonly framer: MessageFramer;
  private readonly pending: Pending[] = [];

  constructor(private readonly options: ClientOptions) {
    this.framer = createFramer(options.framing ?? 'line', options.maxFrameBytes ?? 65_536);
  }

  async connect(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = await new Promise<Socket>((resolve, reject) => {
      const conn = net.createConnection({ host: this.options.host, port: this.options.port });
      conn.once('connect', () => {
        conn.off('error', reject);
        resolve(conn);
      });
      conn.once('error', reject);
    });

    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error) => {
      logger.warn('Client connection error', { error: error.message });
      this.failAll(error);
    });
    socket.on('close', () => {
      this.socket = undefined;
      this.failAll(new Error('Connection closed'));
    });

    this.socket = socket;
  }

  send(request: ArbitrageRequest): Promise<ArbitrageResponse> {
    return this.sendRaw(encodeRequest(request));
  }

  /** Sends `text` as one message, whatever it contains. */
  sendRaw(text: string): Promise<ArbitrageResponse> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error('Client is not connected'));
    }

    return new Promise<ArbitrageResponse>((resolve, reject) => {
      const entry: Pending = { resolve, reject };
      const timeoutMs = this.options.timeoutMs ?? 30_000;

      if (timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          const error = new Error(`No response within ${timeoutMs}ms`);
          this.failAll(error);
          socket.destroy();
        }, timeoutMs);
      }

      this.pending.push(entry);
      socket.write(text + this.framer.delimiter);
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  private onData(chunk: Buffer): void {
    for (const frame of this.framer.push(chunk)) {
      const entry = this.pending.shift();
      if (!entry) {
        logger.warn('Unsolicited response dropped');
        continue;
      }
      clearTimeout(entry.timer);

      if (frame.kind === 'oversized') {
        entry.reject(new Error(`Response exceeds ${frame.limit} bytes`));
        continue;
      }

      try {
        entry.resolve(decodeResponse(frame.text));
      } catch (error) {
        entry.reject(new Error(errorMessage(error)));
      }
    }
  }

  private failAll(error: Error): void {
    for (const entry of this.pending.splice(0)) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
  }
}
