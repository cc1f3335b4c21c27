export type Frame =
  | { kind: 'message'; text: string }
  | { kind: 'oversized'; limit: number };

export type FramingMode = 'line' | 'chunk';

export interface MessageFramer {
  /** Appended to every outbound message. */
  readonly delimiter: string;
  push(chunk: Buffer): Frame[];
}

const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

/**
 * Newline-delimited messages. Handles several messages per read and
 * messages split across reads; blank lines are skipped. A message longer
 * than `maxFrameBytes` is reported once and dropped up to its newline.
 */
export class LineFramer implements MessageFramer {
  readonly delimiter = '\n';
  private buffer: Buffer = EMPTY;
  private discarding = false;

  constructor(private readonly maxFrameBytes: number) {}

  push(chunk: Buffer): Frame[] {
    const frames: Frame[] = [];
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk;

    let newline = this.buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      const line = this.buffer.subarray(0, newline);
      this.buffer = this.buffer.subarray(newline + 1);
      newline = this.buffer.indexOf(NEWLINE);

      if (this.discarding) {
        this.discarding = false;
        continue;
      }

      if (line.length > this.maxFrameBytes) {
        frames.push({ kind: 'oversized', limit: this.maxFrameBytes });
        continue;
      }

      const text = line.toString('utf8').replace(/\r$/, '');
      if (text.trim().length > 0) {
        frames.push({ kind: 'message', text });
      }
    }

    if (this.discarding) {
      this.buffer = EMPTY;
    } else if (this.buffer.length > this.maxFrameBytes) {
      frames.push({ kind: 'oversized', limit: this.maxFrameBytes });
      this.discarding = true;
      this.buffer = EMPTY;
    }

    return frames;
  }
}

/** Legacy mode: every read is one whole message, replies carry no delimiter. */
export class ChunkFramer implements MessageFramer {
  readonly delimiter = '';

  constructor(private readonly maxFrameBytes: number) {}

  push(chunk: Buffer): Frame[] {
    if (chunk.length > this.maxFrameBytes) {
      return [{ kind: 'oversized', limit: this.maxFrameBytes }];
    }
    return [{ kind: 'message', text: chunk.toString('utf8') }];
  }
}

export const createFramer = (mode: FramingMode, maxFrameBytes: number): MessageFramer =>
  mode === 'line' ? new LineFramer(maxFrameBytes) : new ChunkFramer(maxFrameBytes);
