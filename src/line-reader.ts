/**
 * @fileoverview Non-blocking reader over a child process output stream.
 *
 * The stream runs in flowing mode and every decoded chunk is appended to a
 * bounded buffer. poll() hands back whatever has arrived since the previous
 * poll and returns immediately, with '' when nothing is ready.
 *
 * @module line-reader
 */

import type { Readable } from 'node:stream';
import { BufferAccumulator } from './utils/buffer-accumulator.js';
import { CleanupManager } from './utils/cleanup-manager.js';
import { MAX_STREAM_BUFFER_SIZE, TRIM_STREAM_BUFFER_TO } from './config/session-timing.js';
import type { Disposable } from './types.js';

export interface LineReaderOptions {
  /** Label used in log lines (e.g. 'stdout') */
  name?: string;
  maxBufferSize?: number;
  trimBufferTo?: number;
}

export class LineReader implements Disposable {
  readonly name: string;
  private readonly buffer: BufferAccumulator;
  private readonly cleanup = new CleanupManager();
  private readonly stream: Readable;
  private streamError: Error | null = null;
  private _ended = false;

  constructor(stream: Readable, options: LineReaderOptions = {}) {
    this.name = options.name ?? 'stream';
    this.stream = stream;
    this.buffer = new BufferAccumulator({
      maxSize: options.maxBufferSize ?? MAX_STREAM_BUFFER_SIZE,
      trimSize: options.trimBufferTo ?? TRIM_STREAM_BUFFER_TO,
      onTrim: (chars) => console.warn(`[LineReader ${this.name}] Dropped ${chars} unread chars`),
    });

    stream.setEncoding('utf8');
    this.cleanup.registerListener(stream, 'data', (chunk: string) => this.buffer.append(chunk), `${this.name} data`);
    this.cleanup.registerListener(stream, 'end', () => { this._ended = true; }, `${this.name} end`);
    this.cleanup.registerListener(stream, 'error', (err: Error) => { this.streamError = err; }, `${this.name} error`);
  }

  /**
   * Take all buffered text.
   *
   * @throws The stream's error, once, if the stream failed since the last poll
   */
  poll(): string {
    if (this.streamError) {
      const err = this.streamError;
      this.streamError = null;
      throw err;
    }
    return this.buffer.drain();
  }

  /** True once the stream signalled end of data */
  get ended(): boolean {
    return this._ended;
  }

  get isDisposed(): boolean {
    return this.cleanup.isDisposed;
  }

  dispose(): void {
    if (this.cleanup.isDisposed) return;
    this.cleanup.dispose();
    this.buffer.clear();
    // The pipe can still fail while the killed process is torn down
    this.stream.on('error', (err: Error) => {
      console.warn(`[LineReader ${this.name}] Error after dispose:`, err.message);
    });
  }
}
