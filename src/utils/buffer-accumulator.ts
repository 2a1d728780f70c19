/**
 * @fileoverview Bounded string accumulator for stream output.
 *
 * Chunks are pushed to an array and joined only when drained. When the
 * total exceeds `maxSize` the oldest text is dropped, keeping the most
 * recent `trimSize` characters.
 *
 * @module utils/buffer-accumulator
 */

import type { BufferConfig } from '../types.js';

/**
 * @example
 * ```typescript
 * const buffer = new BufferAccumulator({ maxSize: 1024, trimSize: 768 });
 * buffer.append('Loading ');
 * buffer.append('package base ... ');
 * buffer.drain();  // 'Loading package base ... '
 * buffer.drain();  // ''
 * ```
 */
export class BufferAccumulator {
  private chunks: string[] = [];
  private totalLength = 0;
  private readonly maxSize: number;
  private readonly trimSize: number;
  private readonly onTrim?: (trimmedChars: number) => void;

  constructor(config: BufferConfig) {
    if (config.trimSize > config.maxSize) {
      throw new RangeError(`trimSize (${config.trimSize}) must not exceed maxSize (${config.maxSize})`);
    }
    this.maxSize = config.maxSize;
    this.trimSize = config.trimSize;
    this.onTrim = config.onTrim;
  }

  append(data: string): void {
    if (!data) return;
    this.chunks.push(data);
    this.totalLength += data.length;

    if (this.totalLength > this.maxSize) {
      this.trim();
    }
  }

  /** Full content without consuming it */
  get value(): string {
    if (this.chunks.length === 0) return '';
    if (this.chunks.length === 1) return this.chunks[0];

    const result = this.chunks.join('');
    this.chunks = [result];
    return result;
  }

  /**
   * Return everything buffered and empty the buffer.
   */
  drain(): string {
    const result = this.value;
    this.clear();
    return result;
  }

  clear(): void {
    this.chunks = [];
    this.totalLength = 0;
  }

  private trim(): void {
    const full = this.chunks.join('');
    const trimmed = full.slice(-this.trimSize);
    const trimmedChars = full.length - trimmed.length;
    this.chunks = trimmed ? [trimmed] : [];
    this.totalLength = trimmed.length;

    if (this.onTrim && trimmedChars > 0) {
      this.onTrim(trimmedChars);
    }
  }
}
