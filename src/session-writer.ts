/**
 * @fileoverview Line writer for the interpreter's stdin.
 *
 * GHCi treats `\r` as a line break inside the current command and `\n` as
 * the end of the command. A fragment's single line breaks therefore become
 * `\r`, a blank line between paragraphs becomes `\n`, and every send ends
 * with one `\n` terminator.
 *
 * @module session-writer
 */

import type { Writable } from 'node:stream';
import { WriteError, getErrorMessage } from './errors.js';

/**
 * `\n` → `\r`, then `\r\r` → `\n`.
 *
 * @example
 * ```typescript
 * normalizeNewlines('d1 $ sound "bd"\n  # speed 2');  // 'd1 $ sound "bd"\r  # speed 2'
 * normalizeNewlines('hush\n\nd1 $ silence');         // 'hush\nd1 $ silence'
 * ```
 */
export function normalizeNewlines(line: string): string {
  return line.replace(/\n/g, '\r').replace(/\r\r/g, '\n');
}

export class SessionWriter {
  private readonly stdin: Writable;
  private readonly onFault: (error: WriteError) => void;
  private readonly reported = new WeakSet<Error>();
  private readonly onStreamError = (err: Error): void => this.reportAsync(err);
  private _closed = false;

  constructor(stdin: Writable, onFault: (error: WriteError) => void) {
    this.stdin = stdin;
    this.onFault = onFault;
    // EPIPE and friends arrive as 'error' events; an unhandled one would crash the host
    this.stdin.on('error', this.onStreamError);
  }

  get isClosed(): boolean {
    return this._closed || !this.stdin.writable;
  }

  /**
   * Write one normalized command plus terminator.
   * Failures go to onFault; this method never throws.
   *
   * @returns Whether the write was handed to the stream
   */
  send(line: string): boolean {
    if (this.isClosed) {
      this.report(new Error('stdin is closed'));
      return false;
    }

    const payload = normalizeNewlines(line) + '\n';
    try {
      this.stdin.write(payload, (err) => {
        if (err) this.reportAsync(err);
      });
      return true;
    } catch (err) {
      this.report(err);
      return false;
    }
  }

  /**
   * End the stream. Safe to call repeatedly and on an already broken pipe.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    try {
      this.stdin.end();
    } catch (err) {
      console.warn('[SessionWriter] Failed to close stdin (may already be closed):', getErrorMessage(err));
    }
  }

  /**
   * Stream errors and write callbacks can land after close(), e.g. EPIPE
   * from a write still pending when the process was killed. Those are logged.
   */
  private reportAsync(err: Error): void {
    if (this._closed) {
      console.warn('[SessionWriter] Ignoring stdin error after close:', err.message);
      return;
    }
    this.report(err);
  }

  private report(err: unknown): void {
    if (err instanceof Error) {
      if (this.reported.has(err)) return;
      this.reported.add(err);
    }
    const error = err instanceof WriteError ? err : new WriteError(`Write to ghci failed: ${getErrorMessage(err)}`, err);
    try {
      this.onFault(error);
    } catch (handlerErr) {
      console.error('[SessionWriter] Fault handler threw:', handlerErr);
    }
  }
}
