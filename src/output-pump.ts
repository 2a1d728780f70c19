/**
 * @fileoverview Background drain of interpreter stdout/stderr.
 *
 * On a fixed interval the pump checks the process is alive, then polls
 * stdout and stderr and forwards each non-empty batch to its handler.
 * Within a stream, batches arrive in the order the process produced them.
 *
 * The pump stops for good when the process dies, when stop() is called, or
 * on the first exception thrown while polling or inside a handler. That
 * exception is reported to onFault exactly once and never escapes the timer.
 *
 * @module output-pump
 */

import { CleanupManager } from './utils/cleanup-manager.js';
import { OUTPUT_POLL_INTERVAL_MS } from './config/session-timing.js';
import { PumpFaultError, getErrorMessage } from './errors.js';

/** What the pump drains */
export interface PumpSource {
  isAlive(): boolean;
  stdout: { poll(): string };
  stderr: { poll(): string };
}

export interface PumpHandlers {
  onStdout: (text: string) => void;
  onStderr: (text: string) => void;
  onFault: (error: PumpFaultError) => void;
}

export interface OutputPumpOptions {
  intervalMs?: number;
  /** Label used in log lines */
  name?: string;
}

export class OutputPump {
  private readonly source: PumpSource;
  private readonly handlers: PumpHandlers;
  private readonly intervalMs: number;
  private readonly name: string;
  private cleanup: CleanupManager | null = null;
  private _hasRun = false;

  constructor(source: PumpSource, handlers: PumpHandlers, options: OutputPumpOptions = {}) {
    this.source = source;
    this.handlers = handlers;
    this.intervalMs = options.intervalMs ?? OUTPUT_POLL_INTERVAL_MS;
    this.name = options.name ?? 'OutputPump';
  }

  /**
   * Start polling. A pump runs at most once; later calls are ignored.
   */
  run(): void {
    if (this._hasRun) return;
    this._hasRun = true;

    this.cleanup = new CleanupManager();
    this.cleanup.setInterval(() => this.cycle(), this.intervalMs, {
      description: `${this.name} poll`,
    });
  }

  /** Whether the poll timer is still scheduled */
  get isActive(): boolean {
    return this.cleanup !== null && !this.cleanup.isDisposed;
  }

  stop(): void {
    this.cleanup?.dispose();
  }

  private cycle(): void {
    try {
      if (!this.source.isAlive()) {
        this.stop();
        return;
      }

      const stdout = this.source.stdout.poll();
      if (stdout) this.handlers.onStdout(stdout);

      const stderr = this.source.stderr.poll();
      if (stderr) this.handlers.onStderr(stderr);
    } catch (err) {
      this.stop();
      this.reportFault(err);
    }
  }

  private reportFault(err: unknown): void {
    console.error(`[${this.name}] Poll failed:`, getErrorMessage(err));
    try {
      this.handlers.onFault(new PumpFaultError(err));
    } catch (handlerErr) {
      console.error(`[${this.name}] Fault handler threw:`, handlerErr);
    }
  }
}
