/**
 * @fileoverview Resource cleanup tracker.
 *
 * Tracks intervals and listeners owned by one component and
 * releases all of them from a single dispose() call, continuing past
 * individual cleanup failures.
 *
 * @module utils/cleanup-manager
 */

import type { Disposable, CleanupRegistration, CleanupResourceType } from '../types.js';

export interface TimerOptions {
  /** Human-readable description for debugging */
  description?: string;
}

/**
 * @example
 * ```typescript
 * const cleanup = new CleanupManager();
 * cleanup.setInterval(() => poll(), 200, { description: 'output poll' });
 * cleanup.registerListener(stream, 'data', onData, 'stdout data');
 * cleanup.dispose();  // clears the interval and removes the listener
 * ```
 */
export class CleanupManager implements Disposable {
  private registrations: CleanupRegistration[] = [];
  private _isDisposed = false;
  private readonly debugMode: boolean;

  constructor(debug = false) {
    this.debugMode = debug;
  }

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  /**
   * Schedule an interval that is cleared on dispose.
   * The callback does not fire once the manager is disposed.
   */
  setInterval(callback: () => void, delay: number, options?: TimerOptions): void {
    const intervalId = setInterval(() => {
      if (this._isDisposed) return;
      callback();
    }, delay);

    this.register({
      type: 'interval',
      description: options?.description || `setInterval(${delay}ms)`,
      cleanup: () => clearInterval(intervalId),
    });
  }

  registerCleanup(type: CleanupResourceType, cleanup: () => void, description: string): void {
    this.register({ type, description, cleanup });
  }

  /**
   * Attach a listener now and detach it on dispose.
   */
  registerListener<A extends unknown[]>(
    emitter: {
      on(event: string, listener: (...args: A) => void): unknown;
      off(event: string, listener: (...args: A) => void): unknown;
    },
    event: string,
    listener: (...args: A) => void,
    description: string
  ): void {
    emitter.on(event, listener);
    this.registerCleanup('listener', () => emitter.off(event, listener), description);
  }

  /**
   * Release everything. Idempotent.
   */
  dispose(): void {
    if (this._isDisposed) return;
    this._isDisposed = true;

    const failed: string[] = [];

    for (const reg of this.registrations) {
      try {
        reg.cleanup();
        this.debug(`Cleaned up ${reg.type}: ${reg.description}`);
      } catch (err) {
        failed.push(reg.description);
        this.debug(`Error cleaning up ${reg.type} "${reg.description}": ${err}`);
      }
    }

    this.registrations = [];

    if (failed.length > 0) {
      console.error(`[CleanupManager] ${failed.length} errors during disposal:`, failed.join(', '));
    }
  }

  private register(reg: CleanupRegistration): void {
    if (this._isDisposed) {
      // Late registration after dispose: release immediately
      reg.cleanup();
      return;
    }
    this.registrations.push(reg);
    this.debug(`Registered ${reg.type}: ${reg.description}`);
  }

  private debug(message: string): void {
    if (this.debugMode) {
      console.log(`[CleanupManager] ${message}`);
    }
  }
}
