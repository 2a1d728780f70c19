/**
 * @fileoverview Process-wide holder of the single active TidalSession.
 *
 * Every toggle runs inside one promise chain, so a second toggle issued
 * while the first is still spawning waits for it and then sees the session
 * the first one produced. At most one live ghci exists at any time.
 *
 * @module session-registry
 */

import { TidalSession } from './tidal-session.js';
import { getErrorMessage } from './errors.js';
import type { ToggleResult } from './types.js';

export type SessionFactory = () => TidalSession;

export class SessionRegistry {
  private readonly createSession: SessionFactory;
  private active: TidalSession | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(createSession: SessionFactory) {
    this.createSession = createSession;
  }

  /**
   * Stop the running session, or start a new one when none is running.
   *
   * @returns 'stopped' or 'started'
   * @throws The start error (SpawnError, BootstrapReadError); the slot is left empty
   */
  toggle(): Promise<ToggleResult> {
    return this.serialize(async () => {
      const current = this.active;
      if (current?.isRunning()) {
        current.stop();
        this.active = null;
        return 'stopped';
      }

      if (current) {
        // Process died on its own; release the stale handle first
        console.log(`[SessionRegistry] Releasing dead session ${current.id}`);
        current.stop();
        this.active = null;
      }

      const session = this.createSession();
      try {
        await session.start();
      } catch (err) {
        console.error('[SessionRegistry] Failed to start session:', getErrorMessage(err));
        session.stop();
        throw err;
      }
      this.active = session;
      return 'started';
    });
  }

  /** The active session, if any. No lifecycle side effects. */
  current(): TidalSession | null {
    return this.active;
  }

  /**
   * Stop whatever is active. Waits for an in-flight toggle first.
   */
  shutdown(): Promise<void> {
    return this.serialize(async () => {
      this.active?.stop();
      this.active = null;
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the chain alive past a failed task; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }
}
