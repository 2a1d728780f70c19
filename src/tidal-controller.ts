/**
 * @fileoverview Caller-facing operations: toggle, send, hush.
 *
 * The controller owns the SessionRegistry, builds every TidalSession with
 * its output wired to the Notifier, and turns failures into notifications
 * so no operation here throws or rejects.
 *
 * @module tidal-controller
 */

import { SessionRegistry } from './session-registry.js';
import { TidalSession, type SpawnProcess } from './tidal-session.js';
import { cleanMessage, type Notifier } from './notifier.js';
import { prepareFragment } from './fragment.js';
import type { TidalConfig, ToggleResult } from './types.js';

/** Command that silences every running pattern */
export const HUSH_COMMAND = 'hush';

export interface TidalControllerOptions {
  config: TidalConfig;
  notifier: Notifier;
  spawnProcess?: SpawnProcess;
}

export class TidalController {
  readonly registry: SessionRegistry;
  private readonly config: TidalConfig;
  private readonly notifier: Notifier;
  private readonly spawnProcess?: SpawnProcess;

  constructor(options: TidalControllerOptions) {
    this.config = options.config;
    this.notifier = options.notifier;
    this.spawnProcess = options.spawnProcess;
    this.registry = new SessionRegistry(() => this.createSession());
  }

  /**
   * Start Tidal if it is not running, stop it otherwise.
   *
   * @returns The transition, or null when starting failed (already notified)
   */
  async toggleSession(): Promise<ToggleResult | null> {
    try {
      const result = await this.registry.toggle();
      this.info(result === 'started' ? 'Started tidal' : 'Stopped tidal');
      return result;
    } catch (err) {
      this.notifier.onError(err instanceof Error ? err : new Error(String(err)));
      return null;
    }
  }

  /**
   * Send a fragment to the running session. Blank text, or no running
   * session, is a silent no-op.
   *
   * @returns Whether anything was written
   */
  sendText(rawText: string): boolean {
    const text = prepareFragment(rawText);
    if (text === null) return false;
    return this.registry.current()?.send(text) ?? false;
  }

  hush(): boolean {
    const sent = this.registry.current()?.send(HUSH_COMMAND) ?? false;
    this.info('Hushed 🤫');
    return sent;
  }

  isRunning(): boolean {
    return this.registry.current()?.isRunning() ?? false;
  }

  /** Stop the session for good (host shutdown) */
  shutdown(): Promise<void> {
    return this.registry.shutdown();
  }

  private createSession(): TidalSession {
    const session = new TidalSession({ config: this.config, spawnProcess: this.spawnProcess });
    session.on('stdout', (text: string) => this.info(text));
    session.on('stderr', (text: string) => this.warning(text));
    session.on('fault', (error: Error) => this.notifier.onError(error));
    session.on('exit', (info: { code: number | null; signal: NodeJS.Signals | null; expected: boolean }) => {
      if (!info.expected) {
        this.warning(`ghci exited (code ${info.code ?? 'none'}, signal ${info.signal ?? 'none'})`);
      }
    });
    return session;
  }

  private info(text: string): void {
    const message = cleanMessage(text, this.config.promptTokens);
    if (message) this.notifier.onInfo(message);
  }

  private warning(text: string): void {
    const message = cleanMessage(text, this.config.promptTokens);
    if (message) this.notifier.onWarning(message);
  }
}
