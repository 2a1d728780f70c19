/**
 * @fileoverview Command-line front end.
 *
 * Reads the terminal line by line. Lines collect into a block and an empty
 * line sends the block as one fragment, the way an editor sends the
 * paragraph under the caret. `:toggle`, `:hush` and `:quit` control the
 * session.
 *
 * @module cli
 */

import { createInterface } from 'node:readline';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/index.js';
import { ConsoleNotifier } from './notifier.js';
import { TidalController } from './tidal-controller.js';
import { getErrorMessage } from './errors.js';

export interface CliOptions {
  ghci?: string;
  boot?: string;
  interval?: number;
  autostart: boolean;
}

/** Commands recognised at the start of an input line */
export type CliCommand = 'toggle' | 'hush' | 'quit';

/**
 * Collects typed lines into fragments.
 */
export class BlockCollector {
  private lines: string[] = [];

  /**
   * Feed one input line.
   *
   * @returns A command, a completed block, or null while the block is still open
   */
  push(line: string): { command: CliCommand } | { block: string } | null {
    const trimmed = line.trim();
    if (this.lines.length === 0 && trimmed.startsWith(':')) {
      const command = parseCommand(trimmed);
      if (command) return { command };
    }
    if (trimmed === '') {
      return this.flush();
    }
    this.lines.push(line);
    return null;
  }

  /** Close the open block, if any */
  flush(): { block: string } | null {
    if (this.lines.length === 0) return null;
    const block = this.lines.join('\n');
    this.lines = [];
    return { block };
  }
}

export function parseCommand(input: string): CliCommand | null {
  switch (input) {
    case ':toggle':
    case ':t':
      return 'toggle';
    case ':hush':
    case ':h':
      return 'hush';
    case ':quit':
    case ':q':
      return 'quit';
    default:
      return null;
  }
}

export function parseInterval(value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Interval must be a positive integer (ms).');
  }
  return parsed;
}

/** Signals that stop ghci before the relay exits, with the exit code used for each */
const SHUTDOWN_SIGNALS = { SIGINT: 130, SIGTERM: 143 } as const;

type ShutdownSignal = keyof typeof SHUTDOWN_SIGNALS;

export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

/**
 * On SIGINT or SIGTERM, run `shutdown` and then exit, even if shutdown fails.
 *
 * @returns A function that removes the handlers again
 */
export function handleShutdownSignals(
  shutdown: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code),
  source: SignalSource = process
): () => void {
  const signals: ShutdownSignal[] = ['SIGINT', 'SIGTERM'];
  const handlers = signals.map((signal) => {
    const handler = (): void => {
      console.log(`[tidal-relay] ${signal} received, stopping ghci`);
      void shutdown()
        .catch((err: unknown) => console.error('[tidal-relay] Shutdown failed:', getErrorMessage(err)))
        .finally(() => exit(SHUTDOWN_SIGNALS[signal]));
    };
    source.once(signal, handler);
    return { signal, handler };
  });
  return () => {
    for (const { signal, handler } of handlers) {
      source.off(signal, handler);
    }
  };
}

let activeController: TidalController | null = null;

/** Stop the REPL's session, if one is up. Used by the entry point's last-resort handlers. */
export function shutdownActiveSession(): Promise<void> {
  return activeController?.shutdown() ?? Promise.resolve();
}

async function runRepl(options: CliOptions): Promise<void> {
  const config = loadConfig({
    ghciPath: options.ghci,
    bootScriptPath: options.boot,
    pollIntervalMs: options.interval,
  });
  const controller = new TidalController({ config, notifier: new ConsoleNotifier() });
  activeController = controller;
  const removeSignalHandlers = handleShutdownSignals(() => controller.shutdown());
  const collector = new BlockCollector();

  if (options.autostart) {
    await controller.toggleSession();
  }

  const rl = createInterface({ input: process.stdin, terminal: false });
  for await (const line of rl) {
    const entry = collector.push(line);
    if (!entry) continue;
    if ('block' in entry) {
      controller.sendText(entry.block);
    } else if (entry.command === 'toggle') {
      await controller.toggleSession();
    } else if (entry.command === 'hush') {
      controller.hush();
    } else {
      break;
    }
  }
  rl.close();

  const rest = collector.flush();
  if (rest) controller.sendText(rest.block);
  await controller.shutdown();
  removeSignalHandlers();
  activeController = null;
}

export const program = new Command();

program
  .name('tidal-relay')
  .description('Relay Tidal Cycles code from the terminal into a managed ghci session')
  .version('0.1.0')
  .option('--ghci <path>', 'ghci executable (default: $TIDAL_GHCI_PATH or ghci)')
  .option('--boot <path>', 'boot script replayed on start (default: $TIDAL_BOOT_SCRIPT or bundled BootTidal.hs)')
  .option('--interval <ms>', 'output poll interval in ms', parseInterval)
  .option('--no-autostart', 'do not start ghci until :toggle')
  .action(async (options: CliOptions) => {
    try {
      await runRepl(options);
    } catch (err) {
      console.error(`[tidal-relay] ${getErrorMessage(err)}`);
      process.exitCode = 1;
    }
  });
