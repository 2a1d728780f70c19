/**
 * @fileoverview One managed ghci process running Tidal.
 *
 * A TidalSession owns the child process, the SessionWriter on its stdin and
 * the OutputPump draining its stdout/stderr. It goes through
 * `stopped → starting → running → stopping → stopped` exactly once; a
 * restart is a new TidalSession (see SessionRegistry).
 *
 * @module tidal-session
 */

import { EventEmitter } from 'node:events';
import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { readFile } from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { LineReader } from './line-reader.js';
import { OutputPump } from './output-pump.js';
import { SessionWriter } from './session-writer.js';
import { BootstrapReadError, SessionStateError, SpawnError, getErrorMessage } from './errors.js';
import type { SessionPhase, TidalConfig } from './types.js';

/** The parts of a child process a session relies on */
export interface ManagedProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnProcess = (command: string) => ManagedProcess;

/** Launch the interpreter with no arguments and all three stdio streams piped */
export const spawnInterpreter: SpawnProcess = (command) => spawn(command, [], { stdio: 'pipe' });

/**
 * Event signatures emitted by TidalSession.
 */
export interface TidalSessionEvents {
  /** Batch of interpreter stdout */
  stdout: (text: string) => void;
  /** Batch of interpreter stderr */
  stderr: (text: string) => void;
  /** Write, pump or process failure; the session keeps its current liveness */
  fault: (error: Error) => void;
  /** Process exited; `expected` is true when stop() caused it */
  exit: (info: { code: number | null; signal: NodeJS.Signals | null; expected: boolean }) => void;
}

export interface TidalSessionOptions {
  config: Pick<TidalConfig, 'ghciPath' | 'bootScriptPath' | 'pollIntervalMs'>;
  /** Process launcher, replaceable for tests */
  spawnProcess?: SpawnProcess;
}

/**
 * @example
 * ```typescript
 * const session = new TidalSession({ config });
 * session.on('stdout', (text) => console.log(text));
 * await session.start();            // spawns ghci, replays BootTidal.hs
 * session.send('d1 $ sound "bd*2"');
 * session.stop();
 * ```
 */
export class TidalSession extends EventEmitter {
  readonly id: string;
  private readonly config: TidalSessionOptions['config'];
  private readonly spawnProcess: SpawnProcess;

  private process: ManagedProcess | null = null;
  private writer: SessionWriter | null = null;
  private pump: OutputPump | null = null;
  private readers: LineReader[] = [];
  private phase: SessionPhase = 'stopped';
  private stopRequested = false;

  constructor(options: TidalSessionOptions) {
    super();
    this.id = uuidv4();
    this.config = options.config;
    this.spawnProcess = options.spawnProcess ?? spawnInterpreter;
  }

  private get tag(): string {
    return `[TidalSession ${this.id.slice(0, 8)}]`;
  }

  /** Process ID while a process handle is held */
  get pid(): number | null {
    return this.process?.pid ?? null;
  }

  /**
   * Current phase. A process that died on its own reads as 'stopped'
   * even though stop() has not run yet.
   */
  get state(): SessionPhase {
    if ((this.phase === 'running' || this.phase === 'starting') && !this.isRunning()) {
      return 'stopped';
    }
    return this.phase;
  }

  /**
   * True iff a process handle is held and the process has not exited.
   */
  isRunning(): boolean {
    const proc = this.process;
    return proc !== null && proc.exitCode === null && proc.signalCode === null;
  }

  /**
   * Spawn ghci, wire writer and pump, then replay the boot script line by line.
   *
   * @throws SessionStateError if this session was already started
   * @throws SpawnError if the executable cannot be launched or exits before the boot script is replayed
   * @throws BootstrapReadError if the boot script cannot be read
   */
  async start(): Promise<this> {
    if (this.phase !== 'stopped' || this.process !== null || this.stopRequested) {
      throw new SessionStateError(`Session ${this.id} cannot start from phase '${this.state}'`);
    }
    this.phase = 'starting';
    console.log(`${this.tag} Starting ${this.config.ghciPath}`);

    const proc = this.launch();
    this.process = proc;
    this.attach(proc);

    let lines: string[];
    try {
      lines = await readBootScript(this.config.bootScriptPath);
    } catch (err) {
      this.stop();
      throw new BootstrapReadError(this.config.bootScriptPath, err);
    }

    if (this.phase !== 'starting') {
      throw new SessionStateError(`Session ${this.id} was stopped while starting`);
    }
    if (!this.isRunning()) {
      this.stop();
      throw new SpawnError(this.config.ghciPath, new Error('ghci exited during boot'));
    }

    for (const line of lines) {
      this.writer?.send(line);
    }
    this.phase = 'running';
    console.log(`${this.tag} Running with PID ${proc.pid}, replayed ${lines.length} boot lines`);
    return this;
  }

  /**
   * Hand one command to the writer. No-op when the process is not alive.
   *
   * @returns Whether the line was written
   */
  send(line: string): boolean {
    if (!this.isRunning() || !this.writer) return false;
    return this.writer.send(line);
  }

  /**
   * Close stdin and SIGKILL the process. Idempotent, never throws.
   * The pump is not joined: its next liveness check ends it.
   */
  stop(): this {
    if (this.phase === 'stopped' && this.process === null) {
      return this;
    }
    this.phase = 'stopping';
    this.stopRequested = true;

    this.writer?.close();
    this.writer = null;

    const proc = this.process;
    this.process = null;
    if (proc) {
      try {
        proc.kill('SIGKILL');
      } catch (err) {
        console.warn(`${this.tag} Failed to kill ghci (may already be dead):`, getErrorMessage(err));
      }
    }

    this.pump?.stop();
    this.pump = null;
    for (const reader of this.readers) {
      reader.dispose();
    }
    this.readers = [];

    this.phase = 'stopped';
    console.log(`${this.tag} Stopped`);
    return this;
  }

  private launch(): ManagedProcess {
    let proc: ManagedProcess;
    try {
      proc = this.spawnProcess(this.config.ghciPath);
    } catch (err) {
      this.phase = 'stopped';
      throw new SpawnError(this.config.ghciPath, err);
    }

    if (proc.pid === undefined) {
      // Node reports ENOENT/EACCES asynchronously; a missing pid means the launch failed
      proc.on('error', (err: Error) => {
        console.error(`${this.tag} Spawn error:`, err.message);
      });
      this.phase = 'stopped';
      throw new SpawnError(this.config.ghciPath, new Error('process has no pid'));
    }
    return proc;
  }

  private attach(proc: ManagedProcess): void {
    proc.on('error', (err: Error) => {
      console.error(`${this.tag} Process error:`, err.message);
      this.emit('fault', err);
    });
    proc.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      const expected = this.stopRequested;
      if (!expected) {
        console.warn(`${this.tag} ghci exited unexpectedly (code=${code}, signal=${signal})`);
      }
      this.emit('exit', { code, signal, expected });
    });

    this.writer = new SessionWriter(proc.stdin, (error) => this.emit('fault', error));

    const stdout = new LineReader(proc.stdout, { name: 'stdout' });
    const stderr = new LineReader(proc.stderr, { name: 'stderr' });
    this.readers = [stdout, stderr];

    this.pump = new OutputPump(
      { isAlive: () => this.isRunning(), stdout, stderr },
      {
        onStdout: (text) => this.emit('stdout', text),
        onStderr: (text) => this.emit('stderr', text),
        onFault: (error) => this.emit('fault', error),
      },
      { intervalMs: this.config.pollIntervalMs, name: `OutputPump ${this.id.slice(0, 8)}` }
    );
    this.pump.run();
  }
}

/**
 * Read the boot script as lines in file order. A trailing newline does not
 * produce an extra empty command.
 */
export async function readBootScript(path: string): Promise<string[]> {
  const raw = await readFile(path, 'utf-8');
  const lines = raw.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
