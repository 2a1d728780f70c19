/**
 * @fileoverview Shared types for tidal-relay.
 *
 * @module types
 */

// ============================================================================
// Session
// ============================================================================

/** Lifecycle phase of a TidalSession */
export type SessionPhase = 'stopped' | 'starting' | 'running' | 'stopping';

/** Outcome of a registry toggle */
export type ToggleResult = 'started' | 'stopped';

// ============================================================================
// Configuration
// ============================================================================

export interface TidalConfig {
  /** Interpreter executable, launched with no arguments */
  ghciPath: string;
  /** Plain-text file of commands replayed into every new session */
  bootScriptPath: string;
  /** Output pump poll interval (ms) */
  pollIntervalMs: number;
  /** Prompt tokens stripped from output before it is shown */
  promptTokens: string[];
}

// ============================================================================
// Resource Cleanup
// ============================================================================

/**
 * Something that holds timers, listeners or streams and can release them.
 */
export interface Disposable {
  dispose(): void;
  readonly isDisposed: boolean;
}

export type CleanupResourceType = 'interval' | 'listener' | 'stream';

export interface CleanupRegistration {
  type: CleanupResourceType;
  description: string;
  cleanup: () => void;
}

// ============================================================================
// Buffers
// ============================================================================

export interface BufferConfig {
  /** Size (chars) above which the buffer is trimmed */
  maxSize: number;
  /** Size (chars) kept after a trim, most recent text first */
  trimSize: number;
  /** Called with the number of dropped chars after each trim */
  onTrim?: (trimmedChars: number) => void;
}
