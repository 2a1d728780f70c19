/**
 * @fileoverview Public API of tidal-relay.
 *
 * @module lib
 */

export { TidalController, HUSH_COMMAND, type TidalControllerOptions } from './tidal-controller.js';
export { SessionRegistry, type SessionFactory } from './session-registry.js';
export {
  TidalSession,
  spawnInterpreter,
  readBootScript,
  type ManagedProcess,
  type SpawnProcess,
  type TidalSessionEvents,
  type TidalSessionOptions,
} from './tidal-session.js';
export { SessionWriter, normalizeNewlines } from './session-writer.js';
export { OutputPump, type PumpSource, type PumpHandlers, type OutputPumpOptions } from './output-pump.js';
export { LineReader, type LineReaderOptions } from './line-reader.js';
export { ConsoleNotifier, cleanMessage, type Notifier } from './notifier.js';
export {
  prepareFragment,
  selectFragment,
  lineRangeAt,
  paragraphRangeAt,
  isBlank,
  type TextFragment,
  type TextRange,
  type FragmentRequest,
  type FragmentFallback,
} from './fragment.js';
export { loadConfig, DEFAULT_TIDAL_CONFIG, DEFAULT_PROMPT_TOKENS, DEFAULT_BOOT_SCRIPT_PATH } from './config/index.js';
export * from './errors.js';
export type * from './types.js';
