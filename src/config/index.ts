/**
 * @fileoverview Configuration loading and validation.
 *
 * Sources, lowest precedence first: built-in defaults, the `TIDAL_GHCI_PATH`
 * and `TIDAL_BOOT_SCRIPT` environment variables, explicit overrides (CLI flags).
 *
 * @module config
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { TidalConfig } from '../types.js';
import { OUTPUT_POLL_INTERVAL_MS, MAX_POLL_INTERVAL_MS } from './session-timing.js';

export * from './session-timing.js';

/** Bundled boot script, resolved relative to this module */
export const DEFAULT_BOOT_SCRIPT_PATH = fileURLToPath(new URL('../../assets/BootTidal.hs', import.meta.url));

export const DEFAULT_PROMPT_TOKENS = ['Prelude>', 'ghci>', 'tidal>'];

export const DEFAULT_TIDAL_CONFIG: TidalConfig = {
  ghciPath: 'ghci',
  bootScriptPath: DEFAULT_BOOT_SCRIPT_PATH,
  pollIntervalMs: OUTPUT_POLL_INTERVAL_MS,
  promptTokens: DEFAULT_PROMPT_TOKENS,
};

const tidalConfigSchema = z.object({
  ghciPath: z.string().trim().min(1, 'must not be empty'),
  bootScriptPath: z.string().trim().min(1, 'must not be empty'),
  pollIntervalMs: z.number().int().min(1).max(MAX_POLL_INTERVAL_MS),
  promptTokens: z.array(z.string().min(1)),
});

/**
 * Build a validated config.
 *
 * @throws ConfigError when any merged value fails validation
 */
export function loadConfig(
  overrides: Partial<TidalConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): TidalConfig {
  const merged = {
    ...DEFAULT_TIDAL_CONFIG,
    ...(env.TIDAL_GHCI_PATH ? { ghciPath: env.TIDAL_GHCI_PATH } : {}),
    ...(env.TIDAL_BOOT_SCRIPT ? { bootScriptPath: env.TIDAL_BOOT_SCRIPT } : {}),
    ...stripUndefined(overrides),
  };

  const result = tidalConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

function stripUndefined(overrides: Partial<TidalConfig>): Partial<TidalConfig> {
  const out: Partial<TidalConfig> = {};
  if (overrides.ghciPath !== undefined) out.ghciPath = overrides.ghciPath;
  if (overrides.bootScriptPath !== undefined) out.bootScriptPath = overrides.bootScriptPath;
  if (overrides.pollIntervalMs !== undefined) out.pollIntervalMs = overrides.pollIntervalMs;
  if (overrides.promptTokens !== undefined) out.promptTokens = overrides.promptTokens;
  return out;
}
