/**
 * @fileoverview Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { loadConfig, DEFAULT_BOOT_SCRIPT_PATH, OUTPUT_POLL_INTERVAL_MS } from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults with an empty environment', () => {
    const config = loadConfig({}, {});

    expect(config).toEqual({
      ghciPath: 'ghci',
      bootScriptPath: DEFAULT_BOOT_SCRIPT_PATH,
      pollIntervalMs: 200,
      promptTokens: ['Prelude>', 'ghci>', 'tidal>'],
    });
    expect(OUTPUT_POLL_INTERVAL_MS).toBe(200);
  });

  it('should point the default boot script at the bundled file', () => {
    expect(DEFAULT_BOOT_SCRIPT_PATH.endsWith('BootTidal.hs')).toBe(true);
    expect(existsSync(DEFAULT_BOOT_SCRIPT_PATH)).toBe(true);
  });

  it('should read both paths from the environment', () => {
    const config = loadConfig({}, {
      TIDAL_GHCI_PATH: '/opt/ghc/bin/ghci',
      TIDAL_BOOT_SCRIPT: '/home/test/BootTidal.hs',
    });

    expect(config.ghciPath).toBe('/opt/ghc/bin/ghci');
    expect(config.bootScriptPath).toBe('/home/test/BootTidal.hs');
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig(
      { ghciPath: '/usr/local/bin/ghci', pollIntervalMs: 50 },
      { TIDAL_GHCI_PATH: '/opt/ghc/bin/ghci' },
    );

    expect(config.ghciPath).toBe('/usr/local/bin/ghci');
    expect(config.pollIntervalMs).toBe(50);
  });

  it('should ignore undefined overrides', () => {
    const config = loadConfig({ ghciPath: undefined, bootScriptPath: undefined }, { TIDAL_GHCI_PATH: '/opt/ghci' });

    expect(config.ghciPath).toBe('/opt/ghci');
    expect(config.bootScriptPath).toBe(DEFAULT_BOOT_SCRIPT_PATH);
  });

  it('should reject a blank executable path', () => {
    expect(() => loadConfig({ ghciPath: '   ' }, {})).toThrow(ConfigError);

    try {
      loadConfig({ ghciPath: '   ' }, {});
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(['ghciPath: must not be empty']);
      }
    }
  });

  it('should reject a non-positive poll interval', () => {
    let caught: unknown = null;
    try {
      loadConfig({ pollIntervalMs: 0 }, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]).toMatch(/^pollIntervalMs: /);
    }
  });
});
