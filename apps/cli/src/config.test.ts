/**
 * Tests for the CLI configuration module.
 *
 * Covers: paths, getDefaultConfig, ensureConfigDir, configExists,
 * loadConfig (deep merge, env var resolution, validation), loadEnvFile
 * and ConfigLoadError.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, existsSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError } from '@parley/core';
import { DEFAULT_DICTATION_PROCESSES } from '@parley/dictation';

// ---------------------------------------------------------------------------
// Mock homedir to use a temp directory
// ---------------------------------------------------------------------------

const TEST_HOME = join(tmpdir(), `parley-config-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

vi.mock('node:os', async () => {
  const actual = await vi.importActual<typeof import('node:os')>('node:os');
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

import {
  getParleyDir,
  getConfigPath,
  getLogsDir,
  getDefaultConfig,
  loadConfig,
  loadEnvFile,
  ensureConfigDir,
  configExists,
  ConfigLoadError,
} from './config.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let savedApiKey: string | undefined;

beforeEach(() => {
  mkdirSync(TEST_HOME, { recursive: true });
  savedApiKey = process.env['OPENAI_API_KEY'];
  delete process.env['OPENAI_API_KEY'];
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  if (savedApiKey === undefined) {
    delete process.env['OPENAI_API_KEY'];
  } else {
    process.env['OPENAI_API_KEY'] = savedApiKey;
  }
  try {
    rmSync(TEST_HOME, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors on Windows.
  }
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function writeTestConfig(config: unknown): void {
  const parleyDir = join(TEST_HOME, '.parley');
  mkdirSync(parleyDir, { recursive: true });
  writeFileSync(join(parleyDir, 'config.json'), JSON.stringify(config));
}

function loadError(): string {
  try {
    loadConfig();
  } catch (err) {
    if (err instanceof ConfigLoadError) return err.message;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Config paths', () => {
  it('getParleyDir returns ~/.parley', () => {
    expect(getParleyDir()).toBe(resolve(TEST_HOME, '.parley'));
  });

  it('getConfigPath returns ~/.parley/config.json', () => {
    expect(getConfigPath()).toBe(join(resolve(TEST_HOME, '.parley'), 'config.json'));
  });

  it('getLogsDir returns ~/.parley/logs', () => {
    expect(getLogsDir()).toBe(join(resolve(TEST_HOME, '.parley'), 'logs'));
  });
});

describe('getDefaultConfig', () => {
  it('defaults to Japanese', () => {
    expect(getDefaultConfig().language).toBe('ja');
  });

  it('has the dictation key and timing defaults', () => {
    const { dictation } = getDefaultConfig();

    expect(dictation.toggleKeyCode).toBe(54);
    expect(dictation.cancelKeyCode).toBe(53);
    expect(dictation.stopMode).toBe('toggle');
    expect(dictation.startSettleMs).toBe(1500);
    expect(dictation.stopSettleMs).toBe(1000);
    expect(dictation.completionTimeoutMs).toBe(120_000);
    expect(dictation.processNames).toEqual(DEFAULT_DICTATION_PROCESSES);
  });

  it('has the intent retry defaults', () => {
    expect(getDefaultConfig().intent).toEqual({
      clipSeconds: 5,
      retryClipSeconds: 4,
      maxAttempts: 3,
      retryDelayMs: 1000,
      timeoutMs: 60_000,
    });
  });

  it('sends with Command+Return', () => {
    expect(getDefaultConfig().send).toEqual({ keyCode: 36, modifiers: ['command'] });
  });

  it('references the API key through the environment', () => {
    expect(getDefaultConfig().stt.apiKey).toBe('${OPENAI_API_KEY}');
  });

  it('logs to console and file at info', () => {
    const { observability } = getDefaultConfig();
    expect(observability.observers).toEqual(['console', 'file']);
    expect(observability.logLevel).toBe('info');
  });

  it('returns a fresh copy each call', () => {
    const a = getDefaultConfig();
    a.dictation.processNames.push('Other');
    expect(getDefaultConfig().dictation.processNames).toEqual(DEFAULT_DICTATION_PROCESSES);
  });
});

describe('ensureConfigDir', () => {
  it('creates ~/.parley and ~/.parley/logs directories', () => {
    expect(existsSync(getParleyDir())).toBe(false);

    ensureConfigDir();

    expect(existsSync(getParleyDir())).toBe(true);
    expect(existsSync(getLogsDir())).toBe(true);
  });

  it('is idempotent', () => {
    ensureConfigDir();
    expect(() => ensureConfigDir()).not.toThrow();
  });
});

describe('configExists', () => {
  it('returns false when no config file exists', () => {
    expect(configExists()).toBe(false);
  });

  it('returns true when config file exists', () => {
    writeTestConfig({ language: 'en' });
    expect(configExists()).toBe(true);
  });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    const config = loadConfig();

    expect(config.language).toBe('ja');
    expect(config.intent.maxAttempts).toBe(3);
    expect(config.response.timeoutMs).toBe(60_000);
  });

  it('deep-merges user config over defaults', () => {
    writeTestConfig({
      language: 'en',
      intent: { maxAttempts: 5 },
      monitor: { enabled: false },
    });

    const config = loadConfig();

    expect(config.language).toBe('en');
    expect(config.intent.maxAttempts).toBe(5);
    expect(config.monitor.enabled).toBe(false);

    // Untouched siblings keep their defaults.
    expect(config.intent.clipSeconds).toBe(5);
    expect(config.monitor.clipSeconds).toBe(3);
    expect(config.dictation.toggleKeyCode).toBe(54);
  });

  it('resolves environment variables in string values', () => {
    process.env['OPENAI_API_KEY'] = 'test-key';
    expect(loadConfig().stt.apiKey).toBe('test-key');
  });

  it('resolves missing env vars to empty string and warns once', () => {
    const config = loadConfig();

    expect(config.stt.apiKey).toBe('');
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      '  ⚠  Config references ${OPENAI_API_KEY} but it is not set in environment.',
    );
  });

  it('replaces arrays during merge', () => {
    writeTestConfig({ dictation: { processNames: ['CustomDictation'] } });
    expect(loadConfig().dictation.processNames).toEqual(['CustomDictation']);
  });

  it('accepts keyword overrides', () => {
    writeTestConfig({ intent: { keywords: { stop: ['done'] } } });
    expect(loadConfig().intent.keywords).toEqual({ stop: ['done'] });
  });

  it('throws ConfigLoadError for invalid JSON', () => {
    const parleyDir = join(TEST_HOME, '.parley');
    mkdirSync(parleyDir, { recursive: true });
    writeFileSync(join(parleyDir, 'config.json'), 'not valid json{{{');

    expect(() => loadConfig()).toThrow(ConfigLoadError);
  });

  it('rejects a top level that is not an object', () => {
    writeTestConfig(['language', 'en']);
    expect(loadError()).toBe(`Failed to parse ${getConfigPath()}: top level must be an object`);
  });

  it('rejects an unknown language', () => {
    writeTestConfig({ language: 'fr' });
    expect(loadError()).toBe('Configuration validation failed:\n  - language: Must be one of: ja, en');
  });

  it('rejects an unknown modifier', () => {
    writeTestConfig({ send: { modifiers: ['command', 'hyper'] } });
    expect(loadError()).toContain('send.modifiers: Unknown modifier "hyper"');
  });

  it('rejects a zero poll interval', () => {
    writeTestConfig({ response: { pollIntervalMs: 0 } });
    expect(loadError()).toContain('response.pollIntervalMs: Must be a number >= 1');
  });

  it('rejects a retry clip longer than the first clip', () => {
    writeTestConfig({ intent: { clipSeconds: 3, retryClipSeconds: 4 } });
    expect(loadError()).toContain('intent.retryClipSeconds: Must not exceed intent.clipSeconds');
  });

  it('rejects an empty keyword list', () => {
    writeTestConfig({ intent: { keywords: { stop: [] } } });
    expect(loadError()).toContain('intent.keywords.stop: Must not be empty');
  });

  it('rejects a section that is not an object', () => {
    writeTestConfig({ monitor: true });
    expect(loadError()).toContain('monitor: Must be an object');
  });

  it('collects every error in one message', () => {
    writeTestConfig({
      dictation: { stopMode: 'hold' },
      observability: { logLevel: 'verbose' },
    });

    const message = loadError();
    expect(message).toContain('dictation.stopMode: Must be one of: toggle, cancel');
    expect(message).toContain('observability.logLevel: Must be one of: debug, info, warn, error');
  });

  it('accepts every log level', () => {
    for (const logLevel of ['debug', 'info', 'warn', 'error']) {
      writeTestConfig({ observability: { logLevel } });
      expect(loadConfig().observability.logLevel).toBe(logLevel);
    }
  });
});

describe('ConfigLoadError', () => {
  it('is a ConfigError with its own name', () => {
    const err = new ConfigLoadError('test message');

    expect(err.name).toBe('ConfigLoadError');
    expect(err.message).toBe('test message');
    expect(err.code).toBe('CONFIG_ERROR');
    expect(err).toBeInstanceOf(ConfigError);
  });
});

// ---------------------------------------------------------------------------
// loadEnvFile tests
// ---------------------------------------------------------------------------

describe('loadEnvFile', () => {
  function writeEnvFile(content: string): void {
    const parleyDir = join(TEST_HOME, '.parley');
    mkdirSync(parleyDir, { recursive: true });
    writeFileSync(join(parleyDir, '.env'), content);
  }

  function cleanupEnvVars(...keys: string[]): void {
    for (const key of keys) {
      delete process.env[key];
    }
  }

  it('returns 0 when no .env file exists', () => {
    expect(loadEnvFile()).toBe(0);
  });

  it('loads KEY=value pairs into process.env', () => {
    writeEnvFile('PARLEY_TEST_A=hello\nPARLEY_TEST_B=world\n');

    try {
      expect(loadEnvFile()).toBe(2);
      expect(process.env['PARLEY_TEST_A']).toBe('hello');
      expect(process.env['PARLEY_TEST_B']).toBe('world');
    } finally {
      cleanupEnvVars('PARLEY_TEST_A', 'PARLEY_TEST_B');
    }
  });

  it('strips quotes and handles the export prefix', () => {
    writeEnvFile('PARLEY_TEST_D="double"\nPARLEY_TEST_S=\'single\'\nexport PARLEY_TEST_E=exported');

    try {
      loadEnvFile();
      expect(process.env['PARLEY_TEST_D']).toBe('double');
      expect(process.env['PARLEY_TEST_S']).toBe('single');
      expect(process.env['PARLEY_TEST_E']).toBe('exported');
    } finally {
      cleanupEnvVars('PARLEY_TEST_D', 'PARLEY_TEST_S', 'PARLEY_TEST_E');
    }
  });

  it('skips blank lines, comments and lines without =', () => {
    writeEnvFile('# comment\n\nNOT_AN_ASSIGNMENT\nPARLEY_TEST_C=value\n');

    try {
      expect(loadEnvFile()).toBe(1);
      expect(process.env['PARLEY_TEST_C']).toBe('value');
    } finally {
      cleanupEnvVars('PARLEY_TEST_C');
    }
  });

  it('keeps = signs inside values', () => {
    writeEnvFile('PARLEY_TEST_EQ=a=b=c');

    try {
      loadEnvFile();
      expect(process.env['PARLEY_TEST_EQ']).toBe('a=b=c');
    } finally {
      cleanupEnvVars('PARLEY_TEST_EQ');
    }
  });

  it('does not overwrite existing environment variables', () => {
    process.env['PARLEY_TEST_EXISTING'] = 'original';
    writeEnvFile('PARLEY_TEST_EXISTING=overwritten');

    try {
      expect(loadEnvFile()).toBe(0);
      expect(process.env['PARLEY_TEST_EXISTING']).toBe('original');
    } finally {
      cleanupEnvVars('PARLEY_TEST_EXISTING');
    }
  });

  it('feeds ${VAR} references in loadConfig', () => {
    writeEnvFile('OPENAI_API_KEY=test-key');
    expect(loadConfig().stt.apiKey).toBe('test-key');
  });
});
