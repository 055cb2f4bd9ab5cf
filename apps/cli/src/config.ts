/**
 * Configuration loading, validation, and directory management.
 *
 * Loads user config from ~/.parley/config.json, merges over bundled defaults,
 * resolves ${VAR_NAME} environment variable references, and validates every
 * field while building the typed config. Zero external dependencies.
 */

import { readFileSync, mkdirSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { KeyModifier, KeywordSets, LogLevel, ParleyConfig } from '@parley/core';
import { ConfigError } from '@parley/core';
import { DEFAULT_DICTATION_PROCESSES, KEY_CODES } from '@parley/dictation';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PARLEY_DIR_NAME = '.parley';
const CONFIG_FILE_NAME = 'config.json';
const LOGS_DIR_NAME = 'logs';

const LANGUAGES = ['ja', 'en'] as const;
const STOP_MODES = ['toggle', 'cancel'] as const;
const STT_PROVIDERS = ['whisper', 'none'] as const;
const TTS_PROVIDERS = ['say', 'none'] as const;
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const MODIFIERS: readonly KeyModifier[] = ['command', 'shift', 'option', 'control'];
const KEYWORD_SETS = ['affirmative', 'terminate', 'stop'] as const;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Resolve the parley home directory (~/.parley). */
export function getParleyDir(): string {
  return resolve(homedir(), PARLEY_DIR_NAME);
}

/** Resolve the path to the user config file. */
export function getConfigPath(): string {
  return join(getParleyDir(), CONFIG_FILE_NAME);
}

/** Resolve the path to the logs directory. */
export function getLogsDir(): string {
  return join(getParleyDir(), LOGS_DIR_NAME);
}

// ---------------------------------------------------------------------------
// Default config
// ---------------------------------------------------------------------------

export function getDefaultConfig(): ParleyConfig {
  return {
    language: 'ja',
    dictation: {
      toggleKeyCode: KEY_CODES.rightCommand,
      cancelKeyCode: KEY_CODES.escape,
      stopMode: 'toggle',
      pulseGapMs: 100,
      keyHoldMs: 50,
      startSettleMs: 1500,
      stopSettleMs: 1000,
      pollIntervalMs: 500,
      activationTimeoutMs: 10_000,
      completionTimeoutMs: 120_000,
      emitTimeoutMs: 2000,
      processNames: [...DEFAULT_DICTATION_PROCESSES],
    },
    intent: {
      clipSeconds: 5,
      retryClipSeconds: 4,
      maxAttempts: 3,
      retryDelayMs: 1000,
      timeoutMs: 60_000,
    },
    response: {
      pollIntervalMs: 1000,
      timeoutMs: 60_000,
    },
    send: {
      keyCode: KEY_CODES.return,
      modifiers: ['command'],
    },
    monitor: {
      enabled: true,
      clipSeconds: 3,
      joinTimeoutMs: 2000,
    },
    stt: {
      provider: 'whisper',
      apiKey: '${OPENAI_API_KEY}',
      model: 'whisper-1',
    },
    tts: {
      provider: 'say',
      timeoutMs: 120_000,
    },
    orchestrator: {
      maxPhaseRetries: 3,
    },
    observability: {
      observers: ['console', 'file'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// .env file loading
// ---------------------------------------------------------------------------

/**
 * Load variables from ~/.parley/.env into process.env.
 *
 * Supports:
 *   - KEY=value
 *   - KEY="quoted value"
 *   - KEY='single quoted value'
 *   - # comments and blank lines
 *   - export KEY=value (optional export prefix)
 *
 * Existing environment variables are NOT overwritten; the shell environment
 * always takes precedence.
 */
export function loadEnvFile(): number {
  const envPath = join(getParleyDir(), '.env');

  let raw: string;
  try {
    raw = readFileSync(envPath, 'utf8');
  } catch {
    // No .env file.
    return 0;
  }

  let loaded = 0;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) continue;

    const stripped = trimmed.startsWith('export ')
      ? trimmed.slice(7).trim()
      : trimmed;

    const eqIdx = stripped.indexOf('=');
    if (eqIdx === -1) continue;

    const key = stripped.slice(0, eqIdx).trim();
    let value = stripped.slice(eqIdx + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    if (key && process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }

  return loaded;
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Recursively resolve ${VAR_NAME} references in string values. Missing
 * variables resolve to the empty string and are collected in `missing` so
 * the caller can warn once per name.
 */
function resolveEnvVars(value: unknown, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const resolved = process.env[varName];
      if (resolved === undefined) {
        missing.add(varName);
      }
      return resolved ?? '';
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, missing));
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item, missing);
    }
    return result;
  }

  return value;
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge `source` into `target`. Arrays are replaced, not merged.
 * Returns a new object; neither input is mutated.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
  seen = new WeakSet<object>(),
): Record<string, unknown> {
  if (seen.has(source)) return target; // Circular reference guard.
  seen.add(source);

  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal, seen);
    } else {
      result[key] = sourceVal;
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

interface ValidationError {
  field: string;
  message: string;
}

/**
 * Typed field readers. Each records a ValidationError and returns the
 * fallback when the value has the wrong shape.
 */
class FieldReader {
  readonly errors: ValidationError[] = [];

  section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    if (isRecord(value)) return value;
    this.errors.push({ field: key, message: 'Must be an object' });
    return {};
  }

  number(rec: Record<string, unknown>, path: string, fallback: number, min = 0): number {
    const value = rec[lastSegment(path)];
    if (typeof value === 'number' && Number.isFinite(value) && value >= min) return value;
    this.errors.push({ field: path, message: `Must be a number >= ${min}` });
    return fallback;
  }

  boolean(rec: Record<string, unknown>, path: string, fallback: boolean): boolean {
    const value = rec[lastSegment(path)];
    if (typeof value === 'boolean') return value;
    this.errors.push({ field: path, message: 'Must be true or false' });
    return fallback;
  }

  optionalString(rec: Record<string, unknown>, path: string): string | undefined {
    const value = rec[lastSegment(path)];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.errors.push({ field: path, message: 'Must be a string' });
    return undefined;
  }

  optionalNumber(rec: Record<string, unknown>, path: string): number | undefined {
    if (rec[lastSegment(path)] === undefined) return undefined;
    return this.number(rec, path, 0, 1);
  }

  oneOf<T extends string>(rec: Record<string, unknown>, path: string, allowed: readonly T[], fallback: T): T {
    const value = rec[lastSegment(path)];
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.errors.push({ field: path, message: `Must be one of: ${allowed.join(', ')}` });
    return fallback;
  }

  stringArray(rec: Record<string, unknown>, path: string, fallback: string[]): string[] {
    const value = rec[lastSegment(path)];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return [...value];
    }
    this.errors.push({ field: path, message: 'Must be an array of strings' });
    return fallback;
  }

  modifiers(rec: Record<string, unknown>, path: string): KeyModifier[] {
    const names = this.stringArray(rec, path, []);
    const result: KeyModifier[] = [];
    for (const name of names) {
      const match = MODIFIERS.find((m) => m === name);
      if (match) {
        result.push(match);
      } else {
        this.errors.push({ field: path, message: `Unknown modifier "${name}"; use ${MODIFIERS.join(', ')}` });
      }
    }
    return result;
  }

  keywords(rec: Record<string, unknown>, path: string): Partial<KeywordSets> | undefined {
    const value = rec[lastSegment(path)];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      this.errors.push({ field: path, message: 'Must be an object' });
      return undefined;
    }

    const sets: Partial<KeywordSets> = {};
    for (const name of KEYWORD_SETS) {
      if (value[name] === undefined) continue;
      const words = this.stringArray(value, `${path}.${name}`, []);
      if (words.length === 0) {
        this.errors.push({ field: `${path}.${name}`, message: 'Must not be empty' });
      }
      sets[name] = words;
    }
    return sets;
  }
}

function lastSegment(path: string): string {
  const dot = path.lastIndexOf('.');
  return dot === -1 ? path : path.slice(dot + 1);
}

/** Build a ParleyConfig from merged, env-resolved JSON. */
export function parseConfig(raw: Record<string, unknown>): { config: ParleyConfig; errors: ValidationError[] } {
  const d = getDefaultConfig();
  const r = new FieldReader();

  const dictation = r.section(raw, 'dictation');
  const intent = r.section(raw, 'intent');
  const response = r.section(raw, 'response');
  const send = r.section(raw, 'send');
  const monitor = r.section(raw, 'monitor');
  const stt = r.section(raw, 'stt');
  const tts = r.section(raw, 'tts');
  const orchestrator = r.section(raw, 'orchestrator');
  const observability = r.section(raw, 'observability');

  const config: ParleyConfig = {
    language: r.oneOf(raw, 'language', LANGUAGES, d.language),
    dictation: {
      toggleKeyCode: r.number(dictation, 'dictation.toggleKeyCode', d.dictation.toggleKeyCode),
      cancelKeyCode: r.number(dictation, 'dictation.cancelKeyCode', d.dictation.cancelKeyCode),
      stopMode: r.oneOf(dictation, 'dictation.stopMode', STOP_MODES, d.dictation.stopMode),
      pulseGapMs: r.number(dictation, 'dictation.pulseGapMs', d.dictation.pulseGapMs),
      keyHoldMs: r.number(dictation, 'dictation.keyHoldMs', d.dictation.keyHoldMs),
      startSettleMs: r.number(dictation, 'dictation.startSettleMs', d.dictation.startSettleMs),
      stopSettleMs: r.number(dictation, 'dictation.stopSettleMs', d.dictation.stopSettleMs),
      pollIntervalMs: r.number(dictation, 'dictation.pollIntervalMs', d.dictation.pollIntervalMs, 1),
      activationTimeoutMs: r.number(dictation, 'dictation.activationTimeoutMs', d.dictation.activationTimeoutMs, 1),
      completionTimeoutMs: r.number(dictation, 'dictation.completionTimeoutMs', d.dictation.completionTimeoutMs, 1000),
      emitTimeoutMs: r.number(dictation, 'dictation.emitTimeoutMs', d.dictation.emitTimeoutMs, 1),
      processNames: r.stringArray(dictation, 'dictation.processNames', d.dictation.processNames),
    },
    intent: {
      clipSeconds: r.number(intent, 'intent.clipSeconds', d.intent.clipSeconds, 1),
      retryClipSeconds: r.number(intent, 'intent.retryClipSeconds', d.intent.retryClipSeconds, 1),
      maxAttempts: r.number(intent, 'intent.maxAttempts', d.intent.maxAttempts, 1),
      retryDelayMs: r.number(intent, 'intent.retryDelayMs', d.intent.retryDelayMs),
      timeoutMs: r.number(intent, 'intent.timeoutMs', d.intent.timeoutMs, 1000),
      keywords: r.keywords(intent, 'intent.keywords'),
    },
    response: {
      pollIntervalMs: r.number(response, 'response.pollIntervalMs', d.response.pollIntervalMs, 1),
      timeoutMs: r.number(response, 'response.timeoutMs', d.response.timeoutMs, 1000),
    },
    send: {
      keyCode: r.number(send, 'send.keyCode', d.send.keyCode),
      modifiers: r.modifiers(send, 'send.modifiers'),
    },
    monitor: {
      enabled: r.boolean(monitor, 'monitor.enabled', d.monitor.enabled),
      clipSeconds: r.number(monitor, 'monitor.clipSeconds', d.monitor.clipSeconds, 1),
      joinTimeoutMs: r.number(monitor, 'monitor.joinTimeoutMs', d.monitor.joinTimeoutMs),
    },
    stt: {
      provider: r.oneOf(stt, 'stt.provider', STT_PROVIDERS, d.stt.provider),
      apiKey: r.optionalString(stt, 'stt.apiKey'),
      model: r.optionalString(stt, 'stt.model'),
    },
    tts: {
      provider: r.oneOf(tts, 'tts.provider', TTS_PROVIDERS, d.tts.provider),
      voice: r.optionalString(tts, 'tts.voice'),
      rate: r.optionalNumber(tts, 'tts.rate'),
      timeoutMs: r.number(tts, 'tts.timeoutMs', d.tts.timeoutMs, 1000),
    },
    orchestrator: {
      maxPhaseRetries: r.number(orchestrator, 'orchestrator.maxPhaseRetries', d.orchestrator.maxPhaseRetries),
    },
    observability: {
      observers: r.stringArray(observability, 'observability.observers', d.observability.observers),
      logLevel: r.oneOf(observability, 'observability.logLevel', LOG_LEVELS, d.observability.logLevel),
      logFile: r.optionalString(observability, 'observability.logFile'),
    },
  };

  if (config.intent.retryClipSeconds > config.intent.clipSeconds) {
    r.errors.push({ field: 'intent.retryClipSeconds', message: 'Must not exceed intent.clipSeconds' });
  }

  return { config, errors: r.errors };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Ensure the ~/.parley directory structure exists.
 * Creates ~/.parley/ and ~/.parley/logs/ with restrictive permissions.
 */
export function ensureConfigDir(): void {
  const parleyDir = getParleyDir();
  const logsDir = getLogsDir();

  if (!existsSync(parleyDir)) {
    mkdirSync(parleyDir, { recursive: true, mode: 0o700 });
  }

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load and return a fully resolved, validated ParleyConfig.
 *
 * 1. Loads ~/.parley/.env into process.env (shell wins).
 * 2. Deep-merges ~/.parley/config.json, if present, over the defaults.
 * 3. Resolves ${VAR_NAME} references.
 * 4. Validates every field.
 *
 * Throws ConfigLoadError if parsing or validation fails.
 */
export function loadConfig(): ParleyConfig {
  loadEnvFile();

  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    let userConfig: unknown;
    try {
      userConfig = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(userConfig)) {
      throw new ConfigLoadError(`Failed to parse ${configPath}: top level must be an object`);
    }
    merged = deepMerge(merged, userConfig);
  }

  const missingVars = new Set<string>();
  const resolved = resolveEnvVars(merged, missingVars);

  for (const varName of missingVars) {
    console.warn(`  ⚠  Config references \${${varName}} but it is not set in environment.`);
  }

  const { config, errors } = parseConfig(isRecord(resolved) ? resolved : {});
  if (errors.length > 0) {
    const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigLoadError(`Configuration validation failed:\n${details}`);
  }

  return config;
}

/**
 * Check whether a user config file exists.
 */
export function configExists(): boolean {
  return existsSync(getConfigPath());
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}
