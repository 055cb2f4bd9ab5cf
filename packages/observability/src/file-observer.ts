/**
 * FileObserver -- structured JSONL file logging with rotation.
 *
 * Each event is serialised as a single JSON line (JSONL) and appended to the
 * configured log file. When the file exceeds `maxBytes` it is rotated: the
 * current file is renamed with a `.1` suffix (overwriting any previous
 * rotation) and a fresh file is opened.
 *
 * Default path : ~/.parley/logs/parley.jsonl
 * Default limit: 10 MB
 */

import { writeFileSync, appendFileSync, renameSync, statSync, mkdirSync, existsSync, chmodSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

import type {
  IObserver,
  LogLevel,
  SessionMeta,
  SessionStats,
  PhaseChangeEvent,
  DictationEvent,
  IntentEvent,
  ResponseEvent,
} from '@parley/core';
import { LOG_LEVEL_ORDER } from './levels.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

export interface FileObserverOptions {
  /** Absolute or ~-relative path to the JSONL log file. */
  filePath?: string;
  /** Max file size in bytes before rotation (default 10 MB). */
  maxBytes?: number;
  /** Minimum level for free-form `log` lines (default 'debug'). */
  logLevel?: LogLevel;
}

export class FileObserver implements IObserver {
  private readonly filePath: string;
  private readonly maxBytes: number;
  private readonly minLevel: number;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing = false;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = expandHome(opts.filePath ?? '~/.parley/logs/parley.jsonl');
    this.maxBytes = opts.maxBytes ?? 10 * 1024 * 1024; // 10 MB
    this.minLevel = LOG_LEVEL_ORDER[opts.logLevel ?? 'debug'];
    this.ensureDir();
  }

  /** Resolved path of the log file. */
  get path(): string {
    return this.filePath;
  }

  // ---- internal -----------------------------------------------------------

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private write(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      type,
      ...data,
    });
    this.buffer.push(line);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) return;
    this.flushTimer = setTimeout(() => {
      this.flushSync();
      this.flushTimer = null;
    }, 100);
  }

  private flushSync(): void {
    if (this.buffer.length === 0 || this.flushing) return;
    this.flushing = true;

    this.rotateIfNeeded();

    const payload = this.buffer.join('\n') + '\n';
    this.buffer = [];

    try {
      appendFileSync(this.filePath, payload, { encoding: 'utf-8', mode: 0o600 });
      chmodSync(this.filePath, 0o600);
    } catch {
      // Logging must never take the loop down; drop the batch.
    } finally {
      this.flushing = false;
    }
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    try {
      const stats = statSync(this.filePath);
      if (stats.size >= this.maxBytes) {
        renameSync(this.filePath, this.filePath + '.1');
        writeFileSync(this.filePath, '', { encoding: 'utf-8', mode: 0o600 });
      }
    } catch {
      // Rotation is best-effort; keep appending to the current file.
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onSessionStart(meta: SessionMeta): void {
    this.write('session_start', {
      sessionId: meta.sessionId,
      language: meta.language,
      startedAt: meta.startedAt.toISOString(),
    });
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    this.write('session_end', {
      sessionId: meta.sessionId,
      duration: stats.duration,
      cycles: stats.cycles,
      errors: stats.errors,
      exitCode: stats.exitCode,
    });
  }

  onPhaseChange(event: PhaseChangeEvent): void {
    this.write('phase_change', {
      sessionId: event.sessionId,
      from: event.from,
      to: event.to,
      retryCount: event.retryCount,
      note: event.note,
    });
  }

  onDictation(event: DictationEvent): void {
    this.write('dictation', {
      action: event.action,
      result: event.result,
      state: event.state,
      duration: event.duration,
    });
  }

  onIntent(event: IntentEvent): void {
    this.write('intent', {
      transcript: event.transcript,
      classification: event.classification,
      attemptIndex: event.attemptIndex,
      purpose: event.purpose,
    });
  }

  onResponse(event: ResponseEvent): void {
    this.write('response', {
      length: event.length,
      observedAt: event.observedAt.toISOString(),
    });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', {
      error: serializeError(error),
      context,
    });
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;
    this.write('log', { level, message, context });
  }

  async flush(): Promise<void> {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushSync();
  }
}
