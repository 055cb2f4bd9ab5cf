/**
 * ConsoleObserver -- human-readable diagnostic lines on stderr.
 *
 * stdout belongs to the conversation itself (instructions, replies), so
 * diagnostics go to stderr. Lines below the configured level are dropped.
 */

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
import { truncate } from '@parley/core';
import { LOG_LEVEL_ORDER } from './levels.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: DIM,
  info: '',
  warn: YELLOW,
  error: RED,
};

export interface ConsoleObserverOptions {
  logLevel?: LogLevel;
  /** Line sink (default: process.stderr). */
  write?: (line: string) => void;
  /** Emit ANSI colors (default: stderr is a TTY). */
  colors?: boolean;
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;
  private readonly sink: (line: string) => void;
  private readonly colors: boolean;

  constructor(opts: ConsoleObserverOptions = {}) {
    this.minLevel = LOG_LEVEL_ORDER[opts.logLevel ?? 'info'];
    this.sink = opts.write ?? ((line) => process.stderr.write(line + '\n'));
    this.colors = opts.colors ?? process.stderr.isTTY === true;
  }

  onSessionStart(meta: SessionMeta): void {
    this.log('info', 'session started', { sessionId: meta.sessionId, language: meta.language });
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    this.log('info', 'session ended', {
      sessionId: meta.sessionId,
      cycles: stats.cycles,
      errors: stats.errors,
      exitCode: stats.exitCode,
      durationMs: stats.duration,
    });
  }

  onPhaseChange(event: PhaseChangeEvent): void {
    this.log('info', `phase ${event.from} -> ${event.to}`, {
      retryCount: event.retryCount > 0 ? event.retryCount : undefined,
      note: event.note,
    });
  }

  onDictation(event: DictationEvent): void {
    const level: LogLevel = event.result === 'failed' ? 'warn' : 'debug';
    this.log(level, `dictation ${event.action}: ${event.result}`, {
      state: event.state,
      durationMs: event.duration,
    });
  }

  onIntent(event: IntentEvent): void {
    this.log('info', `heard "${truncate(event.transcript, 60)}" -> ${event.classification}`, {
      attempt: event.attemptIndex,
      purpose: event.purpose,
    });
  }

  onResponse(event: ResponseEvent): void {
    this.log('info', 'new reply on clipboard', { length: event.length });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.log('error', error.message, context);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;

    const time = new Date().toISOString().slice(11, 19);
    const tag = level.toUpperCase().padEnd(5, ' ');
    const line = `[${time}] ${tag} ${message}${formatContext(context)}`;

    if (this.colors && LEVEL_COLOR[level]) {
      this.sink(`${LEVEL_COLOR[level]}${line}${RESET}`);
    } else {
      this.sink(line);
    }
  }

  async flush(): Promise<void> {
    // Writes are synchronous.
  }
}
