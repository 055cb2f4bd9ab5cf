/**
 * IObserver -- structured event sink for the conversation loop.
 *
 * Every component reports what it did through an observer instead of
 * logging directly. Implementations (console, JSONL file, fan-out) live in
 * @parley/observability.
 */

import type {
  CyclePhase,
  DictationState,
  Intent,
  LogLevel,
} from '../types/index.js';

export interface SessionMeta {
  sessionId: string;
  startedAt: Date;
  language: string;
}

export interface SessionStats {
  duration: number;
  cycles: number;
  errors: number;
  exitCode: number;
}

export interface PhaseChangeEvent {
  sessionId: string;
  from: CyclePhase;
  to: CyclePhase;
  retryCount: number;
  note?: string;
}

export interface DictationEvent {
  action: 'start' | 'stop' | 'completion' | 'teardown';
  result: string;
  state: DictationState;
  duration: number;
}

export interface IntentEvent {
  transcript: string;
  classification: Intent;
  attemptIndex: number;
  /** Which call produced the sample. */
  purpose: 'confirm' | 'stop_phrase';
}

export interface ResponseEvent {
  length: number;
  observedAt: Date;
}

export interface IObserver {
  onSessionStart(meta: SessionMeta): void;
  onSessionEnd(meta: SessionMeta, stats: SessionStats): void;
  onPhaseChange(event: PhaseChangeEvent): void;
  onDictation(event: DictationEvent): void;
  onIntent(event: IntentEvent): void;
  onResponse(event: ResponseEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  /** Free-form diagnostic line. */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  flush(): Promise<void>;
}
