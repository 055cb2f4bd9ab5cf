/**
 * Shared types for parley: the conversation loop's domain model and the
 * configuration surface.
 */

// === Dictation ===

export type DictationState = 'inactive' | 'starting' | 'active' | 'stopping';

export interface DictationSession {
  state: DictationState;
  lastProbeTime: Date | null;
}

export type StartResult = 'started' | 'already_active' | 'failed';
export type StopResult = 'stopped' | 'already_inactive' | 'failed';

/** How native dictation is ended: toggle double-tap or a single cancel key. */
export type StopMode = 'toggle' | 'cancel';

// === Intent ===

export type Intent = 'affirmative' | 'terminate' | 'unknown';

export interface IntentSample {
  transcript: string;
  classification: Intent;
  /** 1-based attempt number within one waitForAffirmative call. */
  attemptIndex: number;
}

export interface KeywordSets {
  affirmative: string[];
  terminate: string[];
  /** Phrases that end dictation early while the monitor is listening. */
  stop: string[];
}

// === Response ===

export interface ResponseSnapshot {
  content: string;
  observedAt: Date;
}

// === Cycle ===

export type CyclePhase =
  | 'setup'
  | 'dictating'
  | 'awaiting_send'
  | 'awaiting_response'
  | 'speaking'
  | 'continuation_check'
  | 'terminated';

export interface CycleState {
  phase: CyclePhase;
  /** Retries consumed by the current phase; reset when a phase succeeds. */
  retryCount: number;
  sessionId: string;
  /** Completed question/answer rounds. */
  cycle: number;
}

export type TerminationReason = 'user_declined' | 'fallback' | 'aborted';

/** How a dictation phase ended. */
export type DictationOutcome = 'completed' | 'stop_phrase' | 'timeout';

export interface CycleOutcome {
  exitCode: number;
  reason: TerminationReason;
  cycles: number;
  /** Human-readable notes raised along the way (timeouts, failed sends). */
  warnings: string[];
}

// === Keys ===

export type KeyModifier = 'command' | 'shift' | 'option' | 'control';

export interface KeyCombo {
  keyCode: number;
  modifiers: KeyModifier[];
}

// === Configuration ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Language = 'ja' | 'en';

export interface ParleyConfig {
  /** Transcription language and narration language. */
  language: Language;
  dictation: {
    toggleKeyCode: number;
    cancelKeyCode: number;
    stopMode: StopMode;
    /** Gap between the two pulses of a double-tap (ms). */
    pulseGapMs: number;
    /** How long each key is held down (ms). */
    keyHoldMs: number;
    startSettleMs: number;
    stopSettleMs: number;
    pollIntervalMs: number;
    activationTimeoutMs: number;
    completionTimeoutMs: number;
    emitTimeoutMs: number;
    processNames: string[];
  };
  intent: {
    clipSeconds: number;
    retryClipSeconds: number;
    maxAttempts: number;
    retryDelayMs: number;
    timeoutMs: number;
    keywords?: Partial<KeywordSets>;
  };
  response: {
    pollIntervalMs: number;
    timeoutMs: number;
  };
  send: KeyCombo;
  monitor: {
    enabled: boolean;
    clipSeconds: number;
    joinTimeoutMs: number;
  };
  stt: {
    provider: 'whisper' | 'none';
    apiKey?: string;
    model?: string;
  };
  tts: {
    provider: 'say' | 'none';
    voice?: string;
    rate?: number;
    timeoutMs: number;
  };
  orchestrator: {
    maxPhaseRetries: number;
  };
  observability: {
    observers: string[];
    logLevel: LogLevel;
    logFile?: string;
  };
}
