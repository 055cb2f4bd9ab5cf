/**
 * IntentRecognizer -- short spoken yes/no/end answers from a fixed-length clip.
 *
 * Each attempt records one clip, transcribes it and classifies the
 * transcript against two keyword sets (terminate first, then affirmative).
 * Transcription is slow and unreliable, so instead of trying to understand
 * the utterance the recognizer retries a bounded number of times and then
 * settles on `false`: silence or noise never moves the loop forward.
 *
 * Architecture:
 *   IAudioRecorder → ISpeechToText → classifyTranscript → IntentSample
 */

import type {
  IAudioRecorder,
  IObserver,
  ISpeechToText,
  Intent,
  IntentEvent,
  IntentSample,
  KeywordSets,
} from '@parley/core';
import { sleep, toError } from '@parley/core';
import { NoopObserver } from '@parley/observability';
import { classifyTranscript, matchesAny, resolveKeywords } from './keywords.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IntentRecognizerOptions {
  recorder?: IAudioRecorder;
  stt?: ISpeechToText;
  observer?: IObserver;
  /** Transcription language hint (default: 'ja'). */
  language?: string;
  keywords?: Partial<KeywordSets>;
  /** Clip length of the first attempt (seconds, default: 5). */
  clipSeconds?: number;
  /** Clip length of each retry (seconds, default: 4). */
  retryClipSeconds?: number;
  /** Attempts per waitForAffirmative call, first one included (default: 3). */
  maxAttempts?: number;
  /** Pause before each retry (ms, default: 1000). */
  retryDelayMs?: number;
  /** Default deadline for waitForAffirmative (ms, default: 60000). */
  timeoutMs?: number;
  /** Called before each retry so the user can be asked again. */
  onRetry?: (attempt: number, maxAttempts: number) => Promise<void> | void;
}

// ---------------------------------------------------------------------------
// IntentRecognizer
// ---------------------------------------------------------------------------

export class IntentRecognizer {
  private readonly recorder?: IAudioRecorder;
  private readonly stt?: ISpeechToText;
  private readonly observer: IObserver;
  private readonly clipSeconds: number;
  private readonly retryClipSeconds: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly onRetry?: (attempt: number, maxAttempts: number) => Promise<void> | void;

  readonly keywords: KeywordSets;
  /** Transcription language hint. */
  readonly language: string;

  constructor(opts: IntentRecognizerOptions = {}) {
    this.recorder = opts.recorder;
    this.stt = opts.stt;
    this.observer = opts.observer ?? new NoopObserver();
    this.language = opts.language ?? 'ja';
    this.keywords = resolveKeywords(opts.keywords);
    this.clipSeconds = opts.clipSeconds ?? 5;
    this.retryClipSeconds = opts.retryClipSeconds ?? 4;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.onRetry = opts.onRetry;
  }

  /** Whether both capture and transcription are wired up. */
  get available(): boolean {
    return this.recorder !== undefined && this.stt !== undefined;
  }

  /**
   * Record and classify one utterance. Capture or transcription failures
   * classify as 'unknown'.
   */
  async classifyOnce(durationSeconds: number = this.clipSeconds, signal?: AbortSignal): Promise<Intent> {
    const sample = await this.sampleOnce(durationSeconds, signal);
    return sample.classification;
  }

  /** Like classifyOnce, but keeps the transcript. */
  async sampleOnce(durationSeconds: number = this.clipSeconds, signal?: AbortSignal): Promise<IntentSample> {
    return this.sample(durationSeconds, 1, 'confirm', signal);
  }

  /**
   * Ask for a yes/no answer.
   *
   * Affirmative on any attempt → true; terminate on any attempt → false.
   * Unknown answers are retried until `maxAttempts` captures have been made
   * or the deadline has passed; then the fallback `false` is returned.
   */
  async waitForAffirmative(timeoutMs: number = this.timeoutMs, signal?: AbortSignal): Promise<boolean> {
    return (await this.ask(timeoutMs, signal)) === 'affirmative';
  }

  /**
   * Same loop as waitForAffirmative, but resolves with the deciding intent:
   * 'unknown' means the attempts ran out (or the signal fired) without a
   * clear answer.
   */
  async ask(timeoutMs: number = this.timeoutMs, signal?: AbortSignal): Promise<Intent> {
    if (!this.available) {
      this.observer.log('warn', 'voice confirmation unavailable; treating as "no"');
      return 'unknown';
    }

    const deadline = Date.now() + timeoutMs;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) return 'unknown';
      if (attempt > 1) {
        if (Date.now() >= deadline) break;
        await this.onRetry?.(attempt, this.maxAttempts);
        await sleep(this.retryDelayMs);
      }

      const seconds = attempt === 1 ? this.clipSeconds : this.retryClipSeconds;
      const { classification } = await this.sample(seconds, attempt, 'confirm', signal);

      if (classification !== 'unknown') return classification;
    }

    this.observer.log('info', `no clear answer after ${this.maxAttempts} attempts; treating as "no"`);
    return 'unknown';
  }

  /**
   * Record one clip and report whether it contains any of `phrases`.
   * Used by the background stop-phrase monitor.
   */
  async listenFor(phrases: readonly string[], durationSeconds: number, signal?: AbortSignal): Promise<boolean> {
    const sample = await this.sample(durationSeconds, 1, 'stop_phrase', signal, phrases);
    return sample.classification === 'terminate';
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async sample(
    durationSeconds: number,
    attemptIndex: number,
    purpose: IntentEvent['purpose'],
    signal?: AbortSignal,
    stopPhrases?: readonly string[],
  ): Promise<IntentSample> {
    const transcript = await this.capture(durationSeconds, signal);
    const classification = stopPhrases
      ? (transcript && matchesAny(transcript, stopPhrases) ? 'terminate' : 'unknown')
      : classifyTranscript(transcript, this.keywords);

    const sample: IntentSample = { transcript, classification, attemptIndex };
    if (transcript || purpose === 'confirm') {
      this.observer.onIntent({ ...sample, purpose });
    }
    return sample;
  }

  /** Record and transcribe; '' on any failure. */
  private async capture(durationSeconds: number, signal?: AbortSignal): Promise<string> {
    if (!this.recorder || !this.stt) return '';
    if (signal?.aborted) return '';

    let audio: Buffer;
    try {
      audio = await this.recorder.record(durationSeconds, signal);
    } catch (err) {
      // An aborted recording is the monitor being shut down, not a failure.
      if (!signal?.aborted) {
        this.observer.onError(toError(err), { component: 'intent', action: 'record' });
      }
      return '';
    }

    try {
      const text = await this.stt.transcribe(audio, 'audio/wav', this.language);
      return text.trim();
    } catch (err) {
      this.observer.onError(toError(err), { component: 'intent', action: 'transcribe' });
      return '';
    }
  }
}
