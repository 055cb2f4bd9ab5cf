/**
 * CycleOrchestrator -- the voice-gated question/answer loop.
 *
 *   setup → dictating → awaiting_send → awaiting_response → speaking
 *         → continuation_check → dictating … → terminated
 *
 * Each phase either succeeds and moves on, or fails and asks the user
 * whether to retry. A retry needs a fresh spoken "yes" every time and is
 * capped per phase; anything short of a clear "yes" ends the session. The
 * run always finishes in `terminated` with dictation torn down, whether the
 * user declined, the answers ran out or the process was interrupted.
 *
 * Concurrency: one foreground flow. During `dictating` one background
 * StopPhraseMonitor may run; it shares only a StopFlag with the foreground.
 */

import type {
  CycleOutcome,
  CyclePhase,
  CycleState,
  DictationOutcome,
  IKeyEmitter,
  IObserver,
  Intent,
  KeyCombo,
  TerminationReason,
} from '@parley/core';
import { generateId, toError } from '@parley/core';
import type { DictationController } from '@parley/dictation';
import { KEY_COMBOS, pressCombo } from '@parley/dictation';
import type { IntentRecognizer } from '@parley/voice';
import type { ResponseWatcher } from '@parley/response';
import { NoopObserver } from '@parley/observability';
import type { Narrator } from './narrator.js';
import { StopPhraseMonitor } from './monitor.js';
import { PROMPTS } from './prompts.js';
import type { PromptSet } from './prompts.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OrchestratorSettings {
  /** Upper bound for one dictation (ms, default: 120000). */
  completionTimeoutMs: number;
  /** Clipboard poll interval (ms, default: 1000). */
  responsePollIntervalMs: number;
  /** How long to wait for a copied reply (ms, default: 60000). */
  responseTimeoutMs: number;
  /** Deadline for one yes/no question (ms, default: 60000). */
  confirmTimeoutMs: number;
  /** Retries allowed per phase before giving up (default: 3). */
  maxPhaseRetries: number;
  /** Key combination that submits the chat input (default: Command+Return). */
  send: KeyCombo;
  /** How long each key of the send combination is held (ms, default: 50). */
  keyHoldMs: number;
  monitor: {
    enabled: boolean;
    clipSeconds: number;
    joinTimeoutMs: number;
  };
}

export interface CycleOrchestratorOptions {
  controller: DictationController;
  intent: IntentRecognizer;
  watcher: ResponseWatcher;
  narrator: Narrator;
  keys?: IKeyEmitter;
  observer?: IObserver;
  prompts?: PromptSet;
  settings?: Partial<OrchestratorSettings>;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  completionTimeoutMs: 120_000,
  responsePollIntervalMs: 1000,
  responseTimeoutMs: 60_000,
  confirmTimeoutMs: 60_000,
  maxPhaseRetries: 3,
  send: KEY_COMBOS.send,
  keyHoldMs: 50,
  monitor: { enabled: true, clipSeconds: 3, joinTimeoutMs: 2000 },
};

/** Result of running one phase under the retry policy. */
type PhaseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: TerminationReason };

// ---------------------------------------------------------------------------
// CycleOrchestrator
// ---------------------------------------------------------------------------

export class CycleOrchestrator {
  private readonly controller: DictationController;
  private readonly intent: IntentRecognizer;
  private readonly watcher: ResponseWatcher;
  private readonly narrator: Narrator;
  private readonly keys?: IKeyEmitter;
  private readonly observer: IObserver;
  private readonly prompts: PromptSet;
  private readonly settings: OrchestratorSettings;

  private state: CycleState = { phase: 'setup', retryCount: 0, sessionId: '', cycle: 0 };
  private warnings: string[] = [];

  constructor(opts: CycleOrchestratorOptions) {
    this.controller = opts.controller;
    this.intent = opts.intent;
    this.watcher = opts.watcher;
    this.narrator = opts.narrator;
    this.keys = opts.keys;
    this.observer = opts.observer ?? new NoopObserver();
    this.prompts = opts.prompts ?? PROMPTS.ja;
    this.settings = {
      ...DEFAULT_ORCHESTRATOR_SETTINGS,
      ...opts.settings,
      monitor: { ...DEFAULT_ORCHESTRATOR_SETTINGS.monitor, ...opts.settings?.monitor },
    };
  }

  /** Snapshot of the current cycle state. */
  get current(): Readonly<CycleState> {
    return { ...this.state };
  }

  /**
   * Run the loop until it terminates. Aborting `signal` ends the run at the
   * next checkpoint; dictation is torn down on every path, including a
   * thrown error.
   */
  async run(signal?: AbortSignal): Promise<CycleOutcome> {
    const startedAt = new Date();
    const meta = { sessionId: generateId(), startedAt, language: this.intent.language };
    this.state = { phase: 'setup', retryCount: 0, sessionId: meta.sessionId, cycle: 0 };
    this.warnings = [];
    this.observer.onSessionStart(meta);

    let errors = 0;
    let reason: TerminationReason = 'aborted';

    try {
      reason = await this.cycle(signal);
      if (reason !== 'aborted') {
        await this.narrator.say(this.prompts.goodbye);
      }
    } catch (err) {
      errors++;
      this.observer.onError(toError(err), { component: 'orchestrator', phase: this.state.phase });
      throw err;
    } finally {
      this.transition('terminated', reason);
      await this.controller.teardown();
      this.observer.onSessionEnd(meta, {
        duration: Date.now() - startedAt.getTime(),
        cycles: this.state.cycle,
        errors,
        exitCode: 0,
      });
    }

    return {
      exitCode: 0,
      reason,
      cycles: this.state.cycle,
      warnings: [...this.warnings],
    };
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private async cycle(signal?: AbortSignal): Promise<TerminationReason> {
    await this.narrator.say(this.prompts.welcome);
    const start = await this.confirm(this.prompts.startPrompt, signal);
    if (start !== 'affirmative') return this.terminationReason(start, signal);

    for (;;) {
      if (signal?.aborted) return 'aborted';

      const dictated = await this.runPhase('dictating', this.prompts.dictationFailed, signal, () =>
        this.dictate(signal),
      );
      if (!dictated.ok) return dictated.reason;

      // Adopt whatever is on the clipboard now so it is not taken for the reply.
      await this.watcher.prime();

      this.transition('awaiting_send', dictated.value);
      await this.send();
      if (signal?.aborted) return 'aborted';

      const reply = await this.runPhase('awaiting_response', this.prompts.noReply, signal, () =>
        this.awaitResponse(signal),
      );
      if (!reply.ok) return reply.reason;

      this.transition('speaking');
      await this.narrator.say(reply.value);
      this.state.cycle++;

      this.transition('continuation_check');
      const next = await this.confirm(this.prompts.nextQuestion, signal);
      if (next !== 'affirmative') return this.terminationReason(next, signal);
    }
  }

  /**
   * Run one phase attempt; on failure narrate `retryPrompt` and retry only
   * on a fresh affirmative, at most `maxPhaseRetries` times.
   */
  private async runPhase<T>(
    phase: CyclePhase,
    retryPrompt: string,
    signal: AbortSignal | undefined,
    attempt: () => Promise<T | null>,
  ): Promise<PhaseResult<T>> {
    this.state.retryCount = 0;

    for (;;) {
      this.transition(phase);
      const value = await attempt();
      if (value !== null) {
        this.state.retryCount = 0;
        return { ok: true, value };
      }
      if (signal?.aborted) return { ok: false, reason: 'aborted' };

      if (this.state.retryCount >= this.settings.maxPhaseRetries) {
        this.warn(`${phase} failed ${this.state.retryCount + 1} times; giving up`);
        return { ok: false, reason: 'fallback' };
      }

      this.state.retryCount++;
      const answer = await this.confirm(retryPrompt, signal);
      if (answer !== 'affirmative') {
        return { ok: false, reason: this.terminationReason(answer, signal) };
      }
    }
  }

  /** Start dictation and wait for it to end. null when it could not be started or stopped. */
  private async dictate(signal?: AbortSignal): Promise<DictationOutcome | null> {
    await this.narrator.say(this.prompts.dictate);

    const started = await this.controller.start();
    if (started === 'failed') return null;

    const monitor = this.settings.monitor.enabled
      ? new StopPhraseMonitor({
        intent: this.intent,
        controller: this.controller,
        phrases: this.intent.keywords.stop,
        observer: this.observer,
        clipSeconds: this.settings.monitor.clipSeconds,
        joinTimeoutMs: this.settings.monitor.joinTimeoutMs,
      })
      : null;
    const flag = monitor?.start();

    const waiting = new AbortController();
    const onAbort = () => waiting.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let outcome: DictationOutcome;
    try {
      const completion = this.controller
        .waitForCompletion(this.settings.completionTimeoutMs, waiting.signal)
        .then((done): DictationOutcome => (done ? 'completed' : 'timeout'));
      const racers: Array<Promise<DictationOutcome>> = [completion];
      if (flag) {
        racers.push(flag.wait().then((): DictationOutcome => 'stop_phrase'));
      }

      outcome = await Promise.race(racers);
      waiting.abort();
      await completion;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await monitor?.halt();
    }

    if (signal?.aborted) return null;
    if (flag?.isSet) outcome = 'stop_phrase';

    // Never send while dictation is still running.
    if (outcome === 'stop_phrase' && monitor?.stopResult === 'failed') {
      this.warn('dictation did not stop on the stop phrase');
      return null;
    }

    if (outcome === 'timeout') {
      // Stop before narrating so the narration is not dictated.
      if ((await this.controller.stop()) === 'failed') {
        this.warn('dictation timed out and could not be stopped');
        return null;
      }
      this.warn('dictation timed out; sending what was captured');
      await this.narrator.say(this.prompts.dictationTimeout);
    }

    this.observer.log('info', `dictation ended: ${outcome}`);
    return outcome;
  }

  /** Submit the chat input. Failures are warnings; the cycle carries on. */
  private async send(): Promise<void> {
    if (!this.keys) {
      this.warn('key events unavailable; message not sent');
      await this.narrator.say(this.prompts.sendFailed);
      return;
    }

    let sent = false;
    try {
      sent = await pressCombo(this.keys, this.settings.send, this.settings.keyHoldMs);
    } catch (err) {
      this.observer.onError(toError(err), { component: 'orchestrator', action: 'send' });
    }

    if (!sent) {
      this.warn('send key failed');
      await this.narrator.say(this.prompts.sendFailed);
    }
  }

  /** Ask for the copied reply, then watch the clipboard. null on failure. */
  private async awaitResponse(signal?: AbortSignal): Promise<string | null> {
    const ready = await this.confirm(this.prompts.copyReply, signal);
    if (ready !== 'affirmative') return null;

    return this.watcher.pollForChange(
      this.settings.responsePollIntervalMs,
      this.settings.responseTimeoutMs,
      signal,
    );
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private async confirm(prompt: string, signal?: AbortSignal): Promise<Intent> {
    await this.narrator.say(prompt);
    return this.intent.ask(this.settings.confirmTimeoutMs, signal);
  }

  private terminationReason(answer: Intent, signal?: AbortSignal): TerminationReason {
    if (signal?.aborted) return 'aborted';
    return answer === 'terminate' ? 'user_declined' : 'fallback';
  }

  private transition(to: CyclePhase, note?: string): void {
    const from = this.state.phase;
    this.state.phase = to;
    this.observer.onPhaseChange({
      sessionId: this.state.sessionId,
      from,
      to,
      retryCount: this.state.retryCount,
      note,
    });
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.observer.log('warn', message);
  }
}
