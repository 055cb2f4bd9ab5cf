/**
 * DictationController -- start, stop and watch the OS's native dictation.
 *
 * Native dictation has no API: it is toggled by a double-tap of a designated
 * key and observed only indirectly, through the presence of its helper
 * processes. The controller therefore works strictly probe-before-act:
 *
 *   start():  probe → (already active) | double-tap → settle → re-probe
 *   stop():   probe → (already inactive) | double-tap or cancel → settle → re-probe
 *   waitForCompletion(): poll until active, then poll until inactive
 *
 * Probe errors read as "inactive" and are reported to the observer; they
 * never reach the caller. Every key event and probe is bounded by a timeout
 * so no operation can hang on a stuck subprocess.
 */

import type {
  DictationSession,
  DictationState,
  IActivityProbe,
  IKeyEmitter,
  IObserver,
  KeyModifier,
  StartResult,
  StopMode,
  StopResult,
} from '@parley/core';
import { abortableSleep, sleep, toError, withTimeout } from '@parley/core';
import { NoopObserver } from '@parley/observability';
import { KEY_CODES } from './keys.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DictationControllerOptions {
  keys?: IKeyEmitter;
  probe?: IActivityProbe;
  observer?: IObserver;
  /** Key double-tapped to toggle dictation (default: right Command, 54). */
  toggleKeyCode?: number;
  /** Key pressed once to cancel dictation in 'cancel' mode (default: Escape, 53). */
  cancelKeyCode?: number;
  /** How stop() ends dictation (default: 'toggle'). */
  stopMode?: StopMode;
  /** Gap between the two pulses of a double-tap (ms, default: 100). */
  pulseGapMs?: number;
  /** How long each key is held (ms, default: 50). */
  keyHoldMs?: number;
  /** Pause after starting before re-probing (ms, default: 1500). */
  startSettleMs?: number;
  /** Pause after stopping before re-probing (ms, default: 1000). */
  stopSettleMs?: number;
  /** Probe interval while waiting for completion (ms, default: 500). */
  pollIntervalMs?: number;
  /** How long to wait for dictation to appear at all (ms, default: 10000). */
  activationTimeoutMs?: number;
  /** Upper bound for a single key event or probe (ms, default: 2000). */
  emitTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// DictationController
// ---------------------------------------------------------------------------

export class DictationController {
  private readonly keys?: IKeyEmitter;
  private readonly probe?: IActivityProbe;
  private readonly observer: IObserver;
  private readonly toggleKeyCode: number;
  private readonly cancelKeyCode: number;
  private readonly stopMode: StopMode;
  private readonly pulseGapMs: number;
  private readonly keyHoldMs: number;
  private readonly startSettleMs: number;
  private readonly stopSettleMs: number;
  private readonly pollIntervalMs: number;
  private readonly activationTimeoutMs: number;
  private readonly emitTimeoutMs: number;

  private current: DictationSession = { state: 'inactive', lastProbeTime: null };

  constructor(opts: DictationControllerOptions = {}) {
    this.keys = opts.keys;
    this.probe = opts.probe;
    this.observer = opts.observer ?? new NoopObserver();
    this.toggleKeyCode = opts.toggleKeyCode ?? KEY_CODES.rightCommand;
    this.cancelKeyCode = opts.cancelKeyCode ?? KEY_CODES.escape;
    this.stopMode = opts.stopMode ?? 'toggle';
    this.pulseGapMs = opts.pulseGapMs ?? 100;
    this.keyHoldMs = opts.keyHoldMs ?? 50;
    this.startSettleMs = opts.startSettleMs ?? 1500;
    this.stopSettleMs = opts.stopSettleMs ?? 1000;
    this.pollIntervalMs = opts.pollIntervalMs ?? 500;
    this.activationTimeoutMs = opts.activationTimeoutMs ?? 10_000;
    this.emitTimeoutMs = opts.emitTimeoutMs ?? 2000;
  }

  /** Snapshot of the tracked session. */
  get session(): Readonly<DictationSession> {
    return { ...this.current };
  }

  /**
   * Start native dictation.
   *
   * Returns 'already_active' without emitting anything when the probe
   * already sees dictation, 'started' when the re-probe after the settle
   * delay confirms it, 'failed' otherwise.
   */
  async start(): Promise<StartResult> {
    const began = Date.now();

    if (await this.isActive()) {
      this.setState('active');
      return this.report('start', 'already_active', began);
    }

    this.setState('starting');

    if (!(await this.doubleTap(this.toggleKeyCode))) {
      this.setState('inactive');
      return this.report('start', 'failed', began);
    }

    await sleep(this.startSettleMs);

    if (await this.isActive()) {
      this.setState('active');
      return this.report('start', 'started', began);
    }

    this.setState('inactive');
    return this.report('start', 'failed', began);
  }

  /**
   * Stop native dictation.
   *
   * Returns 'already_inactive' without emitting anything when the probe sees
   * no dictation. Otherwise sends the toggle double-tap or the cancel key,
   * waits the settle delay and re-probes.
   */
  async stop(): Promise<StopResult> {
    const began = Date.now();

    if (!(await this.isActive())) {
      this.setState('inactive');
      return this.report('stop', 'already_inactive', began);
    }

    this.setState('stopping');

    const sent = this.stopMode === 'cancel'
      ? await this.pulse(this.cancelKeyCode)
      : await this.doubleTap(this.toggleKeyCode);

    if (!sent) {
      this.setState('active');
      return this.report('stop', 'failed', began);
    }

    await sleep(this.stopSettleMs);

    if (await this.isActive()) {
      this.setState('active');
      return this.report('stop', 'failed', began);
    }

    this.setState('inactive');
    return this.report('stop', 'stopped', began);
  }

  /**
   * Wait for the user to finish dictating.
   *
   * Polls until dictation is observed (giving up after the activation
   * timeout), then polls until it disappears. Returns true only when
   * completion was observed within `timeoutMs`; an aborted signal returns
   * false at the next poll.
   */
  async waitForCompletion(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const began = Date.now();
    const activationDeadline = began + Math.min(this.activationTimeoutMs, timeoutMs);
    const deadline = began + timeoutMs;

    let seenActive = false;
    while (!signal?.aborted && Date.now() < activationDeadline) {
      if (await this.isActive()) {
        seenActive = true;
        break;
      }
      await abortableSleep(this.pollIntervalMs, signal);
    }

    if (!seenActive) {
      this.report('completion', signal?.aborted ? 'aborted' : 'never_active', began);
      return false;
    }

    this.setState('active');

    while (!signal?.aborted && Date.now() < deadline) {
      if (!(await this.isActive())) {
        this.setState('inactive');
        this.report('completion', 'completed', began);
        return true;
      }
      await abortableSleep(this.pollIntervalMs, signal);
    }

    this.report('completion', signal?.aborted ? 'aborted' : 'timeout', began);
    return false;
  }

  /**
   * Best-effort cleanup on exit. Stops dictation if it is running and
   * resets the session; safe to call any number of times.
   */
  async teardown(): Promise<StopResult> {
    const began = Date.now();
    const result = await this.stop();
    this.current = { state: 'inactive', lastProbeTime: this.current.lastProbeTime };
    this.report('teardown', result, began);
    return result;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /** Probe, bounded and fail-safe: errors and timeouts read as inactive. */
  private async isActive(): Promise<boolean> {
    if (!this.probe) return false;

    try {
      const active = await withTimeout(this.probe.isActive(), this.emitTimeoutMs, false);
      this.current.lastProbeTime = new Date();
      return active;
    } catch (err) {
      this.observer.onError(toError(err), { component: 'dictation', action: 'probe' });
      return false;
    }
  }

  private async emit(keyCode: number, down: boolean, modifiers: readonly KeyModifier[] = []): Promise<boolean> {
    if (!this.keys) return false;

    try {
      return await withTimeout(this.keys.emit(keyCode, down, modifiers), this.emitTimeoutMs, false);
    } catch (err) {
      this.observer.onError(toError(err), { component: 'dictation', action: 'emit', keyCode, down });
      return false;
    }
  }

  private async pulse(keyCode: number): Promise<boolean> {
    if (!(await this.emit(keyCode, true))) return false;
    await sleep(this.keyHoldMs);
    return this.emit(keyCode, false);
  }

  /** Two pulses close enough together to read as a double-tap. */
  private async doubleTap(keyCode: number): Promise<boolean> {
    if (!(await this.pulse(keyCode))) return false;
    await sleep(this.pulseGapMs);
    return this.pulse(keyCode);
  }

  private setState(state: DictationState): void {
    this.current.state = state;
  }

  private report<R extends string>(action: 'start' | 'stop' | 'completion' | 'teardown', result: R, began: number): R {
    this.observer.onDictation({
      action,
      result,
      state: this.current.state,
      duration: Date.now() - began,
    });
    return result;
  }
}
