/**
 * StopPhraseMonitor -- background listener that ends dictation on a spoken
 * stop phrase.
 *
 * While the foreground waits for dictation to finish, the monitor records
 * short clips and checks each transcript for a stop phrase. On a hit it
 * stops dictation itself, keeps the stop result and raises the StopFlag.
 * A capture that ends early (a failed recording) waits out the rest of its
 * clip before the next one.
 *
 *   start() → StopFlag      (foreground races flag.wait() against completion)
 *   halt()  → abort + join  (kills an in-flight recording; bounded wait)
 */

import type { IObserver, StopResult } from '@parley/core';
import { StopFlag, abortableSleep, toError, withTimeout } from '@parley/core';
import type { DictationController } from '@parley/dictation';
import type { IntentRecognizer } from '@parley/voice';
import { NoopObserver } from '@parley/observability';

export interface StopPhraseMonitorOptions {
  intent: IntentRecognizer;
  controller: DictationController;
  phrases: readonly string[];
  observer?: IObserver;
  /** Length of each listening clip (seconds, default: 3). */
  clipSeconds?: number;
  /** Minimum pause between clips (ms, default: 0). */
  intervalMs?: number;
  /** How long halt() waits for the task to exit (ms, default: 2000). */
  joinTimeoutMs?: number;
}

export class StopPhraseMonitor {
  private readonly intent: IntentRecognizer;
  private readonly controller: DictationController;
  private readonly phrases: readonly string[];
  private readonly observer: IObserver;
  private readonly clipSeconds: number;
  private readonly intervalMs: number;
  private readonly joinTimeoutMs: number;

  private abort: AbortController | null = null;
  private task: Promise<void> | null = null;
  private lastStop: StopResult | null = null;

  constructor(opts: StopPhraseMonitorOptions) {
    this.intent = opts.intent;
    this.controller = opts.controller;
    this.phrases = opts.phrases;
    this.observer = opts.observer ?? new NoopObserver();
    this.clipSeconds = opts.clipSeconds ?? 3;
    this.intervalMs = opts.intervalMs ?? 0;
    this.joinTimeoutMs = opts.joinTimeoutMs ?? 2000;
  }

  get running(): boolean {
    return this.task !== null;
  }

  /** What stop() returned after the last stop phrase; null when none was heard. */
  get stopResult(): StopResult | null {
    return this.lastStop;
  }

  /**
   * Begin listening. Only one monitor task runs at a time; a second start()
   * before halt() is rejected.
   */
  start(): StopFlag {
    if (this.task) {
      throw new Error('Stop-phrase monitor is already running');
    }

    const flag = new StopFlag();
    this.lastStop = null;
    this.abort = new AbortController();
    this.task = this.listen(flag, this.abort.signal);
    return flag;
  }

  /**
   * Abort the task and wait for it to exit. Resolves false when it did not
   * exit within the join timeout; it is then left to finish on its own.
   */
  async halt(): Promise<boolean> {
    const task = this.task;
    if (!task) return true;

    this.abort?.abort();
    const joined = await withTimeout(task.then(() => true), this.joinTimeoutMs, false);
    if (!joined) {
      this.observer.log('warn', `stop-phrase monitor did not exit within ${this.joinTimeoutMs}ms`);
    }

    this.task = null;
    this.abort = null;
    return joined;
  }

  private async listen(flag: StopFlag, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const began = Date.now();
        const heard = await this.intent.listenFor(this.phrases, this.clipSeconds, signal);

        if (heard) {
          this.observer.log('info', 'stop phrase heard; ending dictation');
          this.lastStop = await this.controller.stop();
          flag.set();
          return;
        }

        const remainingMs = this.clipSeconds * 1000 - (Date.now() - began);
        await abortableSleep(Math.max(this.intervalMs, remainingMs), signal);
      }
    } catch (err) {
      this.observer.onError(toError(err), { component: 'monitor', action: 'listen' });
    }
  }
}
