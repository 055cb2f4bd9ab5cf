/**
 * Fan-out and silent observers.
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

/** Forwards every event to each child observer. */
export class MultiObserver implements IObserver {
  constructor(private readonly observers: IObserver[]) {}

  onSessionStart(meta: SessionMeta): void {
    for (const o of this.observers) o.onSessionStart(meta);
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    for (const o of this.observers) o.onSessionEnd(meta, stats);
  }

  onPhaseChange(event: PhaseChangeEvent): void {
    for (const o of this.observers) o.onPhaseChange(event);
  }

  onDictation(event: DictationEvent): void {
    for (const o of this.observers) o.onDictation(event);
  }

  onIntent(event: IntentEvent): void {
    for (const o of this.observers) o.onIntent(event);
  }

  onResponse(event: ResponseEvent): void {
    for (const o of this.observers) o.onResponse(event);
  }

  onError(error: Error, context: Record<string, unknown>): void {
    for (const o of this.observers) o.onError(error, context);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    for (const o of this.observers) o.log(level, message, context);
  }

  async flush(): Promise<void> {
    await Promise.all(this.observers.map((o) => o.flush()));
  }
}

/** Drops everything. Default for components constructed without an observer. */
export class NoopObserver implements IObserver {
  onSessionStart(): void {}
  onSessionEnd(): void {}
  onPhaseChange(): void {}
  onDictation(): void {}
  onIntent(): void {}
  onResponse(): void {}
  onError(): void {}
  log(): void {}
  async flush(): Promise<void> {}
}
