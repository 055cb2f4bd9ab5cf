/**
 * Narrator -- print a line and speak it, never waiting longer than the
 * configured bound.
 *
 * The printed line is the source of truth; speech is best-effort. When
 * synthesis fails or runs past the bound, playback is cancelled and a short
 * fallback notice is printed instead.
 */

import type { IObserver, ISpeechSynthesizer } from '@parley/core';
import { toError, withTimeout } from '@parley/core';
import { NoopObserver } from '@parley/observability';

export interface NarratorOptions {
  tts?: ISpeechSynthesizer;
  observer?: IObserver;
  /** Upper bound for one utterance (ms, default: 120000). */
  timeoutMs?: number;
  /** Line sink (default: stdout). */
  print?: (line: string) => void;
}

/** Timed-out playback carries no error. */
type SpeakResult = { ok: true } | { ok: false; error: Error | null };

export class Narrator {
  private readonly tts?: ISpeechSynthesizer;
  private readonly observer: IObserver;
  private readonly timeoutMs: number;
  private readonly print: (line: string) => void;

  constructor(opts: NarratorOptions = {}) {
    this.tts = opts.tts;
    this.observer = opts.observer ?? new NoopObserver();
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.print = opts.print ?? ((line) => process.stdout.write(line + '\n'));
  }

  /** Print `text` and speak it. Resolves true when it was spoken in full. */
  async say(text: string): Promise<boolean> {
    this.print(text);
    if (!this.tts) return false;

    const abort = new AbortController();
    const result = await withTimeout<SpeakResult>(
      this.tts.speak(text, abort.signal).then(
        (): SpeakResult => ({ ok: true }),
        (err: unknown): SpeakResult => ({ ok: false, error: toError(err) }),
      ),
      this.timeoutMs,
      { ok: false, error: null },
    );

    if (result.ok) return true;

    abort.abort();
    if (result.error) {
      this.observer.onError(result.error, { component: 'narrator', action: 'speak' });
      this.print('  (speech unavailable)');
    } else {
      this.observer.log('warn', `speech exceeded ${this.timeoutMs}ms; cancelled`);
      this.print('  (speech cut short)');
    }
    return false;
  }
}
