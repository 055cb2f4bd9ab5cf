/**
 * ResponseWatcher -- detect a new reply on a shared text channel.
 *
 * The chat app offers no API for its output; the user copies the reply and
 * the watcher notices the clipboard changing. Novelty is exact text equality
 * against the last value seen, so the same reply is never handed out twice.
 * The watcher cannot tell which application wrote the content.
 */

import type { IObserver, ITextChannel, ResponseSnapshot } from '@parley/core';
import { abortableSleep, toError } from '@parley/core';
import { NoopObserver } from '@parley/observability';

export class ResponseWatcher {
  private readonly channel?: ITextChannel;
  private readonly observer: IObserver;
  private last: ResponseSnapshot = { content: '', observedAt: new Date(0) };

  constructor(channel?: ITextChannel, observer?: IObserver) {
    this.channel = channel;
    this.observer = observer ?? new NoopObserver();
  }

  get snapshot(): Readonly<ResponseSnapshot> {
    return { ...this.last };
  }

  /**
   * Adopt whatever the channel holds now as already seen, so text copied
   * before the question is not mistaken for the answer.
   */
  async prime(): Promise<void> {
    const content = await this.read();
    if (content !== null) {
      this.last = { content, observedAt: new Date() };
    }
  }

  /**
   * Poll until the channel holds non-empty content that differs from the
   * snapshot, then adopt and return it. Resolves null on timeout or abort.
   */
  async pollForChange(pollIntervalMs: number, timeoutMs: number, signal?: AbortSignal): Promise<string | null> {
    const deadline = Date.now() + timeoutMs;

    while (!signal?.aborted) {
      const content = await this.read();

      if (content && content !== this.last.content) {
        this.last = { content, observedAt: new Date() };
        this.observer.onResponse({ length: content.length, observedAt: this.last.observedAt });
        return content;
      }

      if (Date.now() >= deadline) break;
      await abortableSleep(pollIntervalMs, signal);
    }

    return null;
  }

  /** Read the channel; null when there is none or the read failed. */
  private async read(): Promise<string | null> {
    if (!this.channel) return null;
    try {
      return await this.channel.read();
    } catch (err) {
      this.observer.onError(toError(err), { component: 'response', action: 'read' });
      return null;
    }
  }
}
