/**
 * DictationController unit tests.
 *
 * The key emitter and activity probe are in-process fakes; timings are
 * shrunk to a few milliseconds so every path runs quickly.
 */

import { describe, it, expect, vi } from 'vitest';
import type { IActivityProbe, IKeyEmitter, IObserver } from '@parley/core';
import { DictationController } from './controller.js';
import type { DictationControllerOptions } from './controller.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Probe that replays `values` in order, repeating the last one. */
function sequenceProbe(values: boolean[]) {
  let i = 0;
  return {
    isActive: vi.fn(async () => {
      const value = values[Math.min(i, values.length - 1)] ?? false;
      i++;
      return value;
    }),
  } satisfies IActivityProbe;
}

function createKeys() {
  return {
    emit: vi.fn(async (_keyCode: number, _down: boolean) => true),
  } satisfies IKeyEmitter;
}

function createMockObserver(): IObserver {
  return {
    onSessionStart: vi.fn(),
    onSessionEnd: vi.fn(),
    onPhaseChange: vi.fn(),
    onDictation: vi.fn(),
    onIntent: vi.fn(),
    onResponse: vi.fn(),
    onError: vi.fn(),
    log: vi.fn(),
    flush: vi.fn().mockResolvedValue(undefined),
  };
}

const FAST: DictationControllerOptions = {
  pulseGapMs: 1,
  keyHoldMs: 0,
  startSettleMs: 1,
  stopSettleMs: 1,
  pollIntervalMs: 1,
  activationTimeoutMs: 40,
  emitTimeoutMs: 50,
};

// ===========================================================================
// start()
// ===========================================================================

describe('DictationController.start', () => {
  it('returns already_active without emitting when dictation is running', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([true]) });

    await expect(controller.start()).resolves.toBe('already_active');
    expect(keys.emit).not.toHaveBeenCalled();
    expect(controller.session.state).toBe('active');
  });

  it('double-taps the toggle key and confirms with a re-probe', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([false, true]) });

    await expect(controller.start()).resolves.toBe('started');
    expect(keys.emit.mock.calls.map(([code, down]) => [code, down])).toEqual([
      [54, true],
      [54, false],
      [54, true],
      [54, false],
    ]);
    expect(controller.session.state).toBe('active');
    expect(controller.session.lastProbeTime).toBeInstanceOf(Date);
  });

  it('uses a configured toggle key', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, toggleKeyCode: 63, probe: sequenceProbe([false, true]) });

    await controller.start();
    expect(keys.emit.mock.calls.every(([code]) => code === 63)).toBe(true);
  });

  it('returns failed when the probe never confirms', async () => {
    const controller = new DictationController({ ...FAST, keys: createKeys(), probe: sequenceProbe([false]) });

    await expect(controller.start()).resolves.toBe('failed');
    expect(controller.session.state).toBe('inactive');
  });

  it('returns failed without a key emitter', async () => {
    const controller = new DictationController({ ...FAST, probe: sequenceProbe([false, true]) });

    await expect(controller.start()).resolves.toBe('failed');
  });

  it('returns failed and reports the error when an emit rejects', async () => {
    const observer = createMockObserver();
    const keys: IKeyEmitter = { emit: vi.fn().mockRejectedValue(new Error('not trusted')) };
    const controller = new DictationController({ ...FAST, keys, observer, probe: sequenceProbe([false, true]) });

    await expect(controller.start()).resolves.toBe('failed');
    expect(observer.onError).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'not trusted' }),
      expect.objectContaining({ component: 'dictation', action: 'emit' }),
    );
  });

  it('returns failed instead of hanging when an emit never settles', async () => {
    const keys: IKeyEmitter = { emit: () => new Promise<boolean>(() => undefined) };
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([false, true]) });

    await expect(controller.start()).resolves.toBe('failed');
  });

  it('treats probe errors as inactive and reports them', async () => {
    const observer = createMockObserver();
    const probe: IActivityProbe = { isActive: vi.fn().mockRejectedValue(new Error('ps missing')) };
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, observer, probe });

    await expect(controller.start()).resolves.toBe('failed');
    // Probe error on the first check reads as inactive, so the tap is sent.
    expect(keys.emit).toHaveBeenCalledTimes(4);
    expect(observer.onError).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'ps missing' }),
      { component: 'dictation', action: 'probe' },
    );
  });

  it('reports each start to the observer', async () => {
    const observer = createMockObserver();
    const controller = new DictationController({ ...FAST, keys: createKeys(), observer, probe: sequenceProbe([false, true]) });

    await controller.start();
    expect(observer.onDictation).toHaveBeenCalledWith(
      expect.objectContaining({ action: 'start', result: 'started', state: 'active' }),
    );
  });
});

// ===========================================================================
// stop()
// ===========================================================================

describe('DictationController.stop', () => {
  it('returns already_inactive without emitting any key event', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([false]) });

    await expect(controller.stop()).resolves.toBe('already_inactive');
    expect(keys.emit).not.toHaveBeenCalled();
  });

  it('toggles dictation off with the double-tap by default', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([true, false]) });

    await expect(controller.stop()).resolves.toBe('stopped');
    expect(keys.emit).toHaveBeenCalledTimes(4);
    expect(controller.session.state).toBe('inactive');
  });

  it('sends a single cancel key in cancel mode', async () => {
    const keys = createKeys();
    const controller = new DictationController({
      ...FAST,
      keys,
      stopMode: 'cancel',
      probe: sequenceProbe([true, false]),
    });

    await expect(controller.stop()).resolves.toBe('stopped');
    expect(keys.emit.mock.calls.map(([code, down]) => [code, down])).toEqual([
      [53, true],
      [53, false],
    ]);
  });

  it('returns failed when dictation is still running after the settle delay', async () => {
    const controller = new DictationController({ ...FAST, keys: createKeys(), probe: sequenceProbe([true]) });

    await expect(controller.stop()).resolves.toBe('failed');
    expect(controller.session.state).toBe('active');
  });
});

// ===========================================================================
// waitForCompletion()
// ===========================================================================

describe('DictationController.waitForCompletion', () => {
  it('returns false early when dictation never becomes active', async () => {
    const probe = sequenceProbe([false]);
    const controller = new DictationController({ ...FAST, probe });
    const start = Date.now();

    await expect(controller.waitForCompletion(5000)).resolves.toBe(false);
    // Bounded by the activation timeout, not the overall one.
    expect(Date.now() - start).toBeLessThan(1000);
  });

  it('returns true once dictation has started and ended', async () => {
    const controller = new DictationController({ ...FAST, probe: sequenceProbe([false, true, true, false]) });

    await expect(controller.waitForCompletion(1000)).resolves.toBe(true);
    expect(controller.session.state).toBe('inactive');
  });

  it('returns false when dictation outlasts the timeout', async () => {
    const controller = new DictationController({ ...FAST, probe: sequenceProbe([true]) });

    await expect(controller.waitForCompletion(30)).resolves.toBe(false);
    expect(controller.session.state).toBe('active');
  });

  it('returns false promptly when aborted', async () => {
    const controller = new DictationController({ ...FAST, pollIntervalMs: 5, probe: sequenceProbe([true]) });
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 10);
    const start = Date.now();

    await expect(controller.waitForCompletion(5000, ac.signal)).resolves.toBe(false);
    expect(Date.now() - start).toBeLessThan(1000);
  });
});

// ===========================================================================
// teardown()
// ===========================================================================

describe('DictationController.teardown', () => {
  it('stops running dictation and resets the session', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([true, false]) });

    await expect(controller.teardown()).resolves.toBe('stopped');
    expect(controller.session.state).toBe('inactive');
  });

  it('is idempotent', async () => {
    const keys = createKeys();
    const controller = new DictationController({ ...FAST, keys, probe: sequenceProbe([false]) });

    await expect(controller.teardown()).resolves.toBe('already_inactive');
    await expect(controller.teardown()).resolves.toBe('already_inactive');
    expect(keys.emit).not.toHaveBeenCalled();
  });
});
