/**
 * Observability package tests.
 *
 * Console formatting and level filtering, JSONL file output with rotation,
 * fan-out, and the observer factory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync, existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';
import { createObserver } from './index.js';

// ===========================================================================
// ConsoleObserver
// ===========================================================================

describe('ConsoleObserver', () => {
  let lines: string[];
  let observer: ConsoleObserver;

  beforeEach(() => {
    lines = [];
    observer = new ConsoleObserver({ logLevel: 'info', colors: false, write: (l) => lines.push(l) });
  });

  it('formats a log line with level tag and context', () => {
    observer.log('warn', 'probe failed', { attempt: 2, name: 'DictationIM' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] WARN  probe failed attempt=2 name=DictationIM$/);
  });

  it('drops lines below the configured level', () => {
    observer.log('debug', 'noise');
    observer.onDictation({ action: 'start', result: 'started', state: 'active', duration: 5 });

    expect(lines).toHaveLength(0);
  });

  it('promotes failed dictation events to warnings', () => {
    observer.onDictation({ action: 'start', result: 'failed', state: 'inactive', duration: 1500 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('WARN  dictation start: failed state=inactive durationMs=1500');
  });

  it('describes phase changes and omits a zero retry count', () => {
    observer.onPhaseChange({ sessionId: 's1', from: 'setup', to: 'dictating', retryCount: 0 });

    expect(lines[0]).toMatch(/INFO  phase setup -> dictating$/);
  });

  it('reports intents with their transcript', () => {
    observer.onIntent({ transcript: 'はい', classification: 'affirmative', attemptIndex: 1, purpose: 'confirm' });

    expect(lines[0]).toMatch(/INFO  heard "はい" -> affirmative attempt=1 purpose=confirm$/);
  });

  it('wraps lines in color codes when colors are enabled', () => {
    const colored: string[] = [];
    const o = new ConsoleObserver({ colors: true, write: (l) => colored.push(l) });
    o.log('error', 'boom');

    expect(colored[0]!.startsWith('\x1b[31m')).toBe(true);
    expect(colored[0]!.endsWith('\x1b[0m')).toBe(true);
  });
});

// ===========================================================================
// FileObserver
// ===========================================================================

describe('FileObserver', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'parley-obs-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one JSON line per event on flush', async () => {
    const filePath = join(dir, 'logs', 'parley.jsonl');
    const observer = new FileObserver({ filePath });

    observer.onPhaseChange({ sessionId: 's1', from: 'setup', to: 'dictating', retryCount: 0 });
    observer.onError(new Error('clipboard busy'), { collaborator: 'clipboard' });
    await observer.flush();

    const rows = readFileSync(filePath, 'utf8').trim().split('\n').map((l) => JSON.parse(l) as Record<string, unknown>);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ type: 'phase_change', from: 'setup', to: 'dictating' });
    expect(rows[1]).toMatchObject({
      type: 'error',
      error: { name: 'Error', message: 'clipboard busy' },
      context: { collaborator: 'clipboard' },
    });
  });

  it('filters free-form log lines by level', async () => {
    const filePath = join(dir, 'parley.jsonl');
    const observer = new FileObserver({ filePath, logLevel: 'warn' });

    observer.log('info', 'skipped');
    observer.log('error', 'kept');
    await observer.flush();

    const rows = readFileSync(filePath, 'utf8').trim().split('\n');
    expect(rows).toHaveLength(1);
    expect(JSON.parse(rows[0]!)).toMatchObject({ type: 'log', level: 'error', message: 'kept' });
  });

  it('rotates the file once it exceeds maxBytes', async () => {
    const filePath = join(dir, 'parley.jsonl');
    writeFileSync(filePath, 'x'.repeat(64));
    const observer = new FileObserver({ filePath, maxBytes: 32 });

    observer.log('info', 'fresh');
    await observer.flush();

    expect(readFileSync(filePath + '.1', 'utf8')).toBe('x'.repeat(64));
    expect(readFileSync(filePath, 'utf8')).toContain('"message":"fresh"');
  });

  it('does not create the file when nothing was written', async () => {
    const filePath = join(dir, 'empty.jsonl');
    const observer = new FileObserver({ filePath });
    await observer.flush();

    expect(existsSync(filePath)).toBe(false);
  });
});

// ===========================================================================
// MultiObserver / createObserver
// ===========================================================================

describe('MultiObserver', () => {
  it('forwards events to every child', async () => {
    const a = new NoopObserver();
    const b = new NoopObserver();
    const spyA = vi.spyOn(a, 'onResponse');
    const spyB = vi.spyOn(b, 'onResponse');
    const flushB = vi.spyOn(b, 'flush');

    const multi = new MultiObserver([a, b]);
    const event = { length: 5, observedAt: new Date() };
    multi.onResponse(event);
    await multi.flush();

    expect(spyA).toHaveBeenCalledWith(event);
    expect(spyB).toHaveBeenCalledWith(event);
    expect(flushB).toHaveBeenCalledOnce();
  });
});

describe('createObserver', () => {
  it('returns a NoopObserver for an empty list', () => {
    expect(createObserver({ observers: [], logLevel: 'info' })).toBeInstanceOf(NoopObserver);
  });

  it('returns the single observer unwrapped', () => {
    expect(createObserver({ observers: ['console'], logLevel: 'info' })).toBeInstanceOf(ConsoleObserver);
  });

  it('ignores unknown observer names', () => {
    expect(createObserver({ observers: ['console', 'statsd'], logLevel: 'info' })).toBeInstanceOf(ConsoleObserver);
  });

  it('wraps several observers in a MultiObserver', () => {
    const dir = mkdtempSync(join(tmpdir(), 'parley-obs-'));
    try {
      const observer = createObserver({
        observers: ['console', 'file'],
        logLevel: 'info',
        logFile: join(dir, 'parley.jsonl'),
      });
      expect(observer).toBeInstanceOf(MultiObserver);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
