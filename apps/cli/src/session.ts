/**
 * Startup wiring: detect which OS collaborators are usable, freeze them into
 * the capability registry, and build the components of one session from the
 * loaded config.
 */

import type { Capabilities, IObserver, ParleyConfig } from '@parley/core';
import { createCapabilities } from '@parley/core';
import { DictationController, MacKeyEmitter, ProcessActivityProbe } from '@parley/dictation';
import { IntentRecognizer, SayTTS, SoxRecorder, WhisperSTT } from '@parley/voice';
import { PasteboardChannel, ResponseWatcher } from '@parley/response';
import { CycleOrchestrator, Narrator, PROMPTS } from '@parley/orchestrator';

// ---------------------------------------------------------------------------
// Capability detection
// ---------------------------------------------------------------------------

/** Availability checks, one per adapter. Overridable in tests. */
export interface AvailabilityChecks {
  keys: () => Promise<boolean>;
  probe: () => Promise<boolean>;
  clipboard: () => Promise<boolean>;
  recorder: () => Promise<boolean>;
  tts: () => Promise<boolean>;
}

export const DEFAULT_AVAILABILITY_CHECKS: AvailabilityChecks = {
  keys: () => MacKeyEmitter.isAvailable(),
  probe: async () => process.platform === 'darwin',
  clipboard: () => PasteboardChannel.isAvailable(),
  recorder: () => SoxRecorder.isAvailable(),
  tts: () => SayTTS.isAvailable(),
};

/**
 * Build the capability registry once. A handle is present only when its
 * adapter is usable on this machine and enabled in config.
 */
export async function detectCapabilities(
  config: ParleyConfig,
  checks: AvailabilityChecks = DEFAULT_AVAILABILITY_CHECKS,
): Promise<Readonly<Capabilities>> {
  const [keys, probe, clipboard, recorder, tts] = await Promise.all([
    checks.keys(),
    checks.probe(),
    checks.clipboard(),
    checks.recorder(),
    config.tts.provider === 'say' ? checks.tts() : Promise.resolve(false),
  ]);

  const apiKey = config.stt.apiKey ?? '';
  const sttEnabled = config.stt.provider === 'whisper' && apiKey.length > 0;

  return createCapabilities({
    keys: keys ? new MacKeyEmitter({ timeoutMs: config.dictation.emitTimeoutMs }) : undefined,
    probe: probe
      ? new ProcessActivityProbe({
        processNames: config.dictation.processNames,
        timeoutMs: config.dictation.emitTimeoutMs,
      })
      : undefined,
    clipboard: clipboard ? new PasteboardChannel() : undefined,
    recorder: recorder ? new SoxRecorder() : undefined,
    stt: sttEnabled ? new WhisperSTT({ apiKey, model: config.stt.model }) : undefined,
    tts: tts ? new SayTTS({ voice: config.tts.voice, rate: config.tts.rate }) : undefined,
  });
}

// ---------------------------------------------------------------------------
// Session assembly
// ---------------------------------------------------------------------------

export interface Session {
  controller: DictationController;
  intent: IntentRecognizer;
  watcher: ResponseWatcher;
  narrator: Narrator;
  orchestrator: CycleOrchestrator;
}

export interface SessionOptions {
  observer: IObserver;
  /** Line sink for narration (default: stdout). */
  print?: (line: string) => void;
}

export function buildSession(
  config: ParleyConfig,
  caps: Readonly<Capabilities>,
  opts: SessionOptions,
): Session {
  const { observer } = opts;
  const prompts = PROMPTS[config.language];

  const narrator = new Narrator({
    tts: caps.tts,
    observer,
    timeoutMs: config.tts.timeoutMs,
    print: opts.print,
  });

  const controller = new DictationController({
    keys: caps.keys,
    probe: caps.probe,
    observer,
    ...config.dictation,
  });

  const intent = new IntentRecognizer({
    recorder: caps.recorder,
    stt: caps.stt,
    observer,
    language: config.language,
    keywords: config.intent.keywords,
    clipSeconds: config.intent.clipSeconds,
    retryClipSeconds: config.intent.retryClipSeconds,
    maxAttempts: config.intent.maxAttempts,
    retryDelayMs: config.intent.retryDelayMs,
    timeoutMs: config.intent.timeoutMs,
    onRetry: async () => {
      await narrator.say(prompts.retry);
    },
  });

  const watcher = new ResponseWatcher(caps.clipboard, observer);

  const orchestrator = new CycleOrchestrator({
    controller,
    intent,
    watcher,
    narrator,
    keys: caps.keys,
    observer,
    prompts,
    settings: {
      completionTimeoutMs: config.dictation.completionTimeoutMs,
      responsePollIntervalMs: config.response.pollIntervalMs,
      responseTimeoutMs: config.response.timeoutMs,
      confirmTimeoutMs: config.intent.timeoutMs,
      maxPhaseRetries: config.orchestrator.maxPhaseRetries,
      send: config.send,
      keyHoldMs: config.dictation.keyHoldMs,
      monitor: config.monitor,
    },
  });

  return { controller, intent, watcher, narrator, orchestrator };
}
