/**
 * Listen command -- record one clip and print how it was understood.
 *
 *   parley listen [--seconds N] [--lang ja|en]
 *
 * Shows the transcript, the intent it classifies as, and whether it contains
 * a stop phrase. Handy for tuning keywords and checking the microphone.
 */

import type { IntentSample, ParleyConfig } from '@parley/core';
import { createObserver } from '@parley/observability';
import { IntentRecognizer, matchesAny } from '@parley/voice';
import { loadConfig } from '../config.js';
import { detectCapabilities, DEFAULT_AVAILABILITY_CHECKS } from '../session.js';
import type { AvailabilityChecks } from '../session.js';
import { ACCENT, BOLD, CROSS, DIM, RESET, kvRow } from '../ui.js';

export interface ListenOptions {
  checks?: AvailabilityChecks;
}

interface ListenFlags {
  seconds?: number;
  language?: ParleyConfig['language'];
}

export function parseListenFlags(args: string[]): ListenFlags {
  const flags: ListenFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--seconds' || arg === '-s') {
      const seconds = Number(args[++i]);
      if (!Number.isFinite(seconds) || seconds <= 0) {
        throw new Error('--seconds expects a positive number');
      }
      flags.seconds = seconds;
    } else if (arg === '--lang' || arg === '-l') {
      const value = args[++i];
      if (value !== 'ja' && value !== 'en') {
        throw new Error('--lang expects "ja" or "en"');
      }
      flags.language = value;
    } else {
      throw new Error(`Unknown option for listen: ${arg}`);
    }
  }

  return flags;
}

/** Format one sample for the terminal. */
export function describeSample(sample: IntentSample, stopPhrases: readonly string[]): string[] {
  const heardStop = sample.transcript !== '' && matchesAny(sample.transcript, stopPhrases);
  return [
    kvRow('Transcript', sample.transcript ? `"${sample.transcript}"` : `${DIM}(nothing heard)${RESET}`),
    kvRow('Intent', sample.classification),
    kvRow('Stop phrase', heardStop ? 'yes' : 'no'),
  ];
}

export async function listen(args: string[], opts: ListenOptions = {}): Promise<void> {
  const flags = parseListenFlags(args);
  const config = loadConfig();
  if (flags.language) config.language = flags.language;

  const caps = await detectCapabilities(config, opts.checks ?? DEFAULT_AVAILABILITY_CHECKS);
  if (!caps.recorder || !caps.stt) {
    console.error(`\n  ${CROSS} Listening needs a microphone (SoX) and a transcription key.`);
    console.error(`  ${DIM}Run 'parley doctor' for details.${RESET}\n`);
    process.exitCode = 2;
    return;
  }

  const intent = new IntentRecognizer({
    recorder: caps.recorder,
    stt: caps.stt,
    observer: createObserver({ observers: ['console'], logLevel: config.observability.logLevel }),
    language: config.language,
    keywords: config.intent.keywords,
  });

  const seconds = flags.seconds ?? config.intent.clipSeconds;
  console.log(`\n  ${ACCENT}${BOLD}Listening for ${seconds}s...${RESET}`);

  const sample = await intent.sampleOnce(seconds);

  console.log('');
  for (const line of describeSample(sample, intent.keywords.stop)) {
    console.log(`  ${line}`);
  }
  console.log('');
}
