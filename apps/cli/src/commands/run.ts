/**
 * Run command -- start the voice-gated conversation loop.
 *
 * Loads config, builds the capability registry once, refuses to start
 * without a way to hear the user (exit 2), warns once about anything else
 * that is missing, then hands control to the orchestrator until it reaches
 * `terminated`. SIGINT and SIGTERM abort the run; dictation is still torn
 * down before the process exits.
 */

import type { IObserver, Language } from '@parley/core';
import { CapabilityError, assertRequiredCapabilities } from '@parley/core';
import { createObserver } from '@parley/observability';
import { loadConfig } from '../config.js';
import { buildSession, detectCapabilities, DEFAULT_AVAILABILITY_CHECKS } from '../session.js';
import type { AvailabilityChecks } from '../session.js';
import { ACCENT, BOLD, DIM, RED, RESET, WARN, kvRow, separator } from '../ui.js';

export const EXIT_CAPABILITY_MISSING = 2;

export interface RunOptions {
  checks?: AvailabilityChecks;
  /** Observer to report to (default: built from config). */
  observer?: IObserver;
  /** Line sink for narration (default: stdout). */
  print?: (line: string) => void;
  /** External abort, in addition to SIGINT/SIGTERM. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface RunFlags {
  language?: Language;
  monitor?: boolean;
}

export function parseRunFlags(args: string[]): RunFlags {
  const flags: RunFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--lang' || arg === '-l') {
      const value = args[++i];
      if (value !== 'ja' && value !== 'en') {
        throw new Error(`--lang expects "ja" or "en", got ${value === undefined ? 'nothing' : `"${value}"`}`);
      }
      flags.language = value;
    } else if (arg === '--no-monitor') {
      flags.monitor = false;
    } else {
      throw new Error(`Unknown option for run: ${arg}`);
    }
  }

  return flags;
}

// ---------------------------------------------------------------------------
// Main run command
// ---------------------------------------------------------------------------

export async function run(args: string[], opts: RunOptions = {}): Promise<void> {
  const flags = parseRunFlags(args);
  const config = loadConfig();
  if (flags.language) config.language = flags.language;
  if (flags.monitor !== undefined) config.monitor.enabled = flags.monitor;

  const observer = opts.observer ?? createObserver(config.observability);
  const caps = await detectCapabilities(config, opts.checks ?? DEFAULT_AVAILABILITY_CHECKS);

  let missing: string[];
  try {
    missing = assertRequiredCapabilities(caps);
  } catch (err) {
    if (!(err instanceof CapabilityError)) throw err;
    console.error(`\n  ${RED}${BOLD}Cannot start:${RESET} ${err.message}`);
    console.error(`  ${DIM}Run 'parley doctor' for details.${RESET}\n`);
    process.exitCode = EXIT_CAPABILITY_MISSING;
    return;
  }

  console.log(`\n  ${ACCENT}${BOLD}parley${RESET}`);
  console.log(separator());
  console.log(`  ${kvRow('Language', config.language)}`);
  console.log(`  ${kvRow('Stop phrases', config.monitor.enabled ? 'on' : 'off')}`);
  if (missing.length > 0) {
    console.log(`  ${WARN} Running without: ${missing.join(', ')}`);
    observer.log('warn', `running without: ${missing.join(', ')}`);
  }
  console.log('');

  const { orchestrator } = buildSession(config, caps, { observer, print: opts.print });

  const abort = new AbortController();
  const onSignal = () => abort.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  opts.signal?.addEventListener('abort', onSignal, { once: true });

  try {
    const outcome = await orchestrator.run(abort.signal);

    console.log(`\n${separator()}`);
    console.log(`  ${kvRow('Ended', outcome.reason)}`);
    console.log(`  ${kvRow('Questions', String(outcome.cycles))}`);
    for (const warning of outcome.warnings) {
      console.log(`  ${WARN} ${warning}`);
    }
    console.log('');

    process.exitCode = outcome.exitCode;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    opts.signal?.removeEventListener('abort', onSignal);
    await observer.flush();
  }
}
