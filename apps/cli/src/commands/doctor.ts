/**
 * Doctor command -- health checks for a parley setup.
 *
 * Validates:
 *   1. Node.js version >= 20.10
 *   2. Platform (key events, dictation and the clipboard need macOS)
 *   3. Config file exists and is valid
 *   4. Each OS capability the loop relies on
 */

import type { CapabilityName, ParleyConfig } from '@parley/core';
import { CAPABILITY_NAMES, REQUIRED_CAPABILITIES, toError } from '@parley/core';
import { configExists, getConfigPath, getDefaultConfig, loadConfig } from '../config.js';
import { detectCapabilities, DEFAULT_AVAILABILITY_CHECKS } from '../session.js';
import type { AvailabilityChecks } from '../session.js';
import type { Status } from '../ui.js';
import { ACCENT, BOLD, DIM, GREEN, RED, RESET, YELLOW, separator, statusBadge, statusPrefix } from '../ui.js';

// ---------------------------------------------------------------------------
// Check result type
// ---------------------------------------------------------------------------

export interface CheckResult {
  name: string;
  status: Status;
  message: string;
}

const CAPABILITY_LABELS: Record<CapabilityName, { name: string; present: string; missing: string }> = {
  keys: {
    name: 'Key events',
    present: 'osascript can post key events',
    missing: 'osascript not found; dictation toggling and send are disabled',
  },
  probe: {
    name: 'Dictation probe',
    present: 'process list readable',
    missing: 'dictation state cannot be observed on this platform',
  },
  clipboard: {
    name: 'Clipboard',
    present: 'pbpaste / pbcopy available',
    missing: 'pbpaste not found; replies cannot be read',
  },
  recorder: {
    name: 'Microphone',
    present: 'SoX rec available',
    missing: "SoX 'rec' not found. Install SoX (brew install sox).",
  },
  stt: {
    name: 'Transcription',
    present: 'Whisper API key configured',
    missing: 'No API key. Set OPENAI_API_KEY or stt.apiKey in config.',
  },
  tts: {
    name: 'Speech',
    present: 'macOS say available',
    missing: 'say unavailable or disabled; replies are printed only',
  },
};

// ---------------------------------------------------------------------------
// Individual checks
// ---------------------------------------------------------------------------

/** Oldest Node.js release that loads JSON through import attributes. */
const MIN_NODE: readonly [number, number] = [20, 10];

export function checkNodeVersion(version: string = process.versions.node): CheckResult {
  const [major = 0, minor = 0] = version.split('.').map((part) => parseInt(part, 10));
  const required = `>= ${MIN_NODE[0]}.${MIN_NODE[1]}`;

  if (major > MIN_NODE[0] || (major === MIN_NODE[0] && minor >= MIN_NODE[1])) {
    return { name: 'Node.js version', status: 'pass', message: `Node.js v${version} (${required} required)` };
  }

  return {
    name: 'Node.js version',
    status: 'fail',
    message: `Node.js v${version} detected. Version ${required} is required.`,
  };
}

function checkPlatform(): CheckResult {
  if (process.platform === 'darwin') {
    return { name: 'Platform', status: 'pass', message: 'macOS' };
  }
  return {
    name: 'Platform',
    status: 'warn',
    message: `${process.platform}: native dictation and key events need macOS`,
  };
}

function checkConfigFile(): { result: CheckResult; config: ParleyConfig } {
  const path = getConfigPath();

  let config: ParleyConfig;
  try {
    config = loadConfig();
  } catch (err) {
    return {
      result: { name: 'Config file', status: 'fail', message: toError(err).message.split('\n')[0] ?? '' },
      config: getDefaultConfig(),
    };
  }

  if (!configExists()) {
    return {
      result: { name: 'Config file', status: 'warn', message: `Not found at ${path}; using defaults.` },
      config,
    };
  }

  return { result: { name: 'Config file', status: 'pass', message: `Valid config at ${path}` }, config };
}

async function checkCapabilities(config: ParleyConfig, checks: AvailabilityChecks): Promise<CheckResult[]> {
  const caps = await detectCapabilities(config, checks);

  return CAPABILITY_NAMES.map((name): CheckResult => {
    const label = CAPABILITY_LABELS[name];
    if (caps[name] !== undefined) {
      return { name: label.name, status: 'pass', message: label.present };
    }
    return {
      name: label.name,
      status: REQUIRED_CAPABILITIES.includes(name) ? 'fail' : 'warn',
      message: label.missing,
    };
  });
}

/** Run every check in order. */
export async function collectChecks(
  checks: AvailabilityChecks = DEFAULT_AVAILABILITY_CHECKS,
): Promise<CheckResult[]> {
  const { result, config } = checkConfigFile();
  return [
    checkNodeVersion(),
    checkPlatform(),
    result,
    ...(await checkCapabilities(config, checks)),
  ];
}

// ---------------------------------------------------------------------------
// Main doctor command
// ---------------------------------------------------------------------------

export async function doctor(checks: AvailabilityChecks = DEFAULT_AVAILABILITY_CHECKS): Promise<void> {
  console.log(`\n  ${ACCENT}${BOLD}parley doctor${RESET}`);
  console.log(separator());
  console.log('');

  const results = await collectChecks(checks);

  for (const check of results) {
    console.log(`  ${statusPrefix(check.status)} ${check.name.padEnd(20, ' ')} ${check.message}`);
  }

  const count = (status: Status) => results.filter((c) => c.status === status).length;
  const failCount = count('fail');
  const warnCount = count('warn');

  console.log(`\n${separator()}`);
  console.log(
    `  ${statusBadge('pass')} ${count('pass')}  ` +
    `${statusBadge('warn')} ${warnCount}  ` +
    `${statusBadge('fail')} ${failCount}  ` +
    `${DIM}(${results.length} checks)${RESET}`,
  );

  if (failCount > 0) {
    console.log(`\n  ${RED}${BOLD}Issues found.${RESET} Fix the failures above before running parley.`);
    process.exitCode = 1;
  } else if (warnCount > 0) {
    console.log(`\n  ${YELLOW}Warnings found.${RESET} parley will run with reduced features.`);
  } else {
    console.log(`\n  ${GREEN}${BOLD}All checks passed.${RESET} Ready to talk.`);
  }

  console.log('');
}
