/**
 * Keys command -- emit one named key combination.
 *
 *   parley keys toggle       double-tap the dictation toggle key
 *   parley keys cancel       press the dictation cancel key
 *   parley keys send         press the send combination
 *   parley keys screenshot   Command+Shift+3
 *
 * Useful for checking the Accessibility permission and the configured key
 * codes without running the whole loop.
 */

import type { IKeyEmitter, KeyCombo, ParleyConfig } from '@parley/core';
import { sleep } from '@parley/core';
import { KEY_COMBOS, MacKeyEmitter, isKeyComboName, pressCombo } from '@parley/dictation';
import type { KeyComboName } from '@parley/dictation';
import { loadConfig } from '../config.js';
import { BOLD, CHECK, CROSS, RED, RESET } from '../ui.js';

export interface KeysOptions {
  /** Emitter to use (default: osascript, when available). */
  emitter?: IKeyEmitter;
}

/** The combination a name maps to, with configured key codes applied. */
export function resolveCombo(name: KeyComboName, config: ParleyConfig): KeyCombo {
  switch (name) {
    case 'toggle':
      return { keyCode: config.dictation.toggleKeyCode, modifiers: [] };
    case 'cancel':
      return { keyCode: config.dictation.cancelKeyCode, modifiers: [] };
    case 'send':
      return config.send;
    case 'screenshot':
      return KEY_COMBOS.screenshot;
  }
}

export async function keys(args: string[], opts: KeysOptions = {}): Promise<void> {
  const name = args[0];
  if (name === undefined || !isKeyComboName(name)) {
    console.error(`\n  ${RED}Usage:${RESET} parley keys <${Object.keys(KEY_COMBOS).join('|')}>\n`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  let emitter = opts.emitter;
  if (!emitter) {
    if (!(await MacKeyEmitter.isAvailable())) {
      console.error(`\n  ${CROSS} Key events need macOS with osascript.\n`);
      process.exitCode = 2;
      return;
    }
    emitter = new MacKeyEmitter({ timeoutMs: config.dictation.emitTimeoutMs });
  }

  const combo = resolveCombo(name, config);
  const { keyHoldMs, pulseGapMs } = config.dictation;

  let ok = await pressCombo(emitter, combo, keyHoldMs);
  if (ok && name === 'toggle') {
    await sleep(pulseGapMs);
    ok = await pressCombo(emitter, combo, keyHoldMs);
  }

  if (ok) {
    console.log(`  ${CHECK} Sent ${BOLD}${name}${RESET}`);
  } else {
    console.error(`  ${CROSS} Could not send ${name}. Check the Accessibility permission.`);
    process.exitCode = 1;
  }
}
