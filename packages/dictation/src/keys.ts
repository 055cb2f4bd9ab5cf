/**
 * macOS virtual key codes and the key combinations parley sends.
 */

import type { IKeyEmitter, KeyCombo, KeyModifier } from '@parley/core';
import { sleep } from '@parley/core';

export const KEY_CODES = {
  return: 36,
  escape: 53,
  rightCommand: 54,
  three: 20,
} as const;

/** Named combinations the CLI can emit on request. */
export const KEY_COMBOS = {
  /** Double-tapped to toggle native dictation. */
  toggle: { keyCode: KEY_CODES.rightCommand, modifiers: [] },
  /** Cancels native dictation. */
  cancel: { keyCode: KEY_CODES.escape, modifiers: [] },
  /** Submits the chat input. */
  send: { keyCode: KEY_CODES.return, modifiers: ['command'] },
  /** Full-screen screenshot to file. */
  screenshot: { keyCode: KEY_CODES.three, modifiers: ['command', 'shift'] },
} satisfies Record<string, KeyCombo>;

export type KeyComboName = keyof typeof KEY_COMBOS;

export function isKeyComboName(name: string): name is KeyComboName {
  return Object.prototype.hasOwnProperty.call(KEY_COMBOS, name);
}

/** CGEventFlags bit for each modifier. */
export const MODIFIER_FLAGS: Record<KeyModifier, number> = {
  shift: 1 << 17,
  control: 1 << 18,
  option: 1 << 19,
  command: 1 << 20,
};

export function modifierMask(modifiers: readonly KeyModifier[]): number {
  let mask = 0;
  for (const m of modifiers) mask |= MODIFIER_FLAGS[m];
  return mask;
}

/**
 * Press and release one key combination. Resolves false if either event
 * was not posted; rejections from the emitter propagate.
 */
export async function pressCombo(keys: IKeyEmitter, combo: KeyCombo, holdMs = 50): Promise<boolean> {
  const down = await keys.emit(combo.keyCode, true, combo.modifiers);
  await sleep(holdMs);
  const up = await keys.emit(combo.keyCode, false, combo.modifiers);
  return down && up;
}
