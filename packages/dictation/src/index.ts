/**
 * @parley/dictation - Native dictation control for parley.
 *
 * The DictationController state machine plus the macOS adapters it drives:
 * Quartz key events through osascript and a process-list activity probe.
 *
 * @packageDocumentation
 */

export { DictationController } from './controller.js';
export { MacKeyEmitter, buildKeyEventScript } from './macos-keys.js';
export { ProcessActivityProbe, DEFAULT_DICTATION_PROCESSES } from './process-probe.js';
export { KEY_CODES, KEY_COMBOS, MODIFIER_FLAGS, isKeyComboName, modifierMask, pressCombo } from './keys.js';
export type { DictationControllerOptions } from './controller.js';
export type { MacKeyEmitterOptions } from './macos-keys.js';
export type { ProcessActivityProbeOptions } from './process-probe.js';
export type { KeyComboName } from './keys.js';
