/**
 * MacKeyEmitter -- synthetic key events through Quartz Event Services.
 *
 * Each event is posted by a short JXA script run with `osascript -l
 * JavaScript`, which bridges to CGEventCreateKeyboardEvent / CGEventPost.
 * The calling terminal needs the Accessibility permission for events to
 * reach other applications.
 *
 * Zero npm dependencies -- uses only osascript via node:child_process.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import type { IKeyEmitter, KeyModifier } from '@parley/core';
import { CollaboratorError, toError } from '@parley/core';
import { modifierMask } from './keys.js';

const execFile = promisify(execFileCb);

export interface MacKeyEmitterOptions {
  /** Kill osascript after this long (ms, default: 2000). */
  timeoutMs?: number;
}

/** Build the JXA source that posts one keyboard event. */
export function buildKeyEventScript(keyCode: number, down: boolean, modifiers: readonly KeyModifier[] = []): string {
  const lines = [
    "ObjC.import('CoreGraphics');",
    `const event = $.CGEventCreateKeyboardEvent($(), ${Math.trunc(keyCode)}, ${down ? 'true' : 'false'});`,
  ];
  const mask = modifierMask(modifiers);
  if (mask !== 0) {
    lines.push(`$.CGEventSetFlags(event, ${mask});`);
  }
  lines.push('$.CGEventPost($.kCGHIDEventTap, event);');
  return lines.join('\n');
}

export class MacKeyEmitter implements IKeyEmitter {
  private readonly timeoutMs: number;

  constructor(opts: MacKeyEmitterOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 2000;
  }

  /** Whether osascript is present (macOS only). */
  static async isAvailable(): Promise<boolean> {
    if (process.platform !== 'darwin') return false;
    try {
      await execFile('which', ['osascript']);
      return true;
    } catch {
      return false;
    }
  }

  async emit(keyCode: number, down: boolean, modifiers: readonly KeyModifier[] = []): Promise<boolean> {
    const script = buildKeyEventScript(keyCode, down, modifiers);
    try {
      await execFile('osascript', ['-l', 'JavaScript', '-e', script], { timeout: this.timeoutMs });
      return true;
    } catch (err) {
      throw new CollaboratorError(`Key event ${keyCode} (${down ? 'down' : 'up'}) failed: ${toError(err).message}`, 'keys', {
        keyCode,
        down,
      });
    }
  }
}
