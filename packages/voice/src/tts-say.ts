/**
 * SayTTS -- speech synthesis through the macOS `say` command.
 *
 * Blocks until playback finishes. Aborting the signal kills `say`.
 *
 * Zero npm dependencies -- uses `node:child_process`.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import type { ISpeechSynthesizer } from '@parley/core';
import { CollaboratorError, toError } from '@parley/core';

const execFile = promisify(execFileCb);

export interface SayTTSConfig {
  /** Voice name, e.g. 'Kyoko' (default: system voice). */
  voice?: string;
  /** Words per minute (default: system rate). */
  rate?: number;
}

export class SayTTS implements ISpeechSynthesizer {
  private readonly voice?: string;
  private readonly rate?: number;

  constructor(config: SayTTSConfig = {}) {
    this.voice = config.voice;
    this.rate = config.rate;
  }

  static async isAvailable(): Promise<boolean> {
    if (process.platform !== 'darwin') return false;
    try {
      await execFile('which', ['say']);
      return true;
    } catch {
      return false;
    }
  }

  buildArgs(text: string): string[] {
    const args: string[] = [];
    if (this.voice) args.push('-v', this.voice);
    if (this.rate) args.push('-r', String(this.rate));
    // `--` keeps text that starts with a dash from being read as a flag.
    args.push('--', text);
    return args;
  }

  async speak(text: string, signal?: AbortSignal): Promise<void> {
    if (!text.trim()) return;
    try {
      await execFile('say', this.buildArgs(text), { signal });
    } catch (err) {
      throw new CollaboratorError(`Speech synthesis failed: ${toError(err).message}`, 'tts');
    }
  }
}
