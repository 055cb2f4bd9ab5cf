/**
 * PasteboardChannel -- the macOS clipboard through `pbpaste` / `pbcopy`.
 */

import { execFile as execFileCb, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import type { ITextChannel } from '@parley/core';
import { CollaboratorError, toError } from '@parley/core';

const execFile = promisify(execFileCb);

export interface PasteboardChannelConfig {
  /** Upper bound for one clipboard command (ms, default: 2000). */
  timeoutMs?: number;
}

export class PasteboardChannel implements ITextChannel {
  private readonly timeoutMs: number;

  constructor(config: PasteboardChannelConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 2000;
  }

  static async isAvailable(): Promise<boolean> {
    if (process.platform !== 'darwin') return false;
    try {
      await execFile('which', ['pbpaste']);
      return true;
    } catch {
      return false;
    }
  }

  async read(): Promise<string> {
    try {
      const { stdout } = await execFile('pbpaste', [], { timeout: this.timeoutMs });
      return stdout;
    } catch (err) {
      throw new CollaboratorError(`Clipboard read failed: ${toError(err).message}`, 'clipboard');
    }
  }

  write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn('pbcopy', [], { stdio: ['pipe', 'ignore', 'ignore'], timeout: this.timeoutMs });
      child.on('error', (err) => {
        reject(new CollaboratorError(`Clipboard write failed: ${err.message}`, 'clipboard'));
      });
      child.on('close', (code) => {
        if (code === 0) resolve();
        else reject(new CollaboratorError(`Clipboard write failed: pbcopy exited with ${code}`, 'clipboard'));
      });
      child.stdin?.end(text);
    });
  }
}
