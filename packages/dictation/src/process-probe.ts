/**
 * ProcessActivityProbe -- infers whether native dictation is running from
 * the process list.
 *
 * Best-effort: the helper processes can lag a state change by a second or
 * so, which is why the controller settles before re-probing.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import type { IActivityProbe } from '@parley/core';
import { CollaboratorError, toError } from '@parley/core';

const execFile = promisify(execFileCb);

export const DEFAULT_DICTATION_PROCESSES = ['DictationIM', 'SpeechRecognitionServer'];

export interface ProcessActivityProbeOptions {
  processNames?: string[];
  timeoutMs?: number;
}

export class ProcessActivityProbe implements IActivityProbe {
  private readonly processNames: string[];
  private readonly timeoutMs: number;

  constructor(opts: ProcessActivityProbeOptions = {}) {
    this.processNames = opts.processNames ?? DEFAULT_DICTATION_PROCESSES;
    this.timeoutMs = opts.timeoutMs ?? 2000;
  }

  async isActive(): Promise<boolean> {
    let stdout: string;
    try {
      ({ stdout } = await execFile('ps', ['-axo', 'comm='], { timeout: this.timeoutMs }));
    } catch (err) {
      throw new CollaboratorError(`Process listing failed: ${toError(err).message}`, 'probe');
    }

    return this.processNames.some((name) => stdout.includes(name));
  }
}
