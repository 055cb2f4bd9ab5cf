/**
 * SoxRecorder -- fixed-duration microphone capture via SoX `rec`.
 *
 * Records 16-bit mono 16 kHz WAV into a temp file, reads it back and removes
 * it. Works on macOS and Linux where SoX is installed.
 *
 * Zero npm dependencies -- uses only `node:child_process` and `node:fs`.
 *
 * Install SoX:
 *   macOS:  brew install sox
 *   Linux:  apt install sox  (or yum install sox)
 */

import { execFile as execFileCb } from 'node:child_process';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { promisify } from 'node:util';
import type { IAudioRecorder } from '@parley/core';
import { CollaboratorError, toError } from '@parley/core';

const execFile = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SoxRecorderConfig {
  /** Sample rate in Hz (default: 16000). */
  sampleRate?: number;
  /** Number of audio channels (default: 1 -- mono). */
  channels?: number;
  /** Bit depth (default: 16). */
  bitDepth?: number;
  /** Device identifier override (default: system default mic). */
  device?: string;
}

// ---------------------------------------------------------------------------
// SoxRecorder
// ---------------------------------------------------------------------------

export class SoxRecorder implements IAudioRecorder {
  private readonly sampleRate: number;
  private readonly channels: number;
  private readonly bitDepth: number;
  private readonly device?: string;

  constructor(config: SoxRecorderConfig = {}) {
    this.sampleRate = config.sampleRate ?? 16000;
    this.channels = config.channels ?? 1;
    this.bitDepth = config.bitDepth ?? 16;
    this.device = config.device;
  }

  /**
   * Check whether `rec` (SoX) is available on PATH.
   */
  static async isAvailable(): Promise<boolean> {
    try {
      await execFile(process.platform === 'win32' ? 'where' : 'which', ['rec']);
      return true;
    } catch {
      return false;
    }
  }

  /** Arguments for one capture into `file`. */
  buildArgs(file: string, durationSeconds: number): string[] {
    return [
      '-q',                            // Quiet -- suppress progress output
      '-b', String(this.bitDepth),     // Bit depth
      '-r', String(this.sampleRate),   // Sample rate
      '-c', String(this.channels),     // Channels
      file,
      'trim', '0', String(durationSeconds),
    ];
  }

  /**
   * Record `durationSeconds` of audio and resolve with the WAV bytes.
   * Aborting the signal kills `rec`; the call then rejects.
   *
   * @throws CollaboratorError if `rec` fails or is aborted.
   */
  async record(durationSeconds: number, signal?: AbortSignal): Promise<Buffer> {
    const dir = await mkdtemp(join(tmpdir(), 'parley-rec-'));
    const file = join(dir, 'clip.wav');

    const env = { ...process.env };
    if (this.device) {
      env['AUDIODEV'] = this.device;
    }

    try {
      await execFile('rec', this.buildArgs(file, durationSeconds), {
        env,
        signal,
        // Hard ceiling in case the device never delivers samples.
        timeout: (durationSeconds + 10) * 1000,
      });
      return await readFile(file);
    } catch (err) {
      throw new CollaboratorError(`Recording failed: ${toError(err).message}`, 'recorder', { durationSeconds });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
