/**
 * OpenAI Whisper speech-to-text provider.
 *
 * Uses the OpenAI transcriptions API to convert audio buffers into text.
 * Relies on native fetch() and FormData (Node 18+).
 */

import type { ISpeechToText } from '@parley/core';
import { CollaboratorError } from '@parley/core';

/** Configuration for the Whisper STT provider. */
export interface WhisperSTTConfig {
  apiKey: string;
  /** Model name (default: 'whisper-1'). */
  model?: string;
}

/**
 * Speech-to-text provider backed by OpenAI Whisper.
 *
 * @example
 * ```ts
 * const stt = new WhisperSTT({ apiKey: process.env.OPENAI_API_KEY ?? '' });
 * const transcript = await stt.transcribe(clip, 'audio/wav', 'ja');
 * ```
 */
export class WhisperSTT implements ISpeechToText {
  private readonly apiKey: string;
  private readonly model: string;

  constructor(config: WhisperSTTConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? 'whisper-1';
  }

  /**
   * Transcribe an audio buffer to text.
   *
   * @param language - ISO-639-1 hint ('ja', 'en'); improves short utterances.
   */
  async transcribe(audio: Buffer, mimeType: string, language?: string): Promise<string> {
    const ext = mimeTypeToExtension(mimeType);
    const blob = new Blob([new Uint8Array(audio)], { type: mimeType });

    const form = new FormData();
    form.append('file', blob, `audio.${ext}`);
    form.append('model', this.model);
    if (language) {
      form.append('language', language);
    }

    const res = await fetch('https://api.openai.com/v1/audio/transcriptions', {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: form,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new CollaboratorError(`Whisper STT failed (${res.status}): ${body}`, 'stt', { status: res.status });
    }

    const json: unknown = await res.json();
    if (typeof json === 'object' && json !== null && 'text' in json && typeof json.text === 'string') {
      return json.text;
    }
    return '';
  }
}

/**
 * Map a MIME type to a file extension. Whisper infers the format from the
 * filename extension.
 */
function mimeTypeToExtension(mimeType: string): string {
  const map: Record<string, string> = {
    'audio/webm': 'webm',
    'audio/mp3': 'mp3',
    'audio/mpeg': 'mp3',
    'audio/mp4': 'mp4',
    'audio/wav': 'wav',
    'audio/ogg': 'ogg',
    'audio/flac': 'flac',
    'audio/x-m4a': 'm4a',
  };
  return map[mimeType] ?? 'wav';
}
