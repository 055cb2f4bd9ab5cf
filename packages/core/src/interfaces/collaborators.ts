/**
 * OS collaborator contracts.
 *
 * The orchestration core never talks to the operating system directly. Each
 * service it needs (synthetic key events, process probing, the clipboard,
 * microphone capture, transcription, speech synthesis) sits behind one of
 * these interfaces. The macOS adapters live in the feature packages; tests
 * substitute in-process fakes.
 */

import type { KeyModifier } from '../types/index.js';

/** Injects synthetic key events at the OS input layer. */
export interface IKeyEmitter {
  /**
   * Post a single key-down or key-up event. Modifiers are applied as event
   * flags. Resolves false when the event was not posted; adapters may also
   * reject with a CollaboratorError.
   */
  emit(keyCode: number, down: boolean, modifiers?: readonly KeyModifier[]): Promise<boolean>;
}

/** Best-effort check for whether the OS dictation service is running. */
export interface IActivityProbe {
  isActive(): Promise<boolean>;
}

/** A shared text channel, the system clipboard in practice. */
export interface ITextChannel {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

/** Fixed-duration microphone capture. */
export interface IAudioRecorder {
  /** Record for `durationSeconds` and resolve with a WAV buffer. */
  record(durationSeconds: number, signal?: AbortSignal): Promise<Buffer>;
}

/** Speech-to-text provider. */
export interface ISpeechToText {
  transcribe(audio: Buffer, mimeType: string, language?: string): Promise<string>;
}

/** Text-to-speech playback. */
export interface ISpeechSynthesizer {
  speak(text: string, signal?: AbortSignal): Promise<void>;
}
