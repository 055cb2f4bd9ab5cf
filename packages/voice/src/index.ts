/**
 * @parley/voice - Spoken answers in, narration out.
 *
 * The intent engine (keyword classification with bounded retries) plus the
 * adapters it drives: SoX microphone capture, Whisper transcription and
 * macOS `say` playback.
 *
 * @packageDocumentation
 */

export { IntentRecognizer } from './intent.js';
export {
  DEFAULT_KEYWORDS,
  classifyTranscript,
  matchesAny,
  matchesKeyword,
  resolveKeywords,
} from './keywords.js';
export { SoxRecorder } from './recorder.js';
export { WhisperSTT } from './stt-whisper.js';
export { SayTTS } from './tts-say.js';
export type { IntentRecognizerOptions } from './intent.js';
export type { SoxRecorderConfig } from './recorder.js';
export type { WhisperSTTConfig } from './stt-whisper.js';
export type { SayTTSConfig } from './tts-say.js';
