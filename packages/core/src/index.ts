/**
 * @parley/core - Shared contracts for parley.
 *
 * Domain types, OS collaborator interfaces, the observer contract, the
 * capability registry, structured errors and small async utilities.
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
export { StopFlag } from './utils/stop-flag.js';
export * from './capabilities/index.js';
export type {
  IKeyEmitter,
  IActivityProbe,
  ITextChannel,
  IAudioRecorder,
  ISpeechToText,
  ISpeechSynthesizer,
} from './interfaces/collaborators.js';
export type {
  IObserver,
  SessionMeta,
  SessionStats,
  PhaseChangeEvent,
  DictationEvent,
  IntentEvent,
  ResponseEvent,
} from './interfaces/observer.js';
