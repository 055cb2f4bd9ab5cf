/**
 * Capability registry.
 *
 * Built once at startup with an optional handle per OS collaborator.
 * Components consult the registry instead of probing for availability
 * themselves; a missing handle means "substitute the fail-safe result".
 */

import type {
  IActivityProbe,
  IAudioRecorder,
  IKeyEmitter,
  ISpeechSynthesizer,
  ISpeechToText,
  ITextChannel,
} from '../interfaces/collaborators.js';
import { CapabilityError } from '../errors/index.js';

export interface Capabilities {
  readonly keys?: IKeyEmitter;
  readonly probe?: IActivityProbe;
  readonly clipboard?: ITextChannel;
  readonly recorder?: IAudioRecorder;
  readonly stt?: ISpeechToText;
  readonly tts?: ISpeechSynthesizer;
}

export type CapabilityName = keyof Capabilities;

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'keys',
  'probe',
  'clipboard',
  'recorder',
  'stt',
  'tts',
];

/**
 * Without a recorder and a transcriber no confirmation can ever be obtained,
 * so the loop cannot make progress at all.
 */
export const REQUIRED_CAPABILITIES: readonly CapabilityName[] = ['recorder', 'stt'];

/** Freeze the given handles into a registry. */
export function createCapabilities(handles: Capabilities): Readonly<Capabilities> {
  return Object.freeze({ ...handles });
}

/** Names of the capabilities that have no handle. */
export function missingCapabilities(caps: Capabilities): CapabilityName[] {
  return CAPABILITY_NAMES.filter((name) => caps[name] === undefined);
}

/**
 * Throw a CapabilityError when a required capability is absent.
 * Returns the optional ones that are missing so the caller can warn once.
 */
export function assertRequiredCapabilities(caps: Capabilities): CapabilityName[] {
  const missing = missingCapabilities(caps);
  const required = missing.filter((name) => REQUIRED_CAPABILITIES.includes(name));
  if (required.length > 0) {
    throw new CapabilityError(
      `Required capabilities unavailable: ${required.join(', ')}`,
      required,
    );
  }
  return missing;
}
