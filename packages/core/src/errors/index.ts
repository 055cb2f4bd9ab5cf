/**
 * Structured error types for parley.
 */

export class ParleyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ParleyError';
  }
}

/**
 * A single failed call into an OS collaborator (probe, capture, transcription,
 * clipboard, key event). Always absorbed by the caller's fallback policy.
 */
export class CollaboratorError extends ParleyError {
  constructor(
    message: string,
    public readonly collaborator: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'COLLABORATOR_ERROR', { ...context, collaborator });
    this.name = 'CollaboratorError';
  }
}

/** A capability that is missing entirely at startup. */
export class CapabilityError extends ParleyError {
  constructor(message: string, public readonly capabilities: string[]) {
    super(message, 'CAPABILITY_ERROR', { capabilities });
    this.name = 'CapabilityError';
  }
}

export class ConfigError extends ParleyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
