/**
 * Error taxonomy for the dialogue runtime
 */

export type DialogueErrorCode = 'transport' | 'recognition' | 'synthesis' | 'protocol_ordering';

export abstract class DialogueError extends Error {
  abstract readonly code: DialogueErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransportErrorKind =
  | 'not_connected'
  | 'send_failed'
  | 'connection_lost'
  | 'protocol'
  | 'heartbeat_timeout'
  | 'retries_exhausted';

export class TransportError extends DialogueError {
  readonly code = 'transport';

  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type RecognitionErrorKind = 'permission' | 'engine' | 'cancelled';

export class RecognitionError extends DialogueError {
  readonly code = 'recognition';

  constructor(
    readonly kind: RecognitionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /** Cancellation during a deliberate stop is not a failure */
  isCancellation(): boolean {
    return this.kind === 'cancelled';
  }
}

export type SynthesisErrorKind = 'voice_unavailable' | 'engine';

export class SynthesisError extends DialogueError {
  readonly code = 'synthesis';

  constructor(
    readonly kind: SynthesisErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A stream event arrived in a state where it cannot be applied,
 * e.g. sentence_end before text_start.
 */
export class ProtocolOrderingError extends DialogueError {
  readonly code = 'protocol_ordering';

  constructor(
    readonly event: string,
    readonly state: string
  ) {
    super(`Received ${event} while ${state}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Permission and missing-voice failures cannot be fixed by retrying */
export function isTerminal(error: Error): boolean {
  if (error instanceof RecognitionError) return error.kind === 'permission';
  if (error instanceof SynthesisError) return error.kind === 'voice_unavailable';
  return false;
}
