import type { StepFailure } from '../types';

export type StepErrorKind =
  | 'client-construction'
  | 'size-resolution'
  | 'create-submission'
  | 'volume-failed'
  | 'volume-timeout'
  | 'cancelled';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const REMEDIATIONS: Partial<Record<StepErrorKind, string>> = {
  'client-construction': 'Check the aws.region and aws.profile settings',
  'size-resolution': 'Set volume.volume_size explicitly',
  'volume-timeout': 'Increase volume.wait_timeout'
};

/**
 * Halting error raised by a pipeline step. The message is prefixed with the
 * phase that failed; the underlying error is kept as `cause`.
 */
export class StepError extends Error {
  readonly kind: StepErrorKind;
  readonly phase: string;

  constructor(kind: StepErrorKind, phase: string, cause: unknown) {
    super(`${phase}: ${describeError(cause)}`, { cause });
    this.name = 'StepError';
    this.kind = kind;
    this.phase = phase;
  }

  toFailure(): StepFailure {
    return {
      code: this.kind.toUpperCase().replace(/-/g, '_'),
      message: this.message,
      phase: this.phase,
      remediation: REMEDIATIONS[this.kind]
    };
  }
}

export function wrapStepError(kind: StepErrorKind, phase: string, cause: unknown): StepError {
  return new StepError(kind, phase, cause);
}

/** A required shared-state value is missing or has the wrong shape. */
export class StateContractError extends Error {
  readonly key: string;

  constructor(key: string, detail: string) {
    super(`Pipeline state contract violated for "${key}": ${detail}`);
    this.name = 'StateContractError';
    this.key = key;
  }
}

/**
 * Status lookup failed in a way that is expected to clear up on its own,
 * e.g. a volume that is not yet visible right after creation.
 */
export class TransientStatusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientStatusError';
  }
}

export type WaitFailureReason = 'error-status' | 'status-unavailable' | 'timed-out' | 'cancelled';

export class VolumeWaitError extends Error {
  readonly reason: WaitFailureReason;
  readonly volumeId: string;
  readonly lastStatus?: string;

  constructor(
    reason: WaitFailureReason,
    volumeId: string,
    message: string,
    options: { lastStatus?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'VolumeWaitError';
    this.reason = reason;
    this.volumeId = volumeId;
    this.lastStatus = options.lastStatus;
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class DeadlineExceededError extends Error {
  constructor(message = 'Deadline exceeded') {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}
