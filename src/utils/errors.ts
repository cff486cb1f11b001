import type { PipelineState } from '../interfaces/pipeline';

export type CheckErrorKind =
  | 'ValidationError'
  | 'ExtractionFailure'
  | 'SynthesisFailure'
  | 'ExplanationFailure'
  | 'AdapterFailure'
  | 'PipelineCancelled'
  | 'ConfigError'
  | 'InternalError';

export abstract class CheckError extends Error {
  abstract readonly kind: CheckErrorKind;
  readonly stage?: PipelineState;

  constructor(message: string, options: { stage?: PipelineState; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.stage = options.stage;
  }
}

/** Empty or oversized input, rejected before a run starts. */
export class ValidationError extends CheckError {
  readonly kind = 'ValidationError';
}

export class ExtractionFailure extends CheckError {
  readonly kind = 'ExtractionFailure';

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'Extracting', cause: options.cause });
  }
}

export class SynthesisFailure extends CheckError {
  readonly kind = 'SynthesisFailure';

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'Synthesizing', cause: options.cause });
  }
}

export class ExplanationFailure extends CheckError {
  readonly kind = 'ExplanationFailure';

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { stage: 'Explaining', cause: options.cause });
  }
}

export type AdapterFailureReason = 'unreachable' | 'rateLimited' | 'malformed';

export class AdapterFailure extends CheckError {
  readonly kind = 'AdapterFailure';

  constructor(
    readonly adapterId: string,
    readonly reason: AdapterFailureReason,
    message: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, { stage: 'Searching', cause: options.cause });
  }
}

/** The consumer went away; no further events are emitted for the run. */
export class PipelineCancelled extends CheckError {
  readonly kind = 'PipelineCancelled';

  constructor(message = 'Run cancelled by the client') {
    super(message);
  }
}

export class ConfigError extends CheckError {
  readonly kind = 'ConfigError';
}

/** Anything unexpected that escapes a stage. */
export class InternalError extends CheckError {
  readonly kind = 'InternalError';
}

export function isFatalRunFailure(err: unknown): err is ExtractionFailure | SynthesisFailure {
  return err instanceof ExtractionFailure || err instanceof SynthesisFailure;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return typeof err === 'string' ? err : 'Unknown error';
}
