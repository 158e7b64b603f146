export type ErrorKind =
  | 'StepExecutionError'
  | 'SerializationFailure'
  | 'LockTimeout'
  | 'AssertionMismatch'
  | 'ActorMisuseError';

export abstract class HarnessError extends Error {
  abstract readonly kind: ErrorKind;
  /** Recoverable errors are data: recorded as a step outcome, the run continues. */
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A statement could not execute (syntax, connectivity, constraint). */
export class StepExecutionError extends HarnessError {
  readonly kind = 'StepExecutionError';
  readonly recoverable = false;
}

/** The store refused to commit (or continue) because of a detected conflict. */
export class SerializationFailure extends HarnessError {
  readonly kind = 'SerializationFailure';
  readonly recoverable = true;
}

/** A blocking wait exceeded its budget. */
export class LockTimeout extends HarnessError {
  readonly kind = 'LockTimeout';
  readonly recoverable = true;
}

export class AssertionMismatch extends HarnessError {
  readonly kind = 'AssertionMismatch';
  readonly recoverable = false;
}

/** An action was issued to an actor in a state that forbids it. */
export class ActorMisuseError extends HarnessError {
  readonly kind = 'ActorMisuseError';
  readonly recoverable = false;
}

export class UnknownScenarioError extends Error {
  readonly status = 404;

  constructor(readonly scenarioId: string) {
    super(`scenario not found: ${scenarioId}`);
    this.name = 'UnknownScenarioError';
  }
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}
