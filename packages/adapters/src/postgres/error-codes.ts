import {
  LockTimeout,
  SerializationFailure,
  StepExecutionError,
  isHarnessError,
} from '@anomaly-lab/domain';
import type { HarnessError } from '@anomaly-lab/domain';

// SQLSTATE classes, see https://www.postgresql.org/docs/current/errcodes-appendix.html
const SERIALIZATION_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

const TIMEOUT_CODES = new Set([
  '55P03', // lock_not_available (lock_timeout)
  '57014', // query_canceled (statement_timeout)
]);

export interface PgErrorLike {
  code: string;
  message: string;
}

export function isPgError(err: unknown): err is PgErrorLike {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

/** Map a driver error onto the harness taxonomy. */
export function classifyPgError(err: unknown, statement: string): HarnessError {
  if (isHarnessError(err)) return err;
  if (isPgError(err)) {
    const message = `${err.message} [${err.code}] while executing: ${statement}`;
    if (SERIALIZATION_CODES.has(err.code)) return new SerializationFailure(message, { cause: err });
    if (TIMEOUT_CODES.has(err.code)) return new LockTimeout(message, { cause: err });
    return new StepExecutionError(message, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new StepExecutionError(`${detail} while executing: ${statement}`, { cause: err });
}
