import type { StageError, StageErrorKind } from './errors';

export interface StageErrorInfo {
  kind: StageErrorKind;
  details: string[];
}

export type StageFailure = { status: 'error'; message: string; error: StageErrorInfo };

export type StageResult<T> = { status: 'success'; message: string; data: T } | StageFailure;

export function success<T>(message: string, data: T): StageResult<T> {
  return { status: 'success', message, data };
}

export function failure(error: StageError): StageFailure {
  return {
    status: 'error',
    message: error.message,
    error: {
      kind: error.kind,
      details: error.kind === 'validation' ? error.issues : [...error.keys],
    },
  };
}

export function isSuccess<T>(
  result: StageResult<T>
): result is Extract<StageResult<T>, { status: 'success' }> {
  return result.status === 'success';
}

/**
 * Reshape the data of a successful result; failures pass through
 */
export function mapResult<T, U>(result: StageResult<T>, map: (data: T) => U): StageResult<U> {
  return result.status === 'success' ? success(result.message, map(result.data)) : result;
}
