import type { ArtifactKey } from './types';

export type StageErrorKind = 'validation' | 'missing_artifact';

/**
 * Malformed or out-of-range input (bad day, unknown platform, empty field)
 */
export class ValidationError extends Error {
  readonly kind = 'validation' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues.length > 0 ? issues : [message];
  }
}

/**
 * A stage ran before the artifacts it reads were written
 */
export class MissingArtifactError extends Error {
  readonly kind = 'missing_artifact' as const;
  readonly keys: ArtifactKey[];

  constructor(keys: ArtifactKey[]) {
    super(`Missing required artifacts: ${keys.join(', ')}`);
    this.name = 'MissingArtifactError';
    this.keys = keys;
  }
}

export type StageError = ValidationError | MissingArtifactError;

export function isStageError(error: unknown): error is StageError {
  return error instanceof ValidationError || error instanceof MissingArtifactError;
}
