import type { ContextStore } from './context-store';
import type { ArtifactKey, ArtifactMap } from './types';
import { MissingArtifactError, ValidationError, isStageError } from './errors';
import { failure, success, type StageResult } from './result';

export type GateResult = { ok: true } | { ok: false; error: MissingArtifactError };

/**
 * Check that every required artifact is present before a stage computes
 */
export function precondition(store: ContextStore, keys: readonly ArtifactKey[]): GateResult {
  const missing = keys.filter((key) => !store.has(key));
  return missing.length === 0 ? { ok: true } : { ok: false, error: new MissingArtifactError(missing) };
}

/**
 * Write target handed to a stage's commit; writes are recorded under the stage name
 */
export interface ArtifactWriter {
  set<K extends ArtifactKey>(key: K, value: ArtifactMap[K]): void;
}

export interface Stage<T> {
  /** Writer identity recorded against every key the stage commits */
  name: string;
  requires: readonly ArtifactKey[];
  /** Pure computation; throws ValidationError on bad input */
  compute(store: ContextStore): T;
  /** Writes performed only once compute has succeeded */
  commit?(target: ArtifactWriter, data: T): void;
  describe(data: T): string;
}

interface PendingWrite {
  key: ArtifactKey;
  apply(): void;
}

/**
 * Gate, compute, then commit. Validation and missing-artifact failures become
 * error results with nothing written; any other exception propagates.
 * Commit writes are staged and applied only when no key belongs to another writer.
 */
export function runStage<T>(store: ContextStore, stage: Stage<T>): StageResult<T> {
  const gate = precondition(store, stage.requires);
  if (!gate.ok) {
    return failure(gate.error);
  }

  let data: T;
  try {
    data = stage.compute(store);
  } catch (error) {
    if (isStageError(error)) {
      return failure(error);
    }
    throw error;
  }

  const pending: PendingWrite[] = [];
  stage.commit?.(
    {
      set: (key, value) => {
        pending.push({ key, apply: () => store.set(key, value, stage.name) });
      },
    },
    data
  );

  const conflicts = pending
    .map((write) => write.key)
    .filter((key) => !store.canWrite(key, stage.name))
    .map((key) => `${key}: owned by ${store.writerOf(key)}`);
  if (conflicts.length > 0) {
    return failure(
      new ValidationError(`${stage.name} cannot overwrite artifacts owned by another writer`, conflicts)
    );
  }

  for (const write of pending) {
    write.apply();
  }
  return success(stage.describe(data), data);
}
