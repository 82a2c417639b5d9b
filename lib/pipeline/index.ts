export { ContextStore } from './context-store';
export { ValidationError, MissingArtifactError, isStageError } from './errors';
export { success, failure, isSuccess, mapResult } from './result';
export { precondition, runStage } from './stage-gate';
export { contentTypesKey, postKey, hashtagsKey, visualKey } from './types';

export type { StageError, StageErrorKind } from './errors';
export type { StageResult, StageFailure, StageErrorInfo } from './result';
export type { GateResult, Stage, ArtifactWriter } from './stage-gate';
export type { ArtifactMap, ArtifactKey } from './types';
