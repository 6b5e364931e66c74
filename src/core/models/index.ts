export type {
  DocumentFormat,
  DocumentRef,
  ExecutionBindings,
  ExecutionSuccess,
  ExecutionFailure,
  ExecutionOutcome,
  VerdictSource,
  ValidationVerdict,
  AttemptCounters,
  DependencyResult,
  ValidationOutcome,
  ResultArtifact,
  ProcessingResult,
} from './types.js';
export {
  OracleError,
  EmptyOracleResponseError,
  ExecutionExhaustedError,
  UnreadableDocumentError,
  DocumentNotFoundError,
  ConfigError,
  type OracleFailureKind,
  type DocumentNotFoundReason,
} from './errors.js';
export type {
  ProcessingEvent,
  ProcessingEventHandler,
  TargetSource,
  ExecutionPhase,
  CorrectionReason,
} from './events.js';
