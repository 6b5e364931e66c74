/**
 * Core domain types for the correction loop.
 */

export type DocumentFormat = 'word' | 'excel' | 'powerpoint' | 'text';

/** A file on disk that generated code edits in place */
export interface DocumentRef {
  path: string;
  format: DocumentFormat;
}

/** Named values exposed to every executed code unit */
export interface ExecutionBindings {
  targetFilePath: string;
  outputDir: string;
  codesDir: string;
}

export interface ExecutionSuccess {
  ok: true;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface ExecutionFailure {
  ok: false;
  /** Headline of the failure (usually the exception line) */
  message: string;
  /** Full diagnostic output of the failed run */
  trace: string;
  stdout: string;
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
}

export type ExecutionOutcome = ExecutionSuccess | ExecutionFailure;

/** Where a verdict came from */
export type VerdictSource = 'structured' | 'malformed' | 'empty' | 'unavailable' | 'skipped';

export interface ValidationVerdict {
  valid: boolean;
  feedback: string;
  source: VerdictSource;
}

export interface AttemptCounters {
  validationAttempts: number;
  validatorCorrections: number;
  errorRetries: number;
}

export interface DependencyResult {
  name: string;
  success: boolean;
  message: string;
}

/** Terminal states of the validation-correction cycle, plus the two non-run cases */
export type ValidationOutcome =
  | 'passed'
  | 'stopped_with_issues'
  | 'stopped_by_execution_failure'
  | 'skipped'
  | 'not_run';

export interface ResultArtifact {
  fileName: string;
  bytes: Uint8Array;
}

export interface ProcessingResult {
  success: boolean;
  message: string;
  error?: string;
  errorDetails?: string;
  task: string;
  documentPath: string;
  /** First persisted code artifact of the request */
  codeSavedTo: string | null;
  /** Every persisted code artifact, in creation order */
  codeArtifacts: string[];
  generatedFiles: string[];
  archivedPath?: string;
  validation: ValidationOutcome;
  summary: string;
  validationAttempts: number;
  validatorCorrections: number;
  errorRetries: number;
  totalCorrections: number;
  oracleResponse?: string;
  artifact?: ResultArtifact;
  durationMs: number;
}
