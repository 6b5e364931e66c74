/**
 * Progress events emitted while a request runs.
 */

import type { DependencyResult, ValidationVerdict } from './types.js';

export type TargetSource = 'existing' | 'upload' | 'last_file' | 'copy';

export type ExecutionPhase = 'error_cycle' | 'validation_cycle' | 'copy';

export type CorrectionReason = 'error' | 'validation' | 'rejection';

export type ProcessingEvent =
  | { type: 'target_resolved'; path: string; source: TargetSource; sizeBytes: number }
  | { type: 'code_generated'; blocks: number; codePath: string }
  | { type: 'no_code'; artifactPath: string }
  | { type: 'dependencies'; results: DependencyResult[] }
  | { type: 'execution_started'; phase: ExecutionPhase; attempt: number; maxAttempts: number }
  | { type: 'execution_succeeded'; phase: ExecutionPhase; attempt: number }
  | { type: 'execution_failed'; phase: ExecutionPhase; attempt: number; message: string }
  | { type: 'code_corrected'; reason: CorrectionReason; correction: number; codePath: string }
  | { type: 'correction_stalled'; reason: CorrectionReason; correction: number }
  | { type: 'validation'; round: number; verdict: ValidationVerdict }
  | { type: 'archived'; path: string };

export type ProcessingEventHandler = (event: ProcessingEvent) => void;
