/**
 * Validation-correction cycle
 *
 * Validates the document after a successful run and, while the validator
 * rejects it, regenerates the code from the feedback and runs it directly.
 * Stopping with issues is an annotated outcome, not a request failure.
 */

import type { ContentReader } from '../../infra/documents/index.js';
import { MAX_VALIDATOR_RETRIES } from '../../shared/constants.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import type { ExecutionBindings, ValidationOutcome, ValidationVerdict } from '../models/index.js';
import { SKIPPED_VERDICT, validateContent } from './content-validator.js';
import type { CorrectionTrail } from './counters.js';
import type { CorrectionDeps } from './error-correction.js';
import { isUsablePatch, requestFeedbackFix } from './regeneration.js';

const log = createLogger('validation-correction');

export interface ValidationCycleDeps extends CorrectionDeps {
  readContent: ContentReader;
}

export interface ValidationCycleInput {
  task: string;
  code: string;
  /** Snapshot taken before the first run; null when unavailable */
  originalContent: string | null;
  bindings: ExecutionBindings;
  trail: CorrectionTrail;
  maxRetries?: number;
}

export type ValidationCycleState = Exclude<ValidationOutcome, 'not_run'>;

export interface ValidationCycleResult {
  state: ValidationCycleState;
  /** Code unit that produced the final document state */
  code: string;
  lastVerdict?: ValidationVerdict;
  /** Failure message of a corrected run that did not execute */
  executionError?: string;
  /** Output of the last corrected run that succeeded */
  stdout?: string;
}

async function readOrNull(readContent: ContentReader, path: string): Promise<string | null> {
  try {
    return await readContent(path);
  } catch (error) {
    log.warn('Could not read document content', { path, error: getErrorMessage(error) });
    return null;
  }
}

export async function runValidationCorrectionCycle(
  input: ValidationCycleInput,
  deps: ValidationCycleDeps,
): Promise<ValidationCycleResult> {
  const maxRetries = input.maxRetries ?? MAX_VALIDATOR_RETRIES;
  const { counters } = input.trail;
  const path = input.bindings.targetFilePath;
  const emit = deps.onEvent ?? (() => {});
  let code = input.code;
  let original = input.originalContent;
  let stdout: string | undefined;

  for (let round = 0; ; round++) {
    const modified = await readOrNull(deps.readContent, path);
    if (!original || !modified) {
      log.info('Skipping validation; content unavailable', { path });
      emit({ type: 'validation', round: round + 1, verdict: SKIPPED_VERDICT });
      return { state: 'skipped', code, lastVerdict: SKIPPED_VERDICT, stdout };
    }

    counters.validationAttempts++;
    const verdict = await validateContent(deps.oracle, {
      task: input.task,
      originalContent: original,
      modifiedContent: modified,
      code,
    });
    emit({ type: 'validation', round: round + 1, verdict });

    if (verdict.valid) {
      return { state: 'passed', code, lastVerdict: verdict, stdout };
    }
    if (round >= maxRetries) {
      log.info('Validator retries exhausted', { rounds: round + 1 });
      return { state: 'stopped_with_issues', code, lastVerdict: verdict, stdout };
    }

    counters.validatorCorrections++;
    let patch: string | null;
    try {
      patch = await requestFeedbackFix(deps.oracle, deps.runtime, {
        task: input.task,
        code,
        feedback: verdict.feedback,
      });
    } catch (error) {
      log.warn('Feedback regeneration failed', { error: getErrorMessage(error) });
      patch = null;
    }

    if (!isUsablePatch(patch, code)) {
      emit({ type: 'correction_stalled', reason: 'validation', correction: counters.validatorCorrections });
      return { state: 'stopped_with_issues', code, lastVerdict: verdict, stdout };
    }

    const codePath = await deps.store.saveCode(`validator_fix_${counters.validatorCorrections}`, patch);
    input.trail.codeArtifacts.push(codePath);
    emit({ type: 'dependencies', results: await deps.dependencies.ensure(patch) });
    code = patch;
    emit({ type: 'code_corrected', reason: 'validation', correction: counters.validatorCorrections, codePath });

    emit({ type: 'execution_started', phase: 'validation_cycle', attempt: 1, maxAttempts: 1 });
    const outcome = await deps.executor.run(code, input.bindings);
    if (!outcome.ok) {
      emit({ type: 'execution_failed', phase: 'validation_cycle', attempt: 1, message: outcome.message });
      return {
        state: 'stopped_by_execution_failure',
        code,
        lastVerdict: verdict,
        executionError: outcome.message,
        stdout,
      };
    }
    emit({ type: 'execution_succeeded', phase: 'validation_cycle', attempt: 1 });
    stdout = outcome.stdout;

    original = (await readOrNull(deps.readContent, path)) ?? original;
  }
}
