/**
 * Error-correction cycle
 *
 * Runs the code unit; on failure asks the oracle for a fix and runs again,
 * up to `maxRetries` fixes. Oracle errors are not retried.
 */

import type { Oracle } from '../../infra/oracle/index.js';
import type { CodeExecutor, DependencyResolver, ScriptRuntime } from '../../infra/runtime/index.js';
import type { ArtifactStore } from '../../infra/storage/index.js';
import { MAX_ERROR_RETRIES } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';
import {
  ExecutionExhaustedError,
  type ExecutionBindings,
  type ExecutionSuccess,
  type ProcessingEventHandler,
} from '../models/index.js';
import type { CorrectionTrail } from './counters.js';
import { formatErrorDetails, isUsablePatch, requestErrorFix } from './regeneration.js';

const log = createLogger('error-correction');

export interface CorrectionDeps {
  oracle: Oracle;
  runtime: ScriptRuntime;
  executor: CodeExecutor;
  dependencies: DependencyResolver;
  store: ArtifactStore;
  onEvent?: ProcessingEventHandler;
}

export interface ErrorCycleInput {
  task: string;
  code: string;
  bindings: ExecutionBindings;
  trail: CorrectionTrail;
  maxRetries?: number;
}

export interface ErrorCycleResult {
  /** Code unit that ran successfully */
  code: string;
  outcome: ExecutionSuccess;
}

/**
 * @throws ExecutionExhaustedError when the last allowed run fails
 * @throws OracleError when a fix cannot be generated
 */
export async function runErrorCorrectionCycle(
  input: ErrorCycleInput,
  deps: CorrectionDeps,
): Promise<ErrorCycleResult> {
  const maxRetries = input.maxRetries ?? MAX_ERROR_RETRIES;
  const { counters } = input.trail;
  const emit = deps.onEvent ?? (() => {});
  let code = input.code;

  for (let attempt = 0; ; attempt++) {
    emit({ type: 'execution_started', phase: 'error_cycle', attempt: attempt + 1, maxAttempts: maxRetries + 1 });
    const outcome = await deps.executor.run(code, input.bindings);
    if (outcome.ok) {
      emit({ type: 'execution_succeeded', phase: 'error_cycle', attempt: attempt + 1 });
      return { code, outcome };
    }

    emit({ type: 'execution_failed', phase: 'error_cycle', attempt: attempt + 1, message: outcome.message });
    if (attempt >= maxRetries) {
      log.error('Execution retries exhausted', { attempts: attempt + 1, message: outcome.message });
      throw new ExecutionExhaustedError(`Execution failed: ${outcome.message}`, {
        trace: outcome.trace,
        counters: { ...counters },
        code,
      });
    }

    counters.errorRetries++;
    log.info('Requesting error fix', { errorRetries: counters.errorRetries, message: outcome.message });
    const patch = await requestErrorFix(deps.oracle, deps.runtime, {
      task: input.task,
      code,
      error: formatErrorDetails(outcome),
    });

    if (!isUsablePatch(patch, code)) {
      emit({ type: 'correction_stalled', reason: 'error', correction: counters.errorRetries });
      continue;
    }

    const codePath = await deps.store.saveCode(`error_fix_${counters.errorRetries}`, patch);
    input.trail.codeArtifacts.push(codePath);
    emit({ type: 'dependencies', results: await deps.dependencies.ensure(patch) });
    code = patch;
    emit({ type: 'code_corrected', reason: 'error', correction: counters.errorRetries, codePath });
  }
}
