/**
 * Document orchestrator
 *
 * Runs one request end to end: resolve the target, generate code, run it
 * through the error-correction cycle, validate through the
 * validation-correction cycle, then remember, archive and record.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { ERROR_DETAILS_LIMIT } from '../../shared/constants.js';
import { getPrompt } from '../../shared/prompts/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import {
  createTrail,
  extractCodeBlocks,
  combineCodeBlocks,
  runErrorCorrectionCycle,
  runValidationCorrectionCycle,
  totalCorrections,
  type CorrectionTrail,
} from '../correction/index.js';
import {
  ExecutionExhaustedError,
  OracleError,
  type ExecutionBindings,
  type ProcessingEvent,
  type ProcessingResult,
  type ValidationOutcome,
} from '../models/index.js';
import { extractSummaryLine } from './summary.js';
import { resolveTarget } from './target-resolver.js';
import type { OrchestratorDeps, ProcessOptions, ProcessRequest } from './types.js';

const log = createLogger('orchestrator');

const OUTCOME_MESSAGES: Record<ValidationOutcome, string> = {
  passed: 'File processed successfully',
  skipped: 'File processed successfully (validation skipped)',
  stopped_with_issues: 'File processed; validation reported unresolved issues',
  stopped_by_execution_failure: 'File processed; a validator-requested correction failed to execute',
  not_run: 'Model response saved; no code block was found',
};

interface RunState {
  task: string;
  documentPath: string;
  trail: CorrectionTrail;
  startedAt: number;
  codeSavedTo: string | null;
  oracleResponse?: string;
}

function describeFailure(error: unknown): { message: string; error: string; errorDetails: string } {
  if (error instanceof ExecutionExhaustedError) {
    return {
      message: 'Execution failed - code saved for debugging',
      error: error.message,
      errorDetails: `${error.message}\n${error.trace}`.slice(0, ERROR_DETAILS_LIMIT),
    };
  }
  if (error instanceof OracleError) {
    return {
      message: 'Code generation failed',
      error: `Oracle error (${error.kind}): ${error.message}`,
      errorDetails: (error.stack ?? error.message).slice(0, ERROR_DETAILS_LIMIT),
    };
  }
  const text = getErrorMessage(error);
  return {
    message: 'Processing failed',
    error: text,
    errorDetails: (error instanceof Error && error.stack ? error.stack : text).slice(0, ERROR_DETAILS_LIMIT),
  };
}

export class DocumentOrchestrator {
  private readonly clock: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * @throws DocumentNotFoundError when no target can be resolved (before any oracle call)
   */
  async processDocument(request: ProcessRequest, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const target = await resolveTarget(request, this.deps);
    this.emit({ type: 'target_resolved', path: target.path, source: target.source, sizeBytes: target.sizeBytes });
    log.info('Processing document', { path: target.path, source: target.source, task: request.task });

    const state: RunState = {
      task: request.task,
      documentPath: target.path,
      trail: createTrail(),
      startedAt: this.clock(),
      codeSavedTo: null,
    };

    let result: ProcessingResult;
    try {
      result = await this.run(state, options);
    } catch (error) {
      log.error('Processing failed', { path: target.path, error: getErrorMessage(error) });
      result = this.failureResult(state, error);
    }

    await this.record(result);
    return result;
  }

  private emit(event: ProcessingEvent): void {
    this.deps.onEvent?.(event);
  }

  private async readOriginal(path: string): Promise<string | null> {
    try {
      return await this.deps.readContent(path);
    } catch (error) {
      log.warn('Could not read document content', { path, error: getErrorMessage(error) });
      return null;
    }
  }

  private buildPrompt(task: string, content: string | null, targetPath: string): string {
    const { runtime } = this.deps;
    return getPrompt('generation.request', {
      prefix: getPrompt(`runtime.${runtime.name}.prefix`),
      language: runtime.language,
      content: content ?? '(content could not be extracted)',
      task,
      target_path: targetPath,
    });
  }

  private async run(state: RunState, options: ProcessOptions): Promise<ProcessingResult> {
    const { oracle, runtime, store } = this.deps;
    const path = state.documentPath;

    const originalContent = await this.readOriginal(path);
    const response = await oracle.generate(this.buildPrompt(state.task, originalContent, path));
    state.oracleResponse = response;

    const blocks = extractCodeBlocks(response, runtime.fenceTags);
    if (blocks.length === 0) {
      const artifactPath = await store.saveCommentary(
        'no_code',
        `Model response saved (no explicit code block detected):\n\n${response}`,
      );
      state.codeSavedTo = artifactPath;
      state.trail.codeArtifacts.push(artifactPath);
      this.emit({ type: 'no_code', artifactPath });
      return this.finish(state, 'not_run', '', [], options);
    }

    const code = combineCodeBlocks(blocks);
    const codePath = await store.saveCode('generated', code);
    state.codeSavedTo = codePath;
    state.trail.codeArtifacts.push(codePath);
    this.emit({ type: 'code_generated', blocks: blocks.length, codePath });
    this.emit({ type: 'dependencies', results: await this.deps.dependencies.ensure(code) });

    const bindings: ExecutionBindings = {
      targetFilePath: path,
      outputDir: dirname(path),
      codesDir: this.deps.codesDir,
    };

    const executed = await runErrorCorrectionCycle(
      { task: state.task, code, bindings, trail: state.trail },
      this.deps,
    );
    const validated = await runValidationCorrectionCycle(
      { task: state.task, code: executed.code, originalContent, bindings, trail: state.trail },
      this.deps,
    );

    const summary = extractSummaryLine(validated.stdout ?? executed.outcome.stdout)
      ?? validated.lastVerdict?.feedback
      ?? '';
    const generatedFiles = existsSync(path) ? [path] : [];
    return this.finish(state, validated.state, summary, generatedFiles, options);
  }

  private async finish(
    state: RunState,
    validation: ValidationOutcome,
    summary: string,
    generatedFiles: string[],
    options: ProcessOptions,
  ): Promise<ProcessingResult> {
    const path = state.documentPath;
    try {
      this.deps.lastFile.set(path, state.task);
    } catch (error) {
      log.warn('Could not remember last file', { path, error: getErrorMessage(error) });
    }

    let archivedPath: string | undefined;
    try {
      archivedPath = await this.deps.store.archiveDocument(path);
      this.emit({ type: 'archived', path: archivedPath });
    } catch (error) {
      log.warn('Could not archive document', { path, error: getErrorMessage(error) });
    }

    const counters = state.trail.counters;
    const result: ProcessingResult = {
      success: true,
      message: OUTCOME_MESSAGES[validation],
      task: state.task,
      documentPath: path,
      codeSavedTo: state.codeSavedTo,
      codeArtifacts: [...state.trail.codeArtifacts],
      generatedFiles,
      archivedPath,
      validation,
      summary,
      ...counters,
      totalCorrections: totalCorrections(counters),
      oracleResponse: state.oracleResponse,
      durationMs: this.clock() - state.startedAt,
    };

    const returned = generatedFiles[0];
    if (options.returnFile && returned) {
      result.artifact = { fileName: basename(returned), bytes: await readFile(returned) };
    }
    return result;
  }

  private failureResult(state: RunState, error: unknown): ProcessingResult {
    const counters = error instanceof ExecutionExhaustedError ? error.counters : state.trail.counters;
    return {
      success: false,
      ...describeFailure(error),
      task: state.task,
      documentPath: state.documentPath,
      codeSavedTo: state.codeSavedTo,
      codeArtifacts: [...state.trail.codeArtifacts],
      generatedFiles: [],
      validation: 'not_run',
      summary: '',
      validationAttempts: counters.validationAttempts,
      validatorCorrections: counters.validatorCorrections,
      errorRetries: counters.errorRetries,
      totalCorrections: totalCorrections(counters),
      oracleResponse: state.oracleResponse,
      durationMs: this.clock() - state.startedAt,
    };
  }

  private async record(result: ProcessingResult): Promise<void> {
    if (!this.deps.recorder) return;
    try {
      await this.deps.recorder.record(result);
    } catch (error) {
      log.warn('Could not record result', { error: getErrorMessage(error) });
    }
  }
}
