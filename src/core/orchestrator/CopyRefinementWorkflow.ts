/**
 * Copy refinement workflow
 *
 * Works on a private copy of the source document: each attempt generates a
 * fresh inspect/plan/code script, runs it against the copy and asks the
 * oracle to compare the original and modified files (YES/NO). Rejections
 * and execution errors feed the next attempt. The source is never written.
 */

import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { ContentReader } from '../../infra/documents/index.js';
import type { Oracle, OracleFile } from '../../infra/oracle/index.js';
import type { CodeExecutor, DependencyResolver, ScriptRuntime } from '../../infra/runtime/index.js';
import type { ArtifactStore } from '../../infra/storage/index.js';
import { ERROR_DETAILS_LIMIT, MAX_COPY_ATTEMPTS } from '../../shared/constants.js';
import { getPrompt } from '../../shared/prompts/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { createTrail, extractCode, totalCorrections } from '../correction/index.js';
import {
  DocumentNotFoundError,
  type ProcessingEvent,
  type ProcessingEventHandler,
  type ProcessingResult,
  type ValidationOutcome,
} from '../models/index.js';
import { extractSummaryLine } from './summary.js';
import type { ResultRecorder } from './types.js';

const log = createLogger('copy-refinement');

export const DEFAULT_FAILURE_SUMMARY =
  'Sorry, we could not process your request. Please try again or contact support if the issue persists.';
export const EXHAUSTED_MESSAGE =
  'Sorry, the task could not be fully completed. Here is your file (may be unchanged or partially changed).';
export const NO_SUMMARY = 'No summary found in model output.';

export interface CopyRefinementDeps {
  oracle: Oracle;
  runtime: ScriptRuntime;
  executor: CodeExecutor;
  dependencies: DependencyResolver;
  store: ArtifactStore;
  workDir: string;
  codesDir: string;
  /** Text projection attached next to each file the validator compares */
  readContent?: ContentReader;
  recorder?: ResultRecorder;
  onEvent?: ProcessingEventHandler;
  maxAttempts?: number;
  clock?: () => number;
  idGenerator?: () => string;
}

export interface RefineCopyRequest {
  filePath: string;
  task: string;
}

type Feedback =
  | { kind: 'error'; text: string }
  | { kind: 'rejection'; text: string };

/** True when the first word of the first non-empty line is YES */
export function isApproval(reply: string): boolean {
  const firstLine = reply.split(/\r?\n/).map((line) => line.trim()).find((line) => line !== '') ?? '';
  const firstWord = firstLine.replace(/^[^A-Za-z]+/, '').split(/[^A-Za-z]/)[0] ?? '';
  return firstWord.toUpperCase() === 'YES';
}

function feedbackOutcome(feedback: Feedback | null): ValidationOutcome {
  if (!feedback) return 'not_run';
  return feedback.kind === 'error' ? 'stopped_by_execution_failure' : 'stopped_with_issues';
}

export class CopyRefinementWorkflow {
  private readonly clock: () => number;
  private readonly idGenerator: () => string;

  constructor(private readonly deps: CopyRefinementDeps) {
    this.clock = deps.clock ?? Date.now;
    this.idGenerator = deps.idGenerator ?? randomUUID;
  }

  /**
   * @throws DocumentNotFoundError when the source cannot be copied
   */
  async refineCopy(request: RefineCopyRequest): Promise<ProcessingResult> {
    const startedAt = this.clock();
    const sourcePath = resolve(request.filePath);
    const copyPath = join(this.deps.workDir, `modified_${this.idGenerator()}_${basename(sourcePath)}`);

    await mkdir(this.deps.workDir, { recursive: true });
    try {
      await copyFile(sourcePath, copyPath);
    } catch (error) {
      throw new DocumentNotFoundError('missing_path', `Cannot copy ${request.filePath}: ${getErrorMessage(error)}`, sourcePath);
    }
    const originalBytes = await readFile(sourcePath);
    this.emit({ type: 'target_resolved', path: copyPath, source: 'copy', sizeBytes: originalBytes.byteLength });

    const { runtime } = this.deps;
    const maxAttempts = this.deps.maxAttempts ?? MAX_COPY_ATTEMPTS;
    const trail = createTrail();
    let summary = DEFAULT_FAILURE_SUMMARY;
    let feedback: Feedback | null = null;
    let lastError: string | undefined;

    const finish = async (
      outcome: { success: boolean; message: string; validation: ValidationOutcome; error?: string },
    ): Promise<ProcessingResult> => {
      const bytes = await readFile(copyPath);
      const result: ProcessingResult = {
        ...outcome,
        task: request.task,
        documentPath: copyPath,
        codeSavedTo: trail.codeArtifacts[0] ?? null,
        codeArtifacts: [...trail.codeArtifacts],
        generatedFiles: [copyPath],
        summary,
        ...trail.counters,
        totalCorrections: totalCorrections(trail.counters),
        artifact: { fileName: `updated_${basename(sourcePath)}`, bytes },
        durationMs: this.clock() - startedAt,
      };
      await this.record(result);
      return result;
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const prompt = getPrompt('copy.generate', {
        language: runtime.language,
        fence: runtime.fenceTags[0] ?? runtime.name,
        path: copyPath,
        task: request.task,
        previous: this.previousSection(feedback),
      });
      let reply: string;
      try {
        reply = await this.deps.oracle.generate(prompt);
      } catch (error) {
        const reason = getErrorMessage(error);
        log.error('Copy code generation failed', { attempt, reason });
        return finish({
          success: false,
          message: 'Code generation failed',
          validation: feedbackOutcome(feedback),
          error: reason,
        });
      }
      const code = extractCode(reply, runtime.fenceTags) ?? reply;
      const codePath = await this.deps.store.saveCode(`copy_attempt_${attempt}`, code);
      trail.codeArtifacts.push(codePath);
      this.emit({ type: 'code_generated', blocks: 1, codePath });
      this.emit({ type: 'dependencies', results: await this.deps.dependencies.ensure(code) });

      this.emit({ type: 'execution_started', phase: 'copy', attempt, maxAttempts });
      const outcome = await this.deps.executor.run(code, {
        targetFilePath: copyPath,
        outputDir: dirname(copyPath),
        codesDir: this.deps.codesDir,
      });
      if (!outcome.ok) {
        this.emit({ type: 'execution_failed', phase: 'copy', attempt, message: outcome.message });
        lastError = outcome.message;
        feedback = { kind: 'error', text: outcome.trace.slice(0, ERROR_DETAILS_LIMIT) };
        if (attempt < maxAttempts) trail.counters.errorRetries++;
        continue;
      }
      this.emit({ type: 'execution_succeeded', phase: 'copy', attempt });
      summary = extractSummaryLine(outcome.stdout) || NO_SUMMARY;

      trail.counters.validationAttempts++;
      let verdict: string;
      try {
        verdict = await this.validateCopy(request.task, sourcePath, originalBytes, copyPath);
      } catch (error) {
        const reason = getErrorMessage(error);
        log.warn('Copy validation failed; returning copy as-is', { reason });
        summary = `${summary} (Note: validation failed: ${reason})`;
        this.emit({
          type: 'validation',
          round: attempt,
          verdict: { valid: true, feedback: `Validator unavailable: ${reason}`, source: 'unavailable' },
        });
        return finish({ success: true, message: 'File processed; validation failed', validation: 'skipped' });
      }

      const approved = isApproval(verdict);
      this.emit({
        type: 'validation',
        round: attempt,
        verdict: { valid: approved, feedback: verdict, source: 'structured' },
      });
      if (approved) {
        return finish({ success: true, message: 'File processed successfully', validation: 'passed' });
      }
      feedback = { kind: 'rejection', text: verdict };
      lastError = undefined;
      if (attempt < maxAttempts) trail.counters.validatorCorrections++;
    }

    log.warn('Copy refinement attempts exhausted', { maxAttempts });
    return finish({
      success: false,
      message: EXHAUSTED_MESSAGE,
      validation: lastError === undefined ? 'stopped_with_issues' : 'stopped_by_execution_failure',
      error: lastError,
    });
  }

  private emit(event: ProcessingEvent): void {
    this.deps.onEvent?.(event);
  }

  private previousSection(feedback: Feedback | null): string {
    if (!feedback) return '';
    return feedback.kind === 'error'
      ? getPrompt('copy.previous_error', { error: feedback.text })
      : getPrompt('copy.previous_rejection', { feedback: feedback.text });
  }

  private async validateCopy(
    task: string,
    sourcePath: string,
    originalBytes: Uint8Array,
    copyPath: string,
  ): Promise<string> {
    const files: OracleFile[] = [
      {
        label: 'original_file',
        fileName: basename(sourcePath),
        bytes: originalBytes,
        text: await this.readText(sourcePath),
      },
      {
        label: 'modified_file',
        fileName: basename(copyPath),
        bytes: await readFile(copyPath),
        text: await this.readText(copyPath),
      },
    ];
    return this.deps.oracle.generate(getPrompt('copy.validate', { task }), { files });
  }

  private async readText(path: string): Promise<string | undefined> {
    if (!this.deps.readContent) return undefined;
    try {
      return await this.deps.readContent(path);
    } catch (error) {
      log.warn('Could not extract content for validation', { path, error: getErrorMessage(error) });
      return undefined;
    }
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
