/**
 * Console rendering of progress events and results.
 */

import type { ProcessingEvent, ProcessingResult } from '../../core/models/index.js';
import { blankLine, debug, error, header, info, status, success, warn } from '../../shared/ui/index.js';
import { preview } from '../../shared/utils/index.js';

const SOURCE_LABELS = {
  existing: 'Modifying existing file in place',
  upload: 'Stored upload',
  last_file: 'Using last file',
  copy: 'Working on copy',
} as const;

export function renderEvent(event: ProcessingEvent): void {
  switch (event.type) {
    case 'target_resolved':
      header('Processing document');
      status('File', `${event.path} (${event.sizeBytes} bytes)`);
      status('Source', SOURCE_LABELS[event.source]);
      break;
    case 'code_generated':
      info(`Generated code (${event.blocks} block${event.blocks === 1 ? '' : 's'}) saved to ${event.codePath}`);
      break;
    case 'no_code':
      warn(`No code block in the model response; saved to ${event.artifactPath}`);
      break;
    case 'dependencies':
      for (const dep of event.results) {
        if (dep.success) {
          debug(`${dep.name}: OK - ${preview(dep.message)}`);
        } else {
          warn(`${dep.name}: FAIL - ${preview(dep.message)}`);
        }
      }
      break;
    case 'execution_started':
      info(`Executing code (attempt ${event.attempt}/${event.maxAttempts})...`);
      break;
    case 'execution_succeeded':
      success('Code executed successfully');
      break;
    case 'execution_failed':
      warn(`Execution failed: ${preview(event.message, 200)}`);
      break;
    case 'code_corrected':
      info(`Corrected code (${event.reason} #${event.correction}) saved to ${event.codePath}`);
      break;
    case 'correction_stalled':
      warn(`Correction #${event.correction} did not produce new code`);
      break;
    case 'validation':
      if (event.verdict.source === 'skipped') {
        warn('Validation skipped: document content unavailable');
      } else if (event.verdict.valid) {
        success(`Validation #${event.round} passed`);
      } else {
        warn(`Validation #${event.round} rejected: ${preview(event.verdict.feedback, 200)}`);
      }
      break;
    case 'archived':
      debug(`Archived to ${event.path}`);
      break;
  }
}

export function renderResult(result: ProcessingResult): void {
  blankLine();
  if (result.success) {
    success(result.message);
  } else {
    error(result.message);
    if (result.error) {
      error(result.error);
    }
  }
  status('Document', result.documentPath);
  if (result.codeSavedTo) {
    status('Code', result.codeSavedTo);
  }
  if (result.archivedPath) {
    status('Archived', result.archivedPath);
  }
  if (result.summary) {
    status('Summary', result.summary);
  }
  status('Validation', result.validation);
  status(
    'Corrections',
    `${result.totalCorrections} (validator ${result.validatorCorrections}, error ${result.errorRetries}, validations ${result.validationAttempts})`,
  );
  status('Duration', `${(result.durationMs / 1000).toFixed(2)}s`);
}

/** Result as printed by `--json`: document bytes become their size */
export function resultToJson(result: ProcessingResult): string {
  const { artifact, ...rest } = result;
  const printable = artifact ? { ...rest, artifact: { fileName: artifact.fileName, size: artifact.bytes.byteLength } } : rest;
  return JSON.stringify(printable, null, 2);
}
