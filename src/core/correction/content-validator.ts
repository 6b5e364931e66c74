/**
 * Content validator
 *
 * Asks the oracle whether the modified document does exactly what the task
 * asked, comparing textual projections before and after the change.
 */

import type { Oracle } from '../../infra/oracle/index.js';
import { VALIDATION_CODE_LIMIT, VALIDATION_CONTENT_LIMIT } from '../../shared/constants.js';
import { getPrompt } from '../../shared/prompts/index.js';
import { EmptyOracleResponseError, type ValidationVerdict } from '../models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { parseVerdict } from './verdict-parser.js';

const log = createLogger('content-validator');

export interface ValidationRequest {
  task: string;
  /** Content before the change; null when it could not be read */
  originalContent: string | null;
  /** Content after the change; null when it could not be read */
  modifiedContent: string | null;
  code: string;
}

export const SKIPPED_VERDICT: ValidationVerdict = {
  valid: true,
  feedback: 'Validation skipped: document content unavailable',
  source: 'skipped',
};

export async function validateContent(oracle: Oracle, request: ValidationRequest): Promise<ValidationVerdict> {
  if (!request.originalContent || !request.modifiedContent) {
    log.info('Skipping validation; content unavailable');
    return SKIPPED_VERDICT;
  }

  const prompt = getPrompt('validation.request', {
    task: request.task,
    original: request.originalContent.slice(0, VALIDATION_CONTENT_LIMIT),
    modified: request.modifiedContent.slice(0, VALIDATION_CONTENT_LIMIT),
    code: request.code.slice(0, VALIDATION_CODE_LIMIT),
  });

  let reply: string;
  try {
    reply = await oracle.generate(prompt);
  } catch (error) {
    if (error instanceof EmptyOracleResponseError) {
      return parseVerdict('');
    }
    log.warn('Validator unavailable', { error: getErrorMessage(error) });
    return { valid: true, feedback: `Validator unavailable: ${getErrorMessage(error)}`, source: 'unavailable' };
  }

  const verdict = parseVerdict(reply);
  log.debug('Validator verdict', { valid: verdict.valid, source: verdict.source });
  return verdict;
}
