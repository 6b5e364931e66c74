/**
 * Code regeneration requests sent back to the oracle.
 */

import { getPrompt } from '../../shared/prompts/index.js';
import type { Oracle } from '../../infra/oracle/index.js';
import type { ScriptRuntime } from '../../infra/runtime/index.js';
import type { ExecutionFailure } from '../models/index.js';
import { extractCode } from './code-extractor.js';

function languageVars(runtime: ScriptRuntime): { language: string; fence: string } {
  return { language: runtime.language, fence: runtime.fenceTags[0] ?? runtime.name };
}

/** Error details handed to the oracle for a failed run */
export function formatErrorDetails(failure: ExecutionFailure): string {
  if (!failure.trace || failure.trace === failure.message) {
    return failure.message;
  }
  return `${failure.message}\n\nTraceback:\n${failure.trace}`;
}

/** Ask for a fix of code that failed to run; null when the reply holds no code */
export async function requestErrorFix(
  oracle: Oracle,
  runtime: ScriptRuntime,
  params: { task: string; code: string; error: string },
): Promise<string | null> {
  const prompt = getPrompt('fix.error', { ...languageVars(runtime), ...params });
  const reply = await oracle.generate(prompt);
  return extractCode(reply, runtime.fenceTags);
}

/** Ask for code that addresses validator feedback; null when the reply holds no code */
export async function requestFeedbackFix(
  oracle: Oracle,
  runtime: ScriptRuntime,
  params: { task: string; code: string; feedback: string },
): Promise<string | null> {
  const prompt = getPrompt('fix.feedback', { ...languageVars(runtime), ...params });
  const reply = await oracle.generate(prompt);
  return extractCode(reply, runtime.fenceTags);
}

/** A patch is adopted only when it has content and differs from the current code */
export function isUsablePatch(patch: string | null, current: string): patch is string {
  return patch !== null && patch.trim() !== '' && patch !== current;
}
