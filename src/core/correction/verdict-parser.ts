/**
 * Validator reply parsing
 *
 * Replies are expected to be a JSON object `{"valid": boolean, "feedback": string}`.
 * Anything else goes through the malformed-verdict rule: a reply mentioning
 * both `valid` and `false` is a rejection, every other reply passes.
 */

import { z } from 'zod/v4';
import type { ValidationVerdict } from '../models/index.js';

const VerdictSchema = z.object({
  valid: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
  feedback: z.unknown().optional(),
});

function stripFences(text: string): string {
  return text.replace(/^```[\w-]*\s*$/gm, '').trim();
}

function normalizeFeedback(feedback: unknown): string {
  if (feedback === undefined || feedback === null) return '';
  if (typeof feedback === 'string') return feedback.trim();
  return JSON.stringify(feedback);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseStructured(text: string): ValidationVerdict | null {
  const unfenced = stripFences(text);
  const candidates = [unfenced];
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(unfenced.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = VerdictSchema.safeParse(tryParseJson(candidate));
    if (parsed.success) {
      const { valid, feedback } = parsed.data;
      return {
        valid: valid === undefined ? true : valid === true || valid === 'true',
        feedback: normalizeFeedback(feedback),
        source: 'structured',
      };
    }
  }
  return null;
}

export function parseVerdict(reply: string): ValidationVerdict {
  const text = reply.trim();
  if (!text) {
    return { valid: true, feedback: 'No issues found', source: 'empty' };
  }

  const structured = parseStructured(text);
  if (structured) {
    return structured;
  }

  const lower = text.toLowerCase();
  const rejected = lower.includes('valid') && lower.includes('false');
  return { valid: !rejected, feedback: text, source: 'malformed' };
}
