/**
 * Tests for the content validator
 */

import { describe, expect, it } from 'vitest';
import { SKIPPED_VERDICT, validateContent } from '../core/correction/index.js';
import { EmptyOracleResponseError, OracleError } from '../core/models/index.js';
import { ScriptedOracle } from '../infra/oracle/index.js';

const request = {
  task: 'Replace "draft" with "final"',
  originalContent: 'Status: draft',
  modifiedContent: 'Status: final',
  code: 'doc.save(TARGET_FILE_PATH)',
};

describe('validateContent', () => {
  it('should skip without calling the oracle when a side is empty', async () => {
    // Given
    const oracle = new ScriptedOracle([]);

    // When
    const missingOriginal = await validateContent(oracle, { ...request, originalContent: '' });
    const missingModified = await validateContent(oracle, { ...request, modifiedContent: null });

    // Then
    expect(missingOriginal).toBe(SKIPPED_VERDICT);
    expect(missingModified).toBe(SKIPPED_VERDICT);
    expect(oracle.calls).toHaveLength(0);
  });

  it('should send task, both contents and code to the oracle', async () => {
    const oracle = new ScriptedOracle(['{"valid": true, "feedback": "ok"}']);

    const verdict = await validateContent(oracle, request);

    expect(verdict).toEqual({ valid: true, feedback: 'ok', source: 'structured' });
    const prompt = oracle.calls[0]?.prompt ?? '';
    expect(prompt).toContain('USER TASK:\nReplace "draft" with "final"\n');
    expect(prompt).toContain('ORIGINAL FILE CONTENT:\nStatus: draft\n');
    expect(prompt).toContain('MODIFIED FILE CONTENT:\nStatus: final\n');
    expect(prompt).toContain('Generated code (for reference):\ndoc.save(TARGET_FILE_PATH)');
  });

  it('should truncate contents to 5000 and code to 2000 characters', async () => {
    const oracle = new ScriptedOracle(['{"valid": true}']);

    await validateContent(oracle, {
      task: 't',
      originalContent: 'o'.repeat(6000),
      modifiedContent: 'm'.repeat(6000),
      code: 'c'.repeat(3000),
    });

    const prompt = oracle.calls[0]?.prompt ?? '';
    expect(prompt).toContain(`ORIGINAL FILE CONTENT:\n${'o'.repeat(5000)}\n`);
    expect(prompt).toContain(`MODIFIED FILE CONTENT:\n${'m'.repeat(5000)}\n`);
    expect(prompt).toContain(`Generated code (for reference):\n${'c'.repeat(2000)}\n`);
    expect(prompt).not.toContain('o'.repeat(5001));
  });

  it('should treat an empty oracle reply as a pass', async () => {
    const oracle = new ScriptedOracle([new EmptyOracleResponseError()]);

    expect(await validateContent(oracle, request)).toEqual({
      valid: true,
      feedback: 'No issues found',
      source: 'empty',
    });
  });

  it('should pass with a note when the oracle is unavailable', async () => {
    const oracle = new ScriptedOracle([new OracleError('connection reset')]);

    expect(await validateContent(oracle, request)).toEqual({
      valid: true,
      feedback: 'Validator unavailable: connection reset',
      source: 'unavailable',
    });
  });
});
