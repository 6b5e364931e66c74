/**
 * Tests for validator reply parsing
 */

import { describe, expect, it } from 'vitest';
import { parseVerdict } from '../core/correction/index.js';

describe('parseVerdict', () => {
  it('should treat an empty reply as a pass', () => {
    expect(parseVerdict('  \n')).toEqual({ valid: true, feedback: 'No issues found', source: 'empty' });
  });

  it('should read a JSON verdict', () => {
    const verdict = parseVerdict('{"valid": false, "feedback": "Row 3 was not updated"}');

    expect(verdict).toEqual({ valid: false, feedback: 'Row 3 was not updated', source: 'structured' });
  });

  it('should read a fenced JSON verdict surrounded by prose', () => {
    const reply = 'Here is my assessment:\n```json\n{"valid": true, "feedback": " Looks right "}\n```\nThanks';

    expect(parseVerdict(reply)).toEqual({ valid: true, feedback: 'Looks right', source: 'structured' });
  });

  it('should accept string booleans', () => {
    expect(parseVerdict('{"valid": "false", "feedback": "x"}').valid).toBe(false);
    expect(parseVerdict('{"valid": "true"}')).toEqual({ valid: true, feedback: '', source: 'structured' });
  });

  it('should default a missing valid field to a pass', () => {
    expect(parseVerdict('{"feedback": "nothing to add"}')).toEqual({
      valid: true,
      feedback: 'nothing to add',
      source: 'structured',
    });
  });

  it('should serialize structured feedback', () => {
    const verdict = parseVerdict('{"valid": false, "feedback": ["missing title", "extra row"]}');

    expect(verdict.feedback).toBe('["missing title","extra row"]');
  });

  it('should reject a malformed reply mentioning valid and false', () => {
    const reply = 'The result is not Valid: FALSE because the header is missing';

    expect(parseVerdict(reply)).toEqual({ valid: false, feedback: reply, source: 'malformed' });
  });

  it('should pass any other malformed reply', () => {
    expect(parseVerdict('Everything looks fine.')).toEqual({
      valid: true,
      feedback: 'Everything looks fine.',
      source: 'malformed',
    });
  });

  it('should fall back to the malformed rule when the JSON has the wrong shape', () => {
    const reply = '{"valid": 0}';

    expect(parseVerdict(reply)).toEqual({ valid: true, feedback: reply, source: 'malformed' });
  });
});
