/**
 * Scripted oracle
 *
 * Replays a fixed queue of replies and records every prompt it receives.
 * Backs the `mock` provider and the tests.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod/v4';
import { ConfigError, EmptyOracleResponseError, OracleError } from '../../core/models/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';
import type { GenerateOptions, Oracle } from './types.js';

export type ScriptedReply =
  | string
  | Error
  | ((prompt: string, options: GenerateOptions) => string);

export interface RecordedCall {
  prompt: string;
  files: string[];
  stream: boolean;
}

const ScenarioSchema = z.object({
  replies: z.array(
    z.union([
      z.string(),
      z.object({
        error: z.string(),
        kind: z.enum(['transport', 'policy', 'empty']).optional(),
      }),
    ]),
  ),
});

export class ScriptedOracle implements Oracle {
  readonly name = 'mock';
  readonly calls: RecordedCall[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  /** Load replies from a YAML scenario (`replies:` list of strings or `{ error, kind }`) */
  static fromScenarioFile(path: string): ScriptedOracle {
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read scenario file ${path}: ${getErrorMessage(error)}`);
    }
    const parsed = ScenarioSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid scenario file ${path}: ${parsed.error.message}`);
    }
    return new ScriptedOracle(parsed.data.replies.map((reply): ScriptedReply => {
      if (typeof reply === 'string') return reply;
      return reply.kind === 'empty'
        ? new EmptyOracleResponseError(reply.error)
        : new OracleError(reply.error, reply.kind ?? 'transport');
    }));
  }

  get remaining(): number {
    return this.replies.length;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({
      prompt,
      files: (options.files ?? []).map((file) => file.label),
      stream: options.stream === true,
    });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new OracleError('Scripted oracle has no replies left');
    }
    if (next instanceof Error) {
      throw next;
    }
    const text = typeof next === 'function' ? next(prompt, options) : next;
    if (!text.trim()) {
      throw new EmptyOracleResponseError();
    }
    return text;
  }
}
