/**
 * Stream-mode selection and the empty-stream fallback.
 */

import { EmptyOracleResponseError } from '../../core/models/index.js';
import { STREAM_PROMPT_THRESHOLD } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';
import type { GenerateOptions, Oracle } from './types.js';

const log = createLogger('oracle-fallback');

export type StreamMode = 'auto' | boolean;

export function shouldStream(mode: StreamMode, prompt: string): boolean {
  if (mode === 'auto') {
    return prompt.length > STREAM_PROMPT_THRESHOLD;
  }
  return mode;
}

/** Generate, retrying once without streaming when a streamed reply came back empty */
export async function generateWithFallback(
  oracle: Oracle,
  prompt: string,
  options: GenerateOptions = {},
): Promise<string> {
  try {
    return await oracle.generate(prompt, options);
  } catch (error) {
    if (!(error instanceof EmptyOracleResponseError) || !options.stream) {
      throw error;
    }
    log.warn('Empty streamed response; retrying without streaming', { oracle: oracle.name });
    return oracle.generate(prompt, { ...options, stream: false });
  }
}

/** Applies a stream mode to every call of the wrapped oracle */
export class FallbackOracle implements Oracle {
  readonly name: string;

  constructor(
    private readonly inner: Oracle,
    private readonly mode: StreamMode,
  ) {
    this.name = inner.name;
  }

  generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const stream = options.stream ?? shouldStream(this.mode, prompt);
    return generateWithFallback(this.inner, prompt, { ...options, stream });
  }
}
