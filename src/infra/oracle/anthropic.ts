/**
 * Anthropic Messages API oracle
 */

import Anthropic from '@anthropic-ai/sdk';
import { EmptyOracleResponseError, OracleError } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import type { GenerateOptions, Oracle, OracleFile } from './types.js';

const log = createLogger('anthropic-oracle');

const MAX_OUTPUT_TOKENS = 8192;

export interface AnthropicOracleOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  /** Injected client (for testing) */
  client?: Anthropic;
}

function isTextBlock(block: Anthropic.Messages.ContentBlock): block is Anthropic.Messages.TextBlock {
  return block.type === 'text';
}

function fileBlocks(file: OracleFile): Anthropic.Messages.TextBlockParam[] {
  const blocks: Anthropic.Messages.TextBlockParam[] = [];
  if (file.text !== undefined) {
    blocks.push({ type: 'text', text: `[${file.label}: ${file.fileName}, extracted content]\n${file.text}` });
  }
  const encoded = Buffer.from(file.bytes).toString('base64');
  blocks.push({ type: 'text', text: `[${file.label}: ${file.fileName}, base64-encoded]\n${encoded}` });
  return blocks;
}

export class AnthropicOracle implements Oracle {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: AnthropicOracleOptions) {
    this.model = options.model;
    this.client = options.client ?? new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const content: Anthropic.Messages.TextBlockParam[] = [
      { type: 'text', text: prompt },
      ...(options.files ?? []).flatMap(fileBlocks),
    ];
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: MAX_OUTPUT_TOKENS,
      messages: [{ role: 'user', content }],
    };

    log.debug('Sending prompt', { model: this.model, length: prompt.length, stream: options.stream === true });

    let message: Anthropic.Messages.Message;
    try {
      message = options.stream
        ? await this.client.messages.stream(params).finalMessage()
        : await this.client.messages.create(params);
    } catch (error) {
      throw new OracleError(`Anthropic request failed: ${getErrorMessage(error)}`, 'transport', { cause: error });
    }

    const stopReason: string | null = message.stop_reason;
    if (stopReason === 'refusal') {
      throw new OracleError('Response blocked by the model provider', 'policy');
    }

    const text = message.content.filter(isTextBlock).map((block) => block.text).join('');
    if (!text.trim()) {
      throw new EmptyOracleResponseError();
    }
    log.debug('Received response', { length: text.length, stopReason });
    return text;
  }
}
