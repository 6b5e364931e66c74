/**
 * Fenced code block extraction from oracle replies.
 */

import { CODE_BLOCK_SEPARATOR } from '../../shared/constants.js';

const FENCE = '```';

function opensBlock(trimmed: string, fenceTags: readonly string[]): boolean {
  if (!trimmed.startsWith(FENCE)) return false;
  const info = trimmed.slice(FENCE.length).trim().split(/\s+/)[0]?.toLowerCase() ?? '';
  return fenceTags.includes(info);
}

/**
 * Ordered contents of the fenced blocks tagged with one of `fenceTags`.
 * Blocks with no content and unterminated blocks are dropped.
 */
export function extractCodeBlocks(text: string, fenceTags: readonly string[]): string[] {
  const blocks: string[] = [];
  let current: string[] | null = null;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (current === null) {
      if (opensBlock(trimmed, fenceTags)) {
        current = [];
      }
      continue;
    }
    if (trimmed.startsWith(FENCE)) {
      const block = current.join('\n');
      if (block.trim()) {
        blocks.push(block);
      }
      current = null;
      continue;
    }
    current.push(line);
  }

  return blocks;
}

export function combineCodeBlocks(blocks: readonly string[]): string {
  return blocks.join(CODE_BLOCK_SEPARATOR);
}

/** Combined code of every matching block, or null when there is none */
export function extractCode(text: string, fenceTags: readonly string[]): string | null {
  const blocks = extractCodeBlocks(text, fenceTags);
  return blocks.length > 0 ? combineCodeBlocks(blocks) : null;
}
