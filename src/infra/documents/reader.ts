/**
 * Document content reader
 *
 * Produces the textual projection of a document that prompts and the
 * validator work with.
 */

import { readFile, stat } from 'node:fs/promises';
import type JSZip from 'jszip';
import { UnreadableDocumentError, type DocumentFormat } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { emptyDocumentSentinel, formatFromPath, formatLabel } from './format.js';
import { extractExcelText, extractPowerPointText, extractWordText, loadPackage } from './ooxml.js';

const log = createLogger('document-reader');

const EXTRACTORS: Record<Exclude<DocumentFormat, 'text'>, (zip: JSZip) => Promise<string>> = {
  word: extractWordText,
  excel: extractExcelText,
  powerpoint: extractPowerPointText,
};

export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}

export async function readDocumentContent(path: string): Promise<string> {
  const format = formatFromPath(path);
  const info = await stat(path);
  if (info.size === 0) {
    log.info('Document is empty; allowing content creation', { path });
    return emptyDocumentSentinel(format);
  }

  const bytes = await readFile(path);
  if (format === 'text') {
    return decodeText(bytes);
  }

  try {
    const zip = await loadPackage(bytes);
    return await EXTRACTORS[format](zip);
  } catch (error) {
    throw new UnreadableDocumentError(
      path,
      `Could not read ${formatLabel(format)} file: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/** Reads the textual projection of a document */
export type ContentReader = (path: string) => Promise<string>;
