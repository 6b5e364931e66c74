import { extname } from 'node:path';
import type { DocumentFormat } from '../../core/models/index.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.docx': 'word',
  '.xlsx': 'excel',
  '.xlsm': 'excel',
  '.pptx': 'powerpoint',
};

export function formatFromPath(path: string): DocumentFormat {
  return EXTENSION_FORMATS[extname(path).toLowerCase()] ?? 'text';
}

const FORMAT_LABELS: Record<Exclude<DocumentFormat, 'text'>, string> = {
  word: 'Word',
  excel: 'Excel',
  powerpoint: 'PowerPoint',
};

export function formatLabel(format: Exclude<DocumentFormat, 'text'>): string {
  return FORMAT_LABELS[format];
}

/** Content reported for a zero-byte document */
export function emptyDocumentSentinel(format: DocumentFormat): string {
  if (format === 'text') {
    return 'Empty file - ready for content creation';
  }
  return `Empty ${FORMAT_LABELS[format]} file - ready for content creation`;
}
