/**
 * Plain-text projections of OOXML packages (docx, xlsx, pptx).
 *
 * Parts are located inside the zip with jszip and scanned with regular
 * expressions; only the text content matters here, not the layout.
 */

import JSZip from 'jszip';

const ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|\w+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return ENTITIES[entity] ?? match;
  });
}

/** Attributes of a start tag's attribute string */
function parseAttributes(source: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of source.matchAll(/([\w:]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
    const [, name, doubleQuoted, singleQuoted] = match;
    if (name) {
      attributes[name] = decodeXmlEntities(doubleQuoted ?? singleQuoted ?? '');
    }
  }
  return attributes;
}

async function readPart(zip: JSZip, path: string): Promise<string | null> {
  const file = zip.file(path);
  return file ? file.async('string') : null;
}

export class MissingPartError extends Error {
  constructor(part: string) {
    super(`Missing package part: ${part}`);
    this.name = 'MissingPartError';
  }
}

async function requirePart(zip: JSZip, path: string): Promise<string> {
  const content = await readPart(zip, path);
  if (content === null) {
    throw new MissingPartError(path);
  }
  return content;
}

// ---- Word ----

function wordParagraphText(paragraphXml: string): string {
  let text = '';
  const tokens = /<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>|<w:tab\s*\/>|<w:(?:br|cr)\b[^>]*\/>/g;
  for (const match of paragraphXml.matchAll(tokens)) {
    if (match[1] !== undefined) {
      text += decodeXmlEntities(match[1]);
    } else if (match[0].startsWith('<w:tab')) {
      text += '\t';
    } else {
      text += '\n';
    }
  }
  return text;
}

export async function extractWordText(zip: JSZip): Promise<string> {
  const xml = (await requirePart(zip, 'word/document.xml')).replace(/<w:p\b[^>]*\/>/g, '');
  const paragraphs: string[] = [];
  for (const match of xml.matchAll(/<w:p[\s>][\s\S]*?<\/w:p>/g)) {
    const text = wordParagraphText(match[0]);
    if (text.trim()) {
      paragraphs.push(text);
    }
  }
  return paragraphs.join('\n');
}

// ---- Excel ----

function collectRunText(xml: string): string {
  const withoutPhonetics = xml.replace(/<rPh\b[\s\S]*?<\/rPh>/g, '');
  let text = '';
  for (const match of withoutPhonetics.matchAll(/<t(?:\s[^>]*)?>([\s\S]*?)<\/t>/g)) {
    text += decodeXmlEntities(match[1] ?? '');
  }
  return text;
}

async function readSharedStrings(zip: JSZip): Promise<string[]> {
  const xml = await readPart(zip, 'xl/sharedStrings.xml');
  if (xml === null) return [];
  return [...xml.matchAll(/<si>([\s\S]*?)<\/si>/g)].map((match) => collectRunText(match[1] ?? ''));
}

interface SheetEntry {
  name: string;
  path: string;
}

async function readSheetEntries(zip: JSZip): Promise<SheetEntry[]> {
  const workbook = await requirePart(zip, 'xl/workbook.xml');
  const rels = (await readPart(zip, 'xl/_rels/workbook.xml.rels')) ?? '';
  const targets = new Map<string, string>();
  for (const match of rels.matchAll(/<Relationship\b([^>]*?)\/?>/g)) {
    const attributes = parseAttributes(match[1] ?? '');
    if (attributes.Id && attributes.Target) {
      targets.set(attributes.Id, attributes.Target);
    }
  }

  const entries: SheetEntry[] = [];
  let position = 0;
  for (const match of workbook.matchAll(/<sheet\b([^>]*?)\/?>/g)) {
    position++;
    const attributes = parseAttributes(match[1] ?? '');
    const relationId = attributes['r:id'];
    const target = relationId ? targets.get(relationId) : undefined;
    const path = target
      ? (target.startsWith('/') ? target.slice(1) : `xl/${target}`)
      : `xl/worksheets/sheet${position}.xml`;
    entries.push({ name: attributes.name ?? `Sheet${position}`, path });
  }
  return entries;
}

/** Zero-based column index of a cell reference such as `AB12` */
export function columnIndex(reference: string): number {
  const letters = /^[A-Z]+/.exec(reference.toUpperCase())?.[0] ?? '';
  let index = 0;
  for (const letter of letters) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index - 1;
}

function cellValue(attributes: Record<string, string>, body: string, sharedStrings: string[]): string {
  const type = attributes.t;
  if (type === 'inlineStr') {
    return collectRunText(body);
  }
  const raw = /<v>([\s\S]*?)<\/v>/.exec(body)?.[1];
  if (raw === undefined) return '';
  const value = decodeXmlEntities(raw);
  if (type === 's') {
    return sharedStrings[Number.parseInt(value, 10)] ?? '';
  }
  if (type === 'b') {
    return value === '1' ? 'TRUE' : 'FALSE';
  }
  return value;
}

function sheetRows(xml: string, sharedStrings: string[]): string[] {
  const lines: string[] = [];
  for (const row of xml.matchAll(/<row\b[^>]*>([\s\S]*?)<\/row>/g)) {
    const cells: string[] = [];
    let next = 0;
    for (const cell of (row[1] ?? '').matchAll(/<c\b([^>]*?)(?:\/>|>([\s\S]*?)<\/c>)/g)) {
      const attributes = parseAttributes(cell[1] ?? '');
      const index = attributes.r ? columnIndex(attributes.r) : next;
      const value = cellValue(attributes, cell[2] ?? '', sharedStrings);
      while (cells.length < index) {
        cells.push('');
      }
      cells[index] = value;
      next = index + 1;
    }
    if (cells.some((value) => value !== '')) {
      lines.push(cells.join('\t'));
    }
  }
  return lines;
}

export async function extractExcelText(zip: JSZip): Promise<string> {
  const sharedStrings = await readSharedStrings(zip);
  const blocks: string[] = [];
  for (const sheet of await readSheetEntries(zip)) {
    const xml = await readPart(zip, sheet.path);
    const rows = xml === null ? [] : sheetRows(xml, sharedStrings);
    blocks.push([`Sheet: ${sheet.name}`, ...rows].join('\n'));
  }
  return blocks.join('\n\n');
}

// ---- PowerPoint ----

function slideNumber(path: string): number {
  return Number.parseInt(/slide(\d+)\.xml$/.exec(path)?.[1] ?? '0', 10);
}

function shapeText(shapeXml: string): string {
  const paragraphs: string[] = [];
  for (const paragraph of shapeXml.matchAll(/<a:p>([\s\S]*?)<\/a:p>|<a:p\s*\/>/g)) {
    let text = '';
    for (const token of (paragraph[1] ?? '').matchAll(/<a:t>([\s\S]*?)<\/a:t>|<a:br\b[^>]*\/>/g)) {
      text += token[1] !== undefined ? decodeXmlEntities(token[1]) : '\n';
    }
    paragraphs.push(text);
  }
  return paragraphs.join('\n');
}

export async function extractPowerPointText(zip: JSZip): Promise<string> {
  const slidePaths = Object.keys(zip.files)
    .filter((path) => /^ppt\/slides\/slide\d+\.xml$/.test(path))
    .sort((a, b) => slideNumber(a) - slideNumber(b));
  if (slidePaths.length === 0 && zip.file('ppt/presentation.xml') === null) {
    throw new MissingPartError('ppt/presentation.xml');
  }

  const lines: string[] = [];
  for (const [index, path] of slidePaths.entries()) {
    lines.push(`Slide ${index + 1}:`);
    const xml = await requirePart(zip, path);
    for (const shape of xml.matchAll(/<p:sp\b[^>]*>([\s\S]*?)<\/p:sp>/g)) {
      const text = shapeText(shape[1] ?? '');
      if (text.trim()) {
        lines.push(`  ${text}`);
      }
    }
  }
  return lines.join('\n');
}

export function loadPackage(bytes: Uint8Array): Promise<JSZip> {
  return JSZip.loadAsync(bytes);
}
