/**
 * Tests for FileArtifactStore
 */

import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { javascriptRuntime, pythonRuntime } from '../infra/runtime/index.js';
import { FileArtifactStore, cleanFileStem } from '../infra/storage/index.js';

describe('cleanFileStem', () => {
  it('should replace unsafe characters and drop the extension', () => {
    expect(cleanFileStem('Q3 report (final).docx')).toBe('Q3_report_final_');
    expect(cleanFileStem('/uploads/budget-2026.v2.xlsx')).toBe('budget-2026.v2');
  });

  it('should fall back to a default stem', () => {
    expect(cleanFileStem('.docx')).toBe('.docx');
    expect(cleanFileStem('')).toBe('document');
  });
});

describe('FileArtifactStore', () => {
  let dir: string;
  let ids: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docmend-store-'));
    ids = ['aaaa1111', 'bbbb2222', 'cccc3333'];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createStore(runtime = pythonRuntime) {
    return new FileArtifactStore({
      codesDir: join(dir, 'codes'),
      archiveDir: join(dir, 'archive'),
      runtime,
      clock: () => 1700000000000,
      idGenerator: () => ids.shift() ?? 'zzzz9999',
    });
  }

  it('should save code units under timestamped unique names', async () => {
    // Given
    const store = createStore();

    // When
    const first = await store.saveCode('generated', 'print(1)');
    const second = await store.saveCode('error_fix_1', 'print(2)');

    // Then
    expect(first).toBe(join(dir, 'codes', '1700000000000_aaaa1111_generated.py'));
    expect(second).toBe(join(dir, 'codes', '1700000000000_bbbb2222_error_fix_1.py'));
    expect(readFileSync(first, 'utf-8')).toBe('print(1)');
  });

  it('should never overwrite an existing code unit', async () => {
    ids = ['same', 'same'];
    const store = createStore();
    await store.saveCode('generated', 'one');

    await expect(store.saveCode('generated', 'two')).rejects.toThrow('EEXIST');
  });

  it('should save commentary as a comment-only program of the runtime', async () => {
    const path = await createStore(javascriptRuntime).saveCommentary('no_code', 'Use exceljs.\n\nDone.');

    expect(path.endsWith('_no_code.js')).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe('// Use exceljs.\n//\n// Done.');
  });

  it('should store uploads with a cleaned name and lowercased extension', async () => {
    const path = await createStore().storeUpload('My Deck.PPTX', new Uint8Array([80, 75]));

    expect(path).toBe(join(dir, 'archive', 'My_Deck_1700000000000_aaaa1111.pptx'));
    expect(readFileSync(path)).toEqual(Buffer.from([80, 75]));
  });

  it('should archive a copy of a document', async () => {
    const source = join(dir, 'report.docx');
    writeFileSync(source, 'content');

    const archived = await createStore().archiveDocument(source);

    expect(archived).toBe(join(dir, 'archive', 'report_1700000000000_aaaa1111.docx'));
    expect(readFileSync(archived, 'utf-8')).toBe('content');
    expect(readdirSync(dir).sort()).toEqual(['archive', 'report.docx']);
  });
});
