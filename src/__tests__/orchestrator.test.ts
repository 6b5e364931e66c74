/**
 * Tests for DocumentOrchestrator.processDocument
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DocumentOrchestrator, type OrchestratorDeps } from '../core/orchestrator/index.js';
import {
  DocumentNotFoundError,
  OracleError,
  type ProcessingEvent,
  type ProcessingResult,
} from '../core/models/index.js';
import { ScriptedOracle } from '../infra/oracle/index.js';
import { pythonRuntime } from '../infra/runtime/index.js';
import {
  FakeDependencies,
  FakeExecutor,
  MemoryArtifactStore,
  MemoryLastFile,
  fail,
  fenced,
  ok,
} from './test-helpers.js';

const APPROVE = '{"valid": true, "feedback": "Looks correct"}';

/** Reader returning `values` in order, then the last value forever */
function sequenceReader(...values: string[]) {
  let index = 0;
  return async (): Promise<string> => {
    const value = values[Math.min(index, values.length - 1)] ?? '';
    index++;
    return value;
  };
}

describe('DocumentOrchestrator', () => {
  let dir: string;
  let docPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docmend-orch-'));
    docPath = join(dir, 'notes.txt');
    writeFileSync(docPath, 'Status: draft');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function setup(params: {
    oracle: ScriptedOracle;
    executor: FakeExecutor;
    readContent?: (path: string) => Promise<string>;
    lastFile?: MemoryLastFile;
  }) {
    const store = new MemoryArtifactStore();
    const lastFile = params.lastFile ?? new MemoryLastFile();
    const recorded: ProcessingResult[] = [];
    const events: ProcessingEvent[] = [];
    const deps: OrchestratorDeps = {
      oracle: params.oracle,
      runtime: pythonRuntime,
      executor: params.executor,
      dependencies: new FakeDependencies(),
      store,
      readContent: params.readContent ?? sequenceReader('Status: draft', 'Status: final'),
      lastFile,
      codesDir: '/codes',
      recorder: { record: (result) => void recorded.push(result) },
      onEvent: (event) => events.push(event),
    };
    return { orchestrator: new DocumentOrchestrator(deps), store, lastFile, recorded, events };
  }

  it('should generate, run, validate, remember and archive', async () => {
    // Given
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const executor = new FakeExecutor([ok('Done\nSUMMARY: replaced draft with final\n')]);
    const { orchestrator, lastFile, recorded } = setup({ oracle, executor });

    // When
    const result = await orchestrator.processDocument({ task: 'Mark as final', existingFilePath: docPath });

    // Then
    expect(result.success).toBe(true);
    expect(result.message).toBe('File processed successfully');
    expect(result.validation).toBe('passed');
    expect(result.summary).toBe('replaced draft with final');
    expect(result.codeSavedTo).toBe('/codes/1_generated.py');
    expect(result.codeArtifacts).toEqual(['/codes/1_generated.py']);
    expect(result.generatedFiles).toEqual([docPath]);
    expect(result.archivedPath).toBe('/archive/1');
    expect(result.totalCorrections).toBe(0);
    expect(result.validationAttempts).toBe(1);
    expect(result.artifact).toBeUndefined();
    expect(lastFile.value).toBe(docPath);
    expect(recorded).toEqual([result]);
    expect(executor.runs[0]?.bindings).toEqual({ targetFilePath: docPath, outputDir: dir, codesDir: '/codes' });
  });

  it('should build the generation prompt from the runtime prefix, content, task and path', async () => {
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const { orchestrator } = setup({ oracle, executor: new FakeExecutor([ok()]) });

    await orchestrator.processDocument({ task: 'Mark as final', existingFilePath: docPath });

    const prompt = oracle.calls[0]?.prompt ?? '';
    expect(prompt).toContain('You are an AI assistant that generates Python code to modify Office documents.');
    expect(prompt).toContain('[FILE CONTENT START]\nStatus: draft\n[FILE CONTENT END]');
    expect(prompt).toContain('Task: Mark as final\n');
    expect(prompt).toContain(`IMPORTANT: The file to modify is at: ${docPath}\n`);
  });

  it('should report total corrections as the sum of both cycles', async () => {
    // Given: one error fix, then one validator fix
    const oracle = new ScriptedOracle([
      fenced('A=1'),
      fenced('A=2'),
      '{"valid": false, "feedback": "Only half the rows changed"}',
      fenced('A=3'),
      APPROVE,
    ]);
    const executor = new FakeExecutor([fail('IndexError: list index out of range'), ok('SUMMARY: s1'), ok('SUMMARY: s2')]);
    const { orchestrator, store } = setup({ oracle, executor });

    // When
    const result = await orchestrator.processDocument({ task: 't', existingFilePath: docPath });

    // Then
    expect(result.errorRetries).toBe(1);
    expect(result.validatorCorrections).toBe(1);
    expect(result.validationAttempts).toBe(2);
    expect(result.totalCorrections).toBe(result.errorRetries + result.validatorCorrections);
    expect(result.summary).toBe('s2');
    expect(store.labels()).toEqual(['generated', 'error_fix_1', 'validator_fix_1']);
    expect(result.codeSavedTo).toBe('/codes/1_generated.py');
  });

  it('should fail before any oracle call when the path does not exist', async () => {
    const oracle = new ScriptedOracle([]);
    const { orchestrator, recorded } = setup({ oracle, executor: new FakeExecutor([]) });
    const missing = join(dir, 'missing.docx');

    const error = await orchestrator.processDocument({ task: 't', existingFilePath: missing }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(DocumentNotFoundError);
    if (!(error instanceof DocumentNotFoundError)) return;
    expect(error.reason).toBe('missing_path');
    expect(error.message).toBe(`File not found at path: ${missing}`);
    expect(oracle.calls).toHaveLength(0);
    expect(recorded).toHaveLength(0);
  });

  it('should fail when there is neither input nor a remembered file', async () => {
    const { orchestrator } = setup({ oracle: new ScriptedOracle([]), executor: new FakeExecutor([]) });

    await expect(orchestrator.processDocument({ task: 't' })).rejects.toThrow(
      'No file provided and no last file found',
    );
  });

  it('should fall back to the remembered file', async () => {
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const { orchestrator, events } = setup({
      oracle,
      executor: new FakeExecutor([ok()]),
      lastFile: new MemoryLastFile(docPath),
    });

    const result = await orchestrator.processDocument({ task: 'Again' });

    expect(result.documentPath).toBe(docPath);
    expect(events[0]).toEqual({ type: 'target_resolved', path: docPath, source: 'last_file', sizeBytes: 13 });
  });

  it('should report a missing remembered file', async () => {
    const gone = join(dir, 'gone.xlsx');
    const { orchestrator } = setup({
      oracle: new ScriptedOracle([]),
      executor: new FakeExecutor([]),
      lastFile: new MemoryLastFile(gone),
    });

    await expect(orchestrator.processDocument({ task: 't' })).rejects.toThrow(`Last file not found at path: ${gone}`);
  });

  it('should store an upload and run against the stored copy', async () => {
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const executor = new FakeExecutor([ok()]);
    const { orchestrator, store } = setup({ oracle, executor });

    const result = await orchestrator.processDocument({
      task: 't',
      upload: { fileName: 'My Report.docx', bytes: new Uint8Array([1, 2, 3]) },
    });

    expect(store.uploads).toEqual([{ fileName: 'My Report.docx', path: '/uploads/stored.docx' }]);
    expect(result.documentPath).toBe('/uploads/stored.docx');
    expect(executor.runs[0]?.bindings.outputDir).toBe('/uploads');
  });

  it('should prefer an existing path over an upload', async () => {
    // Given
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const executor = new FakeExecutor([ok()]);
    const { orchestrator, store, events } = setup({ oracle, executor });

    // When
    const result = await orchestrator.processDocument({
      task: 't',
      existingFilePath: docPath,
      upload: { fileName: 'My Report.docx', bytes: new Uint8Array([1, 2, 3]) },
    });

    // Then
    expect(store.uploads).toEqual([]);
    expect(result.documentPath).toBe(docPath);
    expect(executor.runs[0]?.bindings.targetFilePath).toBe(docPath);
    expect(events[0]).toEqual({ type: 'target_resolved', path: docPath, source: 'existing', sizeBytes: 13 });
  });

  it('should save the reply as commentary when it holds no code', async () => {
    // Given
    const oracle = new ScriptedOracle(['You could use python-docx for this.']);
    const executor = new FakeExecutor([]);
    const { orchestrator, store, lastFile } = setup({ oracle, executor });

    // When
    const result = await orchestrator.processDocument({ task: 't', existingFilePath: docPath });

    // Then
    expect(result.success).toBe(true);
    expect(result.validation).toBe('not_run');
    expect(result.message).toBe('Model response saved; no code block was found');
    expect(result.oracleResponse).toBe('You could use python-docx for this.');
    expect(store.saved[0]?.label).toBe('no_code');
    expect(store.saved[0]?.content).toBe(
      '# Model response saved (no explicit code block detected):\n\nYou could use python-docx for this.',
    );
    expect(executor.runs).toHaveLength(0);
    expect(lastFile.value).toBe(docPath);
  });

  it('should return a recorded failure result when execution retries run out', async () => {
    // Given
    const oracle = new ScriptedOracle([fenced('A=1'), fenced('A=1'), fenced('A=1'), fenced('A=1')]);
    const executor = new FakeExecutor([], fail('PermissionError: denied'));
    const { orchestrator, recorded, lastFile } = setup({ oracle, executor });

    // When
    const result = await orchestrator.processDocument({ task: 't', existingFilePath: docPath });

    // Then
    expect(result.success).toBe(false);
    expect(result.message).toBe('Execution failed - code saved for debugging');
    expect(result.error).toBe('Execution failed: PermissionError: denied');
    expect(result.errorDetails).toBe(
      'Execution failed: PermissionError: denied\nTraceback (most recent call last):\nPermissionError: denied',
    );
    expect(result.errorRetries).toBe(3);
    expect(result.totalCorrections).toBe(3);
    expect(result.validation).toBe('not_run');
    expect(result.codeSavedTo).toBe('/codes/1_generated.py');
    expect(executor.runs).toHaveLength(4);
    expect(recorded).toEqual([result]);
    expect(lastFile.value).toBeNull();
  });

  it('should return a failure result when generation fails', async () => {
    const oracle = new ScriptedOracle([new OracleError('Request blocked', 'policy')]);
    const { orchestrator } = setup({ oracle, executor: new FakeExecutor([]) });

    const result = await orchestrator.processDocument({ task: 't', existingFilePath: docPath });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Code generation failed');
    expect(result.error).toBe('Oracle error (policy): Request blocked');
    expect(result.codeSavedTo).toBeNull();
  });

  it('should skip validation when the content cannot be read', async () => {
    const oracle = new ScriptedOracle([fenced('edit()')]);
    const unreadable = async (): Promise<string> => {
      throw new Error('bad zip');
    };
    const { orchestrator } = setup({ oracle, executor: new FakeExecutor([ok()]), readContent: unreadable });

    const result = await orchestrator.processDocument({ task: 't', existingFilePath: docPath });

    expect(oracle.calls[0]?.prompt).toContain('[FILE CONTENT START]\n(content could not be extracted)\n');
    expect(result.validation).toBe('skipped');
    expect(result.message).toBe('File processed successfully (validation skipped)');
    expect(result.summary).toBe('Validation skipped: document content unavailable');
    expect(result.validationAttempts).toBe(0);
  });

  it('should attach the resulting document when asked to', async () => {
    const oracle = new ScriptedOracle([fenced('edit()'), APPROVE]);
    const { orchestrator } = setup({ oracle, executor: new FakeExecutor([ok()]) });

    const result = await orchestrator.processDocument(
      { task: 't', existingFilePath: docPath },
      { returnFile: true },
    );

    expect(result.artifact?.fileName).toBe('notes.txt');
    expect(Buffer.from(result.artifact?.bytes ?? new Uint8Array()).toString('utf-8')).toBe('Status: draft');
  });
});
