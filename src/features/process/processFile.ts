/**
 * `docmend process` command handler
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ProcessingResult } from '../../core/models/index.js';
import { HistoryWriter } from '../history/index.js';
import { loadGlobalConfig } from '../../infra/config/index.js';
import type { OracleProvider } from '../../infra/oracle/index.js';
import type { RuntimeName } from '../../infra/runtime/index.js';
import { error, success } from '../../shared/ui/index.js';
import { createProcessingContext } from './context.js';
import { renderEvent, renderResult, resultToJson } from './render.js';

export interface ProcessFileOptions {
  file?: string;
  task: string;
  /** Work on a copy with the fused refinement workflow */
  copy?: boolean;
  /** Write the resulting document here */
  output?: string;
  json?: boolean;
  provider?: OracleProvider;
  model?: string;
  runtime?: RuntimeName;
  scenario?: string;
}

/** Run one request; returns the process exit code */
export async function processFile(options: ProcessFileOptions): Promise<number> {
  const config = loadGlobalConfig();
  const { orchestrator, copyWorkflow } = createProcessingContext(
    config,
    {
      provider: options.provider,
      model: options.model,
      runtime: options.runtime,
      scenarioPath: options.scenario,
    },
    {
      onEvent: options.json ? undefined : renderEvent,
      recorder: HistoryWriter.getInstance(),
    },
  );

  let result: ProcessingResult;
  if (options.copy) {
    if (!options.file) {
      error('--copy requires a file');
      return 1;
    }
    result = await copyWorkflow.refineCopy({ filePath: options.file, task: options.task });
  } else {
    result = await orchestrator.processDocument(
      { task: options.task, existingFilePath: options.file },
      { returnFile: options.output !== undefined },
    );
  }

  if (options.output && result.artifact) {
    const outputPath = resolve(options.output);
    await writeFile(outputPath, result.artifact.bytes);
    if (!options.json) {
      success(`Wrote ${outputPath}`);
    }
  }

  if (options.json) {
    console.log(resultToJson(result));
  } else {
    renderResult(result);
  }
  return result.success ? 0 : 1;
}
