/**
 * Wires configuration into the collaborators a request needs.
 */

import { CopyRefinementWorkflow, DocumentOrchestrator, type ResultRecorder } from '../../core/orchestrator/index.js';
import type { ProcessingEventHandler } from '../../core/models/index.js';
import { getScriptsDir, sessionLastFileRegistry, type GlobalConfig } from '../../infra/config/index.js';
import { readDocumentContent } from '../../infra/documents/index.js';
import { createOracle, type Oracle, type OracleProvider } from '../../infra/oracle/index.js';
import {
  CodeRunner,
  SubprocessPackageInstaller,
  createDependencyResolver,
  getRuntime,
  type RuntimeName,
} from '../../infra/runtime/index.js';
import { FileArtifactStore } from '../../infra/storage/index.js';

export interface ContextOverrides {
  provider?: OracleProvider;
  model?: string;
  runtime?: RuntimeName;
  scenarioPath?: string;
  /** Replaces the oracle built from configuration */
  oracle?: Oracle;
}

export interface ProcessingContext {
  orchestrator: DocumentOrchestrator;
  copyWorkflow: CopyRefinementWorkflow;
}

export function createProcessingContext(
  config: GlobalConfig,
  overrides: ContextOverrides,
  hooks: { onEvent?: ProcessingEventHandler; recorder?: ResultRecorder } = {},
): ProcessingContext {
  const runtime = getRuntime(overrides.runtime ?? config.runtime);
  const scriptsDir = getScriptsDir();
  const oracle = overrides.oracle ?? createOracle({
    provider: overrides.provider ?? config.provider,
    model: overrides.model ?? config.model,
    apiKey: config.anthropicApiKey,
    timeoutMs: config.oracleTimeoutMs,
    maxRetries: config.oracleMaxRetries,
    stream: config.stream,
    scenarioPath: overrides.scenarioPath,
  });
  const executor = new CodeRunner({
    runtime,
    scriptsDir,
    interpreter: config.interpreter,
    timeoutMs: config.executionTimeoutMs,
  });
  const installer = new SubprocessPackageInstaller({
    runtime,
    scriptsDir,
    interpreter: config.interpreter,
    timeoutMs: config.installTimeoutMs,
  });
  const dependencies = createDependencyResolver(runtime, installer);
  const store = new FileArtifactStore({ codesDir: config.codesDir, archiveDir: config.archiveDir, runtime });

  const shared = {
    oracle,
    runtime,
    executor,
    dependencies,
    store,
    codesDir: config.codesDir,
    recorder: hooks.recorder,
    onEvent: hooks.onEvent,
  };

  return {
    orchestrator: new DocumentOrchestrator({
      ...shared,
      readContent: readDocumentContent,
      lastFile: sessionLastFileRegistry,
    }),
    copyWorkflow: new CopyRefinementWorkflow({ ...shared, workDir: config.workDir, readContent: readDocumentContent }),
  };
}
