/**
 * docmend - public API
 */

export * from './core/models/index.js';
export {
  extractCodeBlocks,
  combineCodeBlocks,
  extractCode,
  parseVerdict,
  validateContent,
  runErrorCorrectionCycle,
  runValidationCorrectionCycle,
  createTrail,
  totalCorrections,
  type CorrectionTrail,
  type CorrectionDeps,
  type ValidationCycleDeps,
  type ValidationCycleResult,
} from './core/correction/index.js';
export {
  DocumentOrchestrator,
  CopyRefinementWorkflow,
  isApproval,
  type ProcessRequest,
  type ProcessOptions,
  type OrchestratorDeps,
  type CopyRefinementDeps,
  type RefineCopyRequest,
  type ResultRecorder,
} from './core/orchestrator/index.js';
export {
  AnthropicOracle,
  ScriptedOracle,
  FallbackOracle,
  generateWithFallback,
  createOracle,
  type Oracle,
  type OracleFile,
  type GenerateOptions,
  type OracleSettings,
} from './infra/oracle/index.js';
export {
  CodeRunner,
  SubprocessPackageInstaller,
  WorkdirLock,
  extractImports,
  ensureDependencies,
  createDependencyResolver,
  getRuntime,
  pythonRuntime,
  javascriptRuntime,
  type ScriptRuntime,
  type RuntimeName,
  type CodeExecutor,
  type PackageInstaller,
  type DependencyResolver,
} from './infra/runtime/index.js';
export { readDocumentContent, formatFromPath, type ContentReader } from './infra/documents/index.js';
export { FileArtifactStore, type ArtifactStore } from './infra/storage/index.js';
export { loadGlobalConfig, type GlobalConfig } from './infra/config/index.js';
export { createProcessingContext } from './features/process/index.js';
