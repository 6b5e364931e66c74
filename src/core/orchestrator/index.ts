export { DocumentOrchestrator } from './DocumentOrchestrator.js';
export {
  CopyRefinementWorkflow,
  isApproval,
  DEFAULT_FAILURE_SUMMARY,
  EXHAUSTED_MESSAGE,
  NO_SUMMARY,
  type CopyRefinementDeps,
  type RefineCopyRequest,
} from './CopyRefinementWorkflow.js';
export { resolveTarget, type ResolvedTarget } from './target-resolver.js';
export { extractSummaryLine } from './summary.js';
export type {
  ResultRecorder,
  ProcessRequest,
  ProcessOptions,
  UploadedFile,
  OrchestratorDeps,
} from './types.js';
