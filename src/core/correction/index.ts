export { extractCodeBlocks, combineCodeBlocks, extractCode } from './code-extractor.js';
export { createTrail, totalCorrections, type CorrectionTrail } from './counters.js';
export { formatErrorDetails, requestErrorFix, requestFeedbackFix, isUsablePatch } from './regeneration.js';
export {
  runErrorCorrectionCycle,
  type CorrectionDeps,
  type ErrorCycleInput,
  type ErrorCycleResult,
} from './error-correction.js';
export { parseVerdict } from './verdict-parser.js';
export { validateContent, SKIPPED_VERDICT, type ValidationRequest } from './content-validator.js';
export {
  runValidationCorrectionCycle,
  type ValidationCycleDeps,
  type ValidationCycleInput,
  type ValidationCycleResult,
  type ValidationCycleState,
} from './validation-correction.js';
