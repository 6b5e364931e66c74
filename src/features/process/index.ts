export { processFile, type ProcessFileOptions } from './processFile.js';
export { createProcessingContext, type ContextOverrides, type ProcessingContext } from './context.js';
export { renderEvent, renderResult, resultToJson } from './render.js';
