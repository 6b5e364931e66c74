export type { Oracle, OracleFile, GenerateOptions } from './types.js';
export { AnthropicOracle, type AnthropicOracleOptions } from './anthropic.js';
export { ScriptedOracle, type ScriptedReply, type RecordedCall } from './scripted.js';
export { FallbackOracle, generateWithFallback, shouldStream, type StreamMode } from './fallback.js';
export { createOracle, type OracleProvider, type OracleSettings } from './factory.js';
