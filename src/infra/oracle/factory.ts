/**
 * Oracle factory
 */

import { ConfigError } from '../../core/models/index.js';
import { AnthropicOracle } from './anthropic.js';
import { FallbackOracle, type StreamMode } from './fallback.js';
import { ScriptedOracle } from './scripted.js';
import type { Oracle } from './types.js';

export type OracleProvider = 'anthropic' | 'mock';

export interface OracleSettings {
  provider: OracleProvider;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  stream: StreamMode;
  /** Scenario file for the mock provider */
  scenarioPath?: string;
}

export function createOracle(settings: OracleSettings): Oracle {
  switch (settings.provider) {
    case 'anthropic': {
      if (!settings.apiKey) {
        throw new ConfigError(
          'Anthropic API key is not configured. Set ANTHROPIC_API_KEY or anthropic_api_key in config.yaml.',
        );
      }
      const oracle = new AnthropicOracle({
        apiKey: settings.apiKey,
        model: settings.model,
        timeoutMs: settings.timeoutMs,
        maxRetries: settings.maxRetries,
      });
      return new FallbackOracle(oracle, settings.stream);
    }
    case 'mock': {
      if (!settings.scenarioPath) {
        throw new ConfigError('The mock provider requires a scenario file (--scenario <yaml>)');
      }
      return new FallbackOracle(ScriptedOracle.fromScenarioFile(settings.scenarioPath), settings.stream);
    }
  }
}
