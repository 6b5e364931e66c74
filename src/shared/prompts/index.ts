/**
 * Prompt loader utility
 *
 * Loads prompt strings from resources/prompts_en.yaml and provides
 * key-based access with template variable substitution.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { getResourcePath } from '../resources.js';

let promptCache: Record<string, unknown> | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function loadPrompts(): Record<string, unknown> {
  if (promptCache) return promptCache;
  const content = readFileSync(getResourcePath('prompts_en.yaml'), 'utf-8');
  const data: unknown = parseYaml(content);
  promptCache = isRecord(data) ? data : {};
  return promptCache;
}

/**
 * Resolve a dot-separated key path to a value in a nested object.
 * Returns undefined if the path does not exist.
 */
function resolveKey(obj: Record<string, unknown>, keyPath: string): unknown {
  const parts = keyPath.split('.');
  let current: unknown = obj;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Replace {key} placeholders in a template string with values from vars.
 * Unmatched placeholders are left as-is. Substituted values are not rescanned.
 */
export function applyVars(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = vars[key];
    return value === undefined ? match : value;
  });
}

/**
 * Get a prompt string by dot-separated key.
 *
 * Template variables in `{name}` format are replaced when `vars` is given.
 */
export function getPrompt(key: string, vars?: Record<string, string>): string {
  const value = resolveKey(loadPrompts(), key);
  if (typeof value !== 'string') {
    throw new Error(`Prompt key not found: ${key}`);
  }
  return vars ? applyVars(value, vars) : value;
}

/** Reset cached data (for testing) */
export function _resetCache(): void {
  promptCache = null;
}
