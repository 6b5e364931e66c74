/**
 * Dependency resolver
 *
 * Finds the third-party modules a code unit imports and makes sure each one
 * is installed. Installation failures are reported, never thrown.
 */

import type { DependencyResult } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import type { PackageInstaller } from './package-installer.js';
import type { ScriptRuntime } from './profiles.js';

const log = createLogger('dependency-resolver');

/** Candidate packages: top-level names, de-duplicated, builtins removed */
export function extractImports(code: string, runtime: ScriptRuntime): string[] {
  return runtime.scanImports(code).filter((name) => !runtime.isBuiltin(name));
}

export async function ensureDependencies(
  code: string,
  runtime: ScriptRuntime,
  installer: PackageInstaller,
): Promise<DependencyResult[]> {
  const results: DependencyResult[] = [];
  for (const name of extractImports(code, runtime)) {
    try {
      const { success, message } = await installer.ensureInstalled(name);
      if (!success) {
        log.warn('Dependency unavailable', { name, message });
      }
      results.push({ name, success, message });
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn('Dependency check failed', { name, message });
      results.push({ name, success: false, message });
    }
  }
  return results;
}

/** Binds a runtime and installer for the correction cycles */
export interface DependencyResolver {
  ensure(code: string): Promise<DependencyResult[]>;
}

export function createDependencyResolver(runtime: ScriptRuntime, installer: PackageInstaller): DependencyResolver {
  return {
    ensure: (code) => ensureDependencies(code, runtime, installer),
  };
}
