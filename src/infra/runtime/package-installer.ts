/**
 * Package installer
 *
 * Checks whether a module resolves for the runtime and installs its
 * distribution when it does not.
 */

import { mkdir } from 'node:fs/promises';
import { DEFAULT_INSTALL_TIMEOUT_MS, INSTALL_MESSAGE_LIMIT } from '../../shared/constants.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import type { ScriptRuntime } from './profiles.js';
import { runProcess } from './process.js';

const log = createLogger('package-installer');

export interface InstallResult {
  success: boolean;
  message: string;
}

export interface PackageInstaller {
  ensureInstalled(moduleName: string): Promise<InstallResult>;
}

export interface SubprocessInstallerOptions {
  runtime: ScriptRuntime;
  scriptsDir: string;
  interpreter?: string;
  timeoutMs?: number;
}

export class SubprocessPackageInstaller implements PackageInstaller {
  private readonly runtime: ScriptRuntime;
  private readonly scriptsDir: string;
  private readonly interpreter: string;
  private readonly timeoutMs: number;

  constructor(options: SubprocessInstallerOptions) {
    this.runtime = options.runtime;
    this.scriptsDir = options.scriptsDir;
    this.interpreter = options.interpreter ?? options.runtime.defaultInterpreter;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS;
  }

  async ensureInstalled(moduleName: string): Promise<InstallResult> {
    try {
      const check = this.runtime.checkCommand(this.interpreter, moduleName, this.scriptsDir);
      const checked = await runProcess(check.command, check.args, {
        env: check.env,
        timeoutMs: this.timeoutMs,
      });
      if (checked.exitCode === 0) {
        return { success: true, message: 'already installed' };
      }

      const distribution = this.runtime.distributionName(moduleName);
      await mkdir(this.scriptsDir, { recursive: true });
      const install = this.runtime.installCommand(this.interpreter, distribution, this.scriptsDir);
      log.info('Installing package', { moduleName, distribution });
      const installed = await runProcess(install.command, install.args, {
        env: install.env,
        timeoutMs: this.timeoutMs,
      });
      const success = installed.exitCode === 0 && !installed.timedOut;
      const output = success ? installed.stdout : installed.stderr || installed.stdout;
      const message = installed.timedOut
        ? `Installation timed out after ${this.timeoutMs}ms`
        : output.slice(0, INSTALL_MESSAGE_LIMIT);
      if (!success) {
        log.warn('Package installation failed', { distribution, message });
      }
      return { success, message };
    } catch (error) {
      return { success: false, message: getErrorMessage(error).slice(0, INSTALL_MESSAGE_LIMIT) };
    }
  }
}
