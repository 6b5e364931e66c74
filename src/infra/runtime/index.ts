export {
  pythonRuntime,
  javascriptRuntime,
  getRuntime,
  GENERATED_SCRIPT_NAME,
  type RuntimeName,
  type ScriptRuntime,
  type CommandSpec,
} from './profiles.js';
export { runProcess, type ProcessResult, type RunProcessOptions } from './process.js';
export { WorkdirLock } from './workdir-lock.js';
export { CodeRunner, type CodeExecutor, type CodeRunnerOptions } from './code-runner.js';
export {
  SubprocessPackageInstaller,
  type PackageInstaller,
  type InstallResult,
  type SubprocessInstallerOptions,
} from './package-installer.js';
export {
  extractImports,
  ensureDependencies,
  createDependencyResolver,
  type DependencyResolver,
} from './dependency-resolver.js';
