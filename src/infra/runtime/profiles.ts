/**
 * Script runtime profiles
 *
 * A profile describes everything language-specific about executing a
 * generated code unit: fence tags, program text, import scanning, and how
 * packages are checked and installed.
 */

import { readFileSync } from 'node:fs';
import { builtinModules } from 'node:module';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod/v4';
import type { ExecutionBindings } from '../../core/models/index.js';
import { getResourcePath } from '../../shared/resources.js';

export type RuntimeName = 'python' | 'javascript';

export interface CommandSpec {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface ScriptRuntime {
  readonly name: RuntimeName;
  /** Human-readable language name used in prompts */
  readonly language: string;
  /** Fence tags accepted by the code extractor; the first one is requested from the oracle */
  readonly fenceTags: readonly string[];
  readonly extension: string;
  readonly defaultInterpreter: string;
  /** Interpreter arguments that make it read the program from stdin */
  readonly runArgs: readonly string[];
  /** Program fed on stdin; line N of the code stays line N of the program */
  program(code: string): string;
  /** Wrap arbitrary text so it is a comment-only program */
  commentOut(text: string): string;
  /** Top-level module names referenced by the code, in order of appearance */
  scanImports(code: string): string[];
  isBuiltin(moduleName: string): boolean;
  /** Package name to install for an import name */
  distributionName(moduleName: string): string;
  checkCommand(interpreter: string, moduleName: string, scriptsDir: string): CommandSpec;
  installCommand(interpreter: string, distribution: string, scriptsDir: string): CommandSpec;
  /** Environment added to every execution */
  env(bindings: ExecutionBindings, scriptsDir: string): Record<string, string>;
}

const BINDING_NAMES = ['TARGET_FILE_PATH', 'OUTPUT_DIR', 'CODES_DIR'] as const;

/** File name Python tracebacks give the generated code */
export const GENERATED_SCRIPT_NAME = '<generated>';

// Reads the code from stdin and runs it under its own name, so traceback
// line numbers are those of the code; the loader's own frame is dropped.
const PYTHON_LOADER = [
  'import linecache, os, sys, traceback',
  'source = sys.stdin.read()',
  `name = '${GENERATED_SCRIPT_NAME}'`,
  'linecache.cache[name] = (len(source), None, source.splitlines(True), name)',
  `scope = {'__name__': '__main__', ${BINDING_NAMES.map((n) => `'${n}': os.environ['${n}']`).join(', ')}}`,
  'try:',
  "    exec(compile(source, name, 'exec'), scope)",
  'except SystemExit:',
  '    raise',
  'except BaseException as error:',
  '    traceback.print_exception(type(error), error, error.__traceback__.tb_next)',
  '    sys.exit(1)',
].join('\n');

function bindingEnv(bindings: ExecutionBindings): Record<string, string> {
  return {
    TARGET_FILE_PATH: bindings.targetFilePath,
    OUTPUT_DIR: bindings.outputDir,
    CODES_DIR: bindings.codesDir,
  };
}

const PythonModulesSchema = z.object({
  stdlib: z.array(z.string()),
  distributions: z.record(z.string(), z.string()),
});

type PythonModules = z.infer<typeof PythonModulesSchema>;

let pythonModulesCache: PythonModules | null = null;

function loadPythonModules(): PythonModules {
  if (pythonModulesCache) return pythonModulesCache;
  const raw = readFileSync(getResourcePath('python-modules.json'), 'utf-8');
  // JSON is a subset of YAML; one parser for all resource files
  pythonModulesCache = PythonModulesSchema.parse(parseYaml(raw));
  return pythonModulesCache;
}

function pushUnique(target: string[], name: string | undefined): void {
  if (name && !target.includes(name)) {
    target.push(name);
  }
}

function scanPythonImports(code: string): string[] {
  const names: string[] = [];
  for (const line of code.split(/\r?\n/)) {
    const stripped = line.trim();
    const importMatch = /^import\s+(.+)$/.exec(stripped);
    if (importMatch?.[1]) {
      for (const part of importMatch[1].split(',')) {
        const moduleName = part.trim().split(/\s+/)[0];
        pushUnique(names, moduleName?.split('.')[0]);
      }
      continue;
    }
    const fromMatch = /^from\s+(\S+)\s+import\b/.exec(stripped);
    if (fromMatch?.[1] && !fromMatch[1].startsWith('.')) {
      pushUnique(names, fromMatch[1].split('.')[0]);
    }
  }
  return names;
}

function topLevelPackage(specifier: string): string | undefined {
  if (specifier.startsWith('.') || specifier.startsWith('/')) {
    return undefined;
  }
  const parts = specifier.split('/');
  if (specifier.startsWith('@')) {
    return parts.length >= 2 ? `${parts[0]}/${parts[1]}` : undefined;
  }
  return parts[0];
}

function scanJavaScriptImports(code: string): string[] {
  const names: string[] = [];
  const patterns = [
    /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g,
    /\bimport\s+(?:[^'"]*?\s+from\s+)?['"]([^'"]+)['"]/g,
    /\bimport\(\s*['"]([^'"]+)['"]\s*\)/g,
  ];
  const found: Array<{ index: number; specifier: string }> = [];
  for (const pattern of patterns) {
    for (const match of code.matchAll(pattern)) {
      if (match[1] !== undefined) {
        found.push({ index: match.index ?? 0, specifier: match[1] });
      }
    }
  }
  found.sort((a, b) => a.index - b.index);
  for (const { specifier } of found) {
    pushUnique(names, topLevelPackage(specifier));
  }
  return names;
}

export const pythonRuntime: ScriptRuntime = {
  name: 'python',
  language: 'Python',
  fenceTags: ['python', 'py'],
  extension: '.py',
  defaultInterpreter: 'python3',
  runArgs: ['-c', PYTHON_LOADER],
  program(code) {
    return code;
  },
  commentOut(text) {
    return text
      .split(/\r?\n/)
      .map((line) => (line ? `# ${line}` : '#'))
      .join('\n');
  },
  scanImports: scanPythonImports,
  isBuiltin(moduleName) {
    return loadPythonModules().stdlib.includes(moduleName);
  },
  distributionName(moduleName) {
    return loadPythonModules().distributions[moduleName] ?? moduleName;
  },
  checkCommand(interpreter, moduleName) {
    return {
      command: interpreter,
      args: ['-c', 'import importlib, sys; importlib.import_module(sys.argv[1])', moduleName],
    };
  },
  installCommand(interpreter, distribution) {
    return { command: interpreter, args: ['-m', 'pip', 'install', distribution] };
  },
  env(bindings) {
    return { ...bindingEnv(bindings), PYTHONIOENCODING: 'utf-8' };
  },
};

export const javascriptRuntime: ScriptRuntime = {
  name: 'javascript',
  language: 'JavaScript',
  fenceTags: ['javascript', 'js'],
  extension: '.js',
  defaultInterpreter: 'node',
  runArgs: ['-'],
  program(code) {
    const bindings = BINDING_NAMES.map((name) => `globalThis.${name} = process.env.${name};`);
    return `${bindings.join(' ')} ${code}`;
  },
  commentOut(text) {
    return text
      .split(/\r?\n/)
      .map((line) => (line ? `// ${line}` : '//'))
      .join('\n');
  },
  scanImports: scanJavaScriptImports,
  isBuiltin(moduleName) {
    const bare = moduleName.startsWith('node:') ? moduleName.slice('node:'.length) : moduleName;
    return moduleName.startsWith('node:') || builtinModules.includes(bare);
  },
  distributionName(moduleName) {
    return moduleName;
  },
  checkCommand(interpreter, moduleName, scriptsDir) {
    return {
      command: interpreter,
      args: ['-e', 'require.resolve(process.argv[1])', moduleName],
      env: { NODE_PATH: join(scriptsDir, 'node_modules') },
    };
  },
  installCommand(_interpreter, distribution, scriptsDir) {
    return {
      command: 'npm',
      args: ['install', '--no-save', '--no-audit', '--no-fund', '--prefix', scriptsDir, distribution],
    };
  },
  env(bindings, scriptsDir) {
    return { ...bindingEnv(bindings), NODE_PATH: join(scriptsDir, 'node_modules') };
  },
};

const RUNTIMES: Record<RuntimeName, ScriptRuntime> = {
  python: pythonRuntime,
  javascript: javascriptRuntime,
};

export function getRuntime(name: RuntimeName): ScriptRuntime {
  return RUNTIMES[name];
}
