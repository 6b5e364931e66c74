/**
 * Subcommand registration
 */

import { processFile } from '../../features/process/index.js';
import { listConfigKeys, setConfig, showConfig } from '../../features/config/index.js';
import { purgeOldHistory, showHistory } from '../../features/history/index.js';
import type { OracleProvider } from '../../infra/oracle/index.js';
import type { RuntimeName } from '../../infra/runtime/index.js';
import { program } from './program.js';

type GlobalOptions = {
  provider?: OracleProvider;
  model?: string;
  runtime?: RuntimeName;
  scenario?: string;
};

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
}

program
  .command('process')
  .description('Modify a document according to a task (uses the last file when none is given)')
  .argument('[file]', 'document to modify')
  .requiredOption('-t, --task <task>', 'what to change in the document')
  .option('--copy', 'work on a copy with the refinement workflow; the source is left untouched')
  .option('-o, --output <path>', 'also write the resulting document to this path')
  .option('--json', 'print the result as JSON')
  .action(async (file: string | undefined, opts: { task: string; copy?: boolean; output?: string; json?: boolean }) => {
    const globals = program.opts<GlobalOptions>();
    process.exitCode = await processFile({ ...globals, ...opts, file });
  });

const configCommand = program
  .command('config')
  .description('Show the effective configuration')
  .action(() => {
    showConfig();
  });

configCommand
  .command('set')
  .description('Set a key in ~/.docmend/config.yaml')
  .argument('<key>', 'configuration key (snake_case)')
  .argument('<value>', 'value (YAML scalar)')
  .action((key: string, value: string) => {
    setConfig(key, value);
  });

configCommand
  .command('keys')
  .description('List configuration keys')
  .action(() => {
    listConfigKeys();
  });

program
  .command('history')
  .description('Show recent requests')
  .option('-n, --limit <count>', 'number of entries', parsePositiveInt, 20)
  .option('--purge <days>', 'delete history older than this many days', parsePositiveInt)
  .action((opts: { limit: number; purge?: number }) => {
    if (opts.purge !== undefined) {
      purgeOldHistory(opts.purge);
      return;
    }
    showHistory(opts.limit);
  });
