/**
 * Commander program definition: global options and initialization hook.
 */

import { Command, Option } from 'commander';
import { initHistoryWriter } from '../../features/history/index.js';
import { getDebugLogPath, getHistoryDir, loadGlobalConfig } from '../../infra/config/index.js';
import { getPackageVersion } from '../../shared/resources.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger } from '../../shared/utils/index.js';

export const program = new Command();

program
  .name('docmend')
  .description('Edit office documents with generated scripts, checked by a validator')
  .version(getPackageVersion())
  .addOption(new Option('--provider <name>', 'oracle provider (anthropic, mock)').choices(['anthropic', 'mock']))
  .option('--model <model>', 'model used by the oracle')
  .addOption(new Option('--runtime <name>', 'language of generated scripts').choices(['python', 'javascript']))
  .option('--scenario <path>', 'YAML reply scenario for the mock provider')
  .option('-q, --quiet', 'only print warnings and errors')
  .option('--debug', 'write debug logs to ~/.docmend/logs/debug.log');

/** Apply configuration to logging and history before any command runs */
export function initializeFromConfig(): void {
  const config = loadGlobalConfig();
  const opts = program.opts<{ quiet?: boolean; debug?: boolean }>();
  setLogLevel(opts.quiet ? 'warn' : config.logLevel);
  initDebugLogger({ enabled: opts.debug === true || config.debug, logFile: getDebugLogPath() });
  initHistoryWriter(config.history, getHistoryDir());
}

program.hook('preAction', () => {
  initializeFromConfig();
});
