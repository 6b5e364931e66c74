#!/usr/bin/env node
/**
 * docmend CLI entry point
 */

import { DocumentNotFoundError, ConfigError } from '../../core/models/index.js';
import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';
import { program } from './program.js';
import './commands.js';

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    if (e instanceof DocumentNotFoundError || e instanceof ConfigError) {
      error(e.message);
    } else {
      error(`Unexpected error: ${getErrorMessage(e)}`);
    }
    process.exitCode = 1;
  }
}

void main();
