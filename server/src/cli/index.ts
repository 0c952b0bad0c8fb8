#!/usr/bin/env node

import { Command } from 'commander';
import logger from '../utils/logger.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { registerRunCommands } from './commands/run.js';
import { registerSourceCommands } from './commands/sources.js';
import { registerLedgerCommands } from './commands/ledger.js';
import { error } from './format.js';

const program = new Command();

program
  .name('consolidator')
  .description('Consolidate appointment rows from client spreadsheets into one sheet')
  .version('1.0.0');

registerRunCommands(program);
registerSourceCommands(program);
registerLedgerCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');

program.parseAsync(args).catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ issues: err.issues }, err.message);
    error(err.message);
  } else {
    logger.fatal({ error: getErrorMessage(err) }, 'Command failed');
    error(getErrorMessage(err));
  }
  process.exitCode = 1;
});
