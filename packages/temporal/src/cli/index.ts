#!/usr/bin/env node
/**
 * casetime CLI
 *
 * Usage:
 *   casetime timeline <case-file>
 *   casetime context <case-file> [--confidence] [--causal]
 *   casetime sequence <case-file> [--kind <kind>] [--limit <n>]
 *   casetime segments <case-file> [--strategy <name>]
 *   casetime infer <case-file>
 */

import chalk from 'chalk';
import { Command } from 'commander';

import { isTemporalError } from '../errors.js';
import { contextCommand } from './commands/context.js';
import { inferCommand } from './commands/infer.js';
import { segmentsCommand } from './commands/segments.js';
import { sequenceCommand } from './commands/sequence.js';
import { timelineCommand } from './commands/timeline.js';

const program = new Command()
  .name('casetime')
  .description('Temporal reasoning over the events, actions and decisions of a case')
  .version('0.3.0')
  .option('--root <dir>', 'Directory holding .casetime/config.json')
  .option('-v, --verbose', 'Log debug output to stderr');

program.addCommand(timelineCommand);
program.addCommand(contextCommand);
program.addCommand(sequenceCommand);
program.addCommand(segmentsCommand);
program.addCommand(inferCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isTemporalError(error)) {
    console.error(chalk.red(`${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exitCode = 1;
});
