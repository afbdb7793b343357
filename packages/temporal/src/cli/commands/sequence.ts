/**
 * Sequence Command - List the facts of a case in order
 *
 * Usage:
 *   casetime sequence case.json
 *   casetime sequence case.json --kind decision --limit 3
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';

import { formatSpan } from '../../narrative/templates.js';
import { withCase } from '../session.js';
import { intOption, parseOptions } from './options.js';

export const sequenceCommand = new Command('sequence')
  .description('List the facts of a case in chronological order')
  .argument('<case-file>', 'Path to the case JSON file')
  .option('-k, --kind <kind>', 'Only facts of this kind: event, action, decision')
  .option('-l, --limit <number>', 'Maximum number of facts')
  .option('--json', 'Output as JSON')
  .action(async (caseFile: string, _options: unknown, command: Command) => {
    const options = parseOptions(
      command,
      z.object({
        kind: z.enum(['event', 'action', 'decision']).optional(),
        limit: intOption.optional(),
        json: z.boolean().optional(),
      }),
    );

    await withCase(caseFile, options, async ({ service, scopeId }) => {
      const facts = service.store.findSequence(scopeId, options.kind, options.limit);

      if (options.json) {
        console.log(JSON.stringify(facts, null, 2));
        return;
      }

      if (facts.length === 0) {
        console.log(chalk.yellow('No facts recorded'));
        return;
      }
      for (const fact of facts) {
        const span = formatSpan(fact.start, fact.end, fact.regionType === 'interval');
        console.log(
          `${chalk.yellow(span)} ${chalk.cyan(fact.ownerRef.kind)} ${fact.ownerRef.id} ${chalk.dim(`(${fact.granularity})`)}`,
        );
      }
    });
  });
