/**
 * Infer Command - Show the relations inferred for a case
 *
 * Usage:
 *   casetime infer case.json
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';

import { RELATION_TEMPLATES } from '../../narrative/templates.js';
import { withCase } from '../session.js';
import { parseOptions } from './options.js';

export const inferCommand = new Command('infer')
  .description('Infer relations between adjacent facts and recompute the timeline order')
  .argument('<case-file>', 'Path to the case JSON file')
  .option('--json', 'Output as JSON')
  .action(async (caseFile: string, _options: unknown, command: Command) => {
    const options = parseOptions(command, z.object({ json: z.boolean().optional() }));

    await withCase(caseFile, options, async ({ service, scopeId }) => {
      const { inferred, order } = await service.refresh(scopeId);

      if (options.json) {
        console.log(JSON.stringify({ inferred, order: Object.fromEntries(order) }, null, 2));
        return;
      }

      if (inferred.length === 0) {
        console.log(chalk.yellow('No relations inferred'));
      }
      for (const relation of inferred) {
        const source = service.store.getFact(relation.sourceId).ownerRef;
        const target = service.store.getFact(relation.targetId).ownerRef;
        console.log(
          `${chalk.cyan(`${source.kind}:${source.id}`)} ${RELATION_TEMPLATES[relation.type]} ` +
            `${chalk.cyan(`${target.kind}:${target.id}`)} ${chalk.dim(`(confidence: ${relation.confidence.toFixed(2)})`)}`,
        );
      }
      console.log(chalk.dim(`\n${order.size} facts ordered`));
    });
  });
