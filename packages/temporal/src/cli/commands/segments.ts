/**
 * Segments Command - Group the facts of a case
 *
 * Usage:
 *   casetime segments case.json --strategy by_gap --threshold 1800
 *   casetime segments case.json --strategy auto --batch-size 3
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';

import { SEGMENT_STRATEGIES } from '../../segmentation/segmenter.js';
import { withCase } from '../session.js';
import { intOption, numberOption, parseOptions } from './options.js';

export const segmentsCommand = new Command('segments')
  .description('Group the facts of a case into segments')
  .argument('<case-file>', 'Path to the case JSON file')
  .option('-s, --strategy <strategy>', `One of: ${SEGMENT_STRATEGIES.join(', ')}`, 'auto')
  .option('--threshold <seconds>', 'Gap that starts a new segment (by_gap)')
  .option('--batch-size <number>', 'Facts per batch (auto)')
  .option('--json', 'Output as JSON')
  .action(async (caseFile: string, _options: unknown, command: Command) => {
    const options = parseOptions(
      command,
      z.object({
        strategy: z.string(),
        threshold: numberOption.optional(),
        batchSize: intOption.optional(),
        json: z.boolean().optional(),
      }),
    );

    await withCase(caseFile, options, async ({ service, scopeId }) => {
      const segments = await service.segmenter.group(scopeId, options.strategy, {
        thresholdSeconds: options.threshold,
        batchSize: options.batchSize,
      });

      if (options.json) {
        const result: Record<string, string[]> = {};
        for (const [key, facts] of segments) {
          result[key] = facts.map(fact => fact.id);
        }
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      for (const [key, facts] of segments) {
        console.log(chalk.bold(`${key} (${facts.length})`));
        for (const fact of facts) {
          console.log(`  ${chalk.dim(fact.start.toISOString())} ${fact.ownerRef.kind}:${fact.ownerRef.id}`);
        }
      }
    });
  });
