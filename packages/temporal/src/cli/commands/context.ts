/**
 * Context Command - Render a case as a temporal context block
 *
 * Usage:
 *   casetime context case.json
 *   casetime context case.json --confidence --causal
 *   casetime context case.json --no-infer
 */

import { Command } from 'commander';
import { z } from 'zod';

import { withCase } from '../session.js';
import { parseOptions } from './options.js';

export const contextCommand = new Command('context')
  .description('Print the TIMELINE / TEMPORAL RELATIONSHIPS text of a case')
  .argument('<case-file>', 'Path to the case JSON file')
  .option('--confidence', 'Show the confidence of inferred relations')
  .option('--causal', 'Add the causal relationships section')
  .option('--no-infer', 'Do not infer relations between adjacent facts')
  .action(async (caseFile: string, _options: unknown, command: Command) => {
    const options = parseOptions(
      command,
      z.object({
        confidence: z.boolean().optional(),
        causal: z.boolean().optional(),
        infer: z.boolean().default(true),
      }),
    );

    await withCase(caseFile, options, async ({ service, scopeId }) => {
      if (options.infer) {
        await service.refresh(scopeId);
      }
      const context = await service.narrator.getContext(scopeId, {
        includeConfidence: options.confidence,
        includeCausal: options.causal,
      });
      process.stdout.write(context);
    });
  });
