/**
 * Timeline Command - Show the structured timeline of a case
 *
 * Usage:
 *   casetime timeline case.json
 *   casetime timeline case.json --json
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';

import type { TimelineEntry } from '../../narrative/narrator.js';
import { formatSpan } from '../../narrative/templates.js';
import { withCase } from '../session.js';
import { parseOptions } from './options.js';

function printEntries(title: string, entries: TimelineEntry[]): void {
  console.log(chalk.bold(`${title} (${entries.length})`));
  if (entries.length === 0) {
    console.log(chalk.dim('  none'));
  }
  for (const entry of entries) {
    const span = formatSpan(entry.start, entry.end, entry.regionType === 'interval');
    const order = entry.timelineOrder !== null ? chalk.dim(`#${entry.timelineOrder} `) : '';
    console.log(`  ${order}${chalk.yellow(span)} ${entry.description}`);
    if (entry.actorId) {
      console.log(chalk.dim(`    actor: ${entry.actorId}`));
    }
  }
  console.log('');
}

export const timelineCommand = new Command('timeline')
  .description('Show events, actions and decisions of a case')
  .argument('<case-file>', 'Path to the case JSON file')
  .option('--json', 'Output as JSON')
  .action(async (caseFile: string, _options: unknown, command: Command) => {
    const options = parseOptions(command, z.object({ json: z.boolean().optional() }));

    await withCase(caseFile, options, async ({ service, scopeId, title }) => {
      await service.refresh(scopeId);
      const timeline = await service.narrator.buildTimeline(scopeId);

      if (options.json) {
        console.log(JSON.stringify(timeline, null, 2));
        return;
      }

      console.log(chalk.bold.cyan(`\nTimeline: ${title ?? scopeId}\n`));
      printEntries('Events', timeline.events);
      printEntries('Actions', timeline.actions);
      printEntries('Decisions', timeline.decisions);

      const descriptions = new Map(timeline.decisions.map(entry => [entry.id, entry]));
      const path = service.store.criticalPath(scopeId);
      if (path.length > 0) {
        console.log(chalk.bold('Critical path'));
      }
      for (const [index, fact] of path.entries()) {
        const entry = descriptions.get(fact.id);
        const chosen = entry?.selectedOption ? ` → ${chalk.green(entry.selectedOption)}` : '';
        console.log(`  ${index + 1}. ${chalk.cyan(entry?.description ?? fact.ownerRef.id)}${chosen}`);
      }
    });
  });
