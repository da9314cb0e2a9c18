/**
 * Summary Command
 *
 * Shows what is known about one document:
 *   lantern summary <id>
 *   lantern summary <id> --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { formatNumber } from '../utils/format.js';
import { DocumentNotFoundError } from '../../errors/index.js';

export function createSummaryCommand(getContext: () => CommandContext): Command {
  return new Command('summary')
    .argument('<id>', 'Document id')
    .description('Show length, chunk count and a preview of a document')
    .action(async (id: string) => {
      const ctx = getContext();

      const summary = await withEngine(ctx, async (engine) => engine.getDocumentSummary(id));
      if (!summary) {
        throw new DocumentNotFoundError(id);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      ctx.log(chalk.bold(summary.id));
      ctx.log(`  ${chalk.dim('Length:')}    ${formatNumber(summary.length)} characters`);
      ctx.log(`  ${chalk.dim('Chunks:')}    ${formatNumber(summary.chunk_count)}`);
      ctx.log(`  ${chalk.dim('Ingested:')}  ${summary.ingested_at ?? 'unknown'}`);
      ctx.log('');
      ctx.log(`  ${summary.preview}`);
    });
}
