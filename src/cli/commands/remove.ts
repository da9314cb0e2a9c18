/**
 * Remove Command
 *
 * Deletes a document and its chunks:
 *   lantern remove <id>          - Show what would be removed (requires --force)
 *   lantern remove <id> --force  - Remove without confirmation
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { DocumentNotFoundError } from '../../errors/index.js';

interface RemoveOptions {
  force?: boolean;
}

/**
 * Create the remove command
 */
export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<id>', 'Id of the document to remove')
    .description('Remove a document and its chunks from the index')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (id: string, options: RemoveOptions) => {
      const ctx = getContext();
      ctx.debug(`Remove command called for document: ${id}`);

      await withEngine(ctx, async (engine) => {
        const summary = engine.getDocumentSummary(id);
        if (!summary) {
          throw new DocumentNotFoundError(id);
        }

        // Confirmation check (unless --force or --json mode)
        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow(`This will permanently remove "${id}" from the index.`));
          ctx.log(`  - ${chalk.dim('Chunks:')} ${summary.chunk_count.toLocaleString()}`);
          ctx.log(`  - ${chalk.dim('Length:')} ${summary.length.toLocaleString()} characters`);
          ctx.log('');
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
          process.exitCode = 1;
          return;
        }

        await engine.removeDocument(id);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, id, chunksRemoved: summary.chunk_count }));
        } else {
          ctx.log(`${chalk.green('✓')} Removed "${chalk.cyan(id)}" (${summary.chunk_count.toLocaleString()} chunks)`);
        }
      });
    });
}
