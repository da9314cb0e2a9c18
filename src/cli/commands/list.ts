/**
 * List Command
 *
 * Displays all ingested documents:
 *   lantern list          - Show table of documents
 *   lantern ls            - Alias for list
 *   lantern list --json   - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { formatNumber, formatRelativeTime } from '../utils/format.js';
import { formatTable, type Column } from '../../utils/table.js';

/**
 * Create the list command
 */
export function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List all ingested documents')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Listing documents...');

      const documents = await withEngine(ctx, async (engine) => engine.listDocuments());
      ctx.debug(`Found ${documents.length} document(s)`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: documents.length, documents }, null, 2));
        return;
      }

      if (documents.length === 0) {
        ctx.log(chalk.yellow('No documents ingested yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('lantern ingest ~/notes')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'Id', key: 'id', maxWidth: 48 },
        { header: 'Kind', key: 'kind' },
        { header: 'Chars', key: 'length', align: 'right' },
        { header: 'Chunks', key: 'chunks', align: 'right' },
        { header: 'Embeddings', key: 'source' },
        { header: 'Ingested', key: 'ingested' },
      ];

      const rows = documents.map((doc) => ({
        id: doc.id,
        kind: doc.content_kind,
        length: formatNumber(doc.length),
        chunks: formatNumber(doc.chunk_count),
        source: doc.embedding_source === 'fallback' ? chalk.yellow('fallback') : 'model',
        ingested: formatRelativeTime(doc.ingested_at),
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${documents.length} document${documents.length === 1 ? '' : 's'} ingested`));
    });
}
