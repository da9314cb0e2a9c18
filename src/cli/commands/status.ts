/**
 * Status Command
 *
 * Displays index statistics and embedding health:
 *   lantern status         - Show status
 *   lantern status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { formatBytes, formatNumber, formatPath } from '../utils/format.js';
import { getConfigPath } from '../../config/index.js';
import { companionPaths } from '../../storage/paths.js';

/**
 * Total size of the index files that exist on disk.
 */
function indexFilesSize(basePath: string): number {
  const paths = companionPaths(basePath);
  return [paths.blob, paths.chunks, paths.wal, paths.documents]
    .filter((file) => existsSync(file))
    .reduce((total, file) => total + statSync(file).size, 0);
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show index statistics and embedding health')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Fetching status...');

      const { status, model } = await withEngine(ctx, async (engine, config) => ({
        status: engine.status(),
        model: config.embedding.model,
      }));
      const configPath = getConfigPath();
      const size = indexFilesSize(status.index.basePath);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              ...status,
              embedding: { ...status.embedding, model },
              size,
              config: { path: configPath },
            },
            null,
            2
          )
        );
        return;
      }

      const embeddings = status.embedding.fallbackOnly
        ? chalk.yellow(`fallback hash vectors (${status.embedding.dimensions} dims)`)
        : `${model} via ${status.embedding.provider} (${status.embedding.dimensions} dims)`;

      const lines: string[] = [];
      lines.push(chalk.bold('Lantern Status'));
      lines.push(chalk.dim('─'.repeat(35)));
      lines.push(`${chalk.cyan('Documents:')}    ${formatNumber(status.documents)}`);
      lines.push(`${chalk.cyan('Chunks:')}       ${formatNumber(status.index.segments)}`);
      lines.push(`${chalk.cyan('Tombstones:')}   ${formatNumber(status.index.tombstones)}`);
      lines.push(`${chalk.cyan('Index:')}        ${formatBytes(size)} (${formatPath(status.index.basePath)})`);
      lines.push(
        `${chalk.cyan('Snapshot:')}     generation ${status.index.generation}, ${status.index.pendingWrites} pending write(s)`
      );
      lines.push('');
      lines.push(`${chalk.cyan('Embeddings:')}   ${embeddings}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (status.documents === 0) {
        lines.push('');
        lines.push(chalk.yellow('No documents ingested.'));
        lines.push(`Run ${chalk.cyan('lantern ingest <path>')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
