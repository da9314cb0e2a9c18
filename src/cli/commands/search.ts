/**
 * Search Command
 *
 * Nearest-neighbor retrieval over everything ingested:
 *
 *   lantern search "fog horn"
 *   lantern search "greet" -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { SearchOptionsSchema, validateInput } from '../validation.js';
import { formatResults } from '../../search/index.js';

interface SearchCommandOptions {
  k?: string;
}

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Check that documents were ingested: lantern list'));
  ctx.log(chalk.dim('  - Try different phrasing'));
}

/**
 * Create the search command.
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Find the chunks most similar to a query')
    .option('-k <number>', 'Number of results to return (default: search.top_k)')
    .action(async (query: string, options: SearchCommandOptions) => {
      const ctx = getContext();
      const { k } = validateInput(SearchOptionsSchema, options, 'search options');

      ctx.debug(`Query: "${query}", k: ${k ?? 'default'}`);

      const results = await withEngine(ctx, (engine) => engine.retrieve({ query, k }));
      ctx.debug(`Found ${results.length} results`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ query, count: results.length, results }, null, 2));
      } else if (results.length === 0) {
        displayEmptyResults(ctx, query);
      } else {
        ctx.log(
          chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) + chalk.dim(` for "${query}"`)
        );
        ctx.log('');
        ctx.log(formatResults(results));
      }
    });
}
