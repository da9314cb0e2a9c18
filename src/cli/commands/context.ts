/**
 * Context Command
 *
 * Fits a conversation into the token budget, optionally with retrieved
 * chunks for a query:
 *
 *   lantern context chat.json
 *   lantern context chat.json --query "fog horn" -k 3
 *
 * The file holds a JSON array of { role, content } turns.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { ContextOptionsSchema, validateInput, type ContextOptions } from '../validation.js';
import { ConversationSchema, type ConversationTurn, type RetrievedResult } from '../../agent/index.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { safeJsonParse } from '../../utils/index.js';

/**
 * Read and validate a conversation file.
 */
export function readConversation(filePath: string): ConversationTurn[] {
  const absolutePath = resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(absolutePath);
  }

  const issues: string[] = [];
  const turns = safeJsonParse(readFileSync(absolutePath, 'utf-8'), ConversationSchema, null, (error) => {
    issues.push(error.message);
  });
  if (!turns) {
    throw new ValidationError('Invalid conversation file', issues);
  }
  return turns;
}

export function createContextCommand(getContext: () => CommandContext): Command {
  return new Command('context')
    .argument('<conversation>', 'JSON file with the conversation turns')
    .description('Truncate a conversation to the context token budget')
    .option('-q, --query <query>', 'Retrieve chunks for this query and include them')
    .option('-k <number>', 'Number of chunks to retrieve (default: search.top_k)')
    .action(async (file: string, options: ContextOptions) => {
      const ctx = getContext();
      const { query, k } = validateInput(ContextOptionsSchema, options, 'context options');
      const turns = readConversation(file);

      const output = await withEngine(ctx, async (engine, config) => {
        const retrieved: RetrievedResult[] = query ? await engine.retrieve({ query, k }) : [];
        const kept = engine.truncateContext(turns, retrieved);
        return {
          budget: config.context.max_tokens,
          tokens: engine.countTokens(kept, retrieved),
          dropped: turns.length - kept.length,
          turns: kept,
          retrieved,
          prompt: query ? engine.buildAugmentedQuery(query, retrieved) : undefined,
        };
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(
        chalk.bold(`Kept ${output.turns.length} of ${turns.length} turns`) +
          chalk.dim(` (${output.tokens}/${output.budget} tokens, ${output.retrieved.length} retrieved chunks)`)
      );
      ctx.log('');
      for (const turn of output.turns) {
        ctx.log(`${chalk.cyan(turn.role.padEnd(10))} ${turn.content}`);
      }
      if (output.prompt) {
        ctx.log('');
        ctx.log(chalk.dim('Augmented query:'));
        ctx.log(output.prompt);
      }
    });
}
