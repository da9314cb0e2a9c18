/**
 * Lantern CLI Program
 *
 * Sets up Commander.js with global options and registers all subcommands.
 * Kept apart from the entry point so tests can build and drive a program
 * without touching process handlers.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createContextCommand } from './commands/context.js';
import { createIngestCommand } from './commands/ingest.js';
import { createListCommand } from './commands/list.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { createSummaryCommand } from './commands/summary.js';
import { CLIError } from '../errors/index.js';

export const VERSION = process.env.LANTERN_VERSION ?? '0.1.0';

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Build the root program with every subcommand registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('lantern')
    .description('Local retrieval engine - ingest documents and query them by meaning')
    .version(VERSION, '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)

    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('lantern ingest ./notes')}               Ingest every text file under a directory
  ${chalk.cyan('lantern ingest --text "..." --id a')}   Ingest inline text
  ${chalk.cyan('lantern search "fog horn" -k 3')}       Find the most similar chunks
  ${chalk.cyan('lantern summary notes/intro.md')}       Show a document summary
  ${chalk.cyan('lantern context chat.json -q "..."')}   Fit a conversation into the token budget
  ${chalk.cyan('lantern config set search.top_k 10')}   Change a setting
`
    );

  /**
   * Commander stores global options on the root command after parsing
   */
  const getContext = (): CommandContext => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return createContext({ verbose: opts.verbose ?? false, json: opts.json ?? false });
  };

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createSearchCommand(getContext));
  program.addCommand(createSummaryCommand(getContext));
  program.addCommand(createListCommand(getContext));
  program.addCommand(createRemoveCommand(getContext));
  program.addCommand(createContextCommand(getContext));
  program.addCommand(createStatusCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  // Handle unknown commands gracefully
  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: lantern --help  to see available commands');
  });

  return program;
}
