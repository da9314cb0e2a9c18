/**
 * Ingest Command
 *
 * Adds documents to the index:
 *   lantern ingest <file>                 Ingest one file (id = its path)
 *   lantern ingest <dir>                  Ingest every text file under a directory
 *   lantern ingest --text "..." --id a    Ingest inline text
 *   lantern ingest notes.md --meta team=docs --meta year=2024
 *
 * Re-ingesting an id replaces its previous chunks.
 */

import { Command } from 'commander';
import { readFileSync, statSync } from 'node:fs';
import { extname, relative, resolve, sep } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandContext } from '../types.js';
import { withEngine } from '../utils/engine.js';
import { createProgressReporter, type IngestRunResult } from '../utils/progress.js';
import { IngestOptionsSchema, validateInput } from '../validation.js';
import type { IngestResult, RetrievalEngine } from '../../agent/index.js';
import type { Config } from '../../config/index.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { contentKindForExtension, scanDirectory } from '../../indexer/index.js';
import type { ContentKind, Metadata } from '../../indexer/index.js';

interface IngestCommandOptions {
  text?: string;
  id?: string;
  meta: string[];
  kind?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Document id for a file: its path relative to the working directory,
 * with forward slashes.
 */
export function fileDocumentId(absolutePath: string): string {
  return relative(process.cwd(), absolutePath).split(sep).join('/');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function printResult(ctx: CommandContext, result: IngestResult): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(result));
    return;
  }

  ctx.log(
    `${chalk.green('✓')} Ingested ${chalk.cyan(result.documentId)}: ` +
      `${result.chunkCount} chunk(s), ${result.contentKind}`
  );
  if (result.embeddingSource === 'fallback') {
    ctx.log(chalk.yellow('  Embedded with fallback vectors (lower retrieval quality)'));
  }
}

async function ingestOne(
  ctx: CommandContext,
  engine: RetrievalEngine,
  request: { content: string; id?: string; metadata: Metadata; contentKind?: ContentKind }
): Promise<void> {
  const spinner = ctx.options.json || !process.stdout.isTTY ? null : ora('Embedding...').start();
  try {
    const result = await engine.ingest(request);
    spinner?.stop();
    printResult(ctx, result);
  } catch (error) {
    spinner?.fail('Ingest failed');
    throw error;
  }
}

async function ingestDirectory(
  ctx: CommandContext,
  engine: RetrievalEngine,
  config: Config,
  rootPath: string,
  metadata: Metadata,
  contentKind: ContentKind | undefined
): Promise<void> {
  const reporter = createProgressReporter({ json: ctx.options.json, verbose: ctx.options.verbose });
  const started = performance.now();

  reporter.startStage('scanning');
  const scan = await scanDirectory(rootPath, {
    ignorePatterns: config.indexing?.ignore_patterns,
    maxFileSize: config.indexing?.max_file_size,
  });
  reporter.completeStage({
    stage: 'scanning',
    processed: scan.files.length,
    total: scan.files.length,
    durationMs: Math.round(performance.now() - started),
    details: { skipped: scan.skipped.length },
  });

  const result: IngestRunResult = {
    rootPath: scan.rootPath,
    filesIngested: 0,
    chunksCreated: 0,
    filesSkipped: scan.skipped.length,
    fallbackDocuments: 0,
    totalDurationMs: 0,
    warnings: scan.skipped.map((file) => `Skipped ${file.path} (${file.reason})`),
    errors: [],
  };

  const ingestStarted = performance.now();
  reporter.startStage('ingesting', scan.files.length);

  for (const [i, file] of scan.files.entries()) {
    let content: string;
    try {
      content = readFileSync(file.path, 'utf-8');
    } catch (error) {
      const message = `Could not read ${file.relativePath}: ${errorMessage(error)}`;
      reporter.warn(message);
      result.warnings.push(message);
      result.filesSkipped++;
      continue;
    }

    try {
      const ingested = await engine.ingest({
        content,
        id: fileDocumentId(file.path),
        metadata: { ...metadata, path: file.relativePath },
        contentKind: contentKind ?? file.contentKind,
      });
      result.filesIngested++;
      result.chunksCreated += ingested.chunkCount;
      if (ingested.embeddingSource === 'fallback') {
        result.fallbackDocuments++;
      }
    } catch (error) {
      // Empty files fail validation; the rest of the directory carries on
      if (!(error instanceof ValidationError)) throw error;
      const message = `Skipped ${file.relativePath}: ${error.issues.join('; ') || error.message}`;
      reporter.warn(message);
      result.warnings.push(message);
      result.filesSkipped++;
    }

    reporter.updateProgress(i + 1, file.relativePath);
  }

  reporter.completeStage({
    stage: 'ingesting',
    processed: result.filesIngested,
    total: scan.files.length,
    durationMs: Math.round(performance.now() - ingestStarted),
    details: { chunks: result.chunksCreated },
  });

  result.totalDurationMs = Math.round(performance.now() - started);
  reporter.showSummary(result);
}

/**
 * Create the ingest command.
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('[path]', 'File or directory to ingest')
    .description('Chunk, embed and index documents')
    .option('--text <text>', 'Ingest this text instead of a file')
    .option('--id <id>', 'Document id (default: file path, or a hash of the text)')
    .option('--meta <key=value>', 'Metadata to attach (repeatable)', collect, [])
    .option('--kind <kind>', 'Chunk as prose or code instead of detecting')
    .action(async (path: string | undefined, options: IngestCommandOptions) => {
      const ctx = getContext();
      const { text, id, meta, kind } = validateInput(IngestOptionsSchema, options, 'ingest options');
      ctx.debug(`Ingest options: ${JSON.stringify({ path, id, meta, kind })}`);

      if ((path === undefined) === (text === undefined)) {
        throw new ValidationError('Invalid ingest options', ['Give either a path or --text, not both']);
      }

      await withEngine(ctx, async (engine, config) => {
        if (text !== undefined) {
          await ingestOne(ctx, engine, { content: text, id, metadata: meta, contentKind: kind });
          return;
        }

        const absolutePath = resolve(path ?? '.');
        const stat = statSync(absolutePath, { throwIfNoEntry: false });
        if (!stat) {
          throw new FileNotFoundError(absolutePath);
        }

        if (stat.isDirectory()) {
          if (id !== undefined) {
            throw new ValidationError('Invalid ingest options', ['--id cannot be used with a directory']);
          }
          await ingestDirectory(ctx, engine, config, absolutePath, meta, kind);
          return;
        }

        await ingestOne(ctx, engine, {
          content: readFileSync(absolutePath, 'utf-8'),
          id: id ?? fileDocumentId(absolutePath),
          metadata: { ...meta, path: fileDocumentId(absolutePath) },
          contentKind: kind ?? contentKindForExtension(extname(absolutePath).slice(1).toLowerCase()),
        });
      });
    });
}
