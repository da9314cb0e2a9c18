/**
 * Progress Reporter
 *
 * Manages progress display for directory ingestion.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripting
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) and file paths are cut
 * to fit. NO_COLOR disables colors.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Stages of a directory ingest, in order.
 */
export type IngestStage = 'scanning' | 'ingesting';

const STAGE_LABELS: Record<IngestStage, string> = {
  scanning: 'Scanning',
  ingesting: 'Ingesting',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show detailed per-file output */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IngestStage;
  processed: number;
  total: number;
  durationMs: number;
  details?: Record<string, unknown>;
}

/**
 * Final result of a directory ingest.
 */
export interface IngestRunResult {
  /** Scanned root directory */
  rootPath: string;

  filesIngested: number;

  chunksCreated: number;

  /** Files left out by size or read errors */
  filesSkipped: number;

  /** Documents embedded (at least partly) by the hash encoder */
  fallbackDocuments: number;

  totalDurationMs: number;

  warnings: string[];

  errors: string[];
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'error'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: false });
 *
 * reporter.startStage('ingesting', files.length);
 * reporter.updateProgress(1, 'notes/intro.md');
 * reporter.completeStage({ stage: 'ingesting', processed: 12, total: 12, durationMs: 840 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage.
   *
   * @param total - Expected total items (0 if unknown, like during scanning)
   */
  startStage(stage: IngestStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();

      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage) return;

    if (this.options.verbose && currentFile) {
      this.verboseLines.push(`  → ${currentFile}`);
    }

    const now = performance.now();
    if (this.lastUpdateTime > 0 && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: {
          processed,
          total: this.currentTotal,
          currentFile,
        },
      });
      return;
    }

    let progressText: string;
    if (this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
    } else {
      progressText = `Found ${processed} files`;
    }

    const shownPath = currentFile ? this.truncatePath(currentFile) : '';

    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = shownPath ? `${progressText.padEnd(25)} ${chalk.dim(shownPath)}` : progressText;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(`${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`);

      if (this.options.verbose && this.verboseLines.length > 0) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // Interactive mode keeps the spinner clean unless --verbose
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Display a non-fatal error. Always shown.
   */
  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'error',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    const contextStr = context ? ` (${context})` : '';
    console.error(chalk.red(`Error: ${message}${contextStr}`));
  }

  /**
   * Display the final summary.
   */
  showSummary(result: IngestRunResult): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result },
      });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Ingest Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Files ingested:')}   ${result.filesIngested.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks created:')}   ${result.chunksCreated.toLocaleString()}`);
    if (result.filesSkipped > 0) {
      console.log(`  ${chalk.dim('Files skipped:')}    ${result.filesSkipped.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.totalDurationMs)}`);

    if (result.fallbackDocuments > 0) {
      console.log('');
      console.log(
        chalk.yellow(`  ${result.fallbackDocuments} document(s) used fallback embeddings (lower retrieval quality)`)
      );
    }

    if (result.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${result.warnings.length} warning(s) during ingest`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  private getStageUnit(stage: IngestStage): string {
    switch (stage) {
      case 'scanning':
        return 'files';
      case 'ingesting':
        return 'files ingested';
    }
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? process.stdout.isTTY ?? false,
  });
}
