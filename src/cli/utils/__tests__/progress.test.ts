/**
 * ProgressReporter Tests
 *
 * Tests the progress display for different output modes:
 * - JSON (NDJSON events)
 * - Non-interactive (simple text)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';

import {
  ProgressReporter,
  createProgressReporter,
  formatDuration,
  type ProgressReporterOptions,
  type IngestRunResult,
} from '../progress.js';

function createResult(overrides: Partial<IngestRunResult> = {}): IngestRunResult {
  return {
    rootPath: '/notes',
    filesIngested: 12,
    chunksCreated: 48,
    filesSkipped: 0,
    fallbackDocuments: 0,
    totalDurationMs: 1500,
    warnings: [],
    errors: [],
    ...overrides,
  };
}

describe('ProgressReporter', () => {
  let consoleOutput: string[] = [];
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    consoleOutput = [];
    previousLevel = chalk.level;
    chalk.level = 0;
    const capture = (...args: unknown[]): void => {
      consoleOutput.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'warn').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
  });

  afterEach(() => {
    chalk.level = previousLevel;
    vi.restoreAllMocks();
  });

  describe('JSON mode', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: false,
      isInteractive: false,
    };

    it('should emit stage_start event', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('scanning', 100);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0] ?? '');
      expect(event).toMatchObject({ type: 'stage_start', stage: 'scanning', data: { total: 100 } });
      expect(event.timestamp).toEqual(expect.any(String));
    });

    it('should emit the first stage_progress event immediately', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('ingesting', 50);
      reporter.updateProgress(25, 'notes/intro.md');

      expect(consoleOutput).toHaveLength(2);
      expect(JSON.parse(consoleOutput[1] ?? '')).toMatchObject({
        type: 'stage_progress',
        stage: 'ingesting',
        data: { processed: 25, total: 50, currentFile: 'notes/intro.md' },
      });
    });

    it('should emit stage_complete event', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('ingesting', 10);
      reporter.completeStage({ stage: 'ingesting', processed: 10, total: 10, durationMs: 500, details: { chunks: 30 } });

      expect(JSON.parse(consoleOutput[1] ?? '')).toMatchObject({
        type: 'stage_complete',
        stage: 'ingesting',
        data: { processed: 10, total: 10, durationMs: 500, details: { chunks: 30 } },
      });
    });

    it('should emit warning and error events with the current stage', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('ingesting', 2);
      reporter.warn('Skipped empty.md', 'empty');
      reporter.error('Could not read', 'locked.md');

      expect(JSON.parse(consoleOutput[1] ?? '')).toMatchObject({
        type: 'warning',
        stage: 'ingesting',
        data: { message: 'Skipped empty.md', context: 'empty' },
      });
      expect(JSON.parse(consoleOutput[2] ?? '')).toMatchObject({
        type: 'error',
        data: { message: 'Could not read', context: 'locked.md' },
      });
    });

    it('should emit complete event on summary', () => {
      const reporter = new ProgressReporter(jsonOptions);
      const result = createResult();
      reporter.showSummary(result);

      expect(JSON.parse(consoleOutput[0] ?? '')).toMatchObject({ type: 'complete', data: { result } });
    });
  });

  describe('Non-interactive mode', () => {
    const textOptions: ProgressReporterOptions = {
      json: false,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('should output text for stage start and complete', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.startStage('scanning');
      reporter.completeStage({ stage: 'scanning', processed: 12, total: 12, durationMs: 5 });

      expect(consoleOutput).toEqual(['Scanning...', 'Scanning complete: 12 files']);
    });

    it('should show warnings and errors', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.warn('Skipped b.txt');
      reporter.error('Could not read', 'c.md');

      expect(consoleOutput).toEqual(['Warning: Skipped b.txt', 'Error: Could not read (c.md)']);
    });

    it('should print a summary with skipped files and fallback notice', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.showSummary(createResult({ filesSkipped: 2, fallbackDocuments: 3 }));

      expect(consoleOutput).toEqual([
        '',
        'Ingest Complete ✓',
        '',
        '  Files ingested:   12',
        '  Chunks created:   48',
        '  Files skipped:    2',
        '  Time elapsed:     1.5s',
        '',
        '  3 document(s) used fallback embeddings (lower retrieval quality)',
        '',
      ]);
    });
  });

  describe('update throttling', () => {
    it('should drop updates inside the throttle window', () => {
      const reporter = new ProgressReporter({ json: true, verbose: false, noColor: false, isInteractive: false });
      reporter.startStage('ingesting', 100);

      for (let i = 1; i <= 10; i++) {
        reporter.updateProgress(i);
      }

      // stage_start plus the first update
      expect(consoleOutput).toHaveLength(2);
    });
  });

  describe('createProgressReporter factory', () => {
    it('should create a reporter with defaults', () => {
      expect(createProgressReporter()).toBeInstanceOf(ProgressReporter);
    });
  });
});

describe('formatDuration', () => {
  it('formats milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
