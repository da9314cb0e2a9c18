/**
 * Test Utilities - CLI Harness
 *
 * Runs the real `lantern` program against a throwaway LANTERN_HOME with
 * hash embeddings, capturing console output line by line.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { vi } from 'vitest';

import { createProgram } from '../cli/program.js';
import { resetAll } from './reset.js';

/** Config written to every harness home: offline, 64-dimension hash vectors */
export const HARNESS_CONFIG = `[embedding]
provider = "hash"
dimensions = 64
`;

const ENV_OVERRIDES = [
  'EMBEDDING_MODEL',
  'EMBEDDING_DIM',
  'CHUNK_SIZE',
  'CHUNK_OVERLAP',
  'MAX_CONTEXT_TOKENS',
  'INDEX_FILE',
] as const;

export interface CliHarness {
  /** LANTERN_HOME for this harness */
  home: string;
  /** console.log lines */
  stdout: string[];
  /** console.warn and console.error lines */
  stderr: string[];
  /** Run `lantern <args>`; rejects with whatever the command throws */
  run: (...args: string[]) => Promise<void>;
  /** stdout lines parsed as one JSON document */
  json: <T = unknown>() => T;
  /** Forget captured output */
  clear: () => void;
  cleanup: () => void;
}

export function createCliHarness(configToml: string = HARNESS_CONFIG): CliHarness {
  const home = fs.mkdtempSync(path.join(os.tmpdir(), 'lantern-cli-'));
  fs.writeFileSync(path.join(home, 'config.toml'), configToml, 'utf-8');

  vi.stubEnv('LANTERN_HOME', home);
  for (const key of ENV_OVERRIDES) {
    vi.stubEnv(key, '');
  }
  resetAll();

  const previousLevel = chalk.level;
  chalk.level = 0;
  process.exitCode = undefined;

  const stdout: string[] = [];
  const stderr: string[] = [];
  const capture =
    (into: string[]) =>
    (...args: unknown[]): void => {
      into.push(args.map(String).join(' '));
    };

  vi.spyOn(console, 'log').mockImplementation(capture(stdout));
  vi.spyOn(console, 'warn').mockImplementation(capture(stderr));
  vi.spyOn(console, 'error').mockImplementation(capture(stderr));

  return {
    home,
    stdout,
    stderr,
    run: async (...args: string[]) => {
      const program = createProgram().exitOverride();
      await program.parseAsync(['node', 'lantern', ...args]);
    },
    json: <T = unknown>(): T => JSON.parse(stdout.join('\n')),
    clear: () => {
      stdout.length = 0;
      stderr.length = 0;
    },
    cleanup: () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      resetAll();
      chalk.level = previousLevel;
      process.exitCode = undefined;
      fs.rmSync(home, { recursive: true, force: true });
    },
  };
}
