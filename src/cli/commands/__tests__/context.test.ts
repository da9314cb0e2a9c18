/**
 * Tests for context command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { FileNotFoundError, ValidationError } from '../../../errors/index.js';
import { createCliHarness, HARNESS_CONFIG, type CliHarness } from '../../../test-utils/index.js';
import type { ConversationTurn } from '../../../agent/index.js';

interface ContextOutput {
  budget: number;
  tokens: number;
  dropped: number;
  turns: ConversationTurn[];
  retrieved: unknown[];
  prompt?: string;
}

describe('createContextCommand', () => {
  let cli: CliHarness;
  let chatFile: string;
  let turns: ConversationTurn[];

  beforeEach(() => {
    cli = createCliHarness(`${HARNESS_CONFIG}\n[context]\nmax_tokens = 40\n`);

    // Every turn is 8 characters, 2 tokens
    turns = [{ role: 'system', content: 'be brief' }];
    for (let i = 0; i < 30; i++) {
      turns.push({ role: i % 2 === 0 ? 'user' : 'assistant', content: `turn ${String(i).padStart(3, '0')}` });
    }
    chatFile = path.join(cli.home, 'chat.json');
    fs.writeFileSync(chatFile, JSON.stringify(turns));
  });

  afterEach(() => {
    cli.cleanup();
  });

  it('keeps the system turn and the newest turns that fit', async () => {
    await cli.run('--json', 'context', chatFile);

    const output = cli.json<ContextOutput>();
    expect(output.budget).toBe(40);
    expect(output.tokens).toBe(40);
    expect(output.dropped).toBe(11);
    expect(output.turns).toEqual([turns[0], ...turns.slice(-19)]);
    expect(output.retrieved).toEqual([]);
    expect(output.prompt).toBeUndefined();
  });

  it('counts retrieved chunks against the budget', async () => {
    await cli.run('ingest', '--text', 'Python is a language.', '--id', 'doc1');
    cli.clear();

    await cli.run('--json', 'context', chatFile, '--query', 'Python is a language.', '-k', '1');

    const output = cli.json<ContextOutput>();
    expect(output.retrieved).toHaveLength(1);
    // 2 (system) + 6 (retrieved) + 16 turns * 2
    expect(output.tokens).toBe(40);
    expect(output.turns).toHaveLength(17);
    expect(output.prompt).toBe(
      [
        '<sources>',
        '  <source id="1" document="doc1" chunk="doc1_chunk_0">',
        '    Python is a language.',
        '  </source>',
        '</sources>',
        '',
        'Question: Python is a language.',
      ].join('\n')
    );
  });

  it('prints kept turns for humans', async () => {
    fs.writeFileSync(chatFile, JSON.stringify(turns.slice(0, 2)));

    await cli.run('context', chatFile);

    expect(cli.stdout).toEqual([
      'Kept 2 of 2 turns (4/40 tokens, 0 retrieved chunks)',
      '',
      'system     be brief',
      'user       turn 000',
    ]);
  });

  it('rejects a file that is not a conversation', async () => {
    fs.writeFileSync(chatFile, JSON.stringify([{ role: 'robot', content: 'beep' }]));

    await expect(cli.run('context', chatFile)).rejects.toMatchObject({
      name: 'ValidationError',
      message: 'Invalid conversation file',
    });
  });

  it('rejects malformed JSON', async () => {
    fs.writeFileSync(chatFile, '[{');

    await expect(cli.run('context', chatFile)).rejects.toBeInstanceOf(ValidationError);
  });

  it('throws FileNotFoundError for a missing file', async () => {
    await expect(cli.run('context', path.join(cli.home, 'nope.json'))).rejects.toBeInstanceOf(FileNotFoundError);
  });
});
