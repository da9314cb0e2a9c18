/**
 * Tests for the file scanner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';

import { FileNotFoundError } from '../../errors/index.js';
import { scanDirectory } from '../scanner.js';
import { contentKindForExtension } from '../types.js';

describe('scanDirectory', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'lantern-scan-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(relativePath: string, content = ''): string {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(resolve(fullPath, '..'), { recursive: true });
    writeFileSync(fullPath, content);
    return fullPath;
  }

  it('finds text and code files sorted by relative path', async () => {
    createFile('guide.md', '# Guide');
    createFile('src/main.py', 'print(1)');
    createFile('notes.txt', 'Hello.');

    const result = await scanDirectory(tempDir);

    expect(result.rootPath).toBe(resolve(tempDir));
    expect(result.files.map((f) => f.relativePath)).toEqual(['guide.md', 'notes.txt', 'src/main.py']);
  });

  it('tags files with the content kind of their extension', async () => {
    createFile('guide.md', '# Guide');
    createFile('main.py', 'print(1)');

    const result = await scanDirectory(tempDir);

    expect(result.files.map((f) => [f.relativePath, f.contentKind])).toEqual([
      ['guide.md', 'prose'],
      ['main.py', 'code'],
    ]);
  });

  it('skips extensions it does not read', async () => {
    createFile('notes.txt', 'Hello.');
    createFile('photo.png', 'binary');
    createFile('data.json', '{}');

    const result = await scanDirectory(tempDir);

    expect(result.files.map((f) => f.relativePath)).toEqual(['notes.txt']);
  });

  it('limits discovery to the given extensions', async () => {
    createFile('notes.txt', 'Hello.');
    createFile('main.py', 'print(1)');

    const result = await scanDirectory(tempDir, { extensions: ['py'] });

    expect(result.files.map((f) => f.relativePath)).toEqual(['main.py']);
  });

  it('respects defaults, .gitignore and configured patterns', async () => {
    createFile('.gitignore', 'archive/\n');
    createFile('keep.md', 'Kept.');
    createFile('archive/old.md', 'Old.');
    createFile('drafts/idea.md', 'Idea.');
    createFile('node_modules/pkg/readme.md', 'Dependency.');

    const result = await scanDirectory(tempDir, { ignorePatterns: ['drafts/'] });

    expect(result.files.map((f) => f.relativePath)).toEqual(['keep.md']);
  });

  it('skips files over maxFileSize and reports them', async () => {
    createFile('small.txt', 'tiny');
    const large = createFile('large.txt', 'x'.repeat(100));

    const result = await scanDirectory(tempDir, { maxFileSize: 50 });

    expect(result.files.map((f) => f.relativePath)).toEqual(['small.txt']);
    expect(result.skipped).toEqual([{ path: large, reason: 'too-large' }]);
  });

  it('reports file size and extension', async () => {
    createFile('README.MD', 'Read me.');

    const [file] = (await scanDirectory(tempDir)).files;

    expect(file).toMatchObject({ relativePath: 'README.MD', extension: 'md', size: 8, contentKind: 'prose' });
  });

  it('throws FileNotFoundError for a missing directory', async () => {
    await expect(scanDirectory(join(tempDir, 'missing'))).rejects.toBeInstanceOf(FileNotFoundError);
  });
});

describe('contentKindForExtension', () => {
  it('maps known extensions and leaves others to detection', () => {
    expect(contentKindForExtension('RS')).toBe('code');
    expect(contentKindForExtension('rst')).toBe('prose');
    expect(contentKindForExtension('log')).toBeUndefined();
  });
});
