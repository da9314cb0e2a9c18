/**
 * Tests for gitignore pattern handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { loadGitignoreFile, parseGitignoreContent, createIgnoreFilter } from '../ignore.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('parseGitignoreContent', () => {
  it('drops comments and blank lines', () => {
    const content = `
# drafts are private
drafts/

*.tmp
`;
    expect(parseGitignoreContent(content)).toEqual(['drafts/', '*.tmp']);
  });

  it('keeps negation patterns and trims whitespace', () => {
    expect(parseGitignoreContent('  *.log  \n!keep.log')).toEqual(['*.log', '!keep.log']);
  });
});

describe('loadGitignoreFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns an empty list when the file is missing', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(loadGitignoreFile('/notes/.gitignore')).toEqual([]);
    expect(readFileSync).not.toHaveBeenCalled();
  });

  it('reads and parses the file', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('archive/\n*.bak\n');

    expect(loadGitignoreFile('/notes/.gitignore')).toEqual(['archive/', '*.bak']);
    expect(readFileSync).toHaveBeenCalledWith('/notes/.gitignore', 'utf-8');
  });

  it('returns an empty list when the file cannot be read', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('Permission denied');
    });

    expect(loadGitignoreFile('/notes/.gitignore')).toEqual([]);
  });
});

describe('createIgnoreFilter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(existsSync).mockReturnValue(false);
  });

  it('ignores default patterns', () => {
    const filter = createIgnoreFilter({ rootPath: '/notes' });

    expect(filter('node_modules/pkg/readme.md')).toBe(true);
    expect(filter('.git/HEAD')).toBe(true);
    expect(filter('.env.local')).toBe(true);
    expect(filter('guides/setup.md')).toBe(false);
  });

  it('skips defaults when useDefaults is false', () => {
    const filter = createIgnoreFilter({ rootPath: '/notes', useDefaults: false });

    expect(filter('node_modules/pkg/readme.md')).toBe(false);
  });

  it('applies additional patterns', () => {
    const filter = createIgnoreFilter({
      rootPath: '/notes',
      additionalPatterns: ['drafts/', '*.tmp'],
      useDefaults: false,
    });

    expect(filter('drafts/idea.md')).toBe(true);
    expect(filter('scratch.tmp')).toBe(true);
    expect(filter('final.md')).toBe(false);
  });

  it('loads patterns from .gitignore, including negations', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('*.txt\n!keep.txt');

    const filter = createIgnoreFilter({ rootPath: '/notes', useDefaults: false });

    expect(existsSync).toHaveBeenCalledWith('/notes/.gitignore');
    expect(filter('scratch.txt')).toBe(true);
    expect(filter('keep.txt')).toBe(false);
  });

  it('lets additional patterns override .gitignore', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('!important.md');

    const filter = createIgnoreFilter({
      rootPath: '/notes',
      additionalPatterns: ['*.md'],
      useDefaults: false,
    });

    expect(filter('important.md')).toBe(true);
  });

  it('accepts absolute paths under the root', () => {
    const filter = createIgnoreFilter({ rootPath: '/notes' });

    expect(filter('/notes/node_modules/pkg/readme.md')).toBe(true);
    expect(filter('/notes/guides/setup.md')).toBe(false);
  });

  it('never ignores the root itself', () => {
    const filter = createIgnoreFilter({ rootPath: '/notes' });

    expect(filter('')).toBe(false);
    expect(filter('/notes')).toBe(false);
  });
});
