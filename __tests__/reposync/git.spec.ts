import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { summarizeGitError } from '@/reposync/git';
import { resolveWithin } from '@/reposync/lib/fs';

describe('summarizeGitError', () => {
  it('keeps the first six lines of stderr', () => {
    const stderr = ['one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight'].join('\n');

    expect(summarizeGitError({ stderr: `${stderr}\n` })).toBe('one\ntwo\nthree\nfour\nfive\nsix');
  });

  it('reads stderr buffers', () => {
    expect(summarizeGitError({ stderr: Buffer.from('fatal: repository not found\n') })).toBe(
      'fatal: repository not found',
    );
  });

  it('falls back to the error message', () => {
    expect(summarizeGitError(Object.assign(new Error('spawn git ENOENT'), { stderr: '' }))).toBe('spawn git ENOENT');
    expect(summarizeGitError(undefined)).toBe('unknown git error');
  });
});

describe('resolveWithin', () => {
  const root = path.resolve('/work', 'repo');

  it('joins relative paths below the root', () => {
    expect(resolveWithin(root, 'src/index.ts')).toBe(path.join(root, 'src', 'index.ts'));
  });

  it('rejects paths that climb out of the root', () => {
    expect(() => resolveWithin(root, '../other/file.txt')).toThrow(`path escapes ${root}: ../other/file.txt`);
  });
});
