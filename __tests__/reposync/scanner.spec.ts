import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { createLocalRepositoryAdapter } from '@/reposync/adapters';
import { GitCommandError } from '@/reposync/lib/errors';
import { silentLogger } from '@/reposync/lib/logger';
import {
  directorySize,
  findRepositories,
  formatSize,
  scanLocalRepositories,
  walkLocalDirectory,
} from '@/reposync/scanner';
import { flattenVisible } from '@/reposync/tree';

const tempRoots: string[] = [];

afterEach(async () => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
});

const createRoot = async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'reposync-scan-'));
  tempRoots.push(root);
  return root;
};

const createFile = async (filePath: string, content: string) => {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf8');
};

describe('formatSize', () => {
  it('uses binary units', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(1024 * 1024)).toBe('1.0 MB');
  });
});

describe('findRepositories', () => {
  it('finds top-level repositories and skips hidden and nested ones', async () => {
    const root = await createRoot();
    await mkdir(path.join(root, 'api', '.git'), { recursive: true });
    await mkdir(path.join(root, 'api', 'vendor', 'dep', '.git'), { recursive: true });
    await mkdir(path.join(root, '.cache', 'mirror', '.git'), { recursive: true });
    await mkdir(path.join(root, 'group', 'web', '.git'), { recursive: true });
    await mkdir(path.join(root, 'notes'), { recursive: true });

    expect(await findRepositories(root, silentLogger)).toEqual([
      path.join(root, 'api'),
      path.join(root, 'group', 'web'),
    ]);
  });

  it('returns nothing for a missing root', async () => {
    const root = await createRoot();
    expect(await findRepositories(path.join(root, 'absent'), silentLogger)).toEqual([]);
  });
});

describe('scanLocalRepositories', () => {
  it('describes each repository once with its size', async () => {
    const root = await createRoot();
    const repoPath = path.join(root, 'tools');
    await mkdir(path.join(repoPath, '.git'), { recursive: true });
    await createFile(path.join(repoPath, 'README.md'), 'hello');

    const summaries = await scanLocalRepositories([root, root], silentLogger);

    expect(summaries).toHaveLength(1);
    expect(summaries[0]).toMatchObject({
      id: repoPath,
      title: 'tools',
      description: repoPath,
      archived: false,
    });
    expect(summaries[0]?.metadata['size']).toBe('5 B');
  });

  it('sums file sizes below a directory', async () => {
    const root = await createRoot();
    await createFile(path.join(root, 'a.txt'), 'abc');
    await createFile(path.join(root, 'nested', 'b.txt'), 'defg');

    expect(await directorySize(root)).toBe(7);
  });
});

describe('walkLocalDirectory', () => {
  it('builds the template tree without git metadata', async () => {
    const root = await createRoot();
    const template = path.join(root, 'starter');
    await createFile(path.join(template, '.git', 'HEAD'), 'ref: refs/heads/main');
    await createFile(path.join(template, 'src', 'main.ts'), 'export {};');
    await createFile(path.join(template, 'README.md'), '# starter');

    const tree = await walkLocalDirectory(template);

    expect(tree.name).toBe('starter');
    expect(flattenVisible(tree).map(({ node }) => node.path)).toEqual(['src', 'README.md']);
    expect(tree.children[0]?.children.map((child) => [child.path, child.size])).toEqual([['src/main.ts', 10]]);
  });

  it('lists symlinked files by their target and drops dangling links', async () => {
    const root = await createRoot();
    const template = path.join(root, 'starter');
    await createFile(path.join(template, 'docs', 'README.md'), '# docs');
    await symlink(path.join('docs', 'README.md'), path.join(template, 'README.md'));
    await symlink('missing.txt', path.join(template, 'dangling.txt'));

    const tree = await walkLocalDirectory(template);

    expect(flattenVisible(tree).map(({ node }) => node.path)).toEqual(['docs', 'README.md']);
    expect(tree.children[1]).toMatchObject({ path: 'README.md', isDir: false, size: 6 });
  });

  it('rejects a missing directory', async () => {
    const root = await createRoot();
    const missing = path.join(root, 'missing');

    await expect(walkLocalDirectory(missing)).rejects.toThrow(`Template directory not found: ${missing}`);
  });
});

describe('local repository adapter', () => {
  it('refuses to copy a directory that is not a repository', async () => {
    const root = await createRoot();
    const plain = path.join(root, 'plain');
    await mkdir(plain);

    const adapter = createLocalRepositoryAdapter();
    const failure = adapter.cloneOrCopy(plain, path.join(root, 'out'));

    await expect(failure).rejects.toBeInstanceOf(GitCommandError);
    await expect(adapter.cloneOrCopy(plain, path.join(root, 'out'))).rejects.toThrow(
      `not a git repository: ${plain}`,
    );
  });

  it('refuses to refresh a directory that is not a repository', async () => {
    const root = await createRoot();

    await expect(createLocalRepositoryAdapter().refresh(root)).rejects.toThrow(`not a git repository: ${root}`);
  });

  it('only lists local scopes', async () => {
    await expect(
      createLocalRepositoryAdapter().listRepositories({ kind: 'personal', owner: 'octo' }),
    ).rejects.toThrow('The local source only lists directories.');
  });
});
