import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { configCommandHandler } from '@/reposync/config.command';
import { silentLogger } from '@/reposync/lib/logger';
import { ConfigStore } from '@/reposync/store';

const tempRoots: string[] = [];

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
});

const setup = async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'reposync-config-'));
  tempRoots.push(root);
  const store = new ConfigStore(path.join(root, 'config.json'), silentLogger);
  const lines: string[] = [];
  const runtime = {
    cwd: '/work',
    env: { HOME: '/home/test' },
    store,
    write: (line: string) => {
      lines.push(line);
    },
  };
  return { store, lines, runtime };
};

describe('configCommandHandler', () => {
  it('stores an expanded target directory and prints the result', async () => {
    const { store, lines, runtime } = await setup();

    expect(await configCommandHandler({ kind: 'set', key: 'target_dir', value: '~/code' }, runtime)).toBe(0);

    const expected = { target_dir: path.resolve('/home/test/code') };
    expect(await store.load()).toEqual(expected);
    expect(lines).toEqual([`# ${store.filePath}`, JSON.stringify(expected, null, 2)]);
  });

  it('adds source directories once and removes them again', async () => {
    const { store, runtime } = await setup();

    await configCommandHandler({ kind: 'addSource', dir: 'src' }, runtime);
    await configCommandHandler({ kind: 'addSource', dir: '/opt/repos' }, runtime);
    await configCommandHandler({ kind: 'addSource', dir: 'src' }, runtime);
    expect((await store.load()).source_dirs).toEqual([path.resolve('/opt/repos'), path.resolve('/work/src')]);

    await configCommandHandler({ kind: 'removeSource', dir: '/work/src' }, runtime);
    expect((await store.load()).source_dirs).toEqual([path.resolve('/opt/repos')]);
  });

  it('rejects unknown keys', async () => {
    const { runtime } = await setup();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await configCommandHandler({ kind: 'set', key: 'colour', value: 'blue' }, runtime)).toBe(1);
    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith(
      'repo-sync config failed: Unknown config key "colour". Expected one of: target_dir, default_owner.',
    );
  });

  it('shows an empty config when nothing is stored', async () => {
    const { lines, runtime } = await setup();

    await configCommandHandler({ kind: 'show' }, runtime);
    expect(lines[1]).toBe('{}');
  });
});
