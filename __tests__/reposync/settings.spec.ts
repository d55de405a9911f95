import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { createSettingsEditor } from '@/reposync/config';
import { silentLogger } from '@/reposync/lib/logger';
import { startQueue } from '@/reposync/queue';
import {
  applySettingsValues,
  handleSettingsFailed,
  handleSettingsLoaded,
  handleSettingsSaved,
  openSettings,
  SETTINGS_BUSY_MESSAGE,
  toSettingsValues,
} from '@/reposync/settings';
import type { AppState, SettingsFormState } from '@/reposync/state';
import { ConfigStore } from '@/reposync/store';

import { makeState } from './fixtures';

const tempRoots: string[] = [];

afterEach(async () => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
});

const createStore = async (initial: unknown) => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'reposync-settings-'));
  tempRoots.push(root);
  const filePath = path.join(root, 'reposync', 'config.json');
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(initial), 'utf8');
  return { store: new ConfigStore(filePath, silentLogger), filePath };
};

const env = { HOME: '/home/test' };

const openForm = (patch: Partial<SettingsFormState> = {}): SettingsFormState => ({
  values: { target_dir: '', source_dirs: '', default_owner: '' },
  cursor: 0,
  loading: false,
  saving: false,
  ...patch,
});

describe('settings values', () => {
  it('shows source directories colon separated', () => {
    expect(toSettingsValues({ target_dir: '~/code', source_dirs: ['/src', '/lib'], recent_owners: ['acme'] })).toEqual({
      target_dir: '~/code',
      source_dirs: '/src:/lib',
      default_owner: '',
    });
  });

  it('drops blank fields and keeps the recent lists', () => {
    const next = applySettingsValues(
      { target_dir: '~/old', default_owner: 'octo', recent_templates: ['acme/base'] },
      { target_dir: ' ', source_dirs: ' /src : /lib ::/src', default_owner: ' acme ' },
    );

    expect(next).toEqual({
      source_dirs: ['/src', '/lib'],
      default_owner: 'acme',
      recent_templates: ['acme/base'],
    });
    expect(JSON.parse(JSON.stringify(next))).toEqual({
      source_dirs: ['/src', '/lib'],
      default_owner: 'acme',
      recent_templates: ['acme/base'],
    });
  });
});

describe('createSettingsEditor', () => {
  it('reads the persisted values and the file location', async () => {
    const { store, filePath } = await createStore({ target_dir: '~/code', default_owner: 'octo' });
    const editor = createSettingsEditor({ store, overrides: {}, env, cwd: '/work' });

    expect(await editor.read()).toEqual({
      values: { target_dir: '~/code', source_dirs: '', default_owner: 'octo' },
      filePath,
    });
  });

  it('saves the edited fields and re-resolves the directories', async () => {
    const { store, filePath } = await createStore({ target_dir: '~/old', recent_owners: ['acme'] });
    const editor = createSettingsEditor({ store, overrides: {}, env, cwd: '/work' });

    const saved = await editor.save({ target_dir: '~/code', source_dirs: '/src:/lib', default_owner: '' });

    expect(saved).toEqual({
      targetDir: path.resolve('/home/test', 'code'),
      sourceDirs: [path.resolve('/src'), path.resolve('/lib')],
      filePath,
    });
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      target_dir: '~/code',
      source_dirs: ['/src', '/lib'],
      recent_owners: ['acme'],
    });
  });

  it('lets command-line flags keep precedence over saved values', async () => {
    const { store } = await createStore({});
    const editor = createSettingsEditor({ store, overrides: { targetDir: '/flag' }, env, cwd: '/work' });

    const saved = await editor.save({ target_dir: '~/code', source_dirs: '', default_owner: '' });

    expect(saved.targetDir).toBe(path.resolve('/flag'));
    expect(saved.sourceDirs).toEqual([]);
  });
});

describe('settings overlay', () => {
  it('stays closed while a sync is running', () => {
    const [queue] = startQueue({ runId: 1, selected: ['octo/api'], targetDir: '/work/repos', origin: 'github' });
    const [state, commands] = openSettings({ ...makeState(), queue });

    expect(state.settings).toBeUndefined();
    expect(state.notice).toEqual({ level: 'error', text: SETTINGS_BUSY_MESSAGE });
    expect(commands).toEqual([]);
  });

  it('fills the form once the values arrive and ignores them after closing', () => {
    const loading: AppState = { ...makeState(), settings: openForm({ loading: true }) };
    const values = { target_dir: '~/code', source_dirs: '', default_owner: 'octo' };

    const loaded = handleSettingsLoaded(loading, { type: 'settingsLoaded', values, filePath: '/cfg/config.json' });
    expect(loaded.settings).toEqual(openForm({ values, filePath: '/cfg/config.json' }));

    const closed = makeState();
    expect(handleSettingsLoaded(closed, { type: 'settingsLoaded', values, filePath: '/cfg/config.json' })).toBe(
      closed,
    );
  });

  it('applies saved directories and rescans local sources', () => {
    const state: AppState = { ...makeState({ mode: 'local' }), settings: openForm({ saving: true }) };

    const [next, commands] = handleSettingsSaved(state, {
      type: 'settingsSaved',
      targetDir: '/home/test/code',
      sourceDirs: ['/src', '/lib'],
      filePath: '/cfg/config.json',
    });

    expect(next.settings).toBeUndefined();
    expect(next.targetDir).toBe('/home/test/code');
    expect(next.sourceDirs).toEqual(['/src', '/lib']);
    expect(next.notice).toEqual({ level: 'info', text: 'Settings saved to /cfg/config.json' });
    expect(commands).toEqual([
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'local', paths: ['/src', '/lib'] } },
    ]);
  });

  it('keeps the GitHub list when saving from a GitHub mode', () => {
    const state: AppState = { ...makeState(), settings: openForm({ saving: true }) };

    const [next, commands] = handleSettingsSaved(state, {
      type: 'settingsSaved',
      targetDir: '/home/test/code',
      sourceDirs: [],
      filePath: '/cfg/config.json',
    });

    expect(next.targetDir).toBe('/home/test/code');
    expect(commands).toEqual([]);
  });

  it('shows a failed save inside the form', () => {
    const state: AppState = { ...makeState(), settings: openForm({ saving: true }) };
    const failed = handleSettingsFailed(state, { type: 'settingsFailed', message: 'disk full' });

    expect(failed.settings).toEqual(openForm({ error: 'disk full' }));
  });
});
