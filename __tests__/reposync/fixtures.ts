import type { Key } from 'ink';

import type { KeyPress } from '@/reposync/messages';
import { createInitialState, type AppState, type InitialStateOptions } from '@/reposync/state';
import type { RepoSummary } from '@/reposync/types';

export const repo = (id: string, overrides: Partial<RepoSummary> = {}): RepoSummary => ({
  id,
  title: id.split('/').pop() ?? id,
  archived: false,
  metadata: {},
  ...overrides,
});

export const makeState = (overrides: Partial<InitialStateOptions> = {}): AppState =>
  createInitialState({
    username: 'octo',
    targetDir: '/work/repos',
    sourceDirs: ['/work/src'],
    ...overrides,
  });

/** A state whose repository list already holds `items`. */
export const withRepositories = (state: AppState, items: RepoSummary[]): AppState => ({
  ...state,
  repositories: { ...state.repositories, items, loading: false },
});

export const press = (input: string, key: Partial<Key> = {}): KeyPress => ({ input, key });
