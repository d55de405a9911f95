import type { Transition } from '@/reposync/messages';
import { startQueue } from '@/reposync/queue';
import {
  allocateId,
  errorNotice,
  isQueueRunning,
  type AppState,
  type RepositoryListState,
  type SortMode,
} from '@/reposync/state';
import { setWithValues, toggleSetValue } from '@/reposync/lib/set';
import type { RepoSummary } from '@/reposync/types';

export const SORT_MODES: readonly SortMode[] = ['updated', 'name', 'stars'];

export const SORT_LABELS: Record<SortMode, string> = {
  updated: 'recently updated',
  name: 'name',
  stars: 'stars',
};

export const NOTHING_SELECTED_MESSAGE = 'Select at least one repository to sync.';

const matchesSearch = (item: RepoSummary, search: string): boolean => {
  const needle = search.trim().toLowerCase();
  if (!needle) {
    return true;
  }
  return (
    item.title.toLowerCase().includes(needle) ||
    (item.description?.toLowerCase().includes(needle) ?? false)
  );
};

const starCount = (item: RepoSummary): number => Number(item.metadata['stars'] ?? 0) || 0;

const compareItems = (sort: SortMode) => (left: RepoSummary, right: RepoSummary): number => {
  if (left.archived !== right.archived) {
    return left.archived ? 1 : -1;
  }
  switch (sort) {
    case 'name':
      return left.title.localeCompare(right.title);
    case 'stars':
      return starCount(right) - starCount(left);
    case 'updated':
      return 0;
  }
};

/** Rows as displayed: filtered by the search text, archived repositories last. */
export const visibleRepositories = (list: RepositoryListState): RepoSummary[] =>
  list.items.filter((item) => matchesSearch(item, list.search)).sort(compareItems(list.sort));

const clampCursor = (list: RepositoryListState, cursor: number): number => {
  const count = visibleRepositories(list).length;
  return count === 0 ? 0 : Math.min(Math.max(cursor, 0), count - 1);
};

export const moveListCursor = (list: RepositoryListState, delta: number): RepositoryListState => ({
  ...list,
  cursor: clampCursor(list, list.cursor + delta),
});

export const toggleCurrentRepository = (list: RepositoryListState): RepositoryListState => {
  const item = visibleRepositories(list)[list.cursor];
  return item ? { ...list, checked: toggleSetValue(list.checked, item.id) } : list;
};

export const selectAllRepositories = (list: RepositoryListState): RepositoryListState => ({
  ...list,
  checked: setWithValues(
    list.checked,
    visibleRepositories(list).map((item) => item.id),
  ),
});

export const clearRepositorySelection = (list: RepositoryListState): RepositoryListState => ({
  ...list,
  checked: new Set(),
});

export const cycleSort = (list: RepositoryListState): RepositoryListState => {
  const index = SORT_MODES.indexOf(list.sort);
  return { ...list, sort: SORT_MODES[(index + 1) % SORT_MODES.length] ?? 'updated', cursor: 0 };
};

export const setSearch = (list: RepositoryListState, search: string): RepositoryListState => ({
  ...list,
  search,
  cursor: 0,
});

/** Identifiers in the order they were checked, limited to what is currently loaded. */
export const selectedIdentifiers = (list: RepositoryListState): string[] => {
  const loaded = new Set(list.items.map((item) => item.id));
  return [...list.checked].filter((id) => loaded.has(id));
};

export const startSync = (state: AppState, now = Date.now()): Transition<AppState> => {
  if (state.mode === 'template' || isQueueRunning(state)) {
    return [state, []];
  }

  const selected = selectedIdentifiers(state.repositories);
  if (selected.length === 0) {
    return [{ ...state, notice: errorNotice(NOTHING_SELECTED_MESSAGE) }, []];
  }

  const [runId, next] = allocateId(state);
  const [queue, commands] = startQueue({
    runId,
    selected,
    targetDir: state.targetDir,
    origin: state.mode === 'local' ? 'local' : 'github',
    now,
  });

  return [{ ...next, queue, notice: undefined }, commands];
};
