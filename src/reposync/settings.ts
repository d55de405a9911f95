import type { AppEvent, Transition } from '@/reposync/messages';
import { requestRepositories } from '@/reposync/mode';
import {
  errorNotice,
  infoNotice,
  isQueueRunning,
  type AppState,
  type SettingsField,
  type SettingsFormState,
  type SettingsValues,
} from '@/reposync/state';
import type { PersistedConfig } from '@/reposync/store';

export const SETTINGS_BUSY_MESSAGE = 'A sync is running; wait for it to finish before changing settings.';

export type SettingsFieldInfo = {
  key: SettingsField;
  label: string;
  placeholder: string;
  help: string;
};

export const SETTINGS_FIELDS: readonly SettingsFieldInfo[] = [
  {
    key: 'target_dir',
    label: 'Target Directory',
    placeholder: '~/repos',
    help: 'Where repositories are cloned',
  },
  {
    key: 'source_dirs',
    label: 'Source Directories',
    placeholder: '/path/to/repos1:/path/to/repos2',
    help: 'Colon-separated directories scanned for local repositories',
  },
  {
    key: 'default_owner',
    label: 'Default Owner',
    placeholder: 'your-github-username',
    help: 'GitHub user or organization used when none is given',
  },
];

export const emptySettingsValues = (): SettingsValues => ({
  target_dir: '',
  source_dirs: '',
  default_owner: '',
});

export const toSettingsValues = (config: PersistedConfig): SettingsValues => ({
  target_dir: config.target_dir ?? '',
  source_dirs: (config.source_dirs ?? []).join(':'),
  default_owner: config.default_owner ?? '',
});

/** Writes the edited fields over `config`. Blank fields are dropped; recent lists are kept. */
export const applySettingsValues = (config: PersistedConfig, values: SettingsValues): PersistedConfig => {
  const targetDir = values.target_dir.trim();
  const owner = values.default_owner.trim();
  const sourceDirs = [
    ...new Set(
      values.source_dirs
        .split(':')
        .map((entry) => entry.trim())
        .filter(Boolean),
    ),
  ];

  return {
    ...config,
    target_dir: targetDir || undefined,
    source_dirs: sourceDirs.length > 0 ? sourceDirs : undefined,
    default_owner: owner || undefined,
  };
};

const withForm = (state: AppState, patch: Partial<SettingsFormState>): AppState =>
  state.settings ? { ...state, settings: { ...state.settings, ...patch } } : state;

export const openSettings = (state: AppState): Transition<AppState> => {
  if (isQueueRunning(state)) {
    return [{ ...state, notice: errorNotice(SETTINGS_BUSY_MESSAGE) }, []];
  }
  return [
    {
      ...state,
      settings: { values: emptySettingsValues(), cursor: 0, loading: true, saving: false },
    },
    [{ kind: 'loadSettings' }],
  ];
};

export const closeSettings = (state: AppState): AppState => ({ ...state, settings: undefined });

export const moveSettingsCursor = (state: AppState, delta: number): AppState => {
  const form = state.settings;
  if (!form) {
    return state;
  }
  const cursor = Math.min(Math.max(form.cursor + delta, 0), SETTINGS_FIELDS.length - 1);
  return withForm(state, { cursor });
};

/** Replaces the focused field with whatever `edit` returns for its current text. */
export const editSettingsField = (state: AppState, edit: (value: string) => string): AppState => {
  const form = state.settings;
  const field = form && SETTINGS_FIELDS[form.cursor];
  if (!form || !field || form.loading || form.saving) {
    return state;
  }
  return withForm(state, {
    values: { ...form.values, [field.key]: edit(form.values[field.key]) },
    error: undefined,
  });
};

export const submitSettings = (state: AppState): Transition<AppState> => {
  const form = state.settings;
  if (!form || form.loading || form.saving) {
    return [state, []];
  }
  return [
    withForm(state, { saving: true, error: undefined }),
    [{ kind: 'saveSettings', values: form.values }],
  ];
};

export const handleSettingsLoaded = (
  state: AppState,
  event: Extract<AppEvent, { type: 'settingsLoaded' }>,
): AppState => {
  if (!state.settings?.loading) {
    return state;
  }
  return withForm(state, { values: event.values, filePath: event.filePath, loading: false });
};

/**
 * Applies the re-resolved directories. Local mode rescans because its
 * repositories come from the source directories.
 */
export const handleSettingsSaved = (
  state: AppState,
  event: Extract<AppEvent, { type: 'settingsSaved' }>,
): Transition<AppState> => {
  const next: AppState = {
    ...state,
    settings: undefined,
    targetDir: event.targetDir,
    sourceDirs: event.sourceDirs,
    notice: infoNotice(`Settings saved to ${event.filePath}`),
  };

  if (next.mode === 'local' && !isQueueRunning(next)) {
    return requestRepositories(next);
  }
  return [next, []];
};

export const handleSettingsFailed = (
  state: AppState,
  event: Extract<AppEvent, { type: 'settingsFailed' }>,
): AppState => {
  if (!state.settings) {
    return { ...state, notice: errorNotice(event.message) };
  }
  return withForm(state, { loading: false, saving: false, error: event.message });
};
