import { errorMessage } from '@/reposync/lib/errors';
import { expandPath, resolveConfigPath } from '@/reposync/paths';
import { ConfigStore, type PersistedConfig } from '@/reposync/store';

export const SETTABLE_CONFIG_KEYS = ['target_dir', 'default_owner'] as const;

export type SettableConfigKey = (typeof SETTABLE_CONFIG_KEYS)[number];

export type ConfigAction =
  | { kind: 'show' }
  | { kind: 'set'; key: string; value: string }
  | { kind: 'addSource'; dir: string }
  | { kind: 'removeSource'; dir: string };

type ConfigRuntime = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  store?: ConfigStore;
  write?: (line: string) => void;
};

const isSettableKey = (key: string): key is SettableConfigKey =>
  SETTABLE_CONFIG_KEYS.some((candidate) => candidate === key);

export const applyConfigAction = async (
  store: ConfigStore,
  action: Exclude<ConfigAction, { kind: 'show' }>,
  resolveDir: (dir: string) => string,
): Promise<PersistedConfig> => {
  switch (action.kind) {
    case 'set': {
      const { key } = action;
      if (!isSettableKey(key)) {
        throw new Error(`Unknown config key "${key}". Expected one of: ${SETTABLE_CONFIG_KEYS.join(', ')}.`);
      }
      if (key === 'target_dir') {
        const targetDir = resolveDir(action.value);
        return store.update((config) => ({ ...config, target_dir: targetDir }));
      }
      const owner = action.value.trim();
      return store.update((config) => ({ ...config, default_owner: owner }));
    }
    case 'addSource': {
      const dir = resolveDir(action.dir);
      return store.update((config) => ({
        ...config,
        source_dirs: [...(config.source_dirs ?? []).filter((existing) => existing !== dir), dir],
      }));
    }
    case 'removeSource': {
      const dir = resolveDir(action.dir);
      return store.update((config) => ({
        ...config,
        source_dirs: (config.source_dirs ?? []).filter((existing) => existing !== dir),
      }));
    }
  }
};

export const configCommandHandler = async (
  action: ConfigAction,
  runtime: ConfigRuntime = {},
): Promise<number> => {
  const env = runtime.env ?? process.env;
  const cwd = runtime.cwd ?? process.cwd();
  const write = runtime.write ?? ((line: string) => console.log(line));

  try {
    const store = runtime.store ?? new ConfigStore(resolveConfigPath(env));
    const config =
      action.kind === 'show'
        ? await store.load()
        : await applyConfigAction(store, action, (dir) => expandPath(dir, cwd, env));

    write(`# ${store.filePath}`);
    write(JSON.stringify(config, null, 2));
    return 0;
  } catch (error) {
    console.error(`repo-sync config failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
