import { expandPath, resolveDefaultTargetDirectory } from '@/reposync/paths';
import { applySettingsValues, toSettingsValues } from '@/reposync/settings';
import type { SettingsValues } from '@/reposync/state';
import type { ConfigStore, PersistedConfig } from '@/reposync/store';

export type EnvironmentConfig = {
  targetDir?: string;
  githubOwner?: string;
  sourceDirs: string[];
};

export type SettingsOverrides = {
  targetDir?: string;
  owner?: string;
  sourceDirs?: string[];
};

export type ResolvedSettings = {
  targetDir: string;
  owner?: string;
  sourceDirs: string[];
  recentTemplates: string[];
  recentOwners: string[];
};

const nonEmpty = (value: string | undefined): string | undefined => value?.trim() || undefined;

const splitSourceDirs = (value: string | undefined): string[] =>
  (value ?? '')
    .split(':')
    .map((entry) => entry.trim())
    .filter(Boolean);

export const loadEnvironmentConfig = (env: NodeJS.ProcessEnv): EnvironmentConfig => ({
  targetDir: nonEmpty(env['REPO_SYNC_TARGET_DIR']),
  githubOwner: nonEmpty(env['REPO_SYNC_GITHUB_OWNER']),
  sourceDirs: splitSourceDirs(env['REPO_SYNC_SOURCE_DIRS']),
});

const firstList = (...lists: Array<string[] | undefined>): string[] =>
  lists.find((list) => list !== undefined && list.length > 0) ?? [];

/** Command-line flags win over the environment, which wins over the persisted file. */
export const resolveSettings = (args: {
  overrides: SettingsOverrides;
  env: NodeJS.ProcessEnv;
  persisted: PersistedConfig;
  cwd: string;
}): ResolvedSettings => {
  const { overrides, env, persisted, cwd } = args;
  const fromEnv = loadEnvironmentConfig(env);

  const targetDir =
    nonEmpty(overrides.targetDir) ?? fromEnv.targetDir ?? nonEmpty(persisted.target_dir);
  const sourceDirs = firstList(overrides.sourceDirs, fromEnv.sourceDirs, persisted.source_dirs);
  const owner =
    nonEmpty(overrides.owner) ?? fromEnv.githubOwner ?? nonEmpty(persisted.default_owner);

  return {
    targetDir: targetDir ? expandPath(targetDir, cwd, env) : resolveDefaultTargetDirectory(env),
    ...(owner ? { owner } : {}),
    sourceDirs: [...new Set(sourceDirs.map((dir) => expandPath(dir, cwd, env)))],
    recentTemplates: persisted.recent_templates ?? [],
    recentOwners: persisted.recent_owners ?? [],
  };
};

export type SettingsEditor = {
  read: () => Promise<{ values: SettingsValues; filePath: string }>;
  /** Persists `values` and returns the directories the session should use from now on. */
  save: (values: SettingsValues) => Promise<{ targetDir: string; sourceDirs: string[]; filePath: string }>;
};

/**
 * Backs the settings overlay. Saved values are merged with the same flags
 * and environment the session started with, so those still win.
 */
export const createSettingsEditor = (args: {
  store: Pick<ConfigStore, 'filePath' | 'load' | 'update'>;
  overrides: SettingsOverrides;
  env: NodeJS.ProcessEnv;
  cwd: string;
}): SettingsEditor => {
  const { store, overrides, env, cwd } = args;
  return {
    read: async () => ({ values: toSettingsValues(await store.load()), filePath: store.filePath }),
    save: async (values) => {
      const persisted = await store.update((config) => applySettingsValues(config, values));
      const resolved = resolveSettings({ overrides, env, persisted, cwd });
      return { targetDir: resolved.targetDir, sourceDirs: resolved.sourceDirs, filePath: store.filePath };
    },
  };
};
