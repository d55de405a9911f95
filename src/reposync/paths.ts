import path from 'node:path';

export const CONFIG_DIRECTORY_NAME = 'reposync';
export const CONFIG_FILE_NAME = 'config.json';

const resolveHome = (env: NodeJS.ProcessEnv): string => {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim();
  if (!home) {
    throw new Error('Unable to resolve home directory: HOME is not set.');
  }
  return home;
};

export const resolveConfigPath = (env: NodeJS.ProcessEnv): string => {
  const xdgConfigHome = env.XDG_CONFIG_HOME?.trim();
  if (xdgConfigHome) {
    return path.resolve(xdgConfigHome, CONFIG_DIRECTORY_NAME, CONFIG_FILE_NAME);
  }

  return path.resolve(resolveHome(env), '.config', CONFIG_DIRECTORY_NAME, CONFIG_FILE_NAME);
};

export const resolveDefaultTargetDirectory = (env: NodeJS.ProcessEnv): string =>
  path.resolve(resolveHome(env), 'repos');

/** Expands a leading `~` and makes the result absolute against `cwd`. */
export const expandPath = (value: string, cwd: string, env: NodeJS.ProcessEnv): string => {
  const trimmed = value.trim();
  if (trimmed === '~') {
    return resolveHome(env);
  }
  if (trimmed.startsWith('~/') || trimmed.startsWith('~\\')) {
    return path.resolve(resolveHome(env), trimmed.slice(2));
  }
  return path.resolve(cwd, trimmed);
};
