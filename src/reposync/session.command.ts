import {
  createGitHubRepositoryAdapter,
  createLocalRepositoryAdapter,
  createTemplateSourceAdapter,
} from '@/reposync/adapters';
import { createSettingsEditor, resolveSettings } from '@/reposync/config';
import { WorkflowController } from '@/reposync/controller';
import { EffectRunner } from '@/reposync/effects';
import { createOctokit, GitHubClient, resolveGitHubToken } from '@/reposync/github';
import { errorMessage } from '@/reposync/lib/errors';
import { createLogger } from '@/reposync/lib/logger';
import {
  normalizeSessionCliOptions,
  type SessionCliOptionsInput,
  toSessionContext,
} from '@/reposync/options';
import { expandPath, resolveConfigPath } from '@/reposync/paths';
import { createInitialState } from '@/reposync/state';
import { ConfigStore } from '@/reposync/store';
import type { Mode, SessionContext } from '@/reposync/types';
import { runRepoSyncApplication } from '@/reposync/ui';

const logger = createLogger('[session] ');

/** Wires the adapters, loads settings and builds the controller for one session. */
export const createSessionController = async (context: SessionContext): Promise<WorkflowController> => {
  const { env, cwd } = context;
  const store = new ConfigStore(resolveConfigPath(env));
  const persisted = await store.load();
  const overrides = { owner: context.owner, targetDir: context.targetDir, sourceDirs: context.sourceDirs };
  const settings = resolveSettings({ overrides, env, persisted, cwd });

  const client = new GitHubClient(createOctokit(await resolveGitHubToken(env)));
  const username = await client.currentUser();
  logger.debug(`signed in as ${username}, target ${settings.targetDir}`);

  const runner = new EffectRunner({
    account: client,
    repositories: {
      github: createGitHubRepositoryAdapter(client),
      local: createLocalRepositoryAdapter(),
    },
    templates: createTemplateSourceAdapter(client),
    recents: store,
    settings: createSettingsEditor({ store, overrides, env, cwd }),
    resolvePath: (value) => expandPath(value, cwd, env),
  });

  const state = createInitialState({
    username,
    owner: settings.owner,
    mode: context.mode,
    targetDir: settings.targetDir,
    sourceDirs: settings.sourceDirs,
    recentTemplates: settings.recentTemplates,
    recentOwners: settings.recentOwners,
  });

  return new WorkflowController(state, runner);
};

export const sessionCommandHandler = async (
  mode: Mode,
  rawOptions: SessionCliOptionsInput,
  runtime?: { cwd?: string; env?: NodeJS.ProcessEnv },
): Promise<number> => {
  const options = normalizeSessionCliOptions(rawOptions);
  const env = runtime?.env ?? process.env;
  const context = toSessionContext(mode, options, runtime?.cwd ?? process.cwd(), env);

  if (context.logLevel) {
    env['LOG_LEVEL'] = context.logLevel;
  }

  try {
    const controller = await createSessionController(context);
    const code = await runRepoSyncApplication(controller);
    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  } catch (error) {
    console.error(`repo-sync failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
