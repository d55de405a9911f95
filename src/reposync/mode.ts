import type { AppEvent, Command, Transition } from '@/reposync/messages';
import {
  allocateId,
  createRepositoryListState,
  createTemplateUiState,
  errorNotice,
  isQueueRunning,
  isTemplateJobRunning,
  resetTemplateWorkflow,
  type AppState,
} from '@/reposync/state';
import { MODES, type Mode, type RepositoryScope } from '@/reposync/types';

export const NO_ORGANIZATIONS_MESSAGE = "no organizations found - use 'o' to select an owner";
export const BUSY_MESSAGE = 'A sync is running; wait for it to finish before switching modes.';

export const repositoryScope = (state: AppState): RepositoryScope | undefined => {
  switch (state.mode) {
    case 'personal':
      return { kind: 'personal', owner: state.owner };
    case 'organization':
      return { kind: 'organization', name: state.owner };
    case 'local':
      return { kind: 'local', paths: state.sourceDirs };
    case 'template':
      return undefined;
  }
};

export const requestRepositories = (state: AppState): Transition<AppState> => {
  const scope = repositoryScope(state);
  if (!scope) {
    return [state, []];
  }

  const [requestId, next] = allocateId(state);
  return [
    {
      ...next,
      repositoriesRequestId: requestId,
      repositories: {
        ...createRepositoryListState(),
        sort: state.repositories.sort,
        loading: true,
      },
    },
    [{ kind: 'loadRepositories', requestId, scope }],
  ];
};

export const requestTemplateTargets = (state: AppState): Transition<AppState> => {
  const [requestId, next] = allocateId(state);
  return [
    { ...next, templateTargetsRequestId: requestId },
    [{ kind: 'loadTemplateTargets', requestId, paths: state.sourceDirs }],
  ];
};

const leaveCurrentMode = (state: AppState, mode: Mode): AppState => ({
  ...state,
  mode,
  notice: undefined,
  ownerPicker: undefined,
  settings: undefined,
  showHelp: false,
  queue: undefined,
});

/**
 * The one entry point for changing modes. Rejections leave `mode` untouched
 * and only set the inline notice.
 */
export const switchMode = (state: AppState, mode: Mode): Transition<AppState> => {
  if (isQueueRunning(state) || isTemplateJobRunning(state)) {
    return [{ ...state, notice: errorNotice(BUSY_MESSAGE) }, []];
  }

  switch (mode) {
    case 'personal':
      return requestRepositories({ ...leaveCurrentMode(state, mode), owner: state.username });

    case 'organization': {
      const [firstOrganization] = state.organizations;
      if (!firstOrganization) {
        return [{ ...state, notice: errorNotice(NO_ORGANIZATIONS_MESSAGE) }, []];
      }
      return requestRepositories({ ...leaveCurrentMode(state, mode), owner: firstOrganization });
    }

    case 'local':
      return requestRepositories(leaveCurrentMode(state, mode));

    case 'template':
      return requestTemplateTargets({
        ...leaveCurrentMode(state, mode),
        template: resetTemplateWorkflow(),
        templateUi: createTemplateUiState(),
      });
  }
};

export const cycleMode = (state: AppState, direction: 1 | -1): Transition<AppState> => {
  const index = MODES.indexOf(state.mode);
  const nextMode = MODES[(index + direction + MODES.length) % MODES.length] ?? 'personal';
  return switchMode(state, nextMode);
};

export const selectOwner = (
  state: AppState,
  owner: string,
  isOrg: boolean,
): Transition<AppState> => {
  if (isQueueRunning(state) || isTemplateJobRunning(state)) {
    return [{ ...state, ownerPicker: undefined, notice: errorNotice(BUSY_MESSAGE) }, []];
  }

  const mode: Mode = isOrg ? 'organization' : 'personal';
  const [next, commands] = requestRepositories({ ...leaveCurrentMode(state, mode), owner });
  return [next, [...commands, { kind: 'recordRecentOwner', owner }]];
};

export const handleRepositoriesLoaded = (
  state: AppState,
  event: Extract<AppEvent, { type: 'repositoriesLoaded' }>,
): AppState => {
  if (event.requestId !== state.repositoriesRequestId) {
    return state;
  }
  return {
    ...state,
    repositories: {
      ...state.repositories,
      items: event.items,
      loading: false,
      error: undefined,
      cursor: 0,
    },
  };
};

export const handleRepositoriesFailed = (
  state: AppState,
  event: Extract<AppEvent, { type: 'repositoriesFailed' }>,
): AppState => {
  if (event.requestId !== state.repositoriesRequestId) {
    return state;
  }
  return {
    ...state,
    repositories: { ...state.repositories, loading: false, error: event.message },
  };
};

export const handleTemplateTargetsLoaded = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateTargetsLoaded' }>,
): AppState => {
  if (event.requestId !== state.templateTargetsRequestId) {
    return state;
  }
  return { ...state, templateTargets: event.paths };
};

/** Commands issued once when the session starts, before any input arrives. */
export const startSession = (state: AppState): Transition<AppState> => {
  const loadOrganizations: Command = { kind: 'loadOrganizations' };

  const [next, commands] =
    state.mode === 'template' ? requestTemplateTargets(state) : requestRepositories(state);

  return [next, [loadOrganizations, ...commands]];
};
