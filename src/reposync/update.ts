import { handleKey } from '@/reposync/keys';
import { startSync } from '@/reposync/list';
import type { AppEvent, Transition } from '@/reposync/messages';
import {
  cycleMode,
  handleRepositoriesFailed,
  handleRepositoriesLoaded,
  handleTemplateTargetsLoaded,
  selectOwner,
  switchMode,
} from '@/reposync/mode';
import {
  handleConflictDecision,
  handleDestinationProbed,
  handleItemFinished,
  handleSyncCompleted,
} from '@/reposync/queue';
import { handleSettingsFailed, handleSettingsLoaded, handleSettingsSaved } from '@/reposync/settings';
import { errorNotice, type AppState, type SyncQueueState } from '@/reposync/state';
import {
  advanceStep,
  cancelTemplateResolution,
  handleFileConflictDecision,
  handleTemplateFileConflict,
  handleTemplateJobClosed,
  handleTemplateProgress,
  handleTemplateSyncCompleted,
  handleTemplateTreeFailed,
  handleTemplateTreeResolved,
  setTargetSelection,
  setTreeExpandedAll,
  setTreeNodeExpanded,
  setTreeSelection,
  stepBack,
  submitTemplate,
  toggleTarget,
  toggleTreeNode,
} from '@/reposync/wizard';

const same = (state: AppState): Transition<AppState> => [state, []];

const withQueue = (
  state: AppState,
  apply: (queue: SyncQueueState) => Transition<SyncQueueState>,
): Transition<AppState> => {
  if (!state.queue) {
    return same(state);
  }
  const [queue, commands] = apply(state.queue);
  return [{ ...state, queue }, commands];
};

/**
 * The workflow reducer. It never performs I/O: everything asynchronous is
 * returned as a command and comes back later as another event.
 */
export const update = (state: AppState, event: AppEvent): Transition<AppState> => {
  switch (event.type) {
    case 'key':
      return handleKey(state, event.press);

    case 'switchMode':
      return switchMode(state, event.mode);
    case 'cycleMode':
      return cycleMode(state, event.direction);
    case 'ownerSelected':
      return selectOwner(state, event.owner, event.isOrg);
    case 'organizationsLoaded':
      return same({ ...state, organizations: event.orgs });
    case 'organizationsFailed':
      return same({
        ...state,
        notice: errorNotice(`Failed to load organizations: ${event.message}`),
      });
    case 'repositoriesLoaded':
      return same(handleRepositoriesLoaded(state, event));
    case 'repositoriesFailed':
      return same(handleRepositoriesFailed(state, event));

    case 'startSync':
      return startSync(state);
    case 'destinationProbed':
      return withQueue(state, (queue) => handleDestinationProbed(queue, event));
    case 'itemFinished':
      return withQueue(state, (queue) => handleItemFinished(queue, event));
    case 'conflictDecision':
      return withQueue(state, (queue) => handleConflictDecision(queue, event.action));
    case 'syncCompleted':
      return withQueue(state, (queue) => [handleSyncCompleted(queue, event), []]);

    case 'templateTargetsLoaded':
      return same(handleTemplateTargetsLoaded(state, event));
    case 'templateSubmitted':
      return submitTemplate(state, event.source);
    case 'templateResolutionCancelled':
      return same(cancelTemplateResolution(state));
    case 'templateTreeResolved':
      return handleTemplateTreeResolved(state, event);
    case 'templateTreeFailed':
      return same(handleTemplateTreeFailed(state, event));
    case 'recentTemplatesUpdated':
      return same({ ...state, recentTemplates: event.entries });
    case 'recentOwnersUpdated':
      return same({ ...state, recentOwners: event.entries });
    case 'treeToggled':
      return same(toggleTreeNode(state, event.path));
    case 'treeExpanded':
      return same(setTreeNodeExpanded(state, event.path, event.expanded));
    case 'treeExpandedAll':
      return same(setTreeExpandedAll(state, event.expanded));
    case 'treeSelectionSet':
      return same(setTreeSelection(state, event.selected));
    case 'advanceStep':
      return advanceStep(state);
    case 'stepBack':
      return same(stepBack(state));
    case 'targetToggled':
      return same(toggleTarget(state, event.path));
    case 'targetSelectionSet':
      return same(setTargetSelection(state, event.selected));
    case 'templateProgress':
      return handleTemplateProgress(state, event);
    case 'templateFileConflict':
      return handleTemplateFileConflict(state, event);
    case 'fileConflictDecision':
      return handleFileConflictDecision(state, event.action);
    case 'templateSyncCompleted':
      return handleTemplateSyncCompleted(state, event);
    case 'templateJobClosed':
      return same(handleTemplateJobClosed(state, event));

    case 'settingsLoaded':
      return same(handleSettingsLoaded(state, event));
    case 'settingsSaved':
      return handleSettingsSaved(state, event);
    case 'settingsFailed':
      return same(handleSettingsFailed(state, event));
    case 'commandFailed':
      return same({ ...state, notice: errorNotice(event.message) });
  }
};
