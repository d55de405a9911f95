import type { Key } from 'ink';

import type { SettingsValues } from '@/reposync/state';
import type {
  ConflictAction,
  FileConflictAction,
  Mode,
  RepoSummary,
  RepositoryScope,
  SyncOrigin,
  SyncResult,
  TemplateSource,
  TemplateSyncProgress,
  TemplateSyncSummary,
  TreeNode,
} from '@/reposync/types';

export type KeyPress = {
  input: string;
  key: Partial<Key>;
};

/** Everything that can change workflow state, whether typed by the user or produced by a command. */
export type AppEvent =
  | { type: 'key'; press: KeyPress }
  | { type: 'switchMode'; mode: Mode }
  | { type: 'cycleMode'; direction: 1 | -1 }
  | { type: 'ownerSelected'; owner: string; isOrg: boolean }
  | { type: 'organizationsLoaded'; orgs: string[] }
  | { type: 'repositoriesLoaded'; requestId: number; items: RepoSummary[] }
  | { type: 'repositoriesFailed'; requestId: number; message: string }
  | { type: 'organizationsFailed'; message: string }
  | { type: 'startSync' }
  | { type: 'destinationProbed'; runId: number; index: number; exists: boolean }
  | { type: 'itemFinished'; runId: number; index: number; result: SyncResult }
  | { type: 'conflictDecision'; action: ConflictAction }
  | { type: 'syncCompleted'; runId: number; results: SyncResult[] }
  | { type: 'templateTargetsLoaded'; requestId: number; paths: string[] }
  | { type: 'templateSubmitted'; source: TemplateSource }
  | { type: 'templateResolutionCancelled' }
  | { type: 'templateTreeResolved'; requestId: number; source: TemplateSource; root: TreeNode }
  | { type: 'templateTreeFailed'; requestId: number; message: string }
  | { type: 'recentTemplatesUpdated'; entries: string[] }
  | { type: 'recentOwnersUpdated'; entries: string[] }
  | { type: 'treeToggled'; path: string }
  | { type: 'treeExpanded'; path: string; expanded: boolean }
  | { type: 'treeExpandedAll'; expanded: boolean }
  | { type: 'treeSelectionSet'; selected: boolean }
  | { type: 'advanceStep' }
  | { type: 'stepBack' }
  | { type: 'targetToggled'; path: string }
  | { type: 'targetSelectionSet'; selected: boolean }
  | { type: 'templateProgress'; jobId: number; progress: TemplateSyncProgress }
  | { type: 'templateFileConflict'; jobId: number; filePath: string; targetRepo: string }
  | { type: 'fileConflictDecision'; action: FileConflictAction }
  | { type: 'templateSyncCompleted'; jobId: number; summary: TemplateSyncSummary }
  | { type: 'templateJobClosed'; jobId: number }
  | { type: 'settingsLoaded'; values: SettingsValues; filePath: string }
  | { type: 'settingsSaved'; targetDir: string; sourceDirs: string[]; filePath: string }
  | { type: 'settingsFailed'; message: string }
  | { type: 'commandFailed'; message: string };

/** Side effects requested by the reducer; resolved outside the core and fed back as events. */
export type Command =
  | { kind: 'loadOrganizations' }
  | { kind: 'loadRepositories'; requestId: number; scope: RepositoryScope }
  | { kind: 'loadTemplateTargets'; requestId: number; paths: string[] }
  | {
      kind: 'probeDestination';
      runId: number;
      index: number;
      origin: SyncOrigin;
      destination: string;
    }
  | {
      kind: 'cloneOrCopy';
      runId: number;
      index: number;
      origin: SyncOrigin;
      identifier: string;
      repoName: string;
      targetDir: string;
    }
  | {
      kind: 'refreshRepository';
      runId: number;
      index: number;
      origin: SyncOrigin;
      repoName: string;
      destination: string;
    }
  | { kind: 'completeSync'; runId: number; results: SyncResult[] }
  | { kind: 'resolveTemplateTree'; requestId: number; source: TemplateSource }
  | { kind: 'recordRecentTemplate'; entry: string }
  | { kind: 'recordRecentOwner'; owner: string }
  | {
      kind: 'startTemplateJob';
      jobId: number;
      source: TemplateSource;
      files: string[];
      targets: string[];
    }
  | { kind: 'awaitTemplateJobMessage'; jobId: number }
  | { kind: 'resolveFileConflict'; jobId: number; action: FileConflictAction }
  | { kind: 'loadSettings' }
  | { kind: 'saveSettings'; values: SettingsValues }
  | { kind: 'exit' };

export type Transition<S> = [S, Command[]];
