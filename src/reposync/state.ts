import type {
  Mode,
  RepoSummary,
  SyncOrigin,
  SyncResult,
  TemplateSource,
  TemplateSyncProgress,
  TemplateSyncSummary,
  TreeNode,
} from '@/reposync/types';

export type Notice = {
  level: 'error' | 'info';
  text: string;
};

export type SortMode = 'updated' | 'name' | 'stars';

export type RepositoryListState = {
  items: RepoSummary[];
  loading: boolean;
  error?: string;
  cursor: number;
  checked: Set<string>;
  search: string;
  searching: boolean;
  sort: SortMode;
};

export type RepoConflict = {
  repoName: string;
  destination: string;
  index: number;
};

export type QueueItemPhase = 'probe' | 'clone' | 'refresh';

export type SyncQueueState = {
  runId: number;
  selected: string[];
  targetDir: string;
  origin: SyncOrigin;
  cursor: number;
  results: SyncResult[];
  skipAll: boolean;
  refreshAll: boolean;
  status: 'running' | 'awaitingDecision' | 'finishing' | 'complete';
  inFlight?: { index: number; repoName: string; destination: string; phase: QueueItemPhase };
  pendingConflict?: RepoConflict;
  startedAt: number;
  finishedAt?: number;
};

export type TemplateStep = 'selectTemplate' | 'browseTree' | 'selectTargets' | 'syncing' | 'complete';

export const TEMPLATE_STEPS: readonly TemplateStep[] = [
  'selectTemplate',
  'browseTree',
  'selectTargets',
  'syncing',
  'complete',
];

export const TEMPLATE_STEP_LABELS: Record<TemplateStep, string> = {
  selectTemplate: 'Select Template',
  browseTree: 'Browse Files',
  selectTargets: 'Select Targets',
  syncing: 'Syncing',
  complete: 'Complete',
};

export type FileConflict = {
  filePath: string;
  targetRepo: string;
};

export type TemplateWorkflowState = {
  step: TemplateStep;
  source?: TemplateSource;
  tree?: TreeNode;
  selectedFiles: string[];
  selectedTargets: string[];
  overwriteAll: boolean;
  skipAll: boolean;
  progress: TemplateSyncProgress;
  summary: TemplateSyncSummary;
  pendingConflict?: FileConflict;
  jobId?: number;
};

export type TemplateSourceKind = TemplateSource['kind'];

export type TemplateSelectorState = {
  sourceKind: TemplateSourceKind;
  input: string;
  /** -1 while the text input has focus, otherwise an index into the shortcut list. */
  cursor: number;
  loading: boolean;
  error?: string;
  requestId?: number;
};

export type TemplateUiState = {
  selector: TemplateSelectorState;
  treeCursor: number;
  targetCursor: number;
  targetFilter: string;
  filtering: boolean;
};

export type SettingsField = 'target_dir' | 'source_dirs' | 'default_owner';

/** Raw text of each settings field; source directories are colon separated. */
export type SettingsValues = Record<SettingsField, string>;

export type SettingsFormState = {
  values: SettingsValues;
  cursor: number;
  loading: boolean;
  saving: boolean;
  error?: string;
  filePath?: string;
};

export type AppState = {
  mode: Mode;
  username: string;
  owner: string;
  organizations: string[];
  targetDir: string;
  sourceDirs: string[];
  sequence: number;
  repositories: RepositoryListState;
  repositoriesRequestId?: number;
  queue?: SyncQueueState;
  notice?: Notice;
  ownerPicker?: { cursor: number };
  showHelp: boolean;
  settings?: SettingsFormState;
  recentTemplates: string[];
  recentOwners: string[];
  templateTargets: string[];
  templateTargetsRequestId?: number;
  template: TemplateWorkflowState;
  templateUi: TemplateUiState;
  quitting: boolean;
};

export const emptyProgress = (): TemplateSyncProgress => ({
  current: 0,
  total: 0,
  currentFile: '',
  currentTarget: '',
});

export const createTemplateWorkflowState = (): TemplateWorkflowState => ({
  step: 'selectTemplate',
  selectedFiles: [],
  selectedTargets: [],
  overwriteAll: false,
  skipAll: false,
  progress: emptyProgress(),
  summary: { synced: 0, skipped: 0, errors: 0 },
});

/** Every field is rebuilt, so nothing from a previous run survives a reset. */
export const resetTemplateWorkflow = (): TemplateWorkflowState => createTemplateWorkflowState();

export const createTemplateUiState = (): TemplateUiState => ({
  selector: {
    sourceKind: 'github',
    input: '',
    cursor: -1,
    loading: false,
  },
  treeCursor: 0,
  targetCursor: 0,
  targetFilter: '',
  filtering: false,
});

export const createRepositoryListState = (): RepositoryListState => ({
  items: [],
  loading: false,
  cursor: 0,
  checked: new Set(),
  search: '',
  searching: false,
  sort: 'updated',
});

export type InitialStateOptions = {
  username: string;
  owner?: string;
  mode?: Mode;
  targetDir: string;
  sourceDirs: string[];
  recentTemplates?: string[];
  recentOwners?: string[];
};

export const createInitialState = (options: InitialStateOptions): AppState => ({
  mode: options.mode ?? 'personal',
  username: options.username,
  owner: options.owner?.trim() || options.username,
  organizations: [],
  targetDir: options.targetDir,
  sourceDirs: options.sourceDirs,
  sequence: 0,
  repositories: createRepositoryListState(),
  showHelp: false,
  recentTemplates: options.recentTemplates ?? [],
  recentOwners: options.recentOwners ?? [],
  templateTargets: [],
  template: createTemplateWorkflowState(),
  templateUi: createTemplateUiState(),
  quitting: false,
});

export const allocateId = (state: AppState): [number, AppState] => {
  const id = state.sequence + 1;
  return [id, { ...state, sequence: id }];
};

export const isQueueRunning = (state: AppState): boolean =>
  state.queue !== undefined && state.queue.status !== 'complete';

export const isTemplateJobRunning = (state: AppState): boolean =>
  state.template.step === 'syncing';

export const errorNotice = (text: string): Notice => ({ level: 'error', text });

export const infoNotice = (text: string): Notice => ({ level: 'info', text });
