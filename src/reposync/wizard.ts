import path from 'node:path';

import type { AppEvent, Transition } from '@/reposync/messages';
import {
  allocateId,
  createTemplateUiState,
  emptyProgress,
  errorNotice,
  resetTemplateWorkflow,
  type AppState,
  type TemplateWorkflowState,
} from '@/reposync/state';
import {
  collectSelectedFiles,
  setExpandedRecursive,
  setNodeExpanded,
  setSelectedRecursive,
  toggleNodeSelection,
} from '@/reposync/tree';
import type { FileConflictAction, TemplateSource, TreeNode } from '@/reposync/types';

export const NO_FILES_MESSAGE = 'Select at least one file to continue.';
export const NO_TARGETS_MESSAGE = 'Select at least one target repository to continue.';

const OWNER_REPO_PATTERN = /^[^/\s]+\/[^/\s]+$/;

export type ParsedTemplateInput =
  | { ok: true; source: TemplateSource }
  | { ok: false; error: string };

export const parseTemplateInput = (
  raw: string,
  kind: TemplateSource['kind'],
): ParsedTemplateInput => {
  const input = raw.trim();

  if (kind === 'local') {
    return input
      ? { ok: true, source: { kind: 'local', path: input } }
      : { ok: false, error: 'Enter the path of a local template directory.' };
  }

  if (!OWNER_REPO_PATTERN.test(input)) {
    return { ok: false, error: `Enter a repository as owner/repo (got "${input}").` };
  }

  const [owner = '', repo = ''] = input.split('/');
  return { ok: true, source: { kind: 'github', owner, repo } };
};

/** The text stored in the recent-templates list. */
export const describeTemplateSource = (source: TemplateSource): string =>
  source.kind === 'github' ? `${source.owner}/${source.repo}` : source.path;

/** Recent entries and scanned repositories carry no kind; paths are told apart from `owner/repo`. */
export const inferTemplateSource = (entry: string): TemplateSource => {
  const looksLikePath = /^[.~/\\]/.test(entry) || /^[A-Za-z]:[\\/]/.test(entry);
  if (!looksLikePath && OWNER_REPO_PATTERN.test(entry)) {
    const [owner = '', repo = ''] = entry.split('/');
    return { kind: 'github', owner, repo };
  }
  return { kind: 'local', path: entry };
};

export const selectorOptions = (state: AppState): string[] => {
  const options: string[] = [];
  for (const entry of [...state.recentTemplates, ...state.templateTargets]) {
    if (!options.includes(entry)) {
      options.push(entry);
    }
  }
  return options;
};

const samePath = (left: string, right: string): boolean =>
  path.resolve(left) === path.resolve(right);

/** Local repositories that may receive files; a local template source is never one of them. */
export const candidateTargets = (state: AppState): string[] => {
  const source = state.template.source;
  if (source?.kind !== 'local') {
    return state.templateTargets;
  }
  return state.templateTargets.filter((target) => !samePath(target, source.path));
};

export const visibleTargets = (state: AppState): string[] => {
  const filter = state.templateUi.targetFilter.trim().toLowerCase();
  const candidates = candidateTargets(state);
  return filter ? candidates.filter((target) => target.toLowerCase().includes(filter)) : candidates;
};

const withTemplate = (
  state: AppState,
  patch: Partial<TemplateWorkflowState>,
): AppState => ({ ...state, template: { ...state.template, ...patch } });

export const submitTemplate = (state: AppState, source: TemplateSource): Transition<AppState> => {
  const selector = state.templateUi.selector;
  if (state.template.step !== 'selectTemplate' || selector.loading) {
    return [state, []];
  }

  const [requestId, next] = allocateId(state);
  return [
    {
      ...next,
      notice: undefined,
      templateUi: {
        ...next.templateUi,
        selector: { ...selector, loading: true, error: undefined, requestId },
      },
    },
    [{ kind: 'resolveTemplateTree', requestId, source }],
  ];
};

/** Drops the pending request id, so whatever the resolution returns is ignored. */
export const cancelTemplateResolution = (state: AppState): AppState => {
  const selector = state.templateUi.selector;
  if (!selector.loading) {
    return state;
  }
  return {
    ...state,
    templateUi: {
      ...state.templateUi,
      selector: { ...selector, loading: false, requestId: undefined },
    },
  };
};

export const handleTemplateTreeResolved = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateTreeResolved' }>,
): Transition<AppState> => {
  const selector = state.templateUi.selector;
  if (event.requestId !== selector.requestId || state.template.step !== 'selectTemplate') {
    return [state, []];
  }

  const tree = { ...setSelectedRecursive(event.root, true), expanded: true };

  return [
    {
      ...withTemplate(state, {
        step: 'browseTree',
        source: event.source,
        tree,
        selectedFiles: collectSelectedFiles(tree),
        selectedTargets: [],
      }),
      templateUi: {
        ...state.templateUi,
        selector: { ...selector, loading: false, error: undefined, requestId: undefined },
        treeCursor: 0,
        targetCursor: 0,
      },
    },
    [{ kind: 'recordRecentTemplate', entry: describeTemplateSource(event.source) }],
  ];
};

export const handleTemplateTreeFailed = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateTreeFailed' }>,
): AppState => {
  const selector = state.templateUi.selector;
  if (event.requestId !== selector.requestId) {
    return state;
  }
  return {
    ...state,
    templateUi: {
      ...state.templateUi,
      selector: { ...selector, loading: false, requestId: undefined, error: event.message },
    },
  };
};

const updateTree = (state: AppState, apply: (tree: TreeNode) => TreeNode): AppState => {
  const tree = state.template.tree;
  if (state.template.step !== 'browseTree' || !tree) {
    return state;
  }
  const next = apply(tree);
  return withTemplate(state, { tree: next, selectedFiles: collectSelectedFiles(next) });
};

export const toggleTreeNode = (state: AppState, nodePath: string): AppState =>
  updateTree(state, (tree) => toggleNodeSelection(tree, nodePath));

export const setTreeNodeExpanded = (state: AppState, nodePath: string, expanded: boolean): AppState =>
  updateTree(state, (tree) => setNodeExpanded(tree, nodePath, expanded));

export const setTreeExpandedAll = (state: AppState, expanded: boolean): AppState =>
  updateTree(state, (tree) => setExpandedRecursive(tree, expanded));

export const setTreeSelection = (state: AppState, selected: boolean): AppState =>
  updateTree(state, (tree) => setSelectedRecursive(tree, selected));

export const toggleTarget = (state: AppState, target: string): AppState => {
  if (state.template.step !== 'selectTargets' || !candidateTargets(state).includes(target)) {
    return state;
  }
  const selected = state.template.selectedTargets;
  return withTemplate(state, {
    selectedTargets: selected.includes(target)
      ? selected.filter((entry) => entry !== target)
      : [...selected, target],
  });
};

export const setTargetSelection = (state: AppState, selected: boolean): AppState => {
  if (state.template.step !== 'selectTargets') {
    return state;
  }
  if (!selected) {
    return withTemplate(state, { selectedTargets: [] });
  }

  const current = state.template.selectedTargets;
  const additions = visibleTargets(state).filter((target) => !current.includes(target));
  return withTemplate(state, { selectedTargets: [...current, ...additions] });
};

const startTemplateJob = (state: AppState): Transition<AppState> => {
  const candidates = candidateTargets(state);
  const targets = state.template.selectedTargets.filter((target) => candidates.includes(target));
  const source = state.template.source;

  if (targets.length === 0 || !source) {
    return [{ ...state, notice: errorNotice(NO_TARGETS_MESSAGE) }, []];
  }

  const files = state.template.selectedFiles;
  const [jobId, next] = allocateId(state);

  return [
    withTemplate(next, {
      step: 'syncing',
      selectedTargets: targets,
      overwriteAll: false,
      skipAll: false,
      pendingConflict: undefined,
      jobId,
      progress: { ...emptyProgress(), total: files.length * targets.length },
      summary: { synced: 0, skipped: 0, errors: 0 },
    }),
    [
      { kind: 'startTemplateJob', jobId, source, files, targets },
      { kind: 'awaitTemplateJobMessage', jobId },
    ],
  ];
};

export const advanceStep = (state: AppState): Transition<AppState> => {
  switch (state.template.step) {
    case 'browseTree': {
      const tree = state.template.tree;
      const files = tree ? collectSelectedFiles(tree) : [];
      if (files.length === 0) {
        return [{ ...state, notice: errorNotice(NO_FILES_MESSAGE) }, []];
      }
      return [
        {
          ...withTemplate(state, { step: 'selectTargets', selectedFiles: files }),
          templateUi: { ...state.templateUi, targetCursor: 0 },
        },
        [],
      ];
    }

    case 'selectTargets':
      return startTemplateJob(state);

    default:
      return [state, []];
  }
};

export const stepBack = (state: AppState): AppState => {
  switch (state.template.step) {
    case 'browseTree':
      return withTemplate(state, {
        step: 'selectTemplate',
        source: undefined,
        tree: undefined,
        selectedFiles: [],
        selectedTargets: [],
      });

    case 'selectTargets':
      return {
        ...withTemplate(state, { step: 'browseTree' }),
        templateUi: { ...state.templateUi, filtering: false },
      };

    default:
      return state;
  }
};

const isCurrentJob = (state: AppState, jobId: number): boolean =>
  state.template.step === 'syncing' && state.template.jobId === jobId;

export const handleTemplateProgress = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateProgress' }>,
): Transition<AppState> => {
  if (!isCurrentJob(state, event.jobId)) {
    return [state, []];
  }
  return [
    withTemplate(state, { progress: event.progress }),
    [{ kind: 'awaitTemplateJobMessage', jobId: event.jobId }],
  ];
};

export const handleTemplateFileConflict = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateFileConflict' }>,
): Transition<AppState> => {
  if (!isCurrentJob(state, event.jobId)) {
    return [state, []];
  }
  return [
    withTemplate(state, {
      pendingConflict: { filePath: event.filePath, targetRepo: event.targetRepo },
    }),
    [{ kind: 'awaitTemplateJobMessage', jobId: event.jobId }],
  ];
};

export const handleFileConflictDecision = (
  state: AppState,
  action: FileConflictAction,
): Transition<AppState> => {
  const { jobId, pendingConflict } = state.template;
  if (state.template.step !== 'syncing' || !pendingConflict || jobId === undefined) {
    return [state, []];
  }
  return [
    withTemplate(state, {
      pendingConflict: undefined,
      overwriteAll: state.template.overwriteAll || action === 'overwriteAll',
      skipAll: state.template.skipAll || action === 'skipAll',
    }),
    [{ kind: 'resolveFileConflict', jobId, action }],
  ];
};

export const handleTemplateSyncCompleted = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateSyncCompleted' }>,
): Transition<AppState> => {
  if (!isCurrentJob(state, event.jobId)) {
    return [state, []];
  }
  return [
    withTemplate(state, { step: 'complete', summary: event.summary, pendingConflict: undefined }),
    [{ kind: 'awaitTemplateJobMessage', jobId: event.jobId }],
  ];
};

/** A queue closed without a summary means the worker died; the run still ends. */
export const handleTemplateJobClosed = (
  state: AppState,
  event: Extract<AppEvent, { type: 'templateJobClosed' }>,
): AppState => {
  if (!isCurrentJob(state, event.jobId)) {
    return state;
  }
  return {
    ...withTemplate(state, { step: 'complete', pendingConflict: undefined }),
    notice: errorNotice('Template sync stopped before reporting a summary.'),
  };
};

export const resetWizard = (state: AppState): AppState => ({
  ...state,
  template: resetTemplateWorkflow(),
  templateUi: createTemplateUiState(),
});
