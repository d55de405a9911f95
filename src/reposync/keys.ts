import {
  clearRepositorySelection,
  cycleSort,
  moveListCursor,
  selectAllRepositories,
  setSearch,
  startSync,
  toggleCurrentRepository,
} from '@/reposync/list';
import type { KeyPress, Transition } from '@/reposync/messages';
import { cycleMode, requestRepositories, selectOwner, switchMode } from '@/reposync/mode';
import { handleConflictDecision } from '@/reposync/queue';
import {
  closeSettings,
  editSettingsField,
  moveSettingsCursor,
  openSettings,
  submitSettings,
} from '@/reposync/settings';
import type { AppState, RepositoryListState, TemplateUiState } from '@/reposync/state';
import { flattenVisible } from '@/reposync/tree';
import { MODES, type ConflictAction, type FileConflictAction } from '@/reposync/types';
import {
  advanceStep,
  cancelTemplateResolution,
  handleFileConflictDecision,
  inferTemplateSource,
  parseTemplateInput,
  resetWizard,
  selectorOptions,
  setTargetSelection,
  setTreeExpandedAll,
  setTreeNodeExpanded,
  setTreeSelection,
  stepBack,
  submitTemplate,
  toggleTarget,
  toggleTreeNode,
  visibleTargets,
} from '@/reposync/wizard';

const QUEUE_DECISIONS: Record<string, ConflictAction> = {
  s: 'skip',
  r: 'refresh',
  S: 'skipAll',
  R: 'refreshAll',
};

const FILE_DECISIONS: Record<string, FileConflictAction> = {
  o: 'overwrite',
  s: 'skip',
  O: 'overwriteAll',
  S: 'skipAll',
};

const unchanged = (state: AppState): Transition<AppState> => [state, []];

const isUp = ({ input, key }: KeyPress) => Boolean(key.upArrow) || input === 'k';
const isDown = ({ input, key }: KeyPress) => Boolean(key.downArrow) || input === 'j';
const isPrintable = ({ input, key }: KeyPress) =>
  input.length > 0 && !key.ctrl && !key.meta && !key.return && !key.escape && !key.tab;
const isErase = ({ key }: KeyPress) => Boolean(key.backspace) || Boolean(key.delete);

const clamp = (value: number, count: number): number =>
  count === 0 ? 0 : Math.min(Math.max(value, 0), count - 1);

const withList = (state: AppState, list: RepositoryListState): AppState => ({
  ...state,
  repositories: list,
});

const withUi = (state: AppState, patch: Partial<TemplateUiState>): AppState => ({
  ...state,
  templateUi: { ...state.templateUi, ...patch },
});

/** Whether the focused widget consumes printable characters. */
export const isTextInputActive = (state: AppState): boolean => {
  if (state.mode !== 'template') {
    return state.repositories.searching;
  }
  const { step } = state.template;
  const { selector, filtering } = state.templateUi;
  return (
    (step === 'selectTemplate' && selector.cursor === -1 && !selector.loading) ||
    (step === 'selectTargets' && filtering)
  );
};

const handleQueueDialogKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const queue = state.queue;
  const action = press.key.escape ? 'skip' : QUEUE_DECISIONS[press.input];
  if (!queue || !action) {
    return unchanged(state);
  }
  const [nextQueue, commands] = handleConflictDecision(queue, action);
  return [{ ...state, queue: nextQueue }, commands];
};

const handleFileDialogKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const action = press.key.escape ? 'skip' : FILE_DECISIONS[press.input];
  return action ? handleFileConflictDecision(state, action) : unchanged(state);
};

/** The signed-in user, then organizations, then owners picked in earlier sessions. */
export const ownerChoices = (state: AppState): string[] => [
  ...new Set([state.username, ...state.organizations, ...state.recentOwners]),
];

const handleOwnerPickerKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const picker = state.ownerPicker;
  if (!picker) {
    return unchanged(state);
  }
  const choices = ownerChoices(state);

  if (press.key.escape) {
    return [{ ...state, ownerPicker: undefined }, []];
  }
  if (isUp(press)) {
    return [{ ...state, ownerPicker: { cursor: clamp(picker.cursor - 1, choices.length) } }, []];
  }
  if (isDown(press)) {
    return [{ ...state, ownerPicker: { cursor: clamp(picker.cursor + 1, choices.length) } }, []];
  }
  if (press.key.return) {
    const owner = choices[picker.cursor];
    return owner ? selectOwner(state, owner, state.organizations.includes(owner)) : unchanged(state);
  }
  return unchanged(state);
};

const handleSettingsKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const { key } = press;
  if (key.escape) {
    return [closeSettings(state), []];
  }
  if (key.return || (key.ctrl && press.input === 's')) {
    return submitSettings(state);
  }
  if (key.upArrow || (key.tab && key.shift)) {
    return [moveSettingsCursor(state, -1), []];
  }
  if (key.downArrow || key.tab) {
    return [moveSettingsCursor(state, 1), []];
  }
  if (isErase(press)) {
    return [editSettingsField(state, (value) => value.slice(0, -1)), []];
  }
  if (isPrintable(press)) {
    return [editSettingsField(state, (value) => value + press.input), []];
  }
  return unchanged(state);
};

const handleSearchKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const list = state.repositories;
  if (press.key.escape) {
    return [withList(state, { ...setSearch(list, ''), searching: false }), []];
  }
  if (press.key.return) {
    return [withList(state, { ...list, searching: false }), []];
  }
  if (isErase(press)) {
    return [withList(state, setSearch(list, list.search.slice(0, -1))), []];
  }
  if (isPrintable(press)) {
    return [withList(state, setSearch(list, list.search + press.input)), []];
  }
  return unchanged(state);
};

const handleListKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const list = state.repositories;
  const { input, key } = press;

  if (isUp(press)) {
    return [withList(state, moveListCursor(list, -1)), []];
  }
  if (isDown(press)) {
    return [withList(state, moveListCursor(list, 1)), []];
  }
  if (key.pageUp) {
    return [withList(state, moveListCursor(list, -10)), []];
  }
  if (key.pageDown) {
    return [withList(state, moveListCursor(list, 10)), []];
  }
  if (key.return) {
    return startSync(state);
  }

  switch (input) {
    case ' ':
      return [withList(state, toggleCurrentRepository(list)), []];
    case 'a':
      return [withList(state, selectAllRepositories(list)), []];
    case 'n':
      return [withList(state, clearRepositorySelection(list)), []];
    case '/':
      return [withList(state, { ...list, searching: true }), []];
    case 's':
      return [withList(state, cycleSort(list)), []];
    case 'r':
      return requestRepositories(state);
    case 'o':
      return state.mode === 'local' ? unchanged(state) : [{ ...state, ownerPicker: { cursor: 0 } }, []];
    case 'c':
      return openSettings(state);
    default:
      return unchanged(state);
  }
};

const handleSelectorKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const selector = state.templateUi.selector;
  const withSelector = (patch: Partial<typeof selector>): AppState =>
    withUi(state, { selector: { ...selector, ...patch } });

  if (selector.loading) {
    return press.key.escape ? [cancelTemplateResolution(state), []] : unchanged(state);
  }

  const options = selectorOptions(state);

  if (press.key.ctrl && press.input === 't') {
    return [
      withSelector({
        sourceKind: selector.sourceKind === 'github' ? 'local' : 'github',
        error: undefined,
      }),
      [],
    ];
  }
  if (press.key.upArrow) {
    return [withSelector({ cursor: Math.max(selector.cursor - 1, -1) }), []];
  }
  if (press.key.downArrow) {
    return [withSelector({ cursor: Math.min(selector.cursor + 1, options.length - 1) }), []];
  }

  if (press.key.return) {
    if (selector.cursor >= 0) {
      const option = options[selector.cursor];
      return option ? submitTemplate(state, inferTemplateSource(option)) : unchanged(state);
    }
    const parsed = parseTemplateInput(selector.input, selector.sourceKind);
    if (!parsed.ok) {
      return [withSelector({ error: parsed.error }), []];
    }
    return submitTemplate(state, parsed.source);
  }

  if (selector.cursor >= 0) {
    return unchanged(state);
  }
  if (press.key.escape) {
    return [withSelector({ input: '', error: undefined }), []];
  }
  if (isErase(press)) {
    return [withSelector({ input: selector.input.slice(0, -1) }), []];
  }
  if (isPrintable(press)) {
    return [withSelector({ input: selector.input + press.input }), []];
  }
  return unchanged(state);
};

const handleTreeKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const tree = state.template.tree;
  if (!tree) {
    return unchanged(state);
  }
  const rows = flattenVisible(tree);
  const cursor = clamp(state.templateUi.treeCursor, rows.length);
  const current = rows[cursor]?.node;
  const { input, key } = press;

  if (isUp(press)) {
    return [withUi(state, { treeCursor: clamp(cursor - 1, rows.length) }), []];
  }
  if (isDown(press)) {
    return [withUi(state, { treeCursor: clamp(cursor + 1, rows.length) }), []];
  }
  if (key.return) {
    return advanceStep(state);
  }
  if (key.escape || key.backspace) {
    return [stepBack(state), []];
  }
  if ((key.rightArrow || input === 'l') && current?.isDir) {
    return [setTreeNodeExpanded(state, current.path, true), []];
  }
  if ((key.leftArrow || input === 'h') && current?.isDir) {
    return [setTreeNodeExpanded(state, current.path, false), []];
  }

  switch (input) {
    case ' ':
      return current ? [toggleTreeNode(state, current.path), []] : unchanged(state);
    case 'a':
      return [setTreeSelection(state, true), []];
    case 'n':
      return [setTreeSelection(state, false), []];
    case 'e':
      return [setTreeExpandedAll(state, true), []];
    case 'c':
      return [withUi(setTreeExpandedAll(state, false), { treeCursor: 0 }), []];
    default:
      return unchanged(state);
  }
};

const handleTargetFilterKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  const { targetFilter } = state.templateUi;
  if (press.key.escape) {
    return [withUi(state, { targetFilter: '', filtering: false, targetCursor: 0 }), []];
  }
  if (press.key.return) {
    return [withUi(state, { filtering: false }), []];
  }
  if (isErase(press)) {
    return [withUi(state, { targetFilter: targetFilter.slice(0, -1), targetCursor: 0 }), []];
  }
  if (isPrintable(press)) {
    return [withUi(state, { targetFilter: targetFilter + press.input, targetCursor: 0 }), []];
  }
  return unchanged(state);
};

const handleTargetsKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  if (state.templateUi.filtering) {
    return handleTargetFilterKey(state, press);
  }

  const targets = visibleTargets(state);
  const cursor = clamp(state.templateUi.targetCursor, targets.length);
  const { input, key } = press;

  if (isUp(press)) {
    return [withUi(state, { targetCursor: clamp(cursor - 1, targets.length) }), []];
  }
  if (isDown(press)) {
    return [withUi(state, { targetCursor: clamp(cursor + 1, targets.length) }), []];
  }
  if (key.return) {
    return advanceStep(state);
  }
  if (key.escape || key.backspace) {
    return [stepBack(state), []];
  }

  switch (input) {
    case ' ': {
      const target = targets[cursor];
      return target ? [toggleTarget(state, target), []] : unchanged(state);
    }
    case 'a':
      return [setTargetSelection(state, true), []];
    case 'n':
      return [setTargetSelection(state, false), []];
    case '/':
      return [withUi(state, { filtering: true }), []];
    default:
      return unchanged(state);
  }
};

const handleTemplateKey = (state: AppState, press: KeyPress): Transition<AppState> => {
  switch (state.template.step) {
    case 'selectTemplate':
      return handleSelectorKey(state, press);
    case 'browseTree':
      return handleTreeKey(state, press);
    case 'selectTargets':
      return handleTargetsKey(state, press);
    case 'syncing':
    case 'complete':
      return unchanged(state);
  }
};

const handleGlobalKey = (state: AppState, press: KeyPress): Transition<AppState> | undefined => {
  const { input, key } = press;

  if (key.tab) {
    return cycleMode(state, key.shift ? -1 : 1);
  }
  if (isTextInputActive(state)) {
    return undefined;
  }
  if (input === 'q') {
    return [{ ...state, quitting: true }, [{ kind: 'exit' }]];
  }
  if (input === '?') {
    return [{ ...state, showHelp: true }, []];
  }

  const modeIndex = Number.parseInt(input, 10);
  if (String(modeIndex) === input) {
    const mode = MODES[modeIndex - 1];
    return mode ? switchMode(state, mode) : undefined;
  }

  return undefined;
};

/**
 * Routes a key press to whichever surface has focus: a pending conflict
 * prompt first, then overlays (help, owner picker, settings), then global
 * shortcuts, then the active mode. Every press clears the previous inline
 * notice.
 */
export const handleKey = (current: AppState, press: KeyPress): Transition<AppState> => {
  if (press.key.ctrl && press.input === 'c') {
    return [{ ...current, quitting: true }, [{ kind: 'exit' }]];
  }

  const state: AppState = current.notice ? { ...current, notice: undefined } : current;

  if (state.queue?.status === 'awaitingDecision') {
    return handleQueueDialogKey(state, press);
  }
  if (state.template.pendingConflict) {
    return handleFileDialogKey(state, press);
  }
  if (state.showHelp) {
    return [{ ...state, showHelp: false }, []];
  }
  if (state.ownerPicker) {
    return handleOwnerPickerKey(state, press);
  }
  if (state.settings) {
    return handleSettingsKey(state, press);
  }
  if (state.mode === 'template' && state.template.step === 'complete') {
    return [resetWizard(state), []];
  }
  // Only cancel is accepted while a template tree resolves.
  if (
    state.mode === 'template' &&
    state.template.step === 'selectTemplate' &&
    state.templateUi.selector.loading
  ) {
    return handleSelectorKey(state, press);
  }

  const global = handleGlobalKey(state, press);
  if (global) {
    return global;
  }

  if (state.mode === 'template') {
    return handleTemplateKey(state, press);
  }

  if (state.repositories.searching) {
    return handleSearchKey(state, press);
  }
  return handleListKey(state, press);
};
