import { Box, Text, useApp, useInput } from 'ink';
import { useEffect, useState, useSyncExternalStore } from 'react';

import type { WorkflowController } from '@/reposync/controller';
import { isTextInputActive, ownerChoices } from '@/reposync/keys';
import { SORT_LABELS, selectedIdentifiers, visibleRepositories } from '@/reposync/list';
import { currentQueueRepo, formatDuration, summarizeResults } from '@/reposync/queue';
import { SETTINGS_FIELDS } from '@/reposync/settings';
import {
  TEMPLATE_STEPS,
  TEMPLATE_STEP_LABELS,
  type SyncQueueState,
} from '@/reposync/state';
import { countFiles, countSelectedFiles, flattenVisible, selectionState } from '@/reposync/tree';
import { MODES, MODE_LABELS, type RepoSummary } from '@/reposync/types';
import { candidateTargets, selectorOptions, visibleTargets } from '@/reposync/wizard';

type RepoSyncApplicationProps = {
  controller: WorkflowController;
};

const SPINNER_FRAMES = ['-', '\\', '|', '/'];
const LIST_WINDOW = 14;

const COLORS = {
  amber: '#f2a541',
  cyan: '#61dafb',
  steel: '#8ea0b2',
  muted: '#6b7280',
  danger: '#ff6b6b',
  success: '#6ee7b7',
};

const TITLE_LINES = [
  '  ____  _____ ____   ___    ______   ___   _  ____',
  ' |  _ \\| ____|  _ \\ / _ \\  / ___\\ \\ / / \\ | |/ ___|',
  ' | |_) |  _| | |_) | | | | \\___ \\\\ V /|  \\| | |',
  ' |  _ <| |___|  __/| |_| |  ___) || | | |\\  | |___',
  ' |_| \\_\\_____|_|    \\___/  |____/ |_| |_| \\_|\\____|',
];

/** First and last index of the rows shown around `cursor`. */
const windowAround = (length: number, cursor: number, size = LIST_WINDOW): [number, number] => {
  if (length <= size) {
    return [0, length];
  }
  const start = Math.min(Math.max(cursor - Math.floor(size / 2), 0), length - size);
  return [start, start + size];
};

const progressBar = (current: number, total: number, width = 40): string => {
  const ratio = total === 0 ? 0 : Math.min(current / total, 1);
  const filled = Math.round(ratio * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.round(ratio * 100)}%`;
};

const repoMetadataLine = (repo: RepoSummary): string =>
  [
    repo.metadata['language'],
    repo.metadata['stars'] === undefined ? undefined : `* ${repo.metadata['stars']}`,
    repo.metadata['visibility'],
    repo.metadata['branch'] && `branch ${repo.metadata['branch']}`,
    repo.metadata['size'],
  ]
    .filter(Boolean)
    .join(' :: ');

export const RepoSyncApplication = ({ controller }: RepoSyncApplicationProps) => {
  const { exit } = useApp();
  const state = useSyncExternalStore(controller.subscribe, controller.getState);

  const [spinnerTick, setSpinnerTick] = useState(0);
  const [pulseTick, setPulseTick] = useState(0);

  const frameWidth = Math.max(72, Math.min((process.stdout.columns || 118) - 2, 118));
  const busy =
    state.repositories.loading ||
    state.templateUi.selector.loading ||
    state.template.step === 'syncing' ||
    (state.queue !== undefined && state.queue.status !== 'complete');

  useEffect(() => {
    const timer = setInterval(() => setPulseTick((value) => value + 1), 450);
    return () => clearInterval(timer);
  }, []);

  useEffect(() => {
    if (!busy) {
      return;
    }
    const timer = setInterval(() => {
      setSpinnerTick((value) => (value + 1) % SPINNER_FRAMES.length);
    }, 110);
    return () => clearInterval(timer);
  }, [busy]);

  useEffect(() => {
    if (state.quitting) {
      exit();
    }
  }, [state.quitting, exit]);

  useInput((input, key) => {
    controller.dispatch({ type: 'key', press: { input, key } });
  });

  const activePulse = pulseTick % 2 === 0;
  const spinner = SPINNER_FRAMES[spinnerTick];

  const renderHeader = () => (
    <Box borderStyle="round" borderColor={COLORS.amber} flexDirection="column" paddingX={1}>
      {TITLE_LINES.map((line) => (
        <Text key={line} color={COLORS.amber} bold>
          {line}
        </Text>
      ))}
      <Text color={COLORS.cyan}>signed in as {state.username || '(unknown)'}</Text>
    </Box>
  );

  const renderTabs = () => (
    <Box marginTop={1}>
      {MODES.map((mode, index) => {
        const active = mode === state.mode;
        return (
          <Box key={mode} marginRight={1} borderStyle={active ? 'bold' : 'single'} borderColor={active ? COLORS.amber : COLORS.muted} paddingX={1}>
            <Text color={active ? COLORS.amber : COLORS.steel} bold={active}>
              {index + 1} {MODE_LABELS[mode]}
            </Text>
          </Box>
        );
      })}
    </Box>
  );

  const renderContextBar = () => {
    if (state.mode === 'template') {
      return null;
    }
    const source =
      state.mode === 'local'
        ? `sources: ${state.sourceDirs.length > 0 ? state.sourceDirs.join(', ') : '(none configured)'}`
        : `owner: ${state.owner}`;

    return (
      <Text color={COLORS.steel}>
        {source} :: target: {state.targetDir} :: sort: {SORT_LABELS[state.repositories.sort]}
      </Text>
    );
  };

  const renderNotice = () => {
    if (!state.notice) {
      return null;
    }
    const color = state.notice.level === 'error' ? COLORS.danger : COLORS.cyan;
    return (
      <Box borderStyle="single" borderColor={color} paddingX={1}>
        <Text color={color}>{state.notice.text}</Text>
      </Box>
    );
  };

  const renderRepositoryList = () => {
    const list = state.repositories;
    const rows = visibleRepositories(list);
    const highlighted = rows[list.cursor];
    const [start, end] = windowAround(rows.length, list.cursor);
    const listWidth = Math.floor(frameWidth * 0.62);

    return (
      <Box marginTop={1}>
        <Box flexDirection="column" borderStyle="round" borderColor={COLORS.steel} paddingX={1} width={listWidth}>
          <Text bold color={COLORS.cyan}>
            Repositories ({selectedIdentifiers(list).length} selected / {rows.length})
          </Text>
          {(list.searching || list.search) && (
            <Text color={list.searching ? COLORS.amber : COLORS.steel}>
              search: {list.search}
              {list.searching ? '_' : ''}
            </Text>
          )}
          {list.loading && (
            <Text color={COLORS.cyan}>
              [{spinner}] Loading repositories...
            </Text>
          )}
          {!list.loading && list.error && <Text color={COLORS.danger}>{list.error}</Text>}
          {!list.loading && !list.error && rows.length === 0 && (
            <Text color={COLORS.muted}>No repositories found.</Text>
          )}
          {rows.slice(start, end).map((repo, offset) => {
            const index = start + offset;
            const focused = index === list.cursor;
            const marker = list.checked.has(repo.id) ? '[x]' : '[ ]';
            const color = focused ? (activePulse ? COLORS.amber : COLORS.cyan) : COLORS.steel;

            return (
              <Text key={repo.id} color={color}>
                {focused ? '>' : ' '} {marker} {repo.title}
                {repo.archived && <Text color={COLORS.muted}> (archived)</Text>}
              </Text>
            );
          })}
        </Box>

        <Box flexDirection="column" borderStyle="round" borderColor={COLORS.amber} paddingX={1} marginLeft={1} width={frameWidth - listWidth}>
          <Text bold color={COLORS.amber}>Details</Text>
          {highlighted ? (
            <>
              <Text color={COLORS.cyan}>{highlighted.id}</Text>
              <Text color={COLORS.steel}>{repoMetadataLine(highlighted)}</Text>
              <Text color={COLORS.muted}>{highlighted.description || 'No description.'}</Text>
            </>
          ) : (
            <Text color={COLORS.muted}>No repository highlighted.</Text>
          )}
        </Box>
      </Box>
    );
  };

  const renderQueue = (queue: SyncQueueState) => {
    if (queue.status === 'complete') {
      const summary = summarizeResults(queue.results);
      const elapsed = formatDuration((queue.finishedAt ?? queue.startedAt) - queue.startedAt);
      const failures = queue.results.filter((result) => !result.success);

      return (
        <Box marginTop={1} borderStyle="round" borderColor={failures.length > 0 ? COLORS.danger : COLORS.success} paddingX={1} flexDirection="column">
          <Text bold color={COLORS.success}>Sync Summary</Text>
          <Text color={COLORS.success}>synced: {summary.succeeded}</Text>
          <Text color={COLORS.muted}>skipped: {summary.skipped}</Text>
          <Text color={summary.failed > 0 ? COLORS.danger : COLORS.steel}>failed: {summary.failed}</Text>
          <Text color={COLORS.steel}>elapsed: {elapsed}</Text>
          {failures.map((result) => (
            <Text key={result.repo} color={COLORS.danger}>
              - {result.repo} :: {result.error}
            </Text>
          ))}
        </Box>
      );
    }

    if (queue.status === 'awaitingDecision' && queue.pendingConflict) {
      return (
        <Box marginTop={1} borderStyle="round" borderColor={COLORS.amber} paddingX={1} flexDirection="column">
          <Text bold color={COLORS.amber}>Destination already exists</Text>
          <Text color={COLORS.cyan}>repository: {queue.pendingConflict.repoName}</Text>
          <Text color={COLORS.steel}>destination: {queue.pendingConflict.destination}</Text>
          <Text color={COLORS.muted}>s skip  r refresh (git pull)  S skip all  R refresh all</Text>
        </Box>
      );
    }

    const done = Math.min(queue.cursor, queue.selected.length);
    return (
      <Box marginTop={1} borderStyle="round" borderColor={COLORS.cyan} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.cyan}>
          [{spinner}] Syncing {Math.min(done + 1, queue.selected.length)}/{queue.selected.length}
        </Text>
        <Text color={COLORS.steel}>{progressBar(done, queue.selected.length)}</Text>
        <Text color={COLORS.amber}>active: {currentQueueRepo(queue) ?? '(finalizing...)'}</Text>
      </Box>
    );
  };

  const ownerKindLabel = (owner: string) => {
    if (owner === state.username) {
      return '(you)';
    }
    return state.organizations.includes(owner) ? '(organization)' : '(recent)';
  };

  const renderOwnerPicker = () => {
    const picker = state.ownerPicker;
    if (!picker) {
      return null;
    }
    return (
      <Box marginTop={1} borderStyle="round" borderColor={COLORS.amber} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.amber}>Select Owner</Text>
        {ownerChoices(state).map((owner, index) => {
          const focused = index === picker.cursor;
          return (
            <Text key={owner} color={focused ? COLORS.amber : COLORS.steel}>
              {focused ? '>' : ' '} {owner}
              <Text color={COLORS.muted}> {ownerKindLabel(owner)}</Text>
            </Text>
          );
        })}
      </Box>
    );
  };

  const renderSettings = () => {
    const form = state.settings;
    if (!form) {
      return null;
    }
    return (
      <Box marginTop={1} borderStyle="double" borderColor={COLORS.amber} paddingX={2} flexDirection="column">
        <Text bold underline color={COLORS.amber}>Settings</Text>
        {form.loading ? (
          <Text color={COLORS.cyan}>[{spinner}] Loading settings...</Text>
        ) : (
          SETTINGS_FIELDS.map((field, index) => {
            const focused = index === form.cursor;
            const value = form.values[field.key];
            return (
              <Box key={field.key} flexDirection="column" marginTop={1}>
                <Text bold color={focused ? COLORS.amber : COLORS.cyan}>{field.label}</Text>
                <Text color={value ? COLORS.steel : COLORS.muted}>
                  {focused ? '> ' : '  '}
                  {value || field.placeholder}
                  {focused ? '_' : ''}
                </Text>
                <Text color={COLORS.muted}>  {field.help}</Text>
              </Box>
            );
          })
        )}
        {form.saving && <Text color={COLORS.cyan}>[{spinner}] Saving...</Text>}
        {form.error && <Text color={COLORS.danger}>{form.error}</Text>}
        {form.filePath && <Text color={COLORS.muted}>Config file: {form.filePath}</Text>}
      </Box>
    );
  };

  const renderHelp = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.cyan} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.cyan}>Keys</Text>
      <Text color={COLORS.steel}>1-4 switch mode  tab / shift+tab cycle modes  q quit  ? help</Text>
      <Text color={COLORS.steel}>up/down move  space toggle  a all  n none  / search  s sort  r reload</Text>
      <Text color={COLORS.steel}>enter start sync  o choose owner  c settings</Text>
      <Text color={COLORS.steel}>template: ctrl+t github/local  enter continue  esc back</Text>
      <Text color={COLORS.steel}>tree: left/right collapse/expand  e expand all  c collapse all</Text>
      <Text color={COLORS.muted}>Press any key to close.</Text>
    </Box>
  );

  const renderWizardSteps = () => (
    <Box marginTop={1}>
      {TEMPLATE_STEPS.map((step, index) => {
        const active = step === state.template.step;
        return (
          <Text key={step} color={active ? COLORS.amber : COLORS.muted} bold={active}>
            {index > 0 ? '  >  ' : ''}
            {TEMPLATE_STEP_LABELS[step]}
          </Text>
        );
      })}
    </Box>
  );

  const renderSelectTemplate = () => {
    const selector = state.templateUi.selector;
    const options = selectorOptions(state);
    const [start, end] = windowAround(options.length, Math.max(selector.cursor, 0), 10);
    const inputFocused = selector.cursor === -1;

    return (
      <Box marginTop={1} borderStyle="round" borderColor={COLORS.steel} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.cyan}>
          Template source :: {selector.sourceKind === 'github' ? 'GitHub (owner/repo)' : 'local directory'}
        </Text>
        <Text color={inputFocused ? COLORS.amber : COLORS.steel}>
          {inputFocused ? '>' : ' '} {selector.input}
          {inputFocused && activePulse ? '_' : ''}
        </Text>
        {selector.loading && (
          <Text color={COLORS.cyan}>
            [{spinner}] Loading template tree... (esc to cancel)
          </Text>
        )}
        {selector.error && <Text color={COLORS.danger}>{selector.error}</Text>}
        {options.length > 0 && <Text color={COLORS.muted}>recent and local repositories:</Text>}
        {options.slice(start, end).map((option, offset) => {
          const focused = start + offset === selector.cursor;
          return (
            <Text key={option} color={focused ? COLORS.amber : COLORS.steel}>
              {focused ? '>' : ' '} {option}
            </Text>
          );
        })}
      </Box>
    );
  };

  const renderBrowseTree = () => {
    const tree = state.template.tree;
    if (!tree) {
      return null;
    }
    const rows = flattenVisible(tree);
    const cursor = Math.min(state.templateUi.treeCursor, Math.max(rows.length - 1, 0));
    const [start, end] = windowAround(rows.length, cursor, 18);

    return (
      <Box marginTop={1} borderStyle="round" borderColor={COLORS.steel} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.cyan}>
          {tree.name} ({countSelectedFiles(tree)}/{countFiles(tree)} files selected)
        </Text>
        {rows.slice(start, end).map(({ node, depth }, offset) => {
          const focused = start + offset === cursor;
          const selection = selectionState(node);
          const marker = selection === 'all' ? '[x]' : selection === 'some' ? '[-]' : '[ ]';
          const icon = node.isDir ? (node.expanded ? 'v ' : '> ') : '  ';

          return (
            <Text key={node.path} color={focused ? COLORS.amber : COLORS.steel}>
              {focused ? '>' : ' '} {'  '.repeat(Math.max(depth - 1, 0))}
              {marker} {icon}
              {node.name}
              {node.isDir ? '/' : ''}
            </Text>
          );
        })}
      </Box>
    );
  };

  const renderSelectTargets = () => {
    const targets = visibleTargets(state);
    const cursor = Math.min(state.templateUi.targetCursor, Math.max(targets.length - 1, 0));
    const [start, end] = windowAround(targets.length, cursor);
    const { filtering, targetFilter } = state.templateUi;

    return (
      <Box marginTop={1} borderStyle="round" borderColor={COLORS.steel} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.cyan}>
          Target repositories ({state.template.selectedTargets.length}/{candidateTargets(state).length} selected)
        </Text>
        <Text color={COLORS.muted}>{state.template.selectedFiles.length} files will be copied into each target</Text>
        {(filtering || targetFilter) && (
          <Text color={filtering ? COLORS.amber : COLORS.steel}>
            filter: {targetFilter}
            {filtering ? '_' : ''}
          </Text>
        )}
        {targets.length === 0 && <Text color={COLORS.muted}>No local repositories found in the source directories.</Text>}
        {targets.slice(start, end).map((target, offset) => {
          const focused = start + offset === cursor;
          const marker = state.template.selectedTargets.includes(target) ? '[x]' : '[ ]';
          return (
            <Text key={target} color={focused ? COLORS.amber : COLORS.steel}>
              {focused ? '>' : ' '} {marker} {target}
            </Text>
          );
        })}
      </Box>
    );
  };

  const renderSyncing = () => {
    const { progress, pendingConflict } = state.template;
    return (
      <Box marginTop={1} flexDirection="column">
        <Box borderStyle="round" borderColor={COLORS.cyan} paddingX={1} flexDirection="column">
          <Text bold color={COLORS.cyan}>
            [{spinner}] Syncing template files {progress.current}/{progress.total}
          </Text>
          <Text color={COLORS.steel}>{progressBar(progress.current, progress.total)}</Text>
          <Text color={COLORS.amber}>file: {progress.currentFile || '(starting...)'}</Text>
          <Text color={COLORS.muted}>target: {progress.currentTarget}</Text>
        </Box>
        {pendingConflict && (
          <Box marginTop={1} borderStyle="round" borderColor={COLORS.amber} paddingX={1} flexDirection="column">
            <Text bold color={COLORS.amber}>File already exists</Text>
            <Text color={COLORS.cyan}>file: {pendingConflict.filePath}</Text>
            <Text color={COLORS.steel}>target: {pendingConflict.targetRepo}</Text>
            <Text color={COLORS.muted}>o overwrite  s skip  O overwrite all  S skip all</Text>
          </Box>
        )}
      </Box>
    );
  };

  const renderTemplateComplete = () => {
    const { summary } = state.template;
    return (
      <Box marginTop={1} borderStyle="round" borderColor={summary.errors > 0 ? COLORS.danger : COLORS.success} paddingX={1} flexDirection="column">
        <Text bold color={COLORS.success}>Template Sync Complete</Text>
        <Text color={COLORS.success}>synced: {summary.synced}</Text>
        <Text color={COLORS.muted}>skipped: {summary.skipped}</Text>
        <Text color={summary.errors > 0 ? COLORS.danger : COLORS.steel}>errors: {summary.errors}</Text>
        <Text color={COLORS.muted}>Press any key to start over.</Text>
      </Box>
    );
  };

  const renderTemplate = () => (
    <>
      {renderWizardSteps()}
      {state.template.step === 'selectTemplate' && renderSelectTemplate()}
      {state.template.step === 'browseTree' && renderBrowseTree()}
      {state.template.step === 'selectTargets' && renderSelectTargets()}
      {state.template.step === 'syncing' && renderSyncing()}
      {state.template.step === 'complete' && renderTemplateComplete()}
    </>
  );

  const renderFooter = () => {
    let hint = '? help  q quit';

    if (state.queue?.status === 'awaitingDecision') {
      hint = 's skip  r refresh  S skip all  R refresh all  esc skip';
    } else if (state.template.pendingConflict) {
      hint = 'o overwrite  s skip  O overwrite all  S skip all  esc skip';
    } else if (state.ownerPicker) {
      hint = 'up/down move  enter select  esc cancel';
    } else if (state.settings) {
      hint = 'up/down field  type to edit  enter save  esc cancel';
    } else if (isTextInputActive(state)) {
      hint = 'type to edit  enter confirm  esc clear  tab next mode  ctrl+c quit';
    } else if (state.mode !== 'template') {
      hint = 'space toggle  a all  n none  enter sync  / search  s sort  o owner  c settings  ? help  q quit';
    } else if (state.template.step === 'browseTree') {
      hint = 'space toggle  left/right fold  a all  n none  enter continue  esc back';
    } else if (state.template.step === 'selectTargets') {
      hint = 'space toggle  a all  n none  / filter  enter start  esc back';
    }

    return (
      <Box marginTop={1} borderStyle="single" borderColor={COLORS.steel} paddingX={1}>
        <Text color={COLORS.muted}>keys :: {hint}</Text>
      </Box>
    );
  };

  return (
    <Box flexDirection="column" width={frameWidth} paddingX={1}>
      {renderHeader()}
      {renderTabs()}
      {renderContextBar()}
      {renderNotice()}
      {state.showHelp && renderHelp()}
      {renderOwnerPicker()}
      {renderSettings()}
      {state.mode === 'template' ? renderTemplate() : renderRepositoryList()}
      {state.mode !== 'template' && state.queue && renderQueue(state.queue)}
      {renderFooter()}
    </Box>
  );
};

