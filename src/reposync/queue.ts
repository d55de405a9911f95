import path from 'node:path';

import type { AppEvent, Command, Transition } from '@/reposync/messages';
import type { SyncQueueState } from '@/reposync/state';
import type { ConflictAction, SyncOrigin, SyncResult } from '@/reposync/types';

type QueueTarget =
  | { ok: true; repoName: string; destination: string }
  | { ok: false; repoName: string; error: string };

export type QueueSummary = {
  succeeded: number;
  skipped: number;
  failed: number;
};

export const resolveQueueTarget = (
  identifier: string,
  origin: SyncOrigin,
  targetDir: string,
): QueueTarget => {
  if (origin === 'github') {
    const parts = identifier.split('/');
    const [owner, repo] = parts;
    if (parts.length !== 2 || !owner || !repo) {
      return {
        ok: false,
        repoName: identifier,
        error: `invalid repository format (expected owner/repo, got "${identifier}")`,
      };
    }
    return { ok: true, repoName: repo, destination: path.join(targetDir, repo) };
  }

  const repoName = path.basename(identifier.replace(/[\\/]+$/, ''));
  if (!repoName) {
    return { ok: false, repoName: identifier, error: `invalid repository path "${identifier}"` };
  }
  return { ok: true, repoName, destination: path.join(targetDir, repoName) };
};

const skippedResult = (repo: string): SyncResult => ({ repo, success: true, skipped: true });

const recordAndAdvance = (queue: SyncQueueState, result: SyncResult): SyncQueueState => ({
  ...queue,
  results: [...queue.results, result],
  cursor: queue.cursor + 1,
  status: 'running',
  inFlight: undefined,
  pendingConflict: undefined,
});

const refreshCommand = (
  queue: SyncQueueState,
  index: number,
  repoName: string,
  destination: string,
): Command => ({
  kind: 'refreshRepository',
  runId: queue.runId,
  index,
  origin: queue.origin,
  repoName,
  destination,
});

/**
 * Issues the single operation for the item under the cursor. Items whose
 * identifier cannot be turned into a destination fail in place and the
 * cursor moves on, so the only exits are one probe or the completion.
 */
export const processCurrentItem = (queue: SyncQueueState): Transition<SyncQueueState> => {
  let current = queue;

  for (;;) {
    const identifier = current.selected[current.cursor];
    if (identifier === undefined) {
      return [
        { ...current, status: 'finishing', inFlight: undefined },
        [{ kind: 'completeSync', runId: current.runId, results: current.results }],
      ];
    }

    const target = resolveQueueTarget(identifier, current.origin, current.targetDir);
    if (!target.ok) {
      current = recordAndAdvance(current, {
        repo: target.repoName,
        success: false,
        error: target.error,
      });
      continue;
    }

    const index = current.cursor;
    return [
      {
        ...current,
        status: 'running',
        inFlight: {
          index,
          repoName: target.repoName,
          destination: target.destination,
          phase: 'probe',
        },
      },
      [
        {
          kind: 'probeDestination',
          runId: current.runId,
          index,
          origin: current.origin,
          destination: target.destination,
        },
      ],
    ];
  }
};

export const startQueue = (args: {
  runId: number;
  selected: string[];
  targetDir: string;
  origin: SyncOrigin;
  now?: number;
}): Transition<SyncQueueState> =>
  processCurrentItem({
    runId: args.runId,
    selected: [...args.selected],
    targetDir: args.targetDir,
    origin: args.origin,
    cursor: 0,
    results: [],
    skipAll: false,
    refreshAll: false,
    status: 'running',
    startedAt: args.now ?? Date.now(),
  });

export const handleDestinationProbed = (
  queue: SyncQueueState,
  event: Extract<AppEvent, { type: 'destinationProbed' }>,
): Transition<SyncQueueState> => {
  const inFlight = queue.inFlight;
  if (
    queue.runId !== event.runId ||
    !inFlight ||
    inFlight.index !== event.index ||
    inFlight.phase !== 'probe'
  ) {
    return [queue, []];
  }

  const { index, repoName, destination } = inFlight;

  if (!event.exists) {
    const identifier = queue.selected[index] ?? repoName;
    return [
      { ...queue, inFlight: { ...inFlight, phase: 'clone' } },
      [
        {
          kind: 'cloneOrCopy',
          runId: queue.runId,
          index,
          origin: queue.origin,
          identifier,
          repoName,
          targetDir: queue.targetDir,
        },
      ],
    ];
  }

  if (queue.skipAll) {
    return processCurrentItem(recordAndAdvance(queue, skippedResult(repoName)));
  }

  if (queue.refreshAll) {
    return [
      { ...queue, inFlight: { ...inFlight, phase: 'refresh' } },
      [refreshCommand(queue, index, repoName, destination)],
    ];
  }

  return [
    {
      ...queue,
      status: 'awaitingDecision',
      inFlight: undefined,
      pendingConflict: { repoName, destination, index },
    },
    [],
  ];
};

export const handleItemFinished = (
  queue: SyncQueueState,
  event: Extract<AppEvent, { type: 'itemFinished' }>,
): Transition<SyncQueueState> => {
  const inFlight = queue.inFlight;
  if (queue.runId !== event.runId || !inFlight || inFlight.index !== event.index) {
    return [queue, []];
  }

  return processCurrentItem(recordAndAdvance(queue, event.result));
};

export const handleConflictDecision = (
  queue: SyncQueueState,
  action: ConflictAction,
): Transition<SyncQueueState> => {
  const conflict = queue.pendingConflict;
  if (queue.status !== 'awaitingDecision' || !conflict) {
    return [queue, []];
  }

  const decided: SyncQueueState = {
    ...queue,
    skipAll: queue.skipAll || action === 'skipAll',
    refreshAll: queue.refreshAll || action === 'refreshAll',
  };

  if (action === 'skip' || action === 'skipAll') {
    return processCurrentItem(recordAndAdvance(decided, skippedResult(conflict.repoName)));
  }

  return [
    {
      ...decided,
      status: 'running',
      pendingConflict: undefined,
      inFlight: {
        index: conflict.index,
        repoName: conflict.repoName,
        destination: conflict.destination,
        phase: 'refresh',
      },
    },
    [refreshCommand(decided, conflict.index, conflict.repoName, conflict.destination)],
  ];
};

export const handleSyncCompleted = (
  queue: SyncQueueState,
  event: Extract<AppEvent, { type: 'syncCompleted' }>,
  now = Date.now(),
): SyncQueueState => {
  if (queue.runId !== event.runId || queue.status !== 'finishing') {
    return queue;
  }
  return { ...queue, status: 'complete', results: event.results, finishedAt: now };
};

export const summarizeResults = (results: SyncResult[]): QueueSummary => ({
  succeeded: results.filter((result) => result.success && !result.skipped).length,
  skipped: results.filter((result) => result.success && result.skipped).length,
  failed: results.filter((result) => !result.success).length,
});

export const currentQueueRepo = (queue: SyncQueueState): string | undefined =>
  queue.inFlight?.repoName ?? queue.pendingConflict?.repoName;

export const formatDuration = (milliseconds: number): string => {
  if (milliseconds < 1000) {
    return `${Math.round(milliseconds)}ms`;
  }
  if (milliseconds < 60_000) {
    return `${(milliseconds / 1000).toFixed(1)}s`;
  }
  const totalSeconds = Math.floor(milliseconds / 1000);
  if (totalSeconds < 3600) {
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
  }
  return `${Math.floor(totalSeconds / 3600)}h ${Math.floor(totalSeconds / 60) % 60}m`;
};
