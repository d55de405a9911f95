import { describe, expect, it } from 'vitest';

import {
  BUSY_MESSAGE,
  cycleMode,
  handleRepositoriesFailed,
  handleRepositoriesLoaded,
  NO_ORGANIZATIONS_MESSAGE,
  selectOwner,
  startSession,
  switchMode,
} from '@/reposync/mode';
import { startQueue } from '@/reposync/queue';

import { makeState, repo } from './fixtures';

describe('switchMode', () => {
  it('rejects Organization mode when there are no organizations', () => {
    const state = makeState();
    const [next, commands] = switchMode(state, 'organization');

    expect(next.mode).toBe('personal');
    expect(next.notice).toEqual({ level: 'error', text: NO_ORGANIZATIONS_MESSAGE });
    expect(next.repositories.loading).toBe(false);
    expect(commands).toEqual([]);
  });

  it('loads the first organization when entering Organization mode', () => {
    const [next, commands] = switchMode({ ...makeState(), organizations: ['acme', 'tools'] }, 'organization');

    expect(next.mode).toBe('organization');
    expect(next.owner).toBe('acme');
    expect(next.repositories.loading).toBe(true);
    expect(next.repositoriesRequestId).toBe(1);
    expect(commands).toEqual([
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'organization', name: 'acme' } },
    ]);
  });

  it('scans the source directories in Local mode', () => {
    const [next, commands] = switchMode(makeState(), 'local');

    expect(next.mode).toBe('local');
    expect(commands).toEqual([
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'local', paths: ['/work/src'] } },
    ]);
  });

  it('resets the wizard and loads candidate targets in Template mode', () => {
    const [next, commands] = switchMode(makeState(), 'template');

    expect(next.mode).toBe('template');
    expect(next.template.step).toBe('selectTemplate');
    expect(next.templateTargetsRequestId).toBe(1);
    expect(commands).toEqual([{ kind: 'loadTemplateTargets', requestId: 1, paths: ['/work/src'] }]);
  });

  it('refuses to leave while a sync is running', () => {
    const [queue] = startQueue({ runId: 9, selected: ['octo/api'], targetDir: '/work/repos', origin: 'github' });
    const state = { ...makeState(), queue };
    const [next, commands] = switchMode(state, 'local');

    expect(next.mode).toBe('personal');
    expect(next.queue).toBe(queue);
    expect(next.notice).toEqual({ level: 'error', text: BUSY_MESSAGE });
    expect(commands).toEqual([]);
  });

  it('wraps around when cycling backwards', () => {
    const [next] = cycleMode(makeState(), -1);
    expect(next.mode).toBe('template');
  });

  it('returns to the signed-in user in Personal mode', () => {
    const state = { ...makeState({ mode: 'organization' }), owner: 'acme' };
    const [next, commands] = switchMode(state, 'personal');

    expect(next.owner).toBe('octo');
    expect(commands).toEqual([
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'personal', owner: 'octo' } },
    ]);
  });
});

describe('repository loading', () => {
  it('ignores a response to a superseded request', () => {
    const [first] = switchMode(makeState(), 'local');
    const [second] = switchMode(first, 'personal');

    const stale = handleRepositoriesLoaded(second, {
      type: 'repositoriesLoaded',
      requestId: 1,
      items: [repo('/work/src/old')],
    });
    expect(stale).toBe(second);

    const fresh = handleRepositoriesLoaded(second, {
      type: 'repositoriesLoaded',
      requestId: 2,
      items: [repo('octo/api')],
    });
    expect(fresh.repositories.loading).toBe(false);
    expect(fresh.repositories.items.map((item) => item.id)).toEqual(['octo/api']);
  });

  it('keeps the failure message on the list', () => {
    const [loading] = switchMode(makeState(), 'personal');
    const failed = handleRepositoriesFailed(loading, {
      type: 'repositoriesFailed',
      requestId: 1,
      message: 'Access denied: list repositories',
    });

    expect(failed.repositories.loading).toBe(false);
    expect(failed.repositories.error).toBe('Access denied: list repositories');
  });
});

describe('owners and sessions', () => {
  it('switches to the chosen organization and records it', () => {
    const [next, commands] = selectOwner({ ...makeState(), ownerPicker: { cursor: 1 } }, 'acme', true);

    expect(next.mode).toBe('organization');
    expect(next.owner).toBe('acme');
    expect(next.ownerPicker).toBeUndefined();
    expect(commands).toEqual([
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'organization', name: 'acme' } },
      { kind: 'recordRecentOwner', owner: 'acme' },
    ]);
  });

  it('loads organizations and the first list when a session starts', () => {
    const [, commands] = startSession(makeState());

    expect(commands).toEqual([
      { kind: 'loadOrganizations' },
      { kind: 'loadRepositories', requestId: 1, scope: { kind: 'personal', owner: 'octo' } },
    ]);
  });

  it('loads template targets when a session starts in Template mode', () => {
    const [, commands] = startSession(makeState({ mode: 'template' }));

    expect(commands).toEqual([
      { kind: 'loadOrganizations' },
      { kind: 'loadTemplateTargets', requestId: 1, paths: ['/work/src'] },
    ]);
  });
});
