import { Octokit } from '@octokit/rest';
import { describe, expect, it } from 'vitest';

import { GitHubClient, resolveGitHubToken, sshCloneUrl, toRepoSummary } from '@/reposync/github';
import { GitHubApiError, mapOctokitError } from '@/reposync/lib/errors';
import { silentLogger } from '@/reposync/lib/logger';

type Route = { status?: number; body: unknown };

const repoPayload = (name: string, overrides: Record<string, unknown> = {}) => ({
  name,
  full_name: `acme/${name}`,
  description: null,
  private: false,
  archived: false,
  language: 'TypeScript',
  stargazers_count: 3,
  updated_at: '2026-01-02T03:04:05Z',
  ...overrides,
});

/** Octokit backed by an in-process fetch that answers from `routes` keyed by pathname. */
const createClient = (routes: Record<string, Route>) => {
  const requested: string[] = [];

  const fetch = async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    requested.push(`${url.pathname}${url.search}`);
    const route = routes[url.pathname] ?? { status: 404, body: { message: 'Not Found' } };

    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { 'content-type': 'application/json' },
    });
  };

  const octokit = new Octokit({ auth: 'test-secret', request: { fetch } });
  return { client: new GitHubClient(octokit, silentLogger), requested };
};

describe('toRepoSummary', () => {
  it('maps the repository payload onto a summary', () => {
    expect(toRepoSummary(repoPayload('api', { description: 'Public API', private: true }))).toEqual({
      id: 'acme/api',
      title: 'api',
      description: 'Public API',
      archived: false,
      metadata: {
        stars: '3',
        visibility: 'private',
        language: 'TypeScript',
        updated: '2026-01-02T03:04:05Z',
      },
    });
  });

  it('builds SSH clone URLs', () => {
    expect(sshCloneUrl('acme', 'api')).toBe('git@github.com:acme/api.git');
  });
});

describe('GitHubClient', () => {
  it('lists the signed-in user through the authenticated endpoint', async () => {
    const { client, requested } = createClient({
      '/user': { body: { login: 'octo' } },
      '/user/repos': { body: [repoPayload('api'), repoPayload('web', { archived: true })] },
    });

    const repos = await client.listRepositories({ kind: 'personal', owner: 'octo' });

    expect(repos.map((repo) => [repo.id, repo.archived])).toEqual([
      ['acme/api', false],
      ['acme/web', true],
    ]);
    expect(requested[0]).toBe('/user');
    expect(requested[1]?.startsWith('/user/repos?')).toBe(true);
    expect(requested[1]).toContain('affiliation=owner');
  });

  it('lists other users and organizations through their own endpoints', async () => {
    const { client, requested } = createClient({
      '/user': { body: { login: 'octo' } },
      '/users/hubot/repos': { body: [repoPayload('bot')] },
      '/orgs/acme/repos': { body: [repoPayload('infra')] },
    });

    expect((await client.listRepositories({ kind: 'personal', owner: 'hubot' }))[0]?.id).toBe('acme/bot');
    expect((await client.listRepositories({ kind: 'organization', name: 'acme' }))[0]?.id).toBe('acme/infra');
    expect(requested.map((entry) => entry.split('?')[0])).toEqual(['/user', '/users/hubot/repos', '/orgs/acme/repos']);
  });

  it('lists organization logins', async () => {
    const { client } = createClient({
      '/user/orgs': { body: [{ login: 'acme' }, { login: 'tools' }] },
    });

    expect(await client.listOrganizations()).toEqual(['acme', 'tools']);
  });

  it('maps missing repositories to NOT_FOUND', async () => {
    const { client } = createClient({});

    const failure = await client.defaultBranch('acme', 'missing').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(GitHubApiError);
    expect(failure).toMatchObject({
      code: 'NOT_FOUND',
      statusCode: 404,
      message: 'Not found: repository acme/missing',
    });
  });

  it('keeps only blob and tree entries from the recursive tree', async () => {
    const { client } = createClient({
      '/repos/acme/tpl/git/trees/main': {
        body: {
          sha: 'abc',
          truncated: false,
          tree: [
            { path: 'src', type: 'tree' },
            { path: 'src/index.ts', type: 'blob', size: 12 },
            { path: 'vendor/lib', type: 'commit' },
          ],
        },
      },
    });

    expect(await client.fetchTreeEntries('acme', 'tpl', 'main')).toEqual([
      { path: 'src', type: 'tree' },
      { path: 'src/index.ts', type: 'blob', size: 12 },
    ]);
  });

  it('decodes base64 file contents', async () => {
    const encoded = Buffer.from('MIT License\n').toString('base64');
    const { client } = createClient({
      '/repos/acme/tpl/contents/LICENSE': {
        body: { type: 'file', encoding: 'base64', content: `${encoded.slice(0, 8)}\n${encoded.slice(8)}` },
      },
    });

    const content = await client.readFile('acme', 'tpl', 'LICENSE', 'main');

    expect(new TextDecoder().decode(content)).toBe('MIT License\n');
  });

  it('rejects files too large to carry their content', async () => {
    const { client } = createClient({
      '/repos/acme/tpl/contents/video.bin': {
        body: { type: 'file', encoding: 'none', content: '', size: 2_000_000 },
      },
    });

    await expect(client.readFile('acme', 'tpl', 'video.bin', 'main')).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      message: 'acme/tpl/video.bin is too large for the contents API',
    });
  });

  it('rejects directory listings where a file was expected', async () => {
    const { client } = createClient({
      '/repos/acme/tpl/contents/docs': { body: [{ name: 'intro.md', type: 'file' }] },
    });

    await expect(client.readFile('acme', 'tpl', 'docs', 'main')).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
    });
  });
});

describe('mapOctokitError', () => {
  const withStatus = (status: number) => Object.assign(new Error('request failed'), { status });

  it('maps HTTP statuses onto error codes', () => {
    expect(mapOctokitError(withStatus(401), 'user').code).toBe('PERMISSION_DENIED');
    expect(mapOctokitError(withStatus(403), 'user').message).toBe('Permission denied: user');
    expect(mapOctokitError(withStatus(422), 'user').code).toBe('CONFLICT');
    expect(mapOctokitError(withStatus(502), 'user').message).toBe('Server error (502): user');
  });

  it('treats errors without a status as network failures', () => {
    const mapped = mapOctokitError(new Error('socket hang up'), 'user');
    expect(mapped.code).toBe('NETWORK_ERROR');
    expect(mapped.message).toBe('Network error: socket hang up');
  });
});

describe('resolveGitHubToken', () => {
  it('prefers GITHUB_TOKEN over the gh fallback', async () => {
    expect(await resolveGitHubToken({ GITHUB_TOKEN: ' test-secret ' }, async () => 'other')).toBe('test-secret');
    expect(await resolveGitHubToken({}, async () => 'from-gh')).toBe('from-gh');
  });

  it('fails when no token can be found', async () => {
    await expect(resolveGitHubToken({}, async () => undefined)).rejects.toThrow(
      'No GitHub token found. Set GITHUB_TOKEN (or GH_TOKEN), or sign in with `gh auth login`.',
    );
  });
});
