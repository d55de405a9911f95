import { Octokit } from '@octokit/rest';

import { readGhAuthToken } from '@/reposync/git';
import { GitHubApiError, mapOctokitError } from '@/reposync/lib/errors';
import { createLogger, type Logger } from '@/reposync/lib/logger';
import type { TreeEntry } from '@/reposync/tree';
import type { GitHubAccountAdapter, RepoSummary } from '@/reposync/types';

const PAGE_SIZE = 100;

type RepositoryPayload = {
  name: string;
  full_name: string;
  description: string | null;
  private: boolean;
  archived?: boolean;
  language?: string | null;
  stargazers_count?: number;
  updated_at?: string | null;
};

export type GitHubRepositoryScope =
  | { kind: 'personal'; owner: string }
  | { kind: 'organization'; name: string };

export const toRepoSummary = (repo: RepositoryPayload): RepoSummary => {
  const metadata: Record<string, string> = {
    stars: String(repo.stargazers_count ?? 0),
    visibility: repo.private ? 'private' : 'public',
  };
  if (repo.language) {
    metadata['language'] = repo.language;
  }
  if (repo.updated_at) {
    metadata['updated'] = repo.updated_at;
  }

  return {
    id: repo.full_name,
    title: repo.name,
    ...(repo.description ? { description: repo.description } : {}),
    archived: repo.archived ?? false,
    metadata,
  };
};

export const sshCloneUrl = (owner: string, repo: string): string =>
  `git@github.com:${owner}/${repo}.git`;

/**
 * Thin wrapper over the GitHub REST API. Every failure leaves as a
 * `GitHubApiError`; the Octokit instance is injected so tests can fake it.
 */
export class GitHubClient implements GitHubAccountAdapter {
  private login?: string;

  constructor(
    private readonly octokit: Octokit,
    private readonly logger: Logger = createLogger('[github] '),
  ) {}

  async currentUser(): Promise<string> {
    if (this.login) {
      return this.login;
    }
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      this.login = data.login;
      return data.login;
    } catch (error) {
      throw mapOctokitError(error, 'authenticated user');
    }
  }

  async listOrganizations(): Promise<string[]> {
    try {
      const orgs = await this.octokit.paginate(this.octokit.rest.orgs.listForAuthenticatedUser, {
        per_page: PAGE_SIZE,
      });
      return orgs.map((org) => org.login);
    } catch (error) {
      throw mapOctokitError(error, 'organizations of the authenticated user');
    }
  }

  async listRepositories(scope: GitHubRepositoryScope): Promise<RepoSummary[]> {
    const context = scope.kind === 'organization' ? `org ${scope.name}` : `user ${scope.owner}`;
    this.logger.debug(`listing repositories for ${context}`);

    try {
      const repositories = await this.fetchRepositories(scope);
      return repositories.map(toRepoSummary);
    } catch (error) {
      throw mapOctokitError(error, `repositories of ${context}`);
    }
  }

  private async fetchRepositories(scope: GitHubRepositoryScope): Promise<RepositoryPayload[]> {
    if (scope.kind === 'organization') {
      return this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
        org: scope.name,
        sort: 'updated',
        direction: 'desc',
        per_page: PAGE_SIZE,
      });
    }

    const login = await this.currentUser();
    if (scope.owner === login) {
      return this.octokit.paginate(this.octokit.rest.repos.listForAuthenticatedUser, {
        affiliation: 'owner',
        sort: 'updated',
        direction: 'desc',
        per_page: PAGE_SIZE,
      });
    }

    return this.octokit.paginate(this.octokit.rest.repos.listForUser, {
      username: scope.owner,
      sort: 'updated',
      direction: 'desc',
      per_page: PAGE_SIZE,
    });
  }

  async defaultBranch(owner: string, repo: string): Promise<string> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo });
      return data.default_branch;
    } catch (error) {
      throw mapOctokitError(error, `repository ${owner}/${repo}`);
    }
  }

  async fetchTreeEntries(owner: string, repo: string, branch: string): Promise<TreeEntry[]> {
    let tree: Array<{ path?: string; type?: string; size?: number }>;
    let truncated: boolean;

    try {
      const { data } = await this.octokit.rest.git.getTree({
        owner,
        repo,
        tree_sha: branch,
        recursive: 'true',
      });
      tree = data.tree;
      truncated = data.truncated;
    } catch (error) {
      throw mapOctokitError(error, `tree of ${owner}/${repo}@${branch}`);
    }

    if (truncated) {
      this.logger.warn(`tree of ${owner}/${repo}@${branch} was truncated by GitHub`);
    }

    const entries: TreeEntry[] = [];
    for (const item of tree) {
      if (!item.path || (item.type !== 'blob' && item.type !== 'tree')) {
        continue;
      }
      entries.push({
        path: item.path,
        type: item.type,
        ...(item.size === undefined ? {} : { size: item.size }),
      });
    }
    return entries;
  }

  async readFile(owner: string, repo: string, filePath: string, ref: string): Promise<Uint8Array> {
    let data: unknown;
    try {
      ({ data } = await this.octokit.rest.repos.getContent({ owner, repo, path: filePath, ref }));
    } catch (error) {
      throw mapOctokitError(error, `${owner}/${repo}/${filePath}@${ref}`);
    }

    if (
      !data ||
      typeof data !== 'object' ||
      Array.isArray(data) ||
      !('content' in data) ||
      typeof data.content !== 'string'
    ) {
      throw new GitHubApiError(
        `Unexpected contents response for ${owner}/${repo}/${filePath}`,
        'INVALID_RESPONSE',
      );
    }

    const encoding = 'encoding' in data ? data.encoding : 'base64';
    // Files over 1 MB come back without content.
    if (encoding === 'none') {
      throw new GitHubApiError(
        `${owner}/${repo}/${filePath} is too large for the contents API`,
        'INVALID_RESPONSE',
      );
    }
    if (encoding !== 'base64') {
      return new TextEncoder().encode(data.content);
    }
    return new Uint8Array(Buffer.from(data.content.replace(/\n/g, ''), 'base64'));
  }
}

export const resolveGitHubToken = async (
  env: NodeJS.ProcessEnv,
  fallback: () => Promise<string | undefined> = readGhAuthToken,
): Promise<string> => {
  const fromEnv = env['GITHUB_TOKEN']?.trim() || env['GH_TOKEN']?.trim();
  const token = fromEnv || (await fallback());
  if (!token) {
    throw new Error(
      'No GitHub token found. Set GITHUB_TOKEN (or GH_TOKEN), or sign in with `gh auth login`.',
    );
  }
  return token;
};

export const createOctokit = (token: string): Octokit =>
  new Octokit({ auth: token, userAgent: 'repo-sync' });
