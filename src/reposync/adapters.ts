import { readFile } from 'node:fs/promises';

import { cloneRepository, isGitRepository, pullRepository } from '@/reposync/git';
import { sshCloneUrl, type GitHubClient } from '@/reposync/github';
import { GitCommandError } from '@/reposync/lib/errors';
import { pathExists, resolveWithin } from '@/reposync/lib/fs';
import { resolveQueueTarget } from '@/reposync/queue';
import { scanLocalRepositories, walkLocalDirectory } from '@/reposync/scanner';
import { buildTreeFromEntries } from '@/reposync/tree';
import type { RepositorySourceAdapter, TemplateSourceAdapter } from '@/reposync/types';

const destinationFor = (identifier: string, origin: 'github' | 'local', targetDir: string) => {
  const target = resolveQueueTarget(identifier, origin, targetDir);
  if (!target.ok) {
    throw new Error(target.error);
  }
  return target;
};

export const createGitHubRepositoryAdapter = (client: GitHubClient): RepositorySourceAdapter => ({
  listRepositories: async (scope) => {
    if (scope.kind === 'local') {
      throw new Error('The GitHub source cannot list local directories.');
    }
    return client.listRepositories(scope);
  },
  exists: pathExists,
  cloneOrCopy: async (identifier, targetDir) => {
    const { repoName, destination } = destinationFor(identifier, 'github', targetDir);
    const owner = identifier.slice(0, identifier.indexOf('/'));
    await cloneRepository(sshCloneUrl(owner, repoName), destination);
  },
  refresh: pullRepository,
});

export const createLocalRepositoryAdapter = (): RepositorySourceAdapter => ({
  listRepositories: async (scope) => {
    if (scope.kind !== 'local') {
      throw new Error('The local source only lists directories.');
    }
    return scanLocalRepositories(scope.paths);
  },
  exists: pathExists,
  cloneOrCopy: async (identifier, targetDir) => {
    if (!(await isGitRepository(identifier))) {
      throw new GitCommandError(`not a git repository: ${identifier}`);
    }
    const { destination } = destinationFor(identifier, 'local', targetDir);
    await cloneRepository(identifier, destination);
  },
  refresh: pullRepository,
});

export const createTemplateSourceAdapter = (client: GitHubClient): TemplateSourceAdapter => ({
  resolveDefaultBranch: (owner, repo) => client.defaultBranch(owner, repo),
  fetchTree: async (owner, repo, branch) =>
    buildTreeFromEntries(await client.fetchTreeEntries(owner, repo, branch), `${owner}/${repo}`),
  walkLocalDirectory,
  readFile: async (source, filePath) => {
    if (source.kind === 'local') {
      return readFile(resolveWithin(source.path, filePath));
    }
    const ref = source.branch ?? (await client.defaultBranch(source.owner, source.repo));
    return client.readFile(source.owner, source.repo, filePath, ref);
  },
});
