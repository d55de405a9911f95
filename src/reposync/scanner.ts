import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { currentBranch } from '@/reposync/git';
import { errorMessage } from '@/reposync/lib/errors';
import { createLogger, type Logger } from '@/reposync/lib/logger';
import { buildTreeFromEntries, type TreeEntry } from '@/reposync/tree';
import type { RepoSummary, TreeNode } from '@/reposync/types';

const defaultLogger = createLogger('[scanner] ');

export const formatSize = (bytes: number): string => {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }

  let divisor = unit;
  let exponent = 0;
  for (let remaining = Math.floor(bytes / unit); remaining >= unit; remaining = Math.floor(remaining / unit)) {
    divisor *= unit;
    exponent += 1;
  }

  return `${(bytes / divisor).toFixed(1)} ${'KMGTPE'.charAt(exponent)}B`;
};

const readDirectory = async (directory: string, logger: Logger): Promise<Dirent[]> => {
  try {
    return await readdir(directory, { withFileTypes: true });
  } catch (error) {
    logger.debug(`skipping unreadable directory ${directory}: ${errorMessage(error)}`);
    return [];
  }
};

/** Total size of the regular files below `directory`; unreadable entries count as zero. */
export const directorySize = async (directory: string): Promise<number> => {
  let total = 0;
  const pending = [directory];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    for (const entry of await readDirectory(current, defaultLogger)) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile()) {
        const stats = await stat(entryPath).catch(() => null);
        total += stats?.size ?? 0;
      }
    }
  }

  return total;
};

const describeRepository = async (repoPath: string, logger: Logger): Promise<RepoSummary> => {
  const metadata: Record<string, string> = {};

  try {
    metadata['branch'] = await currentBranch(repoPath);
  } catch (error) {
    logger.debug(`no branch for ${repoPath}: ${errorMessage(error)}`);
  }
  metadata['size'] = formatSize(await directorySize(repoPath));

  return {
    id: repoPath,
    title: path.basename(repoPath),
    description: repoPath,
    archived: false,
    metadata,
  };
};

/**
 * Finds git repositories under `root`. Hidden directories are skipped and a
 * repository's own subdirectories are never searched for nested ones.
 */
export const findRepositories = async (root: string, logger: Logger = defaultLogger): Promise<string[]> => {
  const found: string[] = [];

  const visit = async (directory: string): Promise<void> => {
    const entries = await readDirectory(directory, logger);
    if (entries.some((entry) => entry.name === '.git')) {
      found.push(directory);
      return;
    }

    for (const entry of entries) {
      if (entry.isDirectory() && !entry.name.startsWith('.')) {
        await visit(path.join(directory, entry.name));
      }
    }
  };

  await visit(path.resolve(root));
  return found.sort();
};

export const scanLocalRepositories = async (
  roots: string[],
  logger: Logger = defaultLogger,
): Promise<RepoSummary[]> => {
  const seen = new Set<string>();
  const summaries: RepoSummary[] = [];

  for (const root of roots) {
    for (const repoPath of await findRepositories(root, logger)) {
      if (seen.has(repoPath)) {
        continue;
      }
      seen.add(repoPath);
      summaries.push(await describeRepository(repoPath, logger));
    }
  }

  return summaries;
};

/** File tree of a local template directory, without its `.git` metadata. */
export const walkLocalDirectory = async (root: string): Promise<TreeNode> => {
  const resolved = path.resolve(root);
  const rootStats = await stat(resolved).catch(() => null);
  if (!rootStats?.isDirectory()) {
    throw new Error(`Template directory not found: ${resolved}`);
  }

  const entries: TreeEntry[] = [];

  const visit = async (directory: string, relative: string): Promise<void> => {
    const children = await readdir(directory, { withFileTypes: true });
    for (const child of children) {
      if (child.name === '.git') {
        continue;
      }
      const childRelative = relative ? `${relative}/${child.name}` : child.name;
      const childPath = path.join(directory, child.name);

      if (child.isDirectory()) {
        entries.push({ path: childRelative, type: 'tree' });
        await visit(childPath, childRelative);
        continue;
      }

      // Symlinks count when they resolve to a regular file.
      const stats = await stat(childPath).catch(() => null);
      if (stats?.isFile()) {
        entries.push({ path: childRelative, type: 'blob', size: stats.size });
      }
    }
  };

  await visit(resolved, '');
  return buildTreeFromEntries(entries, path.basename(resolved));
};
