import { execFile } from 'node:child_process';
import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';

import { GitCommandError } from '@/reposync/lib/errors';

const execFileAsync = promisify(execFile);

const stringField = (error: object, field: 'stderr' | 'message'): string | undefined => {
  if (!(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  if (typeof value === 'string') {
    return value;
  }
  return value instanceof Buffer ? value.toString('utf8') : undefined;
};

export const summarizeGitError = (error: unknown): string => {
  if (!error || typeof error !== 'object') {
    return 'unknown git error';
  }

  const stderr = stringField(error, 'stderr')?.trim();
  if (stderr) {
    const lines = stderr.split(/\r?\n/).slice(0, 6);
    return lines.join('\n');
  }

  return stringField(error, 'message') || 'unknown git error';
};

const runGit = async (args: string[], action: string, cwd?: string): Promise<string> => {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd, maxBuffer: 10 * 1024 * 1024 });
    return stdout;
  } catch (error) {
    throw new GitCommandError(`git ${action} failed: ${summarizeGitError(error)}`);
  }
};

export const isGitRepository = async (repoPath: string): Promise<boolean> => {
  const gitStats = await stat(path.join(repoPath, '.git')).catch(() => null);
  return gitStats !== null;
};

export const cloneRepository = async (source: string, destination: string): Promise<void> => {
  await mkdir(path.dirname(destination), { recursive: true });
  await runGit(['clone', source, destination], 'clone');
};

export const pullRepository = async (repoPath: string): Promise<void> => {
  if (!(await isGitRepository(repoPath))) {
    throw new GitCommandError(`not a git repository: ${repoPath}`);
  }
  await runGit(['-C', repoPath, 'pull'], 'pull');
};

export const currentBranch = async (repoPath: string): Promise<string> => {
  const stdout = await runGit(['-C', repoPath, 'rev-parse', '--abbrev-ref', 'HEAD'], 'rev-parse');
  return stdout.trim();
};

/** Token from an authenticated GitHub CLI session, if there is one. */
export const readGhAuthToken = async (): Promise<string | undefined> => {
  try {
    const { stdout } = await execFileAsync('gh', ['auth', 'token']);
    return stdout.trim() || undefined;
  } catch {
    return undefined;
  }
};
