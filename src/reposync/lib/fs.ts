import { stat } from 'node:fs/promises';
import path from 'node:path';

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
};

/** Joins a relative path onto `root`, refusing paths that climb out of it. */
export const resolveWithin = (root: string, relativePath: string): string => {
  const base = path.resolve(root);
  const resolved = path.resolve(base, relativePath);
  if (resolved !== base && !resolved.startsWith(`${base}${path.sep}`)) {
    throw new Error(`path escapes ${base}: ${relativePath}`);
  }
  return resolved;
};
