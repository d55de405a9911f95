import { isLogLevel } from '@/reposync/lib/logger';
import type { Mode, SessionContext } from '@/reposync/types';

export type SessionCliOptionsInput = {
  owner?: string;
  targetDir?: string;
  sourceDir?: string[];
  logLevel?: string;
};

export type SessionCliOptions = Omit<SessionContext, 'mode' | 'cwd' | 'env'>;

const trimmed = (value: string | undefined): string | undefined => value?.trim() || undefined;

export const normalizeSessionCliOptions = (options: SessionCliOptionsInput): SessionCliOptions => {
  const logLevel = trimmed(options.logLevel)?.toLowerCase();
  const owner = trimmed(options.owner);
  const targetDir = trimmed(options.targetDir);

  return {
    ...(owner ? { owner } : {}),
    ...(targetDir ? { targetDir } : {}),
    sourceDirs: [...new Set((options.sourceDir ?? []).map((dir) => dir.trim()).filter(Boolean))],
    ...(isLogLevel(logLevel) ? { logLevel } : {}),
  };
};

export const toSessionContext = (
  mode: Mode,
  options: SessionCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
): SessionContext => ({
  ...options,
  mode,
  cwd,
  env,
});
