import type { LogLevel } from '@/reposync/lib/logger';

export type Mode = 'personal' | 'organization' | 'local' | 'template';

export const MODES: readonly Mode[] = ['personal', 'organization', 'local', 'template'];

export const MODE_LABELS: Record<Mode, string> = {
  personal: 'Personal',
  organization: 'Orgs',
  local: 'Local',
  template: 'Template',
};

export type RepoSummary = {
  id: string;
  title: string;
  description?: string;
  archived: boolean;
  metadata: Record<string, string>;
};

export type RepositoryScope =
  | { kind: 'personal'; owner: string }
  | { kind: 'organization'; name: string }
  | { kind: 'local'; paths: string[] };

export type SyncOrigin = 'github' | 'local';

export type SyncResult = {
  repo: string;
  success: boolean;
  skipped?: boolean;
  error?: string;
};

export type ConflictAction = 'skip' | 'refresh' | 'skipAll' | 'refreshAll';

export type FileConflictAction = 'overwrite' | 'skip' | 'overwriteAll' | 'skipAll';

export type TreeNode = {
  path: string;
  name: string;
  isDir: boolean;
  children: TreeNode[];
  expanded: boolean;
  selected: boolean;
  size?: number;
};

export type TemplateSource =
  | { kind: 'github'; owner: string; repo: string; branch?: string }
  | { kind: 'local'; path: string };

export type TemplateSyncProgress = {
  current: number;
  total: number;
  currentFile: string;
  currentTarget: string;
};

export type TemplateSyncSummary = {
  synced: number;
  skipped: number;
  errors: number;
};

export type TemplateFileResult = {
  filePath: string;
  targetRepo: string;
  success: boolean;
  skipped: boolean;
  error?: string;
};

export type RepositorySourceAdapter = {
  listRepositories: (scope: RepositoryScope) => Promise<RepoSummary[]>;
  exists: (path: string) => Promise<boolean>;
  cloneOrCopy: (identifier: string, targetDir: string) => Promise<void>;
  refresh: (path: string) => Promise<void>;
};

export type GitHubAccountAdapter = {
  currentUser: () => Promise<string>;
  listOrganizations: () => Promise<string[]>;
};

export type TemplateSourceAdapter = {
  resolveDefaultBranch: (owner: string, repo: string) => Promise<string>;
  fetchTree: (owner: string, repo: string, branch: string) => Promise<TreeNode>;
  walkLocalDirectory: (path: string) => Promise<TreeNode>;
  readFile: (source: TemplateSource, path: string) => Promise<Uint8Array>;
};

export type SessionContext = {
  mode: Mode;
  logLevel?: LogLevel;
  owner?: string;
  targetDir?: string;
  sourceDirs: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
};
