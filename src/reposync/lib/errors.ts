export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE';

/**
 * Typed error for GitHub REST calls. The code abstracts the HTTP status so the
 * workflow can report failures without knowing Octokit.
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    public readonly code: GitHubApiErrorCode,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/** Raised when a git subprocess exits non-zero; the message carries git's stderr. */
export class GitCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitCommandError';
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

const hasNumericStatus = (error: unknown): error is Error & { status: number } =>
  error instanceof Error && 'status' in error && typeof error.status === 'number';

export const mapOctokitError = (error: unknown, context: string): GitHubApiError => {
  if (error instanceof GitHubApiError) {
    return error;
  }

  if (hasNumericStatus(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409 || status === 422) {
      return new GitHubApiError(`Conflict: ${context}`, 'CONFLICT', status);
    }
    if (status >= 500) {
      return new GitHubApiError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status);
    }

    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  return new GitHubApiError(`Network error: ${errorMessage(error)}`, 'NETWORK_ERROR');
};

/** The persisted configuration file exists but cannot be used. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
