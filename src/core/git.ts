import { simpleGit } from 'simple-git';
import { DEFAULT_CLONE_DEPTH, DEFAULT_CLONE_TIMEOUT_MS } from '../constants.js';

export interface CloneOptions {
  /** Shallow clone depth (default: 1) */
  depth?: number;
  /** Abort the clone when git produces no output for this long */
  timeoutMs?: number;
  /** Kills the git process when aborted */
  signal?: AbortSignal;
}

export type CloneFn = (url: string, dest: string, options?: CloneOptions) => Promise<void>;

export class GitCloneError extends Error {
  readonly url: string;
  readonly isTimeout: boolean;
  readonly isAuthError: boolean;

  constructor(
    message: string,
    url: string,
    isTimeout = false,
    isAuthError = false,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GitCloneError';
    this.url = url;
    this.isTimeout = isTimeout;
    this.isAuthError = isAuthError;
  }
}

/**
 * Shallow-clone a repository into `dest` (an empty or nonexistent directory).
 * @throws GitCloneError on any clone failure
 */
export async function cloneTo(
  url: string,
  dest: string,
  options: CloneOptions = {},
): Promise<void> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CLONE_TIMEOUT_MS;
  const depth = options.depth ?? DEFAULT_CLONE_DEPTH;
  const git = simpleGit({
    timeout: { block: timeoutMs },
    ...(options.signal !== undefined && { abort: options.signal }),
  });

  try {
    await git.clone(url, dest, ['--depth', String(depth)]);
  } catch (error) {
    throw classifyCloneError(error, url, timeoutMs);
  }
}

export function classifyCloneError(error: unknown, url: string, timeoutMs: number): GitCloneError {
  const errorMessage =
    error instanceof Error ? error.message : String(error);

  const isTimeout =
    errorMessage.includes('block timeout') ||
    errorMessage.includes('timed out');

  const isAuthError =
    errorMessage.includes('Authentication failed') ||
    errorMessage.includes('could not read Username') ||
    errorMessage.includes('Permission denied') ||
    errorMessage.includes('Repository not found');

  if (isTimeout) {
    return new GitCloneError(
      `Clone timed out after ${Math.round(timeoutMs / 1000)}s for ${url}.\n  Check your network connection and repository access.`,
      url,
      true,
      false,
      error,
    );
  }

  if (isAuthError) {
    return new GitCloneError(
      `Authentication failed for ${url}.\n  For private repos, ensure you have access.\n  For SSH: ssh-add -l (to check loaded keys)\n  For HTTPS: Check your git credentials`,
      url,
      false,
      true,
      error,
    );
  }

  return new GitCloneError(
    `Failed to clone ${url}: ${errorMessage}`,
    url,
    false,
    false,
    error,
  );
}
