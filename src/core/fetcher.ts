import { cp, mkdtemp, rename, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FetchError, describeError } from '../models/errors.js';
import type { MarketplaceSource } from '../models/marketplace.js';
import { cloneUrlFor, formatSource } from '../utils/source-parser.js';
import { err, ok, type Result } from '../utils/result.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { cloneTo, GitCloneError, type CloneFn, type CloneOptions } from './git.js';

export interface FetchOptions extends CloneOptions {
  /** Replaces the git clone (tests, alternative transports) */
  cloneFn?: CloneFn;
  /** Parent for the temporary directory (default: os.tmpdir()) */
  tempRoot?: string;
  logger?: Logger;
}

/**
 * A source materialized into a temporary directory.
 * `cleanup` is idempotent and safe after the directory has been promoted.
 */
export interface FetchedSource {
  path: string;
  cleanup(): Promise<void>;
}

const defaultLogger = createLogger('fetcher');

/**
 * Fetch a source into a fresh temporary directory.
 * GitHub and git sources are cloned; local directories are copied.
 * The temporary directory is removed before returning an error.
 */
export async function fetchSource(
  source: MarketplaceSource,
  options: FetchOptions = {},
): Promise<Result<FetchedSource, FetchError>> {
  const logger = options.logger ?? defaultLogger;
  const display = formatSource(source);
  const tempDir = await mkdtemp(join(options.tempRoot ?? tmpdir(), 'nova-fetch-'));
  const cleanup = async (): Promise<void> => {
    await rm(tempDir, { recursive: true, force: true });
  };

  // Clone/copy into a child so the destination does not exist beforehand
  const target = join(tempDir, 'tree');

  try {
    const url = cloneUrlFor(source);
    if (url !== null) {
      logger.debug('Cloning marketplace', { url, destination: target });
      await (options.cloneFn ?? cloneTo)(url, target, {
        ...(options.depth !== undefined && { depth: options.depth }),
        ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
        ...(options.signal !== undefined && { signal: options.signal }),
      });
    } else if (source.type === 'local') {
      const localError = await checkLocalDirectory(source.path);
      if (localError) {
        await cleanup();
        return err(new FetchError(display, localError));
      }
      logger.debug('Copying local marketplace', { path: source.path, destination: target });
      await cp(source.path, target, { recursive: true });
    }
  } catch (error) {
    await cleanup();
    logger.debug('Fetch failed', { source: display, error: describeError(error) });
    if (error instanceof GitCloneError) {
      return err(
        new FetchError(display, error.message, {
          cause: error,
          isTimeout: error.isTimeout,
          isAuthError: error.isAuthError,
        }),
      );
    }
    return err(new FetchError(display, `Failed to fetch ${display}: ${describeError(error)}`, { cause: error }));
  }

  return ok({ path: target, cleanup });
}

/**
 * Scoped fetch: runs `use` with the fetched directory and always removes the
 * temporary directory afterwards, whether `use` succeeds, fails, or throws.
 */
export async function withFetchedSource<T, E>(
  source: MarketplaceSource,
  options: FetchOptions,
  use: (path: string) => Promise<Result<T, E>>,
): Promise<Result<T, E | FetchError>> {
  const fetched = await fetchSource(source, options);
  if (!fetched.success) {
    return fetched;
  }

  try {
    return await use(fetched.data.path);
  } finally {
    await fetched.data.cleanup();
  }
}

/**
 * Move a directory tree to its final location. Uses rename when both paths are
 * on the same filesystem, otherwise copies then deletes the source.
 */
export async function promoteDirectory(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    try {
      await cp(from, to, { recursive: true });
    } catch (copyError) {
      await rm(to, { recursive: true, force: true });
      throw copyError;
    }
    await rm(from, { recursive: true, force: true });
  }
}

async function checkLocalDirectory(path: string): Promise<string | null> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? null : `Local marketplace is not a directory: ${path}`;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return `Local directory not found: ${path}`;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
