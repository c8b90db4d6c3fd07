/**
 * Classify free-form marketplace source strings into typed sources.
 *
 * Rules are checked in order, first match wins:
 * 1. `owner/repo` shorthand → GitHub
 * 2. URL with an http/https/git/ssh scheme, scp-style `user@host:path`,
 *    or anything ending in `.git` → git
 * 3. An existing path (absolute, `~`, or relative to the working directory) → local
 *
 * A relative directory with exactly one slash (`docs/market`) reads as
 * owner/repo; prefix it with `./` to use it as a local path.
 */

import { existsSync } from 'node:fs';
import { basename, isAbsolute, resolve } from 'node:path';
import { InvalidSourceError } from '../models/errors.js';
import type { MarketplaceSource } from '../models/marketplace.js';
import { err, ok, type Result } from './result.js';
import { expandHome, resolveWorkingDirectory } from './paths.js';

const GITHUB_SHORTHAND = /^([A-Za-z0-9_-]+)\/([A-Za-z0-9_.-]+)$/;
const URL_SCHEME = /^(https?|git|ssh):\/\/[^/\s]+/i;
const SCP_STYLE = /^[A-Za-z0-9_.-]+@[A-Za-z0-9_.-]+:\S+$/;

/**
 * Parse a marketplace source string.
 * @param input - Raw source from the user
 * @param workingDir - Base for relative local paths (defaults to cwd)
 */
export function parseMarketplaceSource(
  input: string,
  workingDir?: string,
): Result<MarketplaceSource, InvalidSourceError> {
  const value = input.trim();
  if (!value) {
    return err(new InvalidSourceError(input, 'source cannot be empty'));
  }

  const baseDir = resolveWorkingDirectory(workingDir);

  const github = GITHUB_SHORTHAND.exec(value);
  if (github) {
    const [, owner = '', rawRepo = ''] = github;
    const repo = stripGitSuffix(rawRepo);
    if (repo && repo !== '.' && repo !== '..') {
      return ok({ type: 'github', owner, repo });
    }
  }

  if (URL_SCHEME.test(value) || SCP_STYLE.test(value)) {
    return ok({ type: 'git', url: value });
  }

  if (value.endsWith('.git')) {
    // A relative bare repository must be cloned from where the user pointed, not from cwd
    const candidate = resolve(baseDir, expandHome(value));
    if (!isAbsolute(value) && existsSync(candidate)) {
      return ok({ type: 'git', url: candidate });
    }
    return ok({ type: 'git', url: value });
  }

  const localPath = resolve(baseDir, expandHome(value));
  if (existsSync(localPath)) {
    return ok({ type: 'local', path: localPath });
  }

  return err(new InvalidSourceError(input, 'not a GitHub repo, git URL, or existing path'));
}

/**
 * Structural equality: same variant and identical fields.
 */
export function sourcesEqual(a: MarketplaceSource, b: MarketplaceSource): boolean {
  switch (a.type) {
    case 'github':
      return b.type === 'github' && a.owner === b.owner && a.repo === b.repo;
    case 'git':
      return b.type === 'git' && a.url === b.url;
    case 'local':
      return b.type === 'local' && a.path === b.path;
  }
}

/**
 * Human-readable form of a source, as the user would type it.
 */
export function formatSource(source: MarketplaceSource): string {
  switch (source.type) {
    case 'github':
      return `${source.owner}/${source.repo}`;
    case 'git':
      return source.url;
    case 'local':
      return source.path;
  }
}

/**
 * Default marketplace name when the manifest does not declare one.
 */
export function deriveMarketplaceName(source: MarketplaceSource): string {
  switch (source.type) {
    case 'github':
      return source.repo;
    case 'git': {
      const segments = source.url.split(/[/:\\]/).filter(Boolean);
      return stripGitSuffix(segments[segments.length - 1] ?? '');
    }
    case 'local':
      return basename(source.path);
  }
}

/**
 * Clone URL for a source that is fetched with git.
 */
export function cloneUrlFor(source: MarketplaceSource): string | null {
  switch (source.type) {
    case 'github':
      return `https://github.com/${source.owner}/${source.repo}.git`;
    case 'git':
      return source.url;
    case 'local':
      return null;
  }
}

function stripGitSuffix(value: string): string {
  return value.endsWith('.git') ? value.slice(0, -'.git'.length) : value;
}
