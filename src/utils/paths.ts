import { existsSync, statSync } from 'node:fs';
import { dirname, join, relative, resolve, isAbsolute } from 'node:path';
import { APP_NAME, PROJECT_DIR, getHomeDir } from '../constants.js';

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return getHomeDir();
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(getHomeDir(), path.slice(2));
  }
  return path;
}

/**
 * Normalize a working directory: defaults to cwd, and a file resolves to its parent.
 */
export function resolveWorkingDirectory(workingDir?: string): string {
  const base = resolve(workingDir ?? process.cwd());
  try {
    if (statSync(base).isFile()) {
      return dirname(base);
    }
  } catch {
    // Nonexistent directories are still valid starting points
  }
  return base;
}

/**
 * Global config root: $XDG_CONFIG_HOME/nova, or ~/.config/nova
 */
export function getGlobalConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg ? expandHome(xdg) : join(getHomeDir(), '.config');
  return join(base, APP_NAME);
}

/**
 * Data root: $XDG_DATA_HOME/nova, or ~/.local/share/nova
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_DATA_HOME;
  const base = xdg ? expandHome(xdg) : join(getHomeDir(), '.local', 'share');
  return join(base, APP_NAME);
}

/**
 * Walk up from startDir looking for a directory that contains `.nova/`.
 * @returns The project root, or null when no ancestor is a nova project
 */
export function findProjectRoot(startDir: string): string | null {
  let current = resolveWorkingDirectory(startDir);

  while (true) {
    const candidate = join(current, PROJECT_DIR);
    if (existsSync(candidate) && statSync(candidate).isDirectory()) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * True when `child` is strictly inside `parent`.
 */
export function isPathInside(child: string, parent: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}
