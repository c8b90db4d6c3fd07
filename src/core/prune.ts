import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DataStoreKeyNotFoundError,
  type ConfigValidationError,
  type DataStoreReadError,
  type DataStoreWriteError,
} from '../models/errors.js';
import type { Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import type { MarketplaceConfigProvider } from './config-store.js';
import type { MarketplaceStateStore } from './marketplace-state.js';

export interface PruneDeps {
  config: MarketplaceConfigProvider;
  state: MarketplaceStateStore;
  /** Directory holding one subdirectory per installed marketplace */
  installRoot: string;
  logger: Logger;
}

export interface PruneResult {
  /** Names whose state record was deleted */
  removedState: string[];
  /** Install directories that were deleted */
  removedDirectories: string[];
}

export type PruneError = ConfigValidationError | DataStoreReadError | DataStoreWriteError;

async function listInstallDirectories(installRoot: string): Promise<string[]> {
  try {
    const entries = await readdir(installRoot, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Remove marketplace state and install directories that no config scope
 * declares any more. Left behind by interrupted adds, by removes that
 * skipped cleanup, and by hand-edited config files.
 */
export async function pruneOrphans(deps: PruneDeps): Promise<Result<PruneResult, PruneError>> {
  const entries = await deps.config.getMarketplaceConfigs();
  if (!entries.success) return entries;
  const configured = new Set(entries.data.map((entry) => entry.name));

  const recorded = await deps.state.names();
  if (!recorded.success) return recorded;

  const removedState: string[] = [];
  for (const name of recorded.data) {
    if (configured.has(name)) continue;
    const deleted = await deps.state.delete(name);
    if (!deleted.success) {
      if (deleted.error instanceof DataStoreKeyNotFoundError) continue;
      return err(deleted.error);
    }
    deps.logger.info('Pruned marketplace state', { name });
    removedState.push(name);
  }

  const removedDirectories: string[] = [];
  for (const name of await listInstallDirectories(deps.installRoot)) {
    if (configured.has(name)) continue;
    const path = join(deps.installRoot, name);
    await rm(path, { recursive: true, force: true });
    deps.logger.info('Pruned marketplace directory', { path });
    removedDirectories.push(path);
  }

  return ok({ removedState, removedDirectories });
}
