import { existsSync } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { INSTALLS_DIR, MANIFEST_FILE, MARKETPLACES_NAMESPACE } from '../constants.js';
import { CONFIG_SCOPES, type ConfigScope, type ResolvedMarketplaceEntry } from '../models/config.js';
import {
  DataStoreKeyNotFoundError,
  FetchError,
  InvalidSourceError,
  ManifestNotFoundError,
  ManifestValidationError,
  MarketplaceAlreadyExistsError,
  MarketplaceNotFoundError,
  MarketplaceRemoveError,
  MarketplaceRollbackError,
  MarketplaceStateError,
  OperationCancelledError,
  describeError,
  type ConfigError,
  type ConfigValidationError,
  type DataStoreReadError,
  type DataStoreWriteError,
  type NovaError,
} from '../models/errors.js';
import {
  MarketplaceNameSchema,
  type InstallStatus,
  type ManifestMetadata,
  type MarketplaceInfo,
  type MarketplaceSource,
  type MarketplaceState,
} from '../models/marketplace.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  readManifestMetadata,
  readMarketplaceManifest,
  toManifestMetadata,
} from '../utils/marketplace-manifest-parser.js';
import { isPathInside } from '../utils/paths.js';
import { err, ok, type Err, type Result } from '../utils/result.js';
import {
  deriveMarketplaceName,
  formatSource,
  parseMarketplaceSource,
  sourcesEqual,
} from '../utils/source-parser.js';
import type { MarketplaceConfigProvider } from './config-store.js';
import { promoteDirectory, withFetchedSource, type FetchOptions } from './fetcher.js';
import type { MarketplaceStateStore } from './marketplace-state.js';
import { pruneOrphans, type PruneError, type PruneResult } from './prune.js';

export interface MarketplaceDeps {
  config: MarketplaceConfigProvider;
  state: MarketplaceStateStore;
  /** Data root; installs go under `<dataDir>/marketplaces/installs/<name>` */
  dataDir: string;
  fetch?: Omit<FetchOptions, 'logger'>;
  logger?: Logger;
  now?: () => Date;
}

export interface AddOptions {
  /** Scope that receives the config entry (default: global) */
  scope?: ConfigScope;
  /** Base for relative local sources */
  workingDir?: string;
  /** Honoured until the first commit step; ignored afterwards */
  signal?: AbortSignal;
}

export interface RemoveOptions {
  /** Only remove an entry declared in this scope */
  scope?: ConfigScope;
  workingDir?: string;
}

export interface RemoveResult {
  name: string;
  scope: ConfigScope;
  source: MarketplaceSource;
  /** Directory that was deleted, or null when nothing was deleted */
  installPath: string | null;
  warnings: string[];
}

/**
 * A configured marketplace joined with its installation state
 */
export interface MarketplaceDetails extends MarketplaceInfo {
  scope: ConfigScope;
  installPath: string | null;
  fetchedAt: string | null;
  status: InstallStatus;
}

export type AddError =
  | InvalidSourceError
  | FetchError
  | ManifestNotFoundError
  | ManifestValidationError
  | MarketplaceAlreadyExistsError
  | OperationCancelledError
  | ConfigError
  | DataStoreWriteError
  | MarketplaceRollbackError;

export type RemoveError = MarketplaceNotFoundError | MarketplaceRemoveError | ConfigError;

export type ListError = ConfigValidationError | DataStoreReadError;

// Manifest errors name the temporary checkout; report them against the source instead
function relocateManifestError(
  error: ManifestNotFoundError | ManifestValidationError,
  source: MarketplaceSource,
): ManifestNotFoundError | ManifestValidationError {
  const location = `${formatSource(source)}/${MANIFEST_FILE}`;
  return error instanceof ManifestNotFoundError
    ? new ManifestNotFoundError(location)
    : new ManifestValidationError(location, error.issues);
}

/**
 * Installs and removes marketplaces.
 *
 * Config (via the provider) says what is configured; the state store says
 * what is installed. `add` and `remove` on one instance run one at a time.
 */
export class Marketplace {
  readonly installRoot: string;
  private readonly config: MarketplaceConfigProvider;
  private readonly state: MarketplaceStateStore;
  private readonly fetchOptions: FetchOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: MarketplaceDeps) {
    this.config = deps.config;
    this.state = deps.state;
    this.installRoot = join(deps.dataDir, MARKETPLACES_NAMESPACE, INSTALLS_DIR);
    this.logger = deps.logger ?? createLogger('marketplace');
    this.fetchOptions = { ...deps.fetch, logger: this.logger };
    this.now = deps.now ?? (() => new Date());
  }

  installPathFor(name: string): string {
    return join(this.installRoot, name);
  }

  /**
   * Fetch, validate and install a marketplace, then record it in `scope`.
   */
  add(source: string, options: AddOptions = {}): Promise<Result<MarketplaceInfo, AddError>> {
    return this.serialize(() => this.runAdd(source, options));
  }

  /**
   * Remove a marketplace by name or by source.
   */
  remove(nameOrSource: string, options: RemoveOptions = {}): Promise<Result<RemoveResult, RemoveError>> {
    return this.serialize(() => this.runRemove(nameOrSource, options));
  }

  /**
   * Delete state records and install directories that no config entry refers to.
   */
  prune(): Promise<Result<PruneResult, PruneError>> {
    return this.serialize(() =>
      pruneOrphans({
        config: this.config,
        state: this.state,
        installRoot: this.installRoot,
        logger: this.logger,
      }),
    );
  }

  /**
   * Every configured marketplace, sorted by name.
   */
  async list(): Promise<Result<MarketplaceDetails[], ListError>> {
    const entries = await this.config.getMarketplaceConfigs();
    if (!entries.success) return entries;

    const details: MarketplaceDetails[] = [];
    for (const entry of entries.data) {
      const described = await this.describe(entry);
      if (!described.success) return described;
      details.push(described.data);
    }

    return ok(details.sort((a, b) => a.name.localeCompare(b.name)));
  }

  async get(name: string): Promise<Result<MarketplaceDetails, ListError | MarketplaceNotFoundError>> {
    const entry = await this.config.findMarketplace(name);
    if (!entry.success) return entry;
    if (!entry.data) return err(new MarketplaceNotFoundError(name));
    return this.describe(entry.data);
  }

  // Chains operations so each starts after the previous one settles.
  // Failures still reach the caller through `run`.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runAdd(input: string, options: AddOptions): Promise<Result<MarketplaceInfo, AddError>> {
    const scope = options.scope ?? 'global';
    const { signal } = options;

    const parsed = parseMarketplaceSource(input, options.workingDir);
    if (!parsed.success) return parsed;
    const source = parsed.data;

    if (signal?.aborted) return err(new OperationCancelledError('source parsing'));

    this.logger.info('Fetching marketplace', { source: formatSource(source) });

    const fetchOptions: FetchOptions = signal ? { ...this.fetchOptions, signal } : this.fetchOptions;
    const result = await withFetchedSource(source, fetchOptions, (fetchedPath) =>
      this.validateAndCommit(input, source, scope, fetchedPath, signal),
    );

    // Aborting kills the git child, which surfaces as a fetch failure
    if (!result.success && result.error instanceof FetchError && signal?.aborted) {
      return err(new OperationCancelledError('fetch'));
    }
    return result;
  }

  private async validateAndCommit(
    input: string,
    source: MarketplaceSource,
    scope: ConfigScope,
    fetchedPath: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<MarketplaceInfo, AddError>> {
    if (signal?.aborted) return err(new OperationCancelledError('fetch'));

    const manifest = await readMarketplaceManifest(fetchedPath);
    if (!manifest.success) return err(relocateManifestError(manifest.error, source));

    const name = manifest.data.name ?? deriveMarketplaceName(source);
    if (!MarketplaceNameSchema.safeParse(name).success) {
      return err(new InvalidSourceError(input, 'cannot derive a marketplace name; set "name" in marketplace.json'));
    }

    const conflict = await this.config.findMarketplaceConflict(name, source);
    if (!conflict.success) return conflict;
    if (conflict.data) {
      return err(new MarketplaceAlreadyExistsError(conflict.data.name, conflict.data.source, conflict.data.scope));
    }

    if (signal?.aborted) return err(new OperationCancelledError('validation'));

    return this.commitAdd(name, source, scope, fetchedPath, toManifestMetadata(manifest.data));
  }

  // From here on the signal is ignored: the install completes or rolls back.
  private async commitAdd(
    name: string,
    source: MarketplaceSource,
    scope: ConfigScope,
    fetchedPath: string,
    metadata: ManifestMetadata,
  ): Promise<Result<MarketplaceInfo, AddError>> {
    const installPath = this.installPathFor(name);

    if (existsSync(installPath)) {
      // No config entry has this name (checked above), so this is left over
      // from an interrupted run.
      this.logger.warn('Removing orphaned marketplace directory', { path: installPath });
      await this.removeDirectory(installPath);
    }

    await mkdir(this.installRoot, { recursive: true });
    await promoteDirectory(fetchedPath, installPath);

    const state: MarketplaceState = {
      name,
      source,
      installPath,
      fetchedAt: this.now().toISOString(),
    };

    const saved = await this.state.save(state);
    if (!saved.success) {
      return this.rollbackAdd(name, saved.error, installPath, false);
    }

    const written = await this.config.addMarketplace({ name, source }, scope);
    if (!written.success) {
      return this.rollbackAdd(name, written.error, installPath, true);
    }

    this.logger.info('Marketplace added', { name, scope, path: installPath });
    return ok({ name, source, ...metadata });
  }

  private async rollbackAdd<E extends NovaError>(
    name: string,
    original: E,
    installPath: string,
    stateSaved: boolean,
  ): Promise<Err<E | MarketplaceRollbackError>> {
    this.logger.debug('Rolling back marketplace install', { name, reason: original.message });
    const failures: Error[] = [];

    if (stateSaved) {
      const deleted = await this.state.delete(name);
      if (!deleted.success && !(deleted.error instanceof DataStoreKeyNotFoundError)) {
        failures.push(deleted.error);
      }
    }

    try {
      await this.removeDirectory(installPath);
    } catch (error) {
      failures.push(error instanceof Error ? error : new Error(describeError(error)));
    }

    if (failures.length > 0) {
      return err(new MarketplaceRollbackError(name, original, failures));
    }
    return err(original);
  }

  private async runRemove(
    nameOrSource: string,
    options: RemoveOptions,
  ): Promise<Result<RemoveResult, RemoveError>> {
    const entries = await this.config.getMarketplaceConfigs(options.scope);
    if (!entries.success) return entries;

    const entry =
      entries.data.find((e) => e.name === nameOrSource) ??
      this.findBySource(entries.data, nameOrSource, options.workingDir);
    if (!entry) {
      return err(new MarketplaceNotFoundError(nameOrSource, options.scope));
    }

    const { name, scope, source } = entry;
    const warnings: string[] = [];
    const warn = (message: string): void => {
      warnings.push(message);
      this.logger.warn(message, { name });
    };

    let removedPath: string | null = null;

    const otherScope = await this.declaringScopeOtherThan(name, scope);
    if (!otherScope.success) return otherScope;

    if (otherScope.data !== null) {
      warn(`Marketplace '${name}' is still declared in ${otherScope.data} config; keeping its installation`);
    } else {
      const cleaned = await this.removeInstallation(name, warn);
      if (!cleaned.success) return cleaned;
      removedPath = cleaned.data;
    }

    const removed = await this.config.removeMarketplace(name, scope);
    if (!removed.success) return removed;

    this.logger.info('Marketplace removed', { name, scope });
    return ok({ name, scope, source, installPath: removedPath, warnings });
  }

  private findBySource(
    entries: ResolvedMarketplaceEntry[],
    input: string,
    workingDir: string | undefined,
  ): ResolvedMarketplaceEntry | undefined {
    const parsed = parseMarketplaceSource(input, workingDir);
    if (!parsed.success) return undefined;
    return entries.find((e) => sourcesEqual(e.source, parsed.data));
  }

  private async declaringScopeOtherThan(
    name: string,
    scope: ConfigScope,
  ): Promise<Result<ConfigScope | null, ConfigValidationError>> {
    for (const other of CONFIG_SCOPES) {
      if (other === scope) continue;
      const entries = await this.config.getMarketplaceConfigs(other);
      if (!entries.success) return entries;
      if (entries.data.some((e) => e.name === name)) return ok(other);
    }
    return ok(null);
  }

  /**
   * Delete the install directory and the state record.
   * @returns The deleted directory, or null when none was deleted
   */
  private async removeInstallation(
    name: string,
    warn: (message: string) => void,
  ): Promise<Result<string | null, MarketplaceRemoveError>> {
    let installPath: string | null;

    const state = await this.state.load(name);
    if (state.success) {
      installPath = state.data.installPath;
    } else if (state.error instanceof DataStoreKeyNotFoundError) {
      warn(`No installation state for marketplace '${name}'; skipping file cleanup`);
      return ok(null);
    } else if (state.error instanceof MarketplaceStateError) {
      installPath = this.installPathFor(name);
      warn(`${state.error.message}; using ${installPath}`);
    } else {
      return err(new MarketplaceRemoveError(name, state.error.message, state.error));
    }

    let deletedPath: string | null = null;
    if (!isPathInside(installPath, this.installRoot)) {
      warn(`Recorded install path ${installPath} is outside ${this.installRoot}; not deleting it`);
    } else if (existsSync(installPath)) {
      try {
        await this.removeDirectory(installPath);
      } catch (error) {
        return err(new MarketplaceRemoveError(name, `cannot delete ${installPath}: ${describeError(error)}`, error));
      }
      deletedPath = installPath;
    }

    const deleted = await this.state.delete(name);
    if (!deleted.success && !(deleted.error instanceof DataStoreKeyNotFoundError)) {
      const files = deletedPath === null ? '' : `files at ${deletedPath} were deleted but `;
      return err(
        new MarketplaceRemoveError(name, `${files}the state record was kept: ${deleted.error.message}`, deleted.error),
      );
    }

    return ok(deletedPath);
  }

  /** Every install-tree deletion goes through here. */
  protected async removeDirectory(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  private async describe(
    entry: ResolvedMarketplaceEntry,
  ): Promise<Result<MarketplaceDetails, DataStoreReadError>> {
    const base = { name: entry.name, source: entry.source, scope: entry.scope };
    const state = await this.state.load(entry.name);

    if (!state.success) {
      if (state.error instanceof DataStoreKeyNotFoundError || state.error instanceof MarketplaceStateError) {
        return ok({
          ...base,
          description: '',
          bundleCount: 0,
          installPath: null,
          fetchedAt: null,
          status: 'missing-state',
        });
      }
      return err(state.error);
    }

    const { installPath, fetchedAt } = state.data;
    const present = existsSync(installPath);
    const metadata = present ? await readManifestMetadata(installPath) : { description: '', bundleCount: 0 };

    return ok({
      ...base,
      ...metadata,
      installPath,
      fetchedAt,
      status: present ? 'installed' : 'missing-files',
    });
  }
}
