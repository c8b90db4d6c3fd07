import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { dump, load, YAMLException } from 'js-yaml';
import type { ZodError } from 'zod';
import {
  GLOBAL_CONFIG_FILE,
  PROJECT_CONFIG_FILE,
  PROJECT_DIR,
  USER_CONFIG_FILE,
} from '../constants.js';
import {
  CONFIG_SCOPES,
  NovaConfigSchema,
  type ConfigScope,
  type EffectiveConfig,
  type NovaConfig,
  type ResolvedMarketplaceEntry,
} from '../models/config.js';
import {
  ConfigValidationError,
  ConfigWriteError,
  describeError,
  type ConfigError,
} from '../models/errors.js';
import type { MarketplaceConfigEntry, MarketplaceSource } from '../models/marketplace.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { findProjectRoot, getGlobalConfigDir, resolveWorkingDirectory } from '../utils/paths.js';
import { err, ok, type Result } from '../utils/result.js';
import { sourcesEqual } from '../utils/source-parser.js';
import { ConfigResolver, type ScopedConfig } from './config-resolver.js';

/**
 * What the marketplace orchestrator needs from configuration.
 * Lookups work on the resolved (merged) view; writes target one scope.
 */
export interface MarketplaceConfigProvider {
  /** Resolved view, or the entries of one scope file when `scope` is given */
  getMarketplaceConfigs(
    scope?: ConfigScope,
  ): Promise<Result<ResolvedMarketplaceEntry[], ConfigValidationError>>;
  findMarketplace(name: string): Promise<Result<ResolvedMarketplaceEntry | null, ConfigValidationError>>;
  /** Entry that shares the name or a structurally equal source, if any */
  findMarketplaceConflict(
    name: string,
    source: MarketplaceSource,
  ): Promise<Result<ResolvedMarketplaceEntry | null, ConfigValidationError>>;
  hasMarketplace(name: string, source: MarketplaceSource): Promise<Result<boolean, ConfigValidationError>>;
  addMarketplace(entry: MarketplaceConfigEntry, scope: ConfigScope): Promise<Result<void, ConfigError>>;
  /** @returns false when the scope file had no entry with that name */
  removeMarketplace(name: string, scope: ConfigScope): Promise<Result<boolean, ConfigError>>;
}

export interface FileConfigStoreOptions {
  workingDir?: string;
  env?: NodeJS.ProcessEnv;
  resolver?: ConfigResolver;
  logger?: Logger;
}

export type ConfigMutation = (config: NovaConfig) => NovaConfig;

// First issue only; field is null for root-level problems
function schemaError(scope: ConfigScope, path: string, error: ZodError): ConfigValidationError {
  const first = error.errors[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : null;
  return new ConfigValidationError(scope, path, field, first?.message ?? 'invalid configuration');
}

/**
 * YAML-backed configuration, one file per scope:
 * - global:  $XDG_CONFIG_HOME/nova/config.yaml
 * - project: <project>/.nova/config.yaml
 * - user:    <project>/.nova/config.local.yaml
 */
export class FileConfigStore implements MarketplaceConfigProvider {
  readonly projectRoot: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly resolver: ConfigResolver;
  private readonly logger: Logger;

  constructor(options: FileConfigStoreOptions = {}) {
    const workingDir = resolveWorkingDirectory(options.workingDir);
    this.projectRoot = findProjectRoot(workingDir) ?? workingDir;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createLogger('config');
    this.resolver = options.resolver ?? new ConfigResolver({ env: this.env, logger: this.logger });
  }

  getScopePath(scope: ConfigScope): string {
    switch (scope) {
      case 'global':
        return join(getGlobalConfigDir(this.env), GLOBAL_CONFIG_FILE);
      case 'project':
        return join(this.projectRoot, PROJECT_DIR, PROJECT_CONFIG_FILE);
      case 'user':
        return join(this.projectRoot, PROJECT_DIR, USER_CONFIG_FILE);
    }
  }

  /**
   * Load one scope file. A missing file is an empty document.
   */
  async load(scope: ConfigScope): Promise<Result<NovaConfig, ConfigValidationError>> {
    const path = this.getScopePath(scope);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return ok({});
      }
      return err(new ConfigValidationError(scope, path, null, `cannot be read: ${describeError(error)}`));
    }

    let parsed: unknown;
    try {
      parsed = load(content);
    } catch (error) {
      if (error instanceof YAMLException) {
        return err(
          new ConfigValidationError(
            scope,
            path,
            null,
            `invalid YAML at line ${error.mark.line + 1}, column ${error.mark.column + 1}: ${error.reason}`,
          ),
        );
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return ok({});
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      return err(new ConfigValidationError(scope, path, null, 'configuration root must be a mapping'));
    }

    const result = NovaConfigSchema.safeParse(parsed);
    if (!result.success) {
      return err(schemaError(scope, path, result.error));
    }

    return ok(result.data);
  }

  /**
   * Load every scope file, lowest precedence first. Stops at the first invalid file.
   */
  async loadAll(): Promise<Result<ScopedConfig[], ConfigValidationError>> {
    const layers: ScopedConfig[] = [];
    for (const scope of CONFIG_SCOPES) {
      const result = await this.load(scope);
      if (!result.success) return result;
      layers.push({ scope, config: result.data });
    }
    return ok(layers);
  }

  async resolve(): Promise<Result<EffectiveConfig, ConfigValidationError>> {
    const layers = await this.loadAll();
    if (!layers.success) return layers;
    return ok(this.resolver.resolve(layers.data));
  }

  /**
   * Read-modify-write of a single scope file. Other scope files are not read
   * or written; the result is validated before it reaches disk.
   */
  async write(scope: ConfigScope, mutation: ConfigMutation): Promise<Result<NovaConfig, ConfigError>> {
    const current = await this.load(scope);
    if (!current.success) return current;

    const path = this.getScopePath(scope);
    const validated = NovaConfigSchema.safeParse(mutation(current.data));
    if (!validated.success) {
      return err(schemaError(scope, path, validated.error));
    }

    try {
      await writeFileAtomic(path, dump(validated.data, { lineWidth: -1 }));
    } catch (error) {
      return err(new ConfigWriteError(scope, path, error));
    }

    this.logger.debug('Wrote config', { scope, path });
    return ok(validated.data);
  }

  async getMarketplaceConfigs(
    scope?: ConfigScope,
  ): Promise<Result<ResolvedMarketplaceEntry[], ConfigValidationError>> {
    if (scope !== undefined) {
      const loaded = await this.load(scope);
      if (!loaded.success) return loaded;
      return ok((loaded.data.marketplaces ?? []).map((entry) => ({ ...entry, scope })));
    }

    const resolved = await this.resolve();
    if (!resolved.success) return resolved;
    return ok(resolved.data.marketplaces);
  }

  async findMarketplace(
    name: string,
  ): Promise<Result<ResolvedMarketplaceEntry | null, ConfigValidationError>> {
    const entries = await this.getMarketplaceConfigs();
    if (!entries.success) return entries;
    return ok(entries.data.find((entry) => entry.name === name) ?? null);
  }

  async findMarketplaceConflict(
    name: string,
    source: MarketplaceSource,
  ): Promise<Result<ResolvedMarketplaceEntry | null, ConfigValidationError>> {
    const entries = await this.getMarketplaceConfigs();
    if (!entries.success) return entries;
    const conflict =
      entries.data.find((entry) => entry.name === name) ??
      entries.data.find((entry) => sourcesEqual(entry.source, source));
    return ok(conflict ?? null);
  }

  async hasMarketplace(
    name: string,
    source: MarketplaceSource,
  ): Promise<Result<boolean, ConfigValidationError>> {
    const conflict = await this.findMarketplaceConflict(name, source);
    if (!conflict.success) return conflict;
    return ok(conflict.data !== null);
  }

  async addMarketplace(
    entry: MarketplaceConfigEntry,
    scope: ConfigScope,
  ): Promise<Result<void, ConfigError>> {
    const written = await this.write(scope, (config) => ({
      ...config,
      marketplaces: [...(config.marketplaces ?? []).filter((e) => e.name !== entry.name), entry],
    }));
    if (!written.success) return written;
    return ok(undefined);
  }

  async removeMarketplace(name: string, scope: ConfigScope): Promise<Result<boolean, ConfigError>> {
    const current = await this.load(scope);
    if (!current.success) return current;
    if (!(current.data.marketplaces ?? []).some((entry) => entry.name === name)) {
      return ok(false);
    }

    const written = await this.write(scope, (config) => {
      const { marketplaces, ...rest } = config;
      const remaining = (marketplaces ?? []).filter((entry) => entry.name !== name);
      return remaining.length > 0 ? { ...rest, marketplaces: remaining } : rest;
    });
    if (!written.success) return written;
    return ok(true);
  }
}
