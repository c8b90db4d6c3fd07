import { load } from 'js-yaml';
import { ENV_CONFIG_PREFIX } from '../constants.js';
import {
  GitSectionSchema,
  LoggingSectionSchema,
  SCALAR_SECTIONS,
  SCOPE_PRECEDENCE,
  type ConfigScope,
  type EffectiveConfig,
  type NovaConfig,
  type ResolvedMarketplaceEntry,
  type ScalarSectionName,
} from '../models/config.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * One loaded scope file
 */
export interface ScopedConfig {
  scope: ConfigScope;
  config: NovaConfig;
}

export interface ConfigResolverOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge two mappings; values from `override` win, nested mappings
 * merge key by key and everything else (lists included) is replaced.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined || value === null) continue;
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * Merge scope files in precedence order (global, project, user).
 *
 * `marketplaces` is appended across scopes and keyed by name: a later scope's
 * entry replaces an earlier one at the same position and carries the later scope.
 */
export function mergeConfigs(layers: readonly ScopedConfig[]): EffectiveConfig {
  const ordered = [...layers].sort((a, b) => SCOPE_PRECEDENCE[a.scope] - SCOPE_PRECEDENCE[b.scope]);

  let sections: Record<string, unknown> = {};
  const marketplaces: ResolvedMarketplaceEntry[] = [];

  for (const { scope, config } of ordered) {
    const { marketplaces: entries, ...rest } = config;
    sections = deepMerge(sections, rest);

    for (const entry of entries ?? []) {
      const resolved: ResolvedMarketplaceEntry = { ...entry, scope };
      const index = marketplaces.findIndex((existing) => existing.name === entry.name);
      if (index === -1) {
        marketplaces.push(resolved);
      } else {
        marketplaces[index] = resolved;
      }
    }
  }

  const effective: EffectiveConfig = { marketplaces };
  for (const [key, value] of Object.entries(sections)) {
    effective[key] = value;
  }
  return effective;
}

function isScalarSection(name: string): name is ScalarSectionName {
  return Object.hasOwn(SCALAR_SECTIONS, name);
}

function parseEnvValue(raw: string): unknown {
  try {
    return load(raw);
  } catch {
    // Not valid YAML: use the raw string
    return raw;
  }
}

function applySectionOverride(
  config: EffectiveConfig,
  section: ScalarSectionName,
  field: string,
  value: unknown,
): string | null {
  switch (section) {
    case 'logging': {
      // Levels compare case-insensitively, as NOVA_LOG_LEVEL does
      const normalized = typeof value === 'string' ? value.toLowerCase() : value;
      const result = LoggingSectionSchema.safeParse({ ...config.logging, [field]: normalized });
      if (!result.success) return result.error.errors[0]?.message ?? 'invalid value';
      config.logging = result.data;
      return null;
    }
    case 'git': {
      const result = GitSectionSchema.safeParse({ ...config.git, [field]: value });
      if (!result.success) return result.error.errors[0]?.message ?? 'invalid value';
      config.git = result.data;
      return null;
    }
  }
}

/**
 * Apply NOVA_CONFIG__<SECTION>__<FIELD> variables on top of a merged config.
 * Only mapping sections are overridable, one field at a time; anything else is
 * skipped with a debug log.
 */
export function applyEnvOverrides(
  config: EffectiveConfig,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): EffectiveConfig {
  const result: EffectiveConfig = { ...config, marketplaces: [...config.marketplaces] };

  const keys = Object.keys(env)
    .filter((key) => key.toUpperCase().startsWith(ENV_CONFIG_PREFIX))
    .sort();

  for (const key of keys) {
    const raw = env[key];
    if (raw === undefined) continue;

    const segments = key
      .slice(ENV_CONFIG_PREFIX.length)
      .split('__')
      .filter(Boolean)
      .map((segment) => segment.toLowerCase());

    const [section, field] = segments;
    if (segments.length !== 2 || section === undefined || field === undefined) {
      logger.debug('Ignoring config override: expected <SECTION>__<FIELD>', { variable: key });
      continue;
    }
    if (!isScalarSection(section)) {
      logger.debug('Ignoring config override: section is not overridable', { variable: key, section });
      continue;
    }

    const value = parseEnvValue(raw);
    if (value === undefined || value === null) {
      logger.debug('Ignoring config override: empty value', { variable: key });
      continue;
    }

    const problem = applySectionOverride(result, section, field, value);
    if (problem !== null) {
      logger.debug('Ignoring config override: invalid value', { variable: key, reason: problem });
    }
  }

  return result;
}

/**
 * Produces the effective configuration from loaded scope files and the
 * environment it was constructed with. Holds no cache; each call recomputes.
 */
export class ConfigResolver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: ConfigResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createLogger('config');
  }

  resolve(layers: readonly ScopedConfig[]): EffectiveConfig {
    return applyEnvOverrides(mergeConfigs(layers), this.env, this.logger);
  }
}
