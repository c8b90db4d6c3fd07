import { z } from 'zod';
import { MarketplaceConfigEntrySchema, type MarketplaceConfigEntry } from './marketplace.js';

/**
 * Configuration scopes, lowest precedence first
 */
export const ConfigScopeSchema = z.enum(['global', 'project', 'user']);

export type ConfigScope = z.infer<typeof ConfigScopeSchema>;

export const CONFIG_SCOPES: readonly ConfigScope[] = ConfigScopeSchema.options;

/**
 * Precedence rank per scope: user > project > global
 */
export const SCOPE_PRECEDENCE: Record<ConfigScope, number> = {
  global: 0,
  project: 1,
  user: 2,
};

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingSectionSchema = z
  .object({
    level: LogLevelSchema.optional(),
  })
  .strict();

export const GitSectionSchema = z
  .object({
    clone_timeout_ms: z.number().int().positive().optional(),
    depth: z.number().int().positive().optional(),
  })
  .strict();

export type LoggingSection = z.infer<typeof LoggingSectionSchema>;
export type GitSection = z.infer<typeof GitSectionSchema>;

/**
 * Mapping sections that environment variables may override, by name
 */
export const SCALAR_SECTIONS = {
  logging: LoggingSectionSchema,
  git: GitSectionSchema,
} as const;

export type ScalarSectionName = keyof typeof SCALAR_SECTIONS;

/**
 * One scope file (config.yaml / config.local.yaml).
 * Unknown top-level sections pass through untouched so a write never drops them.
 */
export const NovaConfigSchema = z
  .object({
    marketplaces: z.array(MarketplaceConfigEntrySchema).optional(),
    logging: LoggingSectionSchema.optional(),
    git: GitSectionSchema.optional(),
  })
  .passthrough();

export type NovaConfig = z.infer<typeof NovaConfigSchema>;

/**
 * Marketplace entry in the merged view, tagged with the scope that declared it
 */
export interface ResolvedMarketplaceEntry extends MarketplaceConfigEntry {
  scope: ConfigScope;
}

/**
 * Merged configuration across all scopes plus environment overrides
 */
export interface EffectiveConfig {
  marketplaces: ResolvedMarketplaceEntry[];
  logging?: LoggingSection;
  git?: GitSection;
  [section: string]: unknown;
}
