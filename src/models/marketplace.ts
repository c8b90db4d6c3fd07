import { z } from 'zod';

/**
 * Marketplace name: a single path-safe segment (it becomes a directory under the data root)
 */
export const MarketplaceNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/, 'must be a single path segment (letters, digits, "_", "-", ".")');

/**
 * Repository hosted on GitHub, written as owner/repo
 */
export const GitHubSourceSchema = z.object({
  type: z.literal('github'),
  owner: z.string().min(1),
  repo: z.string().min(1),
});

/**
 * Any git remote (https, ssh, git://, scp-style)
 */
export const GitSourceSchema = z.object({
  type: z.literal('git'),
  url: z.string().min(1),
});

/**
 * Directory on the local filesystem (absolute path)
 */
export const LocalSourceSchema = z.object({
  type: z.literal('local'),
  path: z.string().min(1),
});

export const MarketplaceSourceSchema = z.discriminatedUnion('type', [
  GitHubSourceSchema,
  GitSourceSchema,
  LocalSourceSchema,
]);

export type GitHubSource = z.infer<typeof GitHubSourceSchema>;
export type GitSource = z.infer<typeof GitSourceSchema>;
export type LocalSource = z.infer<typeof LocalSourceSchema>;
export type MarketplaceSource = z.infer<typeof MarketplaceSourceSchema>;
export type MarketplaceSourceType = MarketplaceSource['type'];

/**
 * Marketplace entry as written to a scope's config.yaml
 */
export const MarketplaceConfigEntrySchema = z.object({
  name: MarketplaceNameSchema,
  source: MarketplaceSourceSchema,
});

export type MarketplaceConfigEntry = z.infer<typeof MarketplaceConfigEntrySchema>;

/**
 * Installation state stored in the data store, keyed by marketplace name
 */
export const MarketplaceStateSchema = z.object({
  name: MarketplaceNameSchema,
  source: MarketplaceSourceSchema,
  installPath: z.string().min(1),
  fetchedAt: z.string(), // ISO timestamp
});

export type MarketplaceState = z.infer<typeof MarketplaceStateSchema>;

/**
 * Summary derived from a marketplace.json, recomputed on demand
 */
export interface ManifestMetadata {
  description: string;
  bundleCount: number;
}

export interface MarketplaceInfo {
  name: string;
  description: string;
  source: MarketplaceSource;
  bundleCount: number;
}

/**
 * How a configured marketplace relates to what is on disk:
 * - installed: state record and install directory both present
 * - missing-state: configured, but the data store has no record
 * - missing-files: state recorded, but the install directory is gone
 */
export type InstallStatus = 'installed' | 'missing-state' | 'missing-files';
