import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MANIFEST_FILE } from '../constants.js';
import {
  MarketplaceManifestSchema,
  type MarketplaceManifest,
} from '../models/marketplace-manifest.js';
import type { ManifestMetadata } from '../models/marketplace.js';
import { ManifestNotFoundError, ManifestValidationError } from '../models/errors.js';
import { err, ok, type Result } from './result.js';
import { toFieldIssues } from './validation.js';

export type ManifestResult = Result<
  MarketplaceManifest,
  ManifestNotFoundError | ManifestValidationError
>;

/**
 * Get the manifest path for a marketplace directory
 */
export function getManifestPath(marketplacePath: string): string {
  return join(marketplacePath, MANIFEST_FILE);
}

/**
 * Read and validate marketplace.json at the root of a marketplace tree.
 * Used for freshly fetched trees and for installed ones alike.
 */
export async function readMarketplaceManifest(
  marketplacePath: string,
): Promise<ManifestResult> {
  const manifestPath = getManifestPath(marketplacePath);

  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return err(new ManifestNotFoundError(manifestPath));
    }
    return err(
      new ManifestValidationError(manifestPath, [
        { field: '(file)', message: `cannot be read: ${error instanceof Error ? error.message : String(error)}` },
      ]),
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err(
      new ManifestValidationError(manifestPath, [
        { field: '(root)', message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` },
      ]),
    );
  }

  const result = MarketplaceManifestSchema.safeParse(json);
  if (!result.success) {
    return err(new ManifestValidationError(manifestPath, toFieldIssues(result.error)));
  }

  return ok(result.data);
}

/**
 * Summarize a manifest for display
 */
export function toManifestMetadata(manifest: MarketplaceManifest): ManifestMetadata {
  return {
    description: manifest.description ?? '',
    bundleCount: manifest.bundles.length,
  };
}

/**
 * Metadata for an installed marketplace. Falls back to an empty description and
 * zero bundles when the manifest is missing or invalid.
 */
export async function readManifestMetadata(marketplacePath: string): Promise<ManifestMetadata> {
  const result = await readMarketplaceManifest(marketplacePath);
  if (!result.success) {
    return { description: '', bundleCount: 0 };
  }
  return toManifestMetadata(result.data);
}
