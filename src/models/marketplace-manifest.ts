import { z } from 'zod';
import { MarketplaceNameSchema } from './marketplace.js';

/**
 * Author/owner contact info
 */
export const ContactSchema = z.object({
  name: z.string().min(1),
  email: z.string().optional(),
});

export type Contact = z.infer<typeof ContactSchema>;

/**
 * A bundle entry in marketplace.json. Bundle contents are opaque here;
 * only the entry's shape is checked.
 */
export const BundleEntrySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    source: z.string().optional(),
    version: z.string().optional(),
    category: z.string().optional(),
    author: ContactSchema.optional(),
  })
  .passthrough();

export type BundleEntry = z.infer<typeof BundleEntrySchema>;

/**
 * Top-level marketplace.json schema
 */
export const MarketplaceManifestSchema = z
  .object({
    $schema: z.string().optional(),
    name: MarketplaceNameSchema.optional(),
    version: z.string().optional(),
    description: z.string().optional(),
    owner: ContactSchema.optional(),
    bundles: z.array(BundleEntrySchema),
  })
  .passthrough();

export type MarketplaceManifest = z.infer<typeof MarketplaceManifestSchema>;
