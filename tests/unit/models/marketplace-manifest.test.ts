import { describe, it, expect } from 'vitest';
import { MarketplaceManifestSchema } from '../../../src/models/marketplace-manifest.js';
import {
  MarketplaceConfigEntrySchema,
  MarketplaceNameSchema,
  MarketplaceSourceSchema,
} from '../../../src/models/marketplace.js';

describe('MarketplaceManifestSchema', () => {
  it('should accept a minimal manifest', () => {
    const result = MarketplaceManifestSchema.safeParse({ bundles: [] });
    expect(result.success).toBe(true);
  });

  it('should accept a full manifest', () => {
    const result = MarketplaceManifestSchema.safeParse({
      $schema: 'https://example.com/marketplace.schema.json',
      name: 'team-bundles',
      version: '1.2.0',
      description: 'Bundles for the team',
      owner: { name: 'Platform Team', email: 'platform@example.com' },
      bundles: [
        {
          name: 'reviewer',
          description: 'Code review prompts',
          source: './bundles/reviewer',
          version: '0.3.0',
          category: 'quality',
          author: { name: 'Sam' },
          tags: ['review'],
        },
      ],
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.owner?.name).toBe('Platform Team');
    expect(result.data.bundles[0]?.tags).toEqual(['review']);
  });

  it('should reject an empty bundle name', () => {
    const result = MarketplaceManifestSchema.safeParse({ bundles: [{ name: '' }] });
    expect(result.success).toBe(false);
  });

  it('should reject bundles that are not an array', () => {
    const result = MarketplaceManifestSchema.safeParse({ bundles: { reviewer: {} } });
    expect(result.success).toBe(false);
  });
});

describe('MarketplaceNameSchema', () => {
  it.each(['bundles', 'team.bundles', 'team_bundles-2', '_private'])('should accept %s', (name) => {
    expect(MarketplaceNameSchema.safeParse(name).success).toBe(true);
  });

  it.each(['', '.hidden', '..', 'a/b', 'a\\b', 'has space'])('should reject %j', (name) => {
    expect(MarketplaceNameSchema.safeParse(name).success).toBe(false);
  });
});

describe('MarketplaceSourceSchema', () => {
  it('should discriminate on type', () => {
    expect(MarketplaceSourceSchema.safeParse({ type: 'github', owner: 'acme', repo: 'bundles' }).success).toBe(true);
    expect(MarketplaceSourceSchema.safeParse({ type: 'git', url: 'https://x/y.git' }).success).toBe(true);
    expect(MarketplaceSourceSchema.safeParse({ type: 'local', path: '/srv/mp' }).success).toBe(true);
  });

  it('should reject unknown variants and missing fields', () => {
    expect(MarketplaceSourceSchema.safeParse({ type: 'svn', url: 'x' }).success).toBe(false);
    expect(MarketplaceSourceSchema.safeParse({ type: 'github', owner: 'acme' }).success).toBe(false);
  });
});

describe('MarketplaceConfigEntrySchema', () => {
  it('should require a name and a source', () => {
    expect(
      MarketplaceConfigEntrySchema.safeParse({ name: 'bundles', source: { type: 'local', path: '/srv/mp' } }).success,
    ).toBe(true);
    expect(MarketplaceConfigEntrySchema.safeParse({ name: 'bundles' }).success).toBe(false);
  });
});
