import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  cloneUrlFor,
  deriveMarketplaceName,
  formatSource,
  parseMarketplaceSource,
  sourcesEqual,
} from '../../../src/utils/source-parser.js';
import { InvalidSourceError } from '../../../src/models/errors.js';

describe('parseMarketplaceSource', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'nova-source-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('GitHub shorthand', () => {
    it('should parse owner/repo', () => {
      const result = parseMarketplaceSource('acme/bundles', testDir);
      expect(result).toEqual({ success: true, data: { type: 'github', owner: 'acme', repo: 'bundles' } });
    });

    it('should strip a trailing .git from the repo', () => {
      const result = parseMarketplaceSource('acme/bundles.git', testDir);
      expect(result).toEqual({ success: true, data: { type: 'github', owner: 'acme', repo: 'bundles' } });
    });

    it('should trim surrounding whitespace', () => {
      const result = parseMarketplaceSource('  acme/bundles \n', testDir);
      expect(result).toEqual({ success: true, data: { type: 'github', owner: 'acme', repo: 'bundles' } });
    });

    it('should allow dots in repo names', () => {
      const result = parseMarketplaceSource('acme/team.bundles', testDir);
      expect(result).toEqual({ success: true, data: { type: 'github', owner: 'acme', repo: 'team.bundles' } });
    });

    it('should read a relative dir with one slash as owner/repo', async () => {
      await mkdir(join(testDir, 'docs', 'market'), { recursive: true });
      const result = parseMarketplaceSource('docs/market', testDir);
      expect(result).toEqual({ success: true, data: { type: 'github', owner: 'docs', repo: 'market' } });
    });
  });

  describe('git URLs', () => {
    it('should parse https URLs', () => {
      const result = parseMarketplaceSource('https://git.example.com/team/bundles.git', testDir);
      expect(result).toEqual({
        success: true,
        data: { type: 'git', url: 'https://git.example.com/team/bundles.git' },
      });
    });

    it('should parse ssh URLs', () => {
      const result = parseMarketplaceSource('ssh://git@git.example.com/team/bundles', testDir);
      expect(result).toEqual({
        success: true,
        data: { type: 'git', url: 'ssh://git@git.example.com/team/bundles' },
      });
    });

    it('should parse scp-style remotes', () => {
      const result = parseMarketplaceSource('git@github.com:acme/bundles.git', testDir);
      expect(result).toEqual({ success: true, data: { type: 'git', url: 'git@github.com:acme/bundles.git' } });
    });

    it('should treat a value ending in .git as a git URL', () => {
      const result = parseMarketplaceSource('bundles.git', testDir);
      expect(result).toEqual({ success: true, data: { type: 'git', url: 'bundles.git' } });
    });

    it('should resolve an existing relative .git path against the working directory', async () => {
      await mkdir(join(testDir, 'mirror.git'));
      const result = parseMarketplaceSource('mirror.git', testDir);
      expect(result).toEqual({ success: true, data: { type: 'git', url: join(testDir, 'mirror.git') } });
    });
  });

  describe('local paths', () => {
    it('should parse an absolute existing directory', async () => {
      const dir = join(testDir, 'catalog');
      await mkdir(dir);
      const result = parseMarketplaceSource(dir, testDir);
      expect(result).toEqual({ success: true, data: { type: 'local', path: dir } });
    });

    it('should resolve ./relative paths against the working directory', async () => {
      await mkdir(join(testDir, 'local-fixture'));
      const result = parseMarketplaceSource('./local-fixture', testDir);
      expect(result).toEqual({ success: true, data: { type: 'local', path: join(testDir, 'local-fixture') } });
    });

    it('should resolve nested relative paths', async () => {
      await mkdir(join(testDir, 'a', 'b', 'c'), { recursive: true });
      const result = parseMarketplaceSource('a/b/c', testDir);
      expect(result).toEqual({ success: true, data: { type: 'local', path: join(testDir, 'a', 'b', 'c') } });
    });
  });

  describe('invalid input', () => {
    it('should reject empty input', () => {
      const result = parseMarketplaceSource('   ', testDir);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(InvalidSourceError);
      expect(result.error.message).toBe("Invalid marketplace source '   ': source cannot be empty");
    });

    it('should reject a path that does not exist', () => {
      const result = parseMarketplaceSource('./missing-dir', testDir);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.source).toBe('./missing-dir');
      expect(result.error.acceptedFormats).toHaveLength(3);
    });

    it('should reject unsupported URL schemes', () => {
      const result = parseMarketplaceSource('ftp://files.example.com/bundles', testDir);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('INVALID_SOURCE');
      expect(result.error.hint).toContain('owner/repo (GitHub)');
    });
  });
});

describe('sourcesEqual', () => {
  it('should match identical GitHub sources', () => {
    expect(
      sourcesEqual({ type: 'github', owner: 'acme', repo: 'bundles' }, { type: 'github', owner: 'acme', repo: 'bundles' }),
    ).toBe(true);
  });

  it('should not match different repos', () => {
    expect(
      sourcesEqual({ type: 'github', owner: 'acme', repo: 'bundles' }, { type: 'github', owner: 'acme', repo: 'tools' }),
    ).toBe(false);
  });

  it('should not match across variants', () => {
    expect(
      sourcesEqual(
        { type: 'github', owner: 'acme', repo: 'bundles' },
        { type: 'git', url: 'https://github.com/acme/bundles.git' },
      ),
    ).toBe(false);
  });

  it('should compare local paths exactly', () => {
    expect(sourcesEqual({ type: 'local', path: '/srv/mp' }, { type: 'local', path: '/srv/mp' })).toBe(true);
    expect(sourcesEqual({ type: 'local', path: '/srv/mp' }, { type: 'local', path: '/srv/mp2' })).toBe(false);
  });
});

describe('deriveMarketplaceName', () => {
  it('should use the repo for GitHub sources', () => {
    expect(deriveMarketplaceName({ type: 'github', owner: 'acme', repo: 'bundles' })).toBe('bundles');
  });

  it('should use the last URL segment without .git', () => {
    expect(deriveMarketplaceName({ type: 'git', url: 'https://git.example.com/team/bundles.git' })).toBe('bundles');
  });

  it('should handle scp-style remotes', () => {
    expect(deriveMarketplaceName({ type: 'git', url: 'git@github.com:acme/tools.git' })).toBe('tools');
  });

  it('should use the directory basename for local sources', () => {
    expect(deriveMarketplaceName({ type: 'local', path: '/srv/mp/catalog' })).toBe('catalog');
  });
});

describe('formatSource / cloneUrlFor', () => {
  it('should format each variant', () => {
    expect(formatSource({ type: 'github', owner: 'acme', repo: 'bundles' })).toBe('acme/bundles');
    expect(formatSource({ type: 'git', url: 'https://git.example.com/x.git' })).toBe('https://git.example.com/x.git');
    expect(formatSource({ type: 'local', path: '/srv/mp' })).toBe('/srv/mp');
  });

  it('should clone GitHub sources over https', () => {
    expect(cloneUrlFor({ type: 'github', owner: 'acme', repo: 'bundles' })).toBe('https://github.com/acme/bundles.git');
  });

  it('should not clone local sources', () => {
    expect(cloneUrlFor({ type: 'local', path: '/srv/mp' })).toBeNull();
  });
});
