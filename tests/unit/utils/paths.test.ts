import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  expandHome,
  findProjectRoot,
  getDataDir,
  getGlobalConfigDir,
  isPathInside,
  resolveWorkingDirectory,
} from '../../../src/utils/paths.js';

describe('paths', () => {
  beforeEach(() => {
    vi.stubEnv('HOME', '/home/tester');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~')).toBe('/home/tester');
      expect(expandHome('~/config')).toBe('/home/tester/config');
    });

    it('should leave other paths alone', () => {
      expect(expandHome('/etc/~x')).toBe('/etc/~x');
      expect(expandHome('~other')).toBe('~other');
    });
  });

  describe('getGlobalConfigDir / getDataDir', () => {
    it('should honour the XDG variables', () => {
      expect(getGlobalConfigDir({ XDG_CONFIG_HOME: '/xdg/config' })).toBe('/xdg/config/nova');
      expect(getDataDir({ XDG_DATA_HOME: '/xdg/data' })).toBe('/xdg/data/nova');
    });

    it('should fall back to the home directory', () => {
      expect(getGlobalConfigDir({})).toBe('/home/tester/.config/nova');
      expect(getDataDir({})).toBe('/home/tester/.local/share/nova');
    });

    it('should expand a tilde in XDG values', () => {
      expect(getDataDir({ XDG_DATA_HOME: '~/data' })).toBe('/home/tester/data/nova');
    });
  });

  describe('isPathInside', () => {
    it('should accept strict descendants only', () => {
      expect(isPathInside('/data/nova/marketplaces/bundles', '/data/nova/marketplaces')).toBe(true);
      expect(isPathInside('/data/nova/marketplaces', '/data/nova/marketplaces')).toBe(false);
      expect(isPathInside('/data/nova/marketplaces/../other', '/data/nova/marketplaces')).toBe(false);
      expect(isPathInside('/data/nova/marketplaces-2/x', '/data/nova/marketplaces')).toBe(false);
    });
  });

  describe('filesystem lookups', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), 'nova-paths-test-'));
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should resolve a file to its directory', async () => {
      const file = join(testDir, 'notes.txt');
      await writeFile(file, 'x');
      expect(resolveWorkingDirectory(file)).toBe(testDir);
      expect(resolveWorkingDirectory(testDir)).toBe(testDir);
    });

    it('should find the nearest ancestor with a .nova directory', async () => {
      const nested = join(testDir, 'repo', 'packages', 'app');
      await mkdir(join(testDir, 'repo', '.nova'), { recursive: true });
      await mkdir(nested, { recursive: true });

      expect(findProjectRoot(nested)).toBe(join(testDir, 'repo'));
    });

    it('should not treat a .nova file as a project marker', async () => {
      const dir = join(testDir, 'plain');
      await mkdir(dir);
      await writeFile(join(dir, '.nova'), 'not a directory');

      expect(findProjectRoot(dir)).not.toBe(dir);
    });
  });
});
