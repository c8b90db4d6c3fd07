import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() }).passthrough();

export type PackageJson = z.infer<typeof PackageJsonSchema>;

/**
 * Find and read the nearest package.json by walking up from the caller's location.
 * Works from src/cli/ (tests, tsx) and from dist/cli/ (built).
 */
export function findPackageJson(callerUrl: string): PackageJson {
  let dir = dirname(fileURLToPath(callerUrl));
  while (dir !== dirname(dir)) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return PackageJsonSchema.parse(JSON.parse(readFileSync(candidate, 'utf-8')));
    }
    dir = dirname(dir);
  }
  throw new Error('package.json not found');
}
