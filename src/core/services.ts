import type { EffectiveConfig } from '../models/config.js';
import type { ConfigValidationError } from '../models/errors.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { getDataDir } from '../utils/paths.js';
import { ok, type Result } from '../utils/result.js';
import { ConfigResolver } from './config-resolver.js';
import { FileConfigStore } from './config-store.js';
import type { CloneFn } from './git.js';
import { Marketplace } from './marketplace.js';
import { MarketplaceStateStore } from './marketplace-state.js';

export interface ServicesOptions {
  workingDir?: string;
  env?: NodeJS.ProcessEnv;
  cloneFn?: CloneFn;
}

export interface Services {
  config: FileConfigStore;
  effective: EffectiveConfig;
  marketplace: Marketplace;
  dataDir: string;
}

/**
 * Wire the config store, state store and marketplace orchestrator for one
 * invocation. Applies `logging.level` from the effective config, and the
 * `git` section to fetches.
 */
export async function createServices(
  options: ServicesOptions = {},
): Promise<Result<Services, ConfigValidationError>> {
  const env = options.env ?? process.env;
  const resolver = new ConfigResolver({ env, logger: createLogger('config') });
  const config = new FileConfigStore({
    env,
    resolver,
    ...(options.workingDir !== undefined && { workingDir: options.workingDir }),
  });

  const effective = await config.resolve();
  if (!effective.success) return effective;

  const { logging, git } = effective.data;
  if (logging?.level) {
    setLogLevel(logging.level);
  }

  const dataDir = getDataDir(env);
  const marketplace = new Marketplace({
    config,
    state: MarketplaceStateStore.forDataDir(dataDir),
    dataDir,
    fetch: {
      ...(git?.depth !== undefined && { depth: git.depth }),
      ...(git?.clone_timeout_ms !== undefined && { timeoutMs: git.clone_timeout_ms }),
      ...(options.cloneFn !== undefined && { cloneFn: options.cloneFn }),
    },
  });

  return ok({ config, effective: effective.data, marketplace, dataDir });
}
