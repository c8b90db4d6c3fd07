/**
 * Get the user's home directory (cross-platform).
 */
export function getHomeDir(): string {
  return process.env.HOME || process.env.USERPROFILE || '~';
}

/**
 * Application name, used for XDG config and data directories
 */
export const APP_NAME = 'nova';

/**
 * Directory that marks a project root
 */
export const PROJECT_DIR = '.nova';

/**
 * Config filenames per scope
 */
export const GLOBAL_CONFIG_FILE = 'config.yaml';
export const PROJECT_CONFIG_FILE = 'config.yaml';
export const USER_CONFIG_FILE = 'config.local.yaml';

/**
 * Catalog manifest expected at the root of every marketplace
 */
export const MANIFEST_FILE = 'marketplace.json';

/**
 * DataStore namespace for marketplaces
 */
export const MARKETPLACES_NAMESPACE = 'marketplaces';

/**
 * Installed trees live here inside the namespace directory, apart from its data file
 */
export const INSTALLS_DIR = 'installs';

/**
 * DataStore file inside each namespace directory
 */
export const DATA_FILE = 'data.json';

/**
 * Prefix for environment overrides: NOVA_CONFIG__<SECTION>__<FIELD>
 */
export const ENV_CONFIG_PREFIX = 'NOVA_CONFIG__';

/**
 * Log level override read before any config file is loaded
 */
export const ENV_LOG_LEVEL = 'NOVA_LOG_LEVEL';

export const DEFAULT_CLONE_TIMEOUT_MS = 60_000;
export const DEFAULT_CLONE_DEPTH = 1;

/**
 * Accepted marketplace source formats, shown when a source cannot be parsed
 */
export const SOURCE_FORMAT_HINTS = [
  'owner/repo (GitHub)',
  'https://git.example.com/team/bundles.git (git URL)',
  './path/to/marketplace (local directory)',
] as const;
