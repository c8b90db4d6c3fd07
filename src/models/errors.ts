import { SOURCE_FORMAT_HINTS } from '../constants.js';
import type { ConfigScope } from './config.js';
import type { MarketplaceSource } from './marketplace.js';

/**
 * Base class for expected failures. These are returned inside a Result,
 * never thrown; `hint` is the actionable line the CLI prints under the error.
 */
export abstract class NovaError extends Error {
  abstract readonly code: string;
  readonly hint: string | undefined;

  constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.hint = options.hint;
  }
}

/**
 * Field-level validation problem ("bundles.0.name: Required")
 */
export interface FieldIssue {
  field: string;
  message: string;
}

// =============================================================================
// Source / fetch / manifest
// =============================================================================

export class InvalidSourceError extends NovaError {
  readonly code = 'INVALID_SOURCE';
  readonly source: string;
  readonly acceptedFormats: readonly string[] = SOURCE_FORMAT_HINTS;

  constructor(source: string, reason?: string) {
    super(
      reason
        ? `Invalid marketplace source '${source}': ${reason}`
        : `Invalid marketplace source '${source}'`,
      { hint: `valid formats are: ${SOURCE_FORMAT_HINTS.join(', ')}` },
    );
    this.source = source;
  }
}

export class FetchError extends NovaError {
  readonly code = 'FETCH_FAILED';
  readonly source: string;
  readonly isTimeout: boolean;
  readonly isAuthError: boolean;

  constructor(
    source: string,
    message: string,
    options: { cause?: unknown; isTimeout?: boolean; isAuthError?: boolean } = {},
  ) {
    super(message, {
      hint: 'verify the source is accessible and contains a valid marketplace',
      cause: options.cause,
    });
    this.source = source;
    this.isTimeout = options.isTimeout ?? false;
    this.isAuthError = options.isAuthError ?? false;
  }
}

export class ManifestNotFoundError extends NovaError {
  readonly code = 'MANIFEST_NOT_FOUND';
  readonly expectedPath: string;

  constructor(expectedPath: string) {
    super(`Marketplace manifest not found: ${expectedPath}`, {
      hint: 'ensure marketplace.json exists at the repository root',
    });
    this.expectedPath = expectedPath;
  }
}

export class ManifestValidationError extends NovaError {
  readonly code = 'MANIFEST_INVALID';
  readonly path: string;
  readonly issues: FieldIssue[];

  constructor(path: string, issues: FieldIssue[]) {
    const details = issues.map((i) => `  - ${i.field}: ${i.message}`).join('\n');
    super(`Invalid marketplace manifest ${path}:\n${details}`);
    this.path = path;
    this.issues = issues;
  }
}

// =============================================================================
// Marketplace orchestration
// =============================================================================

export class MarketplaceAlreadyExistsError extends NovaError {
  readonly code = 'MARKETPLACE_EXISTS';
  readonly marketplaceName: string;
  readonly existingSource: MarketplaceSource;
  readonly existingScope: ConfigScope;

  constructor(name: string, existingSource: MarketplaceSource, existingScope: ConfigScope) {
    super(`Marketplace '${name}' already exists (${existingScope})`, {
      hint: `use 'nova marketplace remove ${name}' to replace it`,
    });
    this.marketplaceName = name;
    this.existingSource = existingSource;
    this.existingScope = existingScope;
  }
}

export class MarketplaceNotFoundError extends NovaError {
  readonly code = 'MARKETPLACE_NOT_FOUND';
  readonly nameOrSource: string;
  readonly scope: ConfigScope | undefined;

  constructor(nameOrSource: string, scope?: ConfigScope) {
    super(
      scope
        ? `Marketplace '${nameOrSource}' not found in ${scope} config`
        : `Marketplace '${nameOrSource}' not found`,
      { hint: "use 'nova marketplace list' to see configured marketplaces" },
    );
    this.nameOrSource = nameOrSource;
    this.scope = scope;
  }
}

export class MarketplaceRemoveError extends NovaError {
  readonly code = 'MARKETPLACE_REMOVE_FAILED';
  readonly marketplaceName: string;

  constructor(name: string, message: string, cause?: unknown) {
    super(`Failed to remove marketplace '${name}': ${message}`, {
      hint: 'the configuration entry was kept; fix the problem and run the command again',
      cause,
    });
    this.marketplaceName = name;
  }
}

/**
 * A commit step of `add` failed and undoing the installation failed too.
 * Carries both the original failure and every rollback failure.
 */
export class MarketplaceRollbackError extends NovaError {
  readonly code = 'MARKETPLACE_ROLLBACK_FAILED';
  readonly marketplaceName: string;
  readonly original: NovaError;
  readonly rollbackErrors: Error[];

  constructor(name: string, original: NovaError, rollbackErrors: Error[]) {
    const reasons = rollbackErrors.map((e) => `  - ${e.message}`).join('\n');
    super(
      `Failed to add marketplace '${name}': ${original.message}\nRollback also failed, the installation may be partial:\n${reasons}`,
      { hint: "run 'nova marketplace prune' to clean up leftover files", cause: original },
    );
    this.marketplaceName = name;
    this.original = original;
    this.rollbackErrors = rollbackErrors;
  }
}

export class MarketplaceStateError extends NovaError {
  readonly code = 'MARKETPLACE_STATE_INVALID';
  readonly marketplaceName: string;

  constructor(name: string, message: string) {
    super(`Marketplace '${name}' state is invalid: ${message}`);
    this.marketplaceName = name;
  }
}

export class OperationCancelledError extends NovaError {
  readonly code = 'CANCELLED';
  readonly stage: string;

  constructor(stage: string) {
    super(`Operation cancelled during ${stage}; nothing was installed`);
    this.stage = stage;
  }
}

// =============================================================================
// Configuration
// =============================================================================

export class ConfigValidationError extends NovaError {
  readonly code = 'CONFIG_INVALID';
  readonly scope: ConfigScope;
  readonly path: string;
  readonly field: string | null;

  constructor(scope: ConfigScope, path: string, field: string | null, message: string) {
    super(`[${scope}] ${path}: ${field ? `${field}: ` : ''}${message}`);
    this.scope = scope;
    this.path = path;
    this.field = field;
  }
}

export class ConfigWriteError extends NovaError {
  readonly code = 'CONFIG_WRITE_FAILED';
  readonly scope: ConfigScope;
  readonly path: string;

  constructor(scope: ConfigScope, path: string, cause: unknown) {
    super(`[${scope}] Failed to write ${path}: ${describeError(cause)}`, { cause });
    this.scope = scope;
    this.path = path;
  }
}

export type ConfigError = ConfigValidationError | ConfigWriteError;

// =============================================================================
// DataStore
// =============================================================================

export class DataStoreKeyNotFoundError extends NovaError {
  readonly code = 'DATASTORE_KEY_NOT_FOUND';
  readonly namespace: string;
  readonly key: string;

  constructor(namespace: string, key: string) {
    super(`Key '${key}' not found in namespace '${namespace}'`);
    this.namespace = namespace;
    this.key = key;
  }
}

export class DataStoreReadError extends NovaError {
  readonly code = 'DATASTORE_READ_FAILED';
  readonly namespace: string;

  constructor(namespace: string, cause: unknown) {
    super(`Failed to read data store '${namespace}': ${describeError(cause)}`, { cause });
    this.namespace = namespace;
  }
}

export class DataStoreWriteError extends NovaError {
  readonly code = 'DATASTORE_WRITE_FAILED';
  readonly namespace: string;

  constructor(namespace: string, cause: unknown) {
    super(`Failed to write data store '${namespace}': ${describeError(cause)}`, { cause });
    this.namespace = namespace;
  }
}

export type DataStoreError = DataStoreKeyNotFoundError | DataStoreReadError | DataStoreWriteError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
