import { MARKETPLACES_NAMESPACE } from '../constants.js';
import {
  MarketplaceStateError,
  type DataStoreKeyNotFoundError,
  type DataStoreReadError,
  type DataStoreWriteError,
} from '../models/errors.js';
import { MarketplaceStateSchema, type MarketplaceState } from '../models/marketplace.js';
import { err, ok, type Result } from '../utils/result.js';
import { FileDataStore, type DataStore } from './datastore.js';

export type StateLoadError = DataStoreKeyNotFoundError | DataStoreReadError | MarketplaceStateError;

/**
 * Installation records for marketplaces, keyed by name.
 * Thin typed layer over a DataStore namespace.
 */
export class MarketplaceStateStore {
  constructor(private readonly store: DataStore) {}

  static forDataDir(dataDir: string): MarketplaceStateStore {
    return new MarketplaceStateStore(new FileDataStore(MARKETPLACES_NAMESPACE, dataDir));
  }

  async load(name: string): Promise<Result<MarketplaceState, StateLoadError>> {
    const raw = await this.store.load(name);
    if (!raw.success) return raw;

    const parsed = MarketplaceStateSchema.safeParse(raw.data);
    if (!parsed.success) {
      const detail = parsed.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('; ');
      return err(new MarketplaceStateError(name, detail));
    }
    if (parsed.data.name !== name) {
      return err(new MarketplaceStateError(name, `record belongs to '${parsed.data.name}'`));
    }
    return ok(parsed.data);
  }

  async save(state: MarketplaceState): Promise<Result<void, DataStoreWriteError>> {
    return this.store.save(state.name, state);
  }

  async delete(
    name: string,
  ): Promise<Result<void, DataStoreKeyNotFoundError | DataStoreReadError | DataStoreWriteError>> {
    return this.store.delete(name);
  }

  async names(): Promise<Result<string[], DataStoreReadError>> {
    return this.store.keys();
  }
}
