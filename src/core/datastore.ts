import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { DATA_FILE } from '../constants.js';
import {
  DataStoreKeyNotFoundError,
  DataStoreReadError,
  DataStoreWriteError,
} from '../models/errors.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { err, ok, type Result } from '../utils/result.js';

/**
 * Key-value persistence for one namespace. Values are JSON-serializable;
 * callers validate what they load.
 */
export interface DataStore {
  readonly namespace: string;
  load(key: string): Promise<Result<unknown, DataStoreKeyNotFoundError | DataStoreReadError>>;
  save(key: string, value: unknown): Promise<Result<void, DataStoreWriteError>>;
  delete(
    key: string,
  ): Promise<Result<void, DataStoreKeyNotFoundError | DataStoreReadError | DataStoreWriteError>>;
  keys(): Promise<Result<string[], DataStoreReadError>>;
}

const DataFileSchema = z.record(z.string(), z.unknown());

type DataFile = z.infer<typeof DataFileSchema>;

/**
 * DataStore backed by `<dataDir>/<namespace>/data.json`.
 * A missing file is an empty store; every write replaces the file atomically.
 */
export class FileDataStore implements DataStore {
  readonly namespace: string;
  readonly filePath: string;

  constructor(namespace: string, dataDir: string) {
    this.namespace = namespace;
    this.filePath = join(dataDir, namespace, DATA_FILE);
  }

  async load(key: string): Promise<Result<unknown, DataStoreKeyNotFoundError | DataStoreReadError>> {
    const data = await this.readAll();
    if (!data.success) return data;

    if (!Object.hasOwn(data.data, key)) {
      return err(new DataStoreKeyNotFoundError(this.namespace, key));
    }
    return ok(data.data[key]);
  }

  async save(key: string, value: unknown): Promise<Result<void, DataStoreWriteError>> {
    const data = await this.readAll();
    if (!data.success) {
      // Refuse to overwrite a file we could not parse
      return err(new DataStoreWriteError(this.namespace, data.error));
    }

    return this.writeAll({ ...data.data, [key]: value });
  }

  async delete(
    key: string,
  ): Promise<Result<void, DataStoreKeyNotFoundError | DataStoreReadError | DataStoreWriteError>> {
    const data = await this.readAll();
    if (!data.success) return data;

    if (!Object.hasOwn(data.data, key)) {
      return err(new DataStoreKeyNotFoundError(this.namespace, key));
    }

    const { [key]: _removed, ...rest } = data.data;
    return this.writeAll(rest);
  }

  async keys(): Promise<Result<string[], DataStoreReadError>> {
    const data = await this.readAll();
    if (!data.success) return data;
    return ok(Object.keys(data.data).sort());
  }

  private async readAll(): Promise<Result<DataFile, DataStoreReadError>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return ok({});
      }
      return err(new DataStoreReadError(this.namespace, error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return err(new DataStoreReadError(this.namespace, error));
    }

    const result = DataFileSchema.safeParse(parsed);
    if (!result.success) {
      return err(new DataStoreReadError(this.namespace, new Error(`${this.filePath} is not a JSON object`)));
    }
    return ok(result.data);
  }

  private async writeAll(data: DataFile): Promise<Result<void, DataStoreWriteError>> {
    try {
      await writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
      return ok(undefined);
    } catch (error) {
      return err(new DataStoreWriteError(this.namespace, error));
    }
  }
}
