import { Storage, StorageModule } from "../types";

export class NoStorage implements Storage {
  public async get(_path: string): Promise<Buffer | undefined> {
    return undefined;
  }

  public async put(_path: string, _buffer: Buffer): Promise<void> {}
}

export const MEMORY_STORAGE_MAX_ENTRIES = 1000;

/**
 * Process-local storage shared by every request. Holds at most
 * `maxEntries` images; the least recently used one is dropped first.
 */
export class MemoryStorage implements Storage {
  private entries = new Map<string, Buffer>();

  constructor(private readonly maxEntries = MEMORY_STORAGE_MAX_ENTRIES) {}

  public get size(): number {
    return this.entries.size;
  }

  public async get(path: string): Promise<Buffer | undefined> {
    const buffer = this.entries.get(path);
    if (buffer) {
      this.entries.delete(path);
      this.entries.set(path, buffer);
    }
    return buffer;
  }

  public async put(path: string, buffer: Buffer): Promise<void> {
    this.entries.delete(path);
    this.entries.set(path, buffer);

    // Map iteration order is insertion order, oldest first
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(key);
    }
  }
}

export const noStorageModule: StorageModule = {
  create: () => new NoStorage(),
};

export function createMemoryStorageModule(
  maxEntries = MEMORY_STORAGE_MAX_ENTRIES,
): StorageModule {
  const shared = new MemoryStorage(maxEntries);
  return { create: () => shared };
}
