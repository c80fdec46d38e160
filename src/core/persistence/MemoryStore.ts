import { PersistentStore } from './PersistentStore';

/** In-process store for tests and for hosts without a cache directory. */
export class MemoryStore implements PersistentStore {
  readonly contents = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.contents.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.contents.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.contents.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.contents.keys()];
  }
}
