/**
 * String-keyed blob store backing the persistent cache tier.
 * Values are opaque to the store; the cache serializes and validates them.
 */
export interface PersistentStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
  keys(): Promise<string[]>;
}
