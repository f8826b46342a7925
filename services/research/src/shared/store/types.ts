/**
 * Store Types
 * Interface for the artifact persistence layer
 */

/**
 * Store interface - abstracts artifact persistence
 *
 * Keys are slash-separated paths ("run-abc/plan"); implementations decide
 * how a key maps to a location.
 */
export interface IStore {
  /**
   * Read data from store, null when the key is absent
   */
  read<T>(key: string): Promise<T | null>;

  write<T>(key: string, data: T): Promise<void>;

  exists(key: string): Promise<boolean>;

  /**
   * List keys containing pattern
   */
  list(pattern?: string): Promise<string[]>;

  /**
   * Get the actual path/location for a key
   */
  getPath(key: string): string;
}

export interface StoreOptions {
  /** Base directory or namespace */
  basePath: string;

  /** Pretty print JSON */
  prettyPrint?: boolean;
}
