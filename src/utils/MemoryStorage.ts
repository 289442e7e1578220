/**
 * Synchronous key/value storage the settings and the keychain persist into.
 * Values must be JSON-compatible.
 */
export interface KeyValueStorage {
  getItem(key: string): unknown;
  setItem(key: string, value: unknown): void;
  removeItem(key: string): void;
}

/**
 * In-memory storage, used by default and in tests.
 */
export class MemoryStorage implements KeyValueStorage {
  private readonly items = new Map<string, unknown>();

  /**
   * Get a stored value, or null when the key is absent.
   */
  public getItem(key: string): unknown {
    return this.items.has(key) ? this.items.get(key) : null;
  }

  /**
   * Store a value under a key.
   */
  public setItem(key: string, value: unknown): void {
    this.items.set(key, value);
  }

  /**
   * Remove a key.
   */
  public removeItem(key: string): void {
    this.items.delete(key);
  }
}
