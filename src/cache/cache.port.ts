/**
 * Best-effort JSON key/value store fronting the database.
 *
 * Every operation is independently fault-tolerant: connectivity or
 * serialisation errors are logged by the implementation and surface as a
 * miss (`null`) or `false`, never as a thrown error.
 */
export interface CachePort {
  getJson<T = unknown>(key: string): Promise<T | null>;

  /** `ttlSeconds <= 0` stores the value without expiry. */
  setJson(key: string, value: unknown, ttlSeconds: number): Promise<boolean>;

  /** Resolves `true` when the key is gone afterwards, including when it never existed. */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;

  /**
   * Deletes `key` and resolves `true` only if this call removed a live entry.
   * Of two concurrent calls on the same key at most one sees `true`.
   */
  take(key: string): Promise<boolean>;
}
