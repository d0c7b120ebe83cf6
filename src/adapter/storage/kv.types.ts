/**
 * Minimal key-value contract the session store needs: read, write with TTL,
 * delete. Values are opaque strings. No compare-and-swap is assumed; callers
 * serialize their own read-modify-write.
 */
export interface KeyValueConnection {
  readonly backend: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
