import type { KeyValueConnection } from "../kv.types";

interface MemoryEntry {
  readonly value: string;
  readonly expiresAtMs: number;
}

export interface InMemoryKeyValueOptions {
  readonly nowMs?: () => number;
}

export class InMemoryKeyValueConnection implements KeyValueConnection {
  readonly backend = "memory";
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly nowMs: () => number;

  constructor(options: InMemoryKeyValueOptions = {}) {
    this.nowMs = options.nowMs ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAtMs <= this.nowMs()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAtMs: this.nowMs() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
