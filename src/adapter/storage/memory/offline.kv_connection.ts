import { RecoverableCollaboratorFailure } from "../../../core/errors/errors";
import type { KeyValueConnection } from "../kv.types";

/** Stand-in while the real backend is unreachable: every call fails immediately. */
export class OfflineKeyValueConnection implements KeyValueConnection {
  readonly backend = "offline";

  constructor(private readonly reason: string = "backend unavailable") {}

  async get(key: string): Promise<string | null> {
    throw this.failure(`get ${key}`);
  }

  async set(key: string, _value: string, _ttlSeconds: number): Promise<void> {
    throw this.failure(`set ${key}`);
  }

  async delete(key: string): Promise<void> {
    throw this.failure(`delete ${key}`);
  }

  async ping(): Promise<void> {
    throw this.failure("ping");
  }

  async close(): Promise<void> {}

  private failure(operation: string): RecoverableCollaboratorFailure {
    return new RecoverableCollaboratorFailure(
      "session_store",
      `SESSION_BACKEND_OFFLINE ${operation}: ${this.reason}`
    );
  }
}
