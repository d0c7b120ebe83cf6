import {
  RecoverableCollaboratorFailure,
  asMessage,
} from "../core/errors/errors";
import { OperationTimeoutError, withTimeout } from "../core/_shared/utils/with_timeout";
import type { KeyValueConnection } from "../adapter/storage/kv.types";
import { KeyedLock } from "./keyed_lock";
import { decodeSession, encodeSession, sessionKey } from "./session.codec";
import type { Session, SessionStore, Turn, TurnInput } from "./session.types";

export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;
export const DEFAULT_STORE_TIMEOUT_MS = 2000;

export type ConnectionSource = () => Promise<KeyValueConnection>;

export interface KeyValueSessionStoreOptions {
  readonly ttlSeconds?: number;
  readonly timeoutMs?: number;
  readonly nowMs?: () => number;
}

export class KeyValueSessionStore implements SessionStore {
  private readonly connectionSource: ConnectionSource;
  private readonly ttlSeconds: number;
  private readonly timeoutMs: number;
  private readonly nowMs: () => number;
  private readonly appendLock = new KeyedLock();

  /**
   * `connection` may be a fixed connection or a resolver called before every
   * operation, so a registry-held connection can be swapped after recovery.
   */
  constructor(
    connection: KeyValueConnection | ConnectionSource,
    options: KeyValueSessionStoreOptions = {}
  ) {
    this.connectionSource =
      typeof connection === "function" ? connection : async () => connection;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.nowMs = options.nowMs ?? Date.now;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    return this.readSession(sessionId);
  }

  /** Absent sessions come back empty and are not written. */
  async getSessionHistory(sessionId: string): Promise<Session> {
    const session = await this.readSession(sessionId);
    if (session) {
      return session;
    }
    const now = this.nowMs();
    return {
      id: sessionId,
      turns: [],
      createdAt: now,
      lastUpdated: now,
      ttlSeconds: this.ttlSeconds,
    };
  }

  appendTurn(sessionId: string, input: TurnInput): Promise<Session> {
    return this.appendLock.run(sessionId, async () => {
      const existing = await this.readSession(sessionId);
      const now = this.nowMs();
      const lastTurnNumber = existing?.turns.at(-1)?.turnNumber ?? 0;
      const turn: Turn = {
        turnNumber: lastTurnNumber + 1,
        userQuery: input.userQuery,
        detectedCategories: [...input.detectedCategories],
        recommendedIds: [...input.recommendedIds],
        ...(input.excludedIds && input.excludedIds.length > 0
          ? { excludedIds: [...input.excludedIds] }
          : {}),
        tier: input.tier,
        timestamp: now,
      };
      const next: Session = {
        id: sessionId,
        turns: [...(existing?.turns ?? []), turn],
        createdAt: existing?.createdAt ?? now,
        lastUpdated: now,
        ttlSeconds: this.ttlSeconds,
      };

      await this.call(`set ${sessionId}`, (connection) =>
        connection.set(sessionKey(sessionId), encodeSession(next), this.ttlSeconds)
      );
      return next;
    });
  }

  private async readSession(sessionId: string): Promise<Session | null> {
    const serialized = await this.call(`get ${sessionId}`, (connection) =>
      connection.get(sessionKey(sessionId))
    );
    if (serialized === null) {
      return null;
    }

    let session: Session;
    try {
      session = decodeSession(serialized);
    } catch (error) {
      throw new RecoverableCollaboratorFailure(
        "session_store",
        `SESSION_STORE_CORRUPT session=${sessionId}: ${asMessage(error)}`,
        { cause: error }
      );
    }

    if (session.lastUpdated + session.ttlSeconds * 1000 <= this.nowMs()) {
      return null;
    }
    return session;
  }

  private async call<T>(
    label: string,
    operation: (connection: KeyValueConnection) => Promise<T>
  ): Promise<T> {
    try {
      const connection = await this.connectionSource();
      return await withTimeout(operation(connection), this.timeoutMs, `session_store ${label}`);
    } catch (error) {
      if (error instanceof RecoverableCollaboratorFailure) {
        throw error;
      }
      const prefix =
        error instanceof OperationTimeoutError ? "SESSION_STORE_TIMEOUT" : "SESSION_STORE_ERROR";
      throw new RecoverableCollaboratorFailure(
        "session_store",
        `${prefix} ${label}: ${asMessage(error)}`,
        { cause: error }
      );
    }
  }
}
