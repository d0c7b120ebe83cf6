import type { CategoryLabel } from "../core/taxonomy/taxonomy.types";
import type { ItemId, TierKind } from "../core/resolver/resolver.types";

export interface Turn {
  readonly turnNumber: number;
  readonly userQuery: string;
  readonly detectedCategories: readonly CategoryLabel[];
  readonly recommendedIds: readonly ItemId[];
  /** Ids the caller excluded on this turn; they stay excluded for the rest of the session. */
  readonly excludedIds?: readonly ItemId[];
  readonly tier: TierKind;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

export type TurnInput = Omit<Turn, "turnNumber" | "timestamp">;

export interface Session {
  readonly id: string;
  readonly turns: readonly Turn[];
  readonly createdAt: number;
  readonly lastUpdated: number;
  readonly ttlSeconds: number;
}

export interface SessionStore {
  getSession(sessionId: string): Promise<Session | null>;
  appendTurn(sessionId: string, turn: TurnInput): Promise<Session>;
}
