import { isRecord } from "../core/_shared/utils/is_record";
import { TIER_KINDS, type TierKind } from "../core/resolver/resolver.types";
import type { Session, Turn } from "./session.types";

export const SESSION_KEY_PREFIX = "session:";

export function sessionKey(sessionId: string): string {
  return `${SESSION_KEY_PREFIX}${sessionId}`;
}

function fail(detail: string): never {
  throw new Error(`SESSION_DECODE_ERROR ${detail}`);
}

function asRecord(value: unknown, field: string): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  return fail(`${field} must be an object`);
}

function asFiniteNumber(value: unknown, field: string): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return fail(`${field} must be a finite number`);
}

function asStringArray(value: unknown, field: string): string[] {
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return [...value];
  }
  return fail(`${field} must be an array of strings`);
}

function isTierKind(value: unknown): value is TierKind {
  return typeof value === "string" && (TIER_KINDS as readonly string[]).includes(value);
}

function decodeTurn(value: unknown, idx: number): Turn {
  const row = asRecord(value, `turns[${idx}]`);
  if (typeof row.userQuery !== "string") {
    fail(`turns[${idx}].userQuery must be a string`);
  }
  if (!isTierKind(row.tier)) {
    fail(`turns[${idx}].tier must be one of ${TIER_KINDS.join("|")}`);
  }
  return {
    turnNumber: asFiniteNumber(row.turnNumber, `turns[${idx}].turnNumber`),
    userQuery: row.userQuery,
    detectedCategories: asStringArray(row.detectedCategories, `turns[${idx}].detectedCategories`),
    recommendedIds: asStringArray(row.recommendedIds, `turns[${idx}].recommendedIds`),
    ...(row.excludedIds === undefined
      ? {}
      : { excludedIds: asStringArray(row.excludedIds, `turns[${idx}].excludedIds`) }),
    tier: row.tier,
    timestamp: asFiniteNumber(row.timestamp, `turns[${idx}].timestamp`),
  };
}

export function decodeSession(serialized: string): Session {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }

  const row = asRecord(parsed, "session");
  if (typeof row.id !== "string" || row.id === "") {
    fail("id must be a non-empty string");
  }
  if (!Array.isArray(row.turns)) {
    fail("turns must be an array");
  }

  return {
    id: row.id,
    turns: row.turns.map((turn, idx) => decodeTurn(turn, idx)),
    createdAt: asFiniteNumber(row.createdAt, "createdAt"),
    lastUpdated: asFiniteNumber(row.lastUpdated, "lastUpdated"),
    ttlSeconds: asFiniteNumber(row.ttlSeconds, "ttlSeconds"),
  };
}

export function encodeSession(session: Session): string {
  return JSON.stringify({
    id: session.id,
    turns: session.turns,
    createdAt: session.createdAt,
    lastUpdated: session.lastUpdated,
    ttlSeconds: session.ttlSeconds,
  });
}
