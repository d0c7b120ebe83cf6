import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../../src/core/errors/errors";

export const SESSION_BACKENDS = ["sqlite", "memory"] as const;

export type SessionBackend = (typeof SESSION_BACKENDS)[number];

export interface RuntimeConfig {
  readonly sessionBackend: SessionBackend;
  readonly sqlitePath: string;
  readonly sessionTtlSeconds: number;
  readonly storeTimeoutMs: number;
  readonly supplierTimeoutMs: number;
  readonly breakerThreshold: number;
  readonly breakerCooldownMs: number;
  readonly taxonomyPath: string;
  readonly catalogPath?: string;
  readonly personalizedLimit: number;
  readonly diverseLimit: number;
}

export interface RuntimeConfigArgs {
  readonly sessionBackend?: string;
  readonly sqlitePath?: string;
  readonly catalogPath?: string;
  readonly taxonomyPath?: string;
}

export interface RuntimeConfigEnv {
  readonly RECO_SESSION_BACKEND?: string;
  readonly RECO_SQLITE_PATH?: string;
  readonly RECO_SESSION_TTL_SECONDS?: string;
  readonly RECO_STORE_TIMEOUT_MS?: string;
  readonly RECO_SUPPLIER_TIMEOUT_MS?: string;
  readonly RECO_BREAKER_THRESHOLD?: string;
  readonly RECO_BREAKER_COOLDOWN_MS?: string;
  readonly RECO_TAXONOMY_PATH?: string;
  readonly RECO_CATALOG_PATH?: string;
  readonly RECO_PERSONALIZED_LIMIT?: string;
  readonly RECO_DIVERSE_LIMIT?: string;
}

export const DEFAULT_SQLITE_PATH = path.join("ops", "runtime", "sessions.db");

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL("../../data/taxonomy.default.json", import.meta.url)
);

const DEFAULTS = {
  sessionTtlSeconds: 86400,
  storeTimeoutMs: 2000,
  supplierTimeoutMs: 3000,
  breakerThreshold: 3,
  breakerCooldownMs: 60000,
  personalizedLimit: 3,
  diverseLimit: 5,
} as const;

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parsePositiveInteger(
  value: string | undefined,
  field: string,
  fallback: number
): number {
  const raw = toTrimmedString(value);
  if (raw === undefined) {
    return fallback;
  }
  const num = Number(raw);
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  if (num <= 0) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be > 0`);
  }
  return num;
}

function parseBackend(value: string): SessionBackend {
  const normalized = value.trim().toLowerCase();
  if (normalized === "sqlite" || normalized === "memory") {
    return normalized;
  }
  throw new ConfigurationError(
    `CONFIGURATION_ERROR unsupported session backend='${value}'. expected one of: ${SESSION_BACKENDS.join("|")}`
  );
}

export function resolveRuntimeConfig(
  args: RuntimeConfigArgs,
  env: RuntimeConfigEnv
): RuntimeConfig {
  const backendRaw =
    toTrimmedString(args.sessionBackend) ?? toTrimmedString(env.RECO_SESSION_BACKEND) ?? "sqlite";
  const sqlitePathRaw =
    toTrimmedString(args.sqlitePath) ??
    toTrimmedString(env.RECO_SQLITE_PATH) ??
    DEFAULT_SQLITE_PATH;
  const taxonomyPathRaw =
    toTrimmedString(args.taxonomyPath) ?? toTrimmedString(env.RECO_TAXONOMY_PATH);
  const catalogPathRaw =
    toTrimmedString(args.catalogPath) ?? toTrimmedString(env.RECO_CATALOG_PATH);

  return {
    sessionBackend: parseBackend(backendRaw),
    sqlitePath: path.resolve(sqlitePathRaw),
    sessionTtlSeconds: parsePositiveInteger(
      env.RECO_SESSION_TTL_SECONDS,
      "sessionTtlSeconds",
      DEFAULTS.sessionTtlSeconds
    ),
    storeTimeoutMs: parsePositiveInteger(
      env.RECO_STORE_TIMEOUT_MS,
      "storeTimeoutMs",
      DEFAULTS.storeTimeoutMs
    ),
    supplierTimeoutMs: parsePositiveInteger(
      env.RECO_SUPPLIER_TIMEOUT_MS,
      "supplierTimeoutMs",
      DEFAULTS.supplierTimeoutMs
    ),
    breakerThreshold: parsePositiveInteger(
      env.RECO_BREAKER_THRESHOLD,
      "breakerThreshold",
      DEFAULTS.breakerThreshold
    ),
    breakerCooldownMs: parsePositiveInteger(
      env.RECO_BREAKER_COOLDOWN_MS,
      "breakerCooldownMs",
      DEFAULTS.breakerCooldownMs
    ),
    taxonomyPath: taxonomyPathRaw ? path.resolve(taxonomyPathRaw) : DEFAULT_TAXONOMY_PATH,
    catalogPath: catalogPathRaw ? path.resolve(catalogPathRaw) : undefined,
    personalizedLimit: parsePositiveInteger(
      env.RECO_PERSONALIZED_LIMIT,
      "personalizedLimit",
      DEFAULTS.personalizedLimit
    ),
    diverseLimit: parsePositiveInteger(
      env.RECO_DIVERSE_LIMIT,
      "diverseLimit",
      DEFAULTS.diverseLimit
    ),
  };
}
