import { ConfigurationError, MissingCapabilityError, asMessage } from "../../src/core/errors/errors";
import { TaxonomyProvider } from "../../src/core/taxonomy/taxonomy.provider";
import { DiversificationResolver } from "../../src/core/resolver/diversification.resolver";
import type { CandidatePoolSupplier } from "../../src/core/resolver/resolver.types";
import type { KeyValueConnection } from "../../src/adapter/storage/kv.types";
import { InMemoryKeyValueConnection } from "../../src/adapter/storage/memory/in_memory.kv_connection";
import { OfflineKeyValueConnection } from "../../src/adapter/storage/memory/offline.kv_connection";
import { CatalogCandidateSupplier } from "../../src/adapter/candidates/catalog.candidate_supplier";
import { KeyValueSessionStore } from "../../src/session/kv_session.store";
import type { RuntimeConfig } from "../config/runtime.config";
import { RecommendationService } from "../orchestrator/recommendation.service";
import { SingletonRegistry } from "./singleton.registry";

export interface RuntimeComponentMap {
  taxonomy: TaxonomyProvider;
  kvConnection: KeyValueConnection;
  sessionStore: KeyValueSessionStore;
  candidateSupplier: CandidatePoolSupplier;
  resolver: DiversificationResolver;
  service: RecommendationService;
}

export interface RuntimeComponentOverrides {
  /** Used when no catalog path is configured. */
  readonly supplier?: CandidatePoolSupplier;
  /** Replaces the configured session backend. */
  readonly openConnection?: () => Promise<KeyValueConnection> | KeyValueConnection;
  readonly nowMs?: () => number;
  readonly onWarn?: (message: string) => void;
}

export type RuntimeComponents = SingletonRegistry<RuntimeComponentMap>;

const NATIVE_BINDING_PATTERN = /bindings|NODE_MODULE_VERSION|invalid ELF header|Cannot find module/i;

async function openSqliteConnection(
  dbPath: string,
  nowMs: (() => number) | undefined
): Promise<KeyValueConnection> {
  let sqlite: typeof import("../../src/adapter/storage/sqlite/sqlite.kv_connection");
  try {
    sqlite = await import("../../src/adapter/storage/sqlite/sqlite.kv_connection");
  } catch (error) {
    throw new MissingCapabilityError("better-sqlite3", { cause: error });
  }
  try {
    return sqlite.SQLiteKeyValueConnection.open({ dbPath, nowMs });
  } catch (error) {
    if (NATIVE_BINDING_PATTERN.test(asMessage(error))) {
      throw new MissingCapabilityError("better-sqlite3", { cause: error });
    }
    throw error;
  }
}

/** A connection that cannot answer a ping is closed and reported as a construction failure. */
async function openVerified(
  open: () => Promise<KeyValueConnection> | KeyValueConnection
): Promise<KeyValueConnection> {
  const connection = await open();
  try {
    await connection.ping();
  } catch (error) {
    await connection.close();
    throw error;
  }
  return connection;
}

export function createRuntimeComponents(
  config: RuntimeConfig,
  overrides: RuntimeComponentOverrides = {}
): RuntimeComponents {
  const onWarn = overrides.onWarn ?? ((message: string) => console.warn(message));

  const registry: RuntimeComponents = new SingletonRegistry<RuntimeComponentMap>(
    {
      taxonomy: {
        create: () => TaxonomyProvider.fromFile(config.taxonomyPath),
      },
      kvConnection: {
        create: () =>
          openVerified(() => {
            if (overrides.openConnection) {
              return overrides.openConnection();
            }
            if (config.sessionBackend === "memory") {
              return new InMemoryKeyValueConnection({ nowMs: overrides.nowMs });
            }
            return openSqliteConnection(config.sqlitePath, overrides.nowMs);
          }),
        createBaseline: () => {
          onWarn("SESSION_BACKEND_BASELINE using in-memory sessions; better-sqlite3 is unavailable");
          return new InMemoryKeyValueConnection({ nowMs: overrides.nowMs });
        },
        fallback: () => new OfflineKeyValueConnection(`${config.sessionBackend} backend unavailable`),
        breaker: {
          failureThreshold: config.breakerThreshold,
          cooldownMs: config.breakerCooldownMs,
        },
        constructTimeoutMs: config.storeTimeoutMs,
      },
      sessionStore: {
        create: () =>
          new KeyValueSessionStore(() => registry.get("kvConnection"), {
            ttlSeconds: config.sessionTtlSeconds,
            timeoutMs: config.storeTimeoutMs,
            nowMs: overrides.nowMs,
          }),
      },
      candidateSupplier: {
        create: () => {
          if (config.catalogPath) {
            return CatalogCandidateSupplier.fromFile(config.catalogPath);
          }
          if (overrides.supplier) {
            return overrides.supplier;
          }
          throw new ConfigurationError(
            "CONFIGURATION_ERROR no candidate supplier: set RECO_CATALOG_PATH or pass --catalog"
          );
        },
      },
      resolver: {
        create: async () =>
          new DiversificationResolver(
            {
              taxonomy: await registry.get("taxonomy"),
              sessionStore: await registry.get("sessionStore"),
              supplier: await registry.get("candidateSupplier"),
            },
            {
              supplierTimeoutMs: config.supplierTimeoutMs,
              personalizedLimit: config.personalizedLimit,
              diverseLimit: config.diverseLimit,
              onWarn,
            }
          ),
      },
      service: {
        create: async () =>
          new RecommendationService({
            resolver: await registry.get("resolver"),
            sessionStore: await registry.get("sessionStore"),
            onWarn,
          }),
      },
    },
    { nowMs: overrides.nowMs, onWarn }
  );

  return registry;
}
