import { MissingCapabilityError, asMessage } from "../../src/core/errors/errors";
import { OperationTimeoutError, withTimeout } from "../../src/core/_shared/utils/with_timeout";
import { AsyncMutex } from "./async_mutex";
import { CircuitBreaker, type CircuitBreakerStats } from "./circuit_breaker";

export interface ComponentDefinition<T> {
  /** Preferred variant. */
  create(): Promise<T> | T;
  /** Used when `create` reports a missing optional capability. */
  createBaseline?(): Promise<T> | T;
  /** Returned, never cached, while construction is failing or the circuit is open. */
  fallback?(): T;
  readonly breaker?: {
    readonly failureThreshold: number;
    readonly cooldownMs: number;
  };
  readonly constructTimeoutMs?: number;
  dispose?(instance: T): Promise<void> | void;
}

export type ComponentDefinitions<TMap> = {
  readonly [K in keyof TMap]: ComponentDefinition<TMap[K]>;
};

export interface SingletonRegistryOptions {
  readonly nowMs?: () => number;
  readonly onWarn?: (message: string) => void;
}

export interface ComponentStats {
  readonly constructed: boolean;
  readonly constructions: number;
  readonly circuit: CircuitBreakerStats | null;
}

interface Entry<T> {
  holder: { readonly value: T } | null;
  readonly mutex: AsyncMutex;
  readonly breaker: CircuitBreaker | null;
  constructions: number;
  /** Set by `shutdown`; a retired entry never constructs again. */
  retired: boolean;
}

type Entries<TMap> = { [K in keyof TMap]?: Entry<TMap[K]> };

function hasClose(value: unknown): value is { close(): unknown } {
  return (
    typeof value === "object" &&
    value !== null &&
    "close" in value &&
    typeof value.close === "function"
  );
}

/**
 * One lazily built instance per component type. `get` checks without the lock,
 * then re-checks under the entry's own lock before constructing, so concurrent
 * first use still builds at most once.
 */
export class SingletonRegistry<TMap extends object> {
  private entries: Entries<TMap> = {};
  private touched: Array<keyof TMap> = [];
  private readonly nowMs: () => number;
  private readonly onWarn: (message: string) => void;

  constructor(
    private readonly definitions: ComponentDefinitions<TMap>,
    options: SingletonRegistryOptions = {}
  ) {
    this.nowMs = options.nowMs ?? Date.now;
    this.onWarn = options.onWarn ?? ((message) => console.warn(message));
  }

  async get<K extends keyof TMap>(key: K): Promise<TMap[K]> {
    const entry = this.entryFor(key);
    if (entry.holder) {
      return entry.holder.value;
    }

    const definition = this.definitions[key];
    if (entry.breaker && !entry.breaker.allowAttempt()) {
      return this.fallbackFor(key, definition, new Error("circuit open"));
    }

    return entry.mutex.runExclusive(async () => {
      if (entry.holder) {
        return entry.holder.value;
      }
      if (entry.retired) {
        throw new Error(`COMPONENT_UNAVAILABLE component=${String(key)}: registry shut down`);
      }
      if (entry.breaker && !entry.breaker.allowAttempt()) {
        return this.fallbackFor(key, definition, new Error("circuit open"));
      }

      try {
        const value = await this.construct(key, definition);
        entry.holder = { value };
        entry.constructions += 1;
        entry.breaker?.recordSuccess();
        return value;
      } catch (error) {
        entry.breaker?.recordFailure();
        this.onWarn(
          `COMPONENT_CONSTRUCTION_FAILED component=${String(key)} circuit=${entry.breaker?.state ?? "none"}: ${asMessage(error)}`
        );
        return this.fallbackFor(key, definition, error);
      }
    });
  }

  peek<K extends keyof TMap>(key: K): TMap[K] | undefined {
    return this.entries[key]?.holder?.value;
  }

  /** Components that have been requested at least once since the last shutdown. */
  stats(): Record<string, ComponentStats> {
    const out: Record<string, ComponentStats> = {};
    for (const key of this.touched) {
      const entry = this.entries[key];
      out[String(key)] = {
        constructed: entry?.holder != null,
        constructions: entry?.constructions ?? 0,
        circuit: entry?.breaker?.stats() ?? null,
      };
    }
    return out;
  }

  /**
   * Disposes every constructed instance, then forgets all instances, locks and
   * breakers. A construction still running is awaited and its instance disposed.
   */
  async shutdown(): Promise<void> {
    const current = this.entries;
    const keys = this.touched;
    this.entries = {};
    this.touched = [];

    for (const key of keys) {
      const entry = current[key];
      if (!entry) {
        continue;
      }
      entry.retired = true;
      await entry.mutex.runExclusive(async () => {
        const holder = entry.holder;
        entry.holder = null;
        if (!holder) {
          return;
        }
        try {
          await this.disposeInstance(this.definitions[key], holder.value);
        } catch (error) {
          this.onWarn(`COMPONENT_DISPOSE_FAILED component=${String(key)}: ${asMessage(error)}`);
        }
      });
    }
  }

  private entryFor<K extends keyof TMap>(key: K): Entry<TMap[K]> {
    const existing = this.entries[key];
    if (existing) {
      return existing;
    }
    const breakerOptions = this.definitions[key].breaker;
    const created: Entry<TMap[K]> = {
      holder: null,
      mutex: new AsyncMutex(),
      breaker: breakerOptions
        ? new CircuitBreaker({ ...breakerOptions, nowMs: this.nowMs })
        : null,
      constructions: 0,
      retired: false,
    };
    this.entries[key] = created;
    this.touched.push(key);
    return created;
  }

  private async construct<K extends keyof TMap>(
    key: K,
    definition: ComponentDefinition<TMap[K]>
  ): Promise<TMap[K]> {
    try {
      return await this.bounded(key, definition, () => definition.create());
    } catch (error) {
      if (error instanceof MissingCapabilityError && definition.createBaseline) {
        const baseline = definition.createBaseline;
        return this.bounded(key, definition, () => baseline());
      }
      throw error;
    }
  }

  private async bounded<K extends keyof TMap>(
    key: K,
    definition: ComponentDefinition<TMap[K]>,
    build: () => Promise<TMap[K]> | TMap[K]
  ): Promise<TMap[K]> {
    const pending = Promise.resolve().then(build);
    if (typeof definition.constructTimeoutMs !== "number") {
      return pending;
    }
    try {
      return await withTimeout(pending, definition.constructTimeoutMs, `construct ${String(key)}`);
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        // A late instance is nobody's: release it when it finally arrives.
        void pending.then(
          (late) => this.disposeInstance(definition, late),
          () => undefined
        ).catch((disposeError: unknown) => {
          this.onWarn(`COMPONENT_DISPOSE_FAILED component=${String(key)}: ${asMessage(disposeError)}`);
        });
      }
      throw error;
    }
  }

  private fallbackFor<K extends keyof TMap>(
    key: K,
    definition: ComponentDefinition<TMap[K]>,
    cause: unknown
  ): TMap[K] {
    if (definition.fallback) {
      return definition.fallback();
    }
    throw new Error(`COMPONENT_UNAVAILABLE component=${String(key)}: ${asMessage(cause)}`, {
      cause,
    });
  }

  private async disposeInstance<T>(definition: ComponentDefinition<T>, instance: T): Promise<void> {
    if (definition.dispose) {
      await definition.dispose(instance);
      return;
    }
    if (hasClose(instance)) {
      await instance.close();
    }
  }
}
