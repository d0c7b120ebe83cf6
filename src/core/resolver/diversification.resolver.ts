import {
  RecoverableCollaboratorFailure,
  asMessage,
} from "../errors/errors";
import { OperationTimeoutError, withTimeout } from "../_shared/utils/with_timeout";
import type { CategoryLabel, TaxonomySource } from "../taxonomy/taxonomy.types";
import type { SessionStore, Turn } from "../../session/session.types";
import { cascadeSlots, planDistribution } from "./distribution";
import { buildPseudoEvents } from "./pseudo_events";
import type {
  Candidate,
  CandidateContext,
  CandidatePoolSupplier,
  HistoryStatus,
  ItemId,
  PoolCategorySize,
  RecommendationRequest,
  RecommendationResult,
  TierSelection,
} from "./resolver.types";
import {
  selectDiverse,
  selectPersonalized,
  selectQueryDriven,
  type TierInputs,
} from "./tier.strategies";

export const DEFAULT_SUPPLIER_TIMEOUT_MS = 3000;
export const DEFAULT_PERSONALIZED_LIMIT = 3;
export const DEFAULT_DIVERSE_LIMIT = 5;

export interface DiversificationResolverDeps {
  readonly taxonomy: TaxonomySource;
  readonly sessionStore: SessionStore;
  readonly supplier: CandidatePoolSupplier;
}

export interface DiversificationResolverOptions {
  readonly supplierTimeoutMs?: number;
  readonly personalizedLimit?: number;
  readonly diverseLimit?: number;
  readonly onWarn?: (message: string) => void;
}

interface LoadedHistory {
  readonly turns: readonly Turn[];
  readonly status: HistoryStatus;
}

interface FetchedCategory {
  readonly category: CategoryLabel;
  readonly candidates: readonly Candidate[];
  readonly unavailable: boolean;
}

function toSlotCount(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

/** Everything shown or explicitly excluded in earlier turns, plus this request's exclusions. */
function collectExclusions(
  turns: readonly Turn[],
  explicit: readonly ItemId[] | undefined
): Set<ItemId> {
  const excluded = new Set<ItemId>(explicit ?? []);
  for (const turn of turns) {
    for (const id of [...turn.recommendedIds, ...(turn.excludedIds ?? [])]) {
      excluded.add(id);
    }
  }
  return excluded;
}

function countEligible(candidates: readonly Candidate[], excluded: ReadonlySet<ItemId>): number {
  return candidates.filter((candidate) => candidate.available && !excluded.has(candidate.id)).length;
}

/**
 * Eligible ids per category, in supplier order. An id eligible in an earlier
 * category is claimed there and skipped later.
 */
function eligibleByCategory(
  fetched: readonly FetchedCategory[],
  excluded: ReadonlySet<ItemId>
): Map<CategoryLabel, ItemId[]> {
  const claimed = new Set<ItemId>();
  const eligible = new Map<CategoryLabel, ItemId[]>();
  for (const { category, candidates } of fetched) {
    const ids: ItemId[] = [];
    for (const candidate of candidates) {
      if (!candidate.available || excluded.has(candidate.id) || claimed.has(candidate.id)) {
        continue;
      }
      claimed.add(candidate.id);
      ids.push(candidate.id);
    }
    eligible.set(category, ids);
  }
  return eligible;
}

export class DiversificationResolver {
  private readonly supplierTimeoutMs: number;
  private readonly personalizedLimit: number;
  private readonly diverseLimit: number;
  private readonly onWarn: (message: string) => void;

  constructor(
    private readonly deps: DiversificationResolverDeps,
    options: DiversificationResolverOptions = {}
  ) {
    this.supplierTimeoutMs = options.supplierTimeoutMs ?? DEFAULT_SUPPLIER_TIMEOUT_MS;
    this.personalizedLimit = options.personalizedLimit ?? DEFAULT_PERSONALIZED_LIMIT;
    this.diverseLimit = options.diverseLimit ?? DEFAULT_DIVERSE_LIMIT;
    this.onWarn = options.onWarn ?? ((message) => console.warn(message));
  }

  async resolve(request: RecommendationRequest): Promise<RecommendationResult> {
    const slots = toSlotCount(request.n);
    const taxonomy = this.deps.taxonomy.currentTaxonomy();
    const context: CandidateContext = {
      sessionId: request.sessionId,
      userQuery: request.userQuery,
      language: request.language,
    };

    const history = await this.loadHistory(request.sessionId);
    const excluded = collectExclusions(history.turns, request.explicitExclusions);

    const pseudo = buildPseudoEvents(history.turns, taxonomy, {
      language: request.language,
      onDrop: (label, turnNumber) =>
        this.onWarn(
          `TAXONOMY_MISMATCH session=${request.sessionId} label=${label} turn=${turnNumber} taxonomy=${taxonomy.version}`
        ),
    });

    const inputs: TierInputs = {
      userQuery: request.userQuery,
      language: request.language,
      taxonomy,
      pseudoEvents: pseudo.events,
      personalizedLimit: this.personalizedLimit,
    };
    const ranked = selectQueryDriven(inputs) ?? selectPersonalized(inputs);
    const { selection, fetched } = ranked
      ? { selection: ranked, fetched: slots > 0 ? await this.fetchAll(ranked.categories, context) : [] }
      : await this.selectDiverseTier(context, slots, excluded);

    const plan = planDistribution(slots, selection.categories);
    const eligible = eligibleByCategory(fetched, excluded);
    const eligibleCounts = new Map<CategoryLabel, number>();
    for (const [category, ids] of eligible) {
      eligibleCounts.set(category, ids.length);
    }
    const filled = cascadeSlots(plan, eligibleCounts);

    const items: ItemId[] = [];
    for (const { category } of plan) {
      const picks = (eligible.get(category) ?? []).slice(0, filled.get(category) ?? 0);
      items.push(...picks);
    }

    return {
      items,
      tierUsed: selection.kind,
      categoriesUsed: [...selection.categories],
      excludedCount: excluded.size,
      diagnostics: {
        history: history.status,
        droppedCategories: pseudo.dropped,
        pseudoEventCount: pseudo.events.length,
        allocation: Object.fromEntries(
          plan.map(({ category, slots: planned }): [CategoryLabel, number] => [category, planned])
        ),
        filled: Object.fromEntries(filled),
        unavailableCategories: fetched
          .filter((entry) => entry.unavailable)
          .map((entry) => entry.category),
      },
    };
  }

  private async loadHistory(sessionId: string): Promise<LoadedHistory> {
    try {
      const session = await this.deps.sessionStore.getSession(sessionId);
      if (!session) {
        return { turns: [], status: "absent" };
      }
      return { turns: session.turns, status: "loaded" };
    } catch (error) {
      this.onWarn(`SESSION_HISTORY_UNAVAILABLE session=${sessionId}: ${asMessage(error)}`);
      return { turns: [], status: "unavailable" };
    }
  }

  /**
   * Ranks every non-empty pool category by what is still eligible for this
   * session, so categories already shown in full give way to ones with items left.
   */
  private async selectDiverseTier(
    context: CandidateContext,
    slots: number,
    excluded: ReadonlySet<ItemId>
  ): Promise<{ selection: TierSelection; fetched: FetchedCategory[] }> {
    if (slots === 0) {
      return { selection: { kind: "diverse", categories: [] }, fetched: [] };
    }
    let poolSizes: readonly PoolCategorySize[];
    try {
      poolSizes = await this.callSupplier("describePool", () =>
        this.deps.supplier.describePool(context)
      );
    } catch (error) {
      this.onWarn(`CANDIDATE_POOL_UNAVAILABLE session=${context.sessionId}: ${asMessage(error)}`);
      return { selection: { kind: "diverse", categories: [] }, fetched: [] };
    }

    const pooled = await this.fetchAll(
      poolSizes.filter((entry) => entry.size > 0).map((entry) => entry.category),
      context
    );
    const selection = selectDiverse(
      pooled.map(({ category, candidates }) => ({
        category,
        size: countEligible(candidates, excluded),
      })),
      slots,
      this.diverseLimit
    );
    const byCategory = new Map(
      pooled.map((entry): [CategoryLabel, FetchedCategory] => [entry.category, entry])
    );
    const fetched = selection.categories.flatMap((category) => {
      const entry = byCategory.get(category);
      return entry ? [entry] : [];
    });
    return { selection, fetched };
  }

  private fetchAll(
    categories: readonly CategoryLabel[],
    context: CandidateContext
  ): Promise<FetchedCategory[]> {
    return Promise.all(
      categories.map(async (category): Promise<FetchedCategory> => {
        try {
          const candidates = await this.callSupplier(`fetchCandidates ${category}`, () =>
            this.deps.supplier.fetchCandidates(category, context)
          );
          return { category, candidates, unavailable: false };
        } catch (error) {
          this.onWarn(
            `CANDIDATES_UNAVAILABLE session=${context.sessionId} category=${category}: ${asMessage(error)}`
          );
          return { category, candidates: [], unavailable: true };
        }
      })
    );
  }

  private async callSupplier<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation(), this.supplierTimeoutMs, `candidate_supplier ${label}`);
    } catch (error) {
      const prefix =
        error instanceof OperationTimeoutError ? "SUPPLIER_TIMEOUT" : "SUPPLIER_ERROR";
      throw new RecoverableCollaboratorFailure(
        "candidate_supplier",
        `${prefix} ${label}: ${asMessage(error)}`,
        { cause: error }
      );
    }
  }
}
