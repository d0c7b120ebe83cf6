import type { CategoryLabel, LanguageCode } from "../taxonomy/taxonomy.types";

export type ItemId = string;

export const TIER_KINDS = ["query_driven", "personalized", "diverse"] as const;

export type TierKind = (typeof TIER_KINDS)[number];

export interface Candidate {
  readonly id: ItemId;
  readonly available: boolean;
}

export interface PoolCategorySize {
  readonly category: CategoryLabel;
  readonly size: number;
}

export interface CandidateContext {
  readonly sessionId: string;
  readonly userQuery: string;
  readonly language?: LanguageCode;
}

/** External ranking oracle. Lists are pre-ranked and never re-sorted here. */
export interface CandidatePoolSupplier {
  fetchCandidates(
    category: CategoryLabel,
    context: CandidateContext
  ): Promise<readonly Candidate[]>;
  describePool(context: CandidateContext): Promise<readonly PoolCategorySize[]>;
}

export interface PseudoEvent {
  readonly categoryLabel: CategoryLabel;
  readonly sourceTurnNumber: number;
}

export interface RecommendationRequest {
  readonly sessionId: string;
  readonly userQuery: string;
  readonly n: number;
  readonly explicitExclusions?: readonly ItemId[];
  readonly language?: LanguageCode;
}

export type HistoryStatus = "loaded" | "absent" | "unavailable";

export interface ResolverDiagnostics {
  readonly history: HistoryStatus;
  readonly droppedCategories: readonly CategoryLabel[];
  /** Pseudo-events derived from history, whichever tier was chosen. */
  readonly pseudoEventCount: number;
  readonly allocation: Readonly<Record<CategoryLabel, number>>;
  readonly filled: Readonly<Record<CategoryLabel, number>>;
  readonly unavailableCategories: readonly CategoryLabel[];
}

export interface RecommendationResult {
  readonly items: readonly ItemId[];
  readonly tierUsed: TierKind;
  readonly categoriesUsed: readonly CategoryLabel[];
  readonly excludedCount: number;
  readonly diagnostics: ResolverDiagnostics;
}

export interface TierSelection {
  readonly kind: TierKind;
  readonly categories: readonly CategoryLabel[];
}
