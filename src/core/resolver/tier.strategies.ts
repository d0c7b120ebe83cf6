import { extractCategories } from "../extractor/category.extractor";
import type { CategoryLabel, CategoryTaxonomy, LanguageCode } from "../taxonomy/taxonomy.types";
import type { PoolCategorySize, PseudoEvent, TierSelection } from "./resolver.types";

export interface TierInputs {
  readonly userQuery: string;
  readonly language?: LanguageCode;
  readonly taxonomy: CategoryTaxonomy;
  readonly pseudoEvents: readonly PseudoEvent[];
  readonly personalizedLimit: number;
}

interface Tally {
  count: number;
  earliestTurn: number;
  firstSeen: number;
}

export function selectQueryDriven(inputs: TierInputs): TierSelection | null {
  const categories = extractCategories(inputs.userQuery, inputs.taxonomy, inputs.language);
  if (categories.length === 0) {
    return null;
  }
  return { kind: "query_driven", categories };
}

/** Frequency desc, then earliest source turn, then first-seen order. */
export function rankPseudoEvents(events: readonly PseudoEvent[]): CategoryLabel[] {
  const tallies = new Map<CategoryLabel, Tally>();
  for (const event of events) {
    const tally = tallies.get(event.categoryLabel);
    if (!tally) {
      tallies.set(event.categoryLabel, {
        count: 1,
        earliestTurn: event.sourceTurnNumber,
        firstSeen: tallies.size,
      });
      continue;
    }
    tally.count += 1;
    tally.earliestTurn = Math.min(tally.earliestTurn, event.sourceTurnNumber);
  }

  return [...tallies.entries()]
    .sort(
      ([, a], [, b]) =>
        b.count - a.count || a.earliestTurn - b.earliestTurn || a.firstSeen - b.firstSeen
    )
    .map(([label]) => label);
}

export function selectPersonalized(inputs: TierInputs): TierSelection | null {
  if (inputs.pseudoEvents.length === 0) {
    return null;
  }
  const ranked = rankPseudoEvents(inputs.pseudoEvents);
  return {
    kind: "personalized",
    categories: ranked.slice(0, Math.max(1, inputs.personalizedLimit)),
  };
}

/** Largest categories first; equal sizes fall back to label order. */
export function selectDiverse(
  poolSizes: readonly PoolCategorySize[],
  slots: number,
  diverseLimit: number
): TierSelection {
  const take = Math.max(0, Math.min(slots, diverseLimit));
  const categories = poolSizes
    .filter((entry) => entry.size > 0)
    .slice()
    .sort((a, b) => b.size - a.size || a.category.localeCompare(b.category))
    .slice(0, take)
    .map((entry) => entry.category);
  return { kind: "diverse", categories };
}
