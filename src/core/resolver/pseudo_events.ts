import { extractCategories } from "../extractor/category.extractor";
import type { CategoryLabel, CategoryTaxonomy, LanguageCode } from "../taxonomy/taxonomy.types";
import type { Turn } from "../../session/session.types";
import type { PseudoEvent } from "./resolver.types";

export interface PseudoEventBuild {
  readonly events: readonly PseudoEvent[];
  /** Labels seen in history that the current taxonomy no longer knows. */
  readonly dropped: readonly CategoryLabel[];
}

/**
 * Stored categories count as user intent only for query-driven turns; labels
 * chosen from history or pool size would otherwise feed back into themselves.
 */
function labelsForTurn(
  turn: Turn,
  taxonomy: CategoryTaxonomy,
  language: LanguageCode | undefined
): CategoryLabel[] {
  const fromQuery = extractCategories(turn.userQuery, taxonomy, language);
  const fromRecord = turn.tier === "query_driven" ? turn.detectedCategories : [];
  return [...new Set([...fromQuery, ...fromRecord])];
}

/** One event per matched category per turn, never one per turn. */
export function buildPseudoEvents(
  turns: readonly Turn[],
  taxonomy: CategoryTaxonomy,
  options: {
    readonly language?: LanguageCode;
    readonly onDrop?: (label: CategoryLabel, turnNumber: number) => void;
  } = {}
): PseudoEventBuild {
  const concrete = new Set(taxonomy.concreteCategories);
  const events: PseudoEvent[] = [];
  const dropped = new Set<CategoryLabel>();

  for (const turn of turns) {
    for (const label of labelsForTurn(turn, taxonomy, options.language)) {
      if (!concrete.has(label)) {
        dropped.add(label);
        options.onDrop?.(label, turn.turnNumber);
        continue;
      }
      events.push({ categoryLabel: label, sourceTurnNumber: turn.turnNumber });
    }
  }

  return { events, dropped: [...dropped] };
}
