import type {
  CategoryLabel,
  CategoryTaxonomy,
  LanguageCode,
} from "../taxonomy/taxonomy.types";
import { containsPhrase, countWords, normalizeText } from "./text.normalize";

interface Detection {
  specificity: number;
  order: number;
}

const PARENT_EXPANSION_WEIGHT = 0.5;

function keywordTablesFor(
  taxonomy: CategoryTaxonomy,
  language: LanguageCode | undefined
): ReadonlyArray<Readonly<Record<CategoryLabel, readonly string[]>>> {
  if (typeof language === "string") {
    const table = taxonomy.keywords[language];
    return table ? [table] : [];
  }
  return Object.values(taxonomy.keywords);
}

function longestMatch(normalizedText: string, keywords: readonly string[]): number {
  let best = 0;
  for (const keyword of keywords) {
    const phrase = normalizeText(keyword);
    if (containsPhrase(normalizedText, phrase)) {
      best = Math.max(best, countWords(phrase));
    }
  }
  return best;
}

/**
 * Every concrete category the text mentions, most specific first.
 *
 * A parent keyword expands to all of its concrete children at half weight, so
 * "long dress" outranks the children reached through "dress". Ties keep first
 * detection order. Never collapses several matches into one.
 */
export function extractCategories(
  text: string,
  taxonomy: CategoryTaxonomy,
  language?: LanguageCode
): CategoryLabel[] {
  const normalizedText = normalizeText(text);
  if (normalizedText === "") {
    return [];
  }

  const concrete = new Set(taxonomy.concreteCategories);
  const detected = new Map<CategoryLabel, Detection>();
  const record = (label: CategoryLabel, specificity: number): void => {
    const existing = detected.get(label);
    if (!existing) {
      detected.set(label, { specificity, order: detected.size });
      return;
    }
    existing.specificity = Math.max(existing.specificity, specificity);
  };

  for (const table of keywordTablesFor(taxonomy, language)) {
    for (const [label, keywords] of Object.entries(table)) {
      const matchedWords = longestMatch(normalizedText, keywords);
      if (matchedWords === 0) {
        continue;
      }

      const children = taxonomy.parentToChildren[label];
      if (children) {
        for (const child of children) {
          if (concrete.has(child)) {
            record(child, matchedWords * PARENT_EXPANSION_WEIGHT);
          }
        }
      } else if (concrete.has(label)) {
        record(label, matchedWords);
      }
    }
  }

  return [...detected.entries()]
    .sort(([, a], [, b]) => b.specificity - a.specificity || a.order - b.order)
    .map(([label]) => label);
}
