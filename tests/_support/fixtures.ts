import { parseTaxonomy } from "../../src/core/taxonomy/taxonomy.parser";
import type { CategoryTaxonomy, TaxonomySource } from "../../src/core/taxonomy/taxonomy.types";
import type {
  Candidate,
  CandidatePoolSupplier,
  PoolCategorySize,
} from "../../src/core/resolver/resolver.types";
import type { Session, SessionStore } from "../../src/session/session.types";

export function createTestTaxonomy(): CategoryTaxonomy {
  return parseTaxonomy({
    version: "test-1",
    concreteCategories: ["DRESSES", "SHOES", "BAGS", "HATS"],
    parentToChildren: {
      FOOTWEAR: ["SHOES"],
      ACCESSORIES: ["BAGS", "HATS"],
    },
    keywords: {
      en: {
        DRESSES: ["dress", "dresses", "wedding dress"],
        SHOES: ["shoe", "shoes", "formal shoes"],
        BAGS: ["bag", "bags", "handbag"],
        HATS: ["hat", "hats"],
        FOOTWEAR: ["footwear"],
        ACCESSORIES: ["accessories"],
      },
      es: {
        DRESSES: ["vestido", "vestidos"],
        SHOES: ["zapatos"],
        BAGS: ["bolso"],
        HATS: ["sombrero"],
      },
    },
  });
}

export function fixedTaxonomy(taxonomy: CategoryTaxonomy): TaxonomySource {
  return { currentTaxonomy: () => taxonomy };
}

/** `count` available candidates with ids `<prefix>-1..count`, in ranking order. */
export function rankedCandidates(prefix: string, count: number): Candidate[] {
  return Array.from({ length: count }, (_, idx) => ({
    id: `${prefix}-${idx + 1}`,
    available: true,
  }));
}

export class StubSupplier implements CandidatePoolSupplier {
  readonly fetchCalls: string[] = [];
  describeCalls = 0;
  readonly failing = new Set<string>();
  readonly hanging = new Set<string>();
  failDescribe = false;

  constructor(private readonly pool: Record<string, Candidate[]>) {}

  async fetchCandidates(category: string): Promise<readonly Candidate[]> {
    this.fetchCalls.push(category);
    if (this.failing.has(category)) {
      throw new Error(`stub failure for ${category}`);
    }
    if (this.hanging.has(category)) {
      return new Promise<readonly Candidate[]>(() => undefined);
    }
    return [...(this.pool[category] ?? [])];
  }

  async describePool(): Promise<readonly PoolCategorySize[]> {
    this.describeCalls += 1;
    if (this.failDescribe) {
      throw new Error("stub pool failure");
    }
    return Object.entries(this.pool).map(([category, candidates]) => ({
      category,
      size: candidates.filter((candidate) => candidate.available).length,
    }));
  }
}

/** Session store whose every call fails, as when the backend is unreachable. */
export class UnavailableSessionStore implements SessionStore {
  appendCalls = 0;

  async getSession(): Promise<Session | null> {
    throw new Error("store offline");
  }

  async appendTurn(): Promise<Session> {
    this.appendCalls += 1;
    throw new Error("store offline");
  }
}

export function captureWarnings(): { readonly messages: string[]; readonly onWarn: (message: string) => void } {
  const messages: string[] = [];
  return { messages, onWarn: (message) => messages.push(message) };
}
