import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "../../core/errors/errors";
import type { CategoryLabel } from "../../core/taxonomy/taxonomy.types";
import { isRecord } from "../../core/_shared/utils/is_record";
import type {
  Candidate,
  CandidatePoolSupplier,
  PoolCategorySize,
} from "../../core/resolver/resolver.types";

export interface CatalogItem {
  readonly id: string;
  readonly category: CategoryLabel;
  readonly available: boolean;
}

function fail(detail: string): never {
  throw new ConfigurationError(`CATALOG_VALIDATION_ERROR ${detail}`);
}

export function parseCatalog(raw: unknown): CatalogItem[] {
  const root = isRecord(raw) ? raw : fail("catalog must be an object");
  if (!Array.isArray(root.items)) {
    fail("items must be an array");
  }

  return root.items.map((entry: unknown, idx): CatalogItem => {
    const row = isRecord(entry) ? entry : fail(`items[${idx}] must be an object`);
    const id = typeof row.id === "string" || typeof row.id === "number" ? String(row.id) : "";
    if (id === "") {
      fail(`items[${idx}].id must be a string or number`);
    }
    if (typeof row.category !== "string" || row.category.trim() === "") {
      fail(`items[${idx}].category must be a non-empty string`);
    }
    return {
      id,
      category: row.category.trim(),
      available: row.available !== false,
    };
  });
}

/**
 * Pool backed by a static catalog. File order is the ranking: the first item of
 * a category is its best candidate.
 */
export class CatalogCandidateSupplier implements CandidatePoolSupplier {
  private readonly byCategory = new Map<CategoryLabel, Candidate[]>();

  constructor(items: readonly CatalogItem[]) {
    for (const item of items) {
      const bucket = this.byCategory.get(item.category) ?? [];
      bucket.push({ id: item.id, available: item.available });
      this.byCategory.set(item.category, bucket);
    }
  }

  static fromFile(filePath: string): CatalogCandidateSupplier {
    const absPath = path.resolve(filePath);
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(absPath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(
        `CATALOG_READ_ERROR ${absPath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    return new CatalogCandidateSupplier(parseCatalog(parsed));
  }

  async fetchCandidates(category: CategoryLabel): Promise<readonly Candidate[]> {
    return [...(this.byCategory.get(category) ?? [])];
  }

  async describePool(): Promise<readonly PoolCategorySize[]> {
    return [...this.byCategory.entries()].map(([category, candidates]) => ({
      category,
      size: candidates.filter((candidate) => candidate.available).length,
    }));
  }
}
