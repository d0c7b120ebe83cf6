import { loadTaxonomyFile } from "./taxonomy.parser";
import type { CategoryTaxonomy, TaxonomySource } from "./taxonomy.types";

export interface TaxonomyProviderOptions {
  readonly filePath?: string;
}

/**
 * Holds one frozen taxonomy snapshot. Refresh swaps the whole reference, so
 * extractor calls in flight keep reading the snapshot they started with.
 */
export class TaxonomyProvider implements TaxonomySource {
  private snapshot: CategoryTaxonomy;
  private readonly filePath?: string;

  constructor(initial: CategoryTaxonomy, options: TaxonomyProviderOptions = {}) {
    this.snapshot = initial;
    this.filePath = options.filePath;
  }

  static fromFile(filePath: string): TaxonomyProvider {
    return new TaxonomyProvider(loadTaxonomyFile(filePath), { filePath });
  }

  currentTaxonomy(): CategoryTaxonomy {
    return this.snapshot;
  }

  replace(next: CategoryTaxonomy): void {
    this.snapshot = next;
  }

  /** A failed reload leaves the current snapshot in place and rethrows. */
  reloadFromFile(): CategoryTaxonomy {
    if (!this.filePath) {
      throw new Error("TAXONOMY_RELOAD_ERROR provider was not created from a file");
    }
    const next = loadTaxonomyFile(this.filePath);
    this.snapshot = next;
    return next;
  }
}
