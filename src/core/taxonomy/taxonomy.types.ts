export type CategoryLabel = string;
export type LanguageCode = string;

export interface CategoryTaxonomy {
  readonly version: string;
  /** Labels that exist in the catalog, in canonical order. */
  readonly concreteCategories: readonly CategoryLabel[];
  /** Virtual labels that expand to every listed concrete child. */
  readonly parentToChildren: Readonly<Record<CategoryLabel, readonly CategoryLabel[]>>;
  readonly keywords: Readonly<
    Record<LanguageCode, Readonly<Record<CategoryLabel, readonly string[]>>>
  >;
}

export interface TaxonomySource {
  currentTaxonomy(): CategoryTaxonomy;
}
