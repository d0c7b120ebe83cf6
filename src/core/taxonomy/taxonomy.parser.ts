import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "../errors/errors";
import { isRecord } from "../_shared/utils/is_record";
import { createSnapshot } from "../_shared/utils/snapshot";
import type { CategoryLabel, CategoryTaxonomy } from "./taxonomy.types";

function fail(detail: string): never {
  throw new ConfigurationError(`TAXONOMY_VALIDATION_ERROR ${detail}`);
}

function asObject(value: unknown, field: string): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  return fail(`${field} must be an object`);
}

function asStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    return fail(`${field} must be an array of strings`);
  }
  const out: string[] = [];
  for (const [idx, item] of value.entries()) {
    if (typeof item !== "string" || item.trim() === "") {
      return fail(`${field}[${idx}] must be a non-empty string`);
    }
    out.push(item.trim());
  }
  return out;
}

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export function parseTaxonomy(raw: unknown): CategoryTaxonomy {
  const root = asObject(raw, "taxonomy");

  const version =
    typeof root.version === "string" && root.version.trim() !== ""
      ? root.version.trim()
      : fail("version must be a non-empty string");

  const concreteCategories = uniqueInOrder(
    asStringList(root.concreteCategories, "concreteCategories")
  );
  const concreteSet = new Set(concreteCategories);

  const parentsRow = asObject(root.parentToChildren ?? {}, "parentToChildren");
  const parentToChildren: Record<CategoryLabel, CategoryLabel[]> = {};
  for (const [parent, childrenRaw] of Object.entries(parentsRow)) {
    if (concreteSet.has(parent)) {
      fail(`label '${parent}' is declared both parent and concrete`);
    }
    const children = uniqueInOrder(asStringList(childrenRaw, `parentToChildren.${parent}`));
    for (const child of children) {
      if (!concreteSet.has(child)) {
        fail(`parent '${parent}' lists unknown concrete child '${child}'`);
      }
    }
    parentToChildren[parent] = children;
  }

  const keywordsRow = asObject(root.keywords, "keywords");
  const keywords: Record<string, Record<CategoryLabel, string[]>> = {};
  for (const [language, table] of Object.entries(keywordsRow)) {
    const tableRow = asObject(table, `keywords.${language}`);
    const entries: Record<CategoryLabel, string[]> = {};
    for (const [label, list] of Object.entries(tableRow)) {
      entries[label] = uniqueInOrder(asStringList(list, `keywords.${language}.${label}`));
    }
    keywords[language] = entries;
  }

  return createSnapshot({
    version,
    concreteCategories,
    parentToChildren,
    keywords,
  });
}

export function loadTaxonomyFile(filePath: string): CategoryTaxonomy {
  const absPath = path.resolve(filePath);
  let serialized: string;
  try {
    serialized = fs.readFileSync(absPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `TAXONOMY_READ_ERROR ${absPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    throw new ConfigurationError(
      `TAXONOMY_PARSE_ERROR ${absPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return parseTaxonomy(parsed);
}
