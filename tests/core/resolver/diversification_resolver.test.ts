/**
 * Intent: resolver lock — tier precedence, exclusion of everything already shown, cascading allocation, and degraded modes.
 * Scope: DiversificationResolver over an in-memory session store and a stub candidate supplier.
 * Non-Goals: Turn recording policy (turn graph tests) or backend provisioning.
 */
import test from "node:test";
import assert from "node:assert/strict";
import { DiversificationResolver } from "../../../src/core/resolver/diversification.resolver";
import type {
  Candidate,
  RecommendationRequest,
  RecommendationResult,
} from "../../../src/core/resolver/resolver.types";
import { InMemoryKeyValueConnection } from "../../../src/adapter/storage/memory/in_memory.kv_connection";
import { KeyValueSessionStore } from "../../../src/session/kv_session.store";
import type { SessionStore } from "../../../src/session/session.types";
import {
  StubSupplier,
  UnavailableSessionStore,
  captureWarnings,
  createTestTaxonomy,
  fixedTaxonomy,
  rankedCandidates,
} from "../../_support/fixtures";

function defaultPool(): Record<string, Candidate[]> {
  return {
    DRESSES: rankedCandidates("dress", 12),
    SHOES: rankedCandidates("shoe", 12),
    BAGS: rankedCandidates("bag", 8),
    HATS: rankedCandidates("hat", 3),
  };
}

function setup(
  options: {
    readonly pool?: Record<string, Candidate[]>;
    readonly sessionStore?: SessionStore;
    readonly supplierTimeoutMs?: number;
  } = {}
) {
  const store = new KeyValueSessionStore(new InMemoryKeyValueConnection());
  const sessionStore = options.sessionStore ?? store;
  const supplier = new StubSupplier(options.pool ?? defaultPool());
  const warnings = captureWarnings();
  const resolver = new DiversificationResolver(
    { taxonomy: fixedTaxonomy(createTestTaxonomy()), sessionStore, supplier },
    { onWarn: warnings.onWarn, supplierTimeoutMs: options.supplierTimeoutMs ?? 1000 }
  );

  async function turn(request: RecommendationRequest): Promise<RecommendationResult> {
    const result = await resolver.resolve(request);
    await store.appendTurn(request.sessionId, {
      userQuery: request.userQuery,
      detectedCategories: result.categoriesUsed,
      recommendedIds: result.items,
      excludedIds: request.explicitExclusions,
      tier: result.tierUsed,
    });
    return result;
  }

  return { resolver, store, supplier, warnings, turn };
}

test("Scenario A: the current query wins over a history full of another category", async () => {
  const { turn } = setup();

  const first = await turn({ sessionId: "s-a", userQuery: "elegant dresses for a wedding", n: 5 });
  assert.equal(first.tierUsed, "query_driven");
  assert.deepEqual(first.categoriesUsed, ["DRESSES"]);
  assert.deepEqual(first.items, ["dress-1", "dress-2", "dress-3", "dress-4", "dress-5"]);

  const second = await turn({ sessionId: "s-a", userQuery: "formal shoes", n: 5 });
  assert.equal(second.tierUsed, "query_driven");
  assert.deepEqual(second.categoriesUsed, ["SHOES"]);
  assert.deepEqual(second.items, ["shoe-1", "shoe-2", "shoe-3", "shoe-4", "shoe-5"]);
  assert.equal(second.excludedCount, 5);
  assert.equal(second.diagnostics.history, "loaded");
});

test("Scenario B: an unmatched query on a fresh session spreads over the largest pool categories", async () => {
  const { resolver } = setup();

  const result = await resolver.resolve({ sessionId: "s-b", userQuery: "something nice", n: 10 });

  assert.equal(result.tierUsed, "diverse");
  assert.deepEqual(result.categoriesUsed, ["DRESSES", "SHOES", "BAGS", "HATS"]);
  assert.deepEqual(result.diagnostics.allocation, { DRESSES: 3, SHOES: 3, BAGS: 2, HATS: 2 });
  assert.deepEqual(result.items, [
    "dress-1",
    "dress-2",
    "dress-3",
    "shoe-1",
    "shoe-2",
    "shoe-3",
    "bag-1",
    "bag-2",
    "hat-1",
    "hat-2",
  ]);
  assert.equal(result.diagnostics.history, "absent");
});

test("Scenario C: an unavailable session store degrades to no history without throwing", async () => {
  const { resolver, warnings } = setup({ sessionStore: new UnavailableSessionStore() });

  const queried = await resolver.resolve({ sessionId: "s-c", userQuery: "formal shoes", n: 3 });
  assert.equal(queried.tierUsed, "query_driven");
  assert.deepEqual(queried.items, ["shoe-1", "shoe-2", "shoe-3"]);
  assert.equal(queried.diagnostics.history, "unavailable");
  assert.equal(queried.excludedCount, 0);

  const unmatched = await resolver.resolve({ sessionId: "s-c", userQuery: "surprise me", n: 2 });
  assert.equal(unmatched.tierUsed, "diverse");
  assert.deepEqual(unmatched.items, ["dress-1", "shoe-1"]);

  assert.equal(warnings.messages[0], "SESSION_HISTORY_UNAVAILABLE session=s-c: store offline");
});

test("personalized tier replays the categories the user asked for before", async () => {
  const { turn } = setup();

  await turn({ sessionId: "s-p", userQuery: "dresses", n: 2 });
  const second = await turn({ sessionId: "s-p", userQuery: "dress and hat", n: 2 });
  assert.deepEqual(second.categoriesUsed, ["DRESSES", "HATS"]);
  assert.deepEqual(second.items, ["dress-3", "hat-1"]);

  const third = await turn({ sessionId: "s-p", userQuery: "something nice", n: 4 });
  assert.equal(third.tierUsed, "personalized");
  assert.deepEqual(third.categoriesUsed, ["DRESSES", "HATS"]);
  assert.deepEqual(third.items, ["dress-4", "dress-5", "hat-2", "hat-3"]);
  assert.equal(third.excludedCount, 4);
  assert.equal(third.diagnostics.pseudoEventCount, 3);
});

test("nothing recommended in a session is ever recommended again", async () => {
  const { turn } = setup();
  const seen = new Set<string>();
  const excludedCounts: number[] = [];

  for (let round = 0; round < 5; round += 1) {
    const result = await turn({ sessionId: "s-m", userQuery: "dresses", n: 3 });
    excludedCounts.push(result.excludedCount);
    for (const id of result.items) {
      assert.equal(seen.has(id), false, `repeated item ${id}`);
      seen.add(id);
    }
  }

  assert.deepEqual(excludedCounts, [0, 3, 6, 9, 12]);
  assert.equal(seen.size, 12);
});

test("explicit exclusions stay excluded on later turns that do not repeat them", async () => {
  const { turn } = setup();

  const first = await turn({
    sessionId: "s-k",
    userQuery: "dresses",
    n: 1,
    explicitExclusions: ["dress-1", "dress-2"],
  });
  const second = await turn({ sessionId: "s-k", userQuery: "dresses", n: 1 });

  assert.deepEqual(first.items, ["dress-3"]);
  assert.equal(first.excludedCount, 2);
  assert.deepEqual(second.items, ["dress-4"]);
  assert.equal(second.excludedCount, 3);
});

test("repeated cold-start turns move on to categories that still have unseen items", async () => {
  const { turn } = setup({
    pool: { DRESSES: rankedCandidates("dress", 3), SHOES: rankedCandidates("shoe", 1) },
  });

  const picks: Array<{ categories: readonly string[]; items: readonly string[] }> = [];
  for (let round = 0; round < 5; round += 1) {
    const result = await turn({ sessionId: "s-r", userQuery: "surprise me", n: 1 });
    assert.equal(result.tierUsed, "diverse");
    picks.push({ categories: result.categoriesUsed, items: result.items });
  }

  assert.deepEqual(picks, [
    { categories: ["DRESSES"], items: ["dress-1"] },
    { categories: ["DRESSES"], items: ["dress-2"] },
    { categories: ["DRESSES"], items: ["dress-3"] },
    { categories: ["SHOES"], items: ["shoe-1"] },
    { categories: [], items: [] },
  ]);
});

test("category names that collide with object keys are allocated like any other", async () => {
  const pool = Object.fromEntries([
    ["__proto__", rankedCandidates("odd", 2)],
    ["HATS", rankedCandidates("hat", 1)],
  ]);
  const { resolver } = setup({ pool });

  const result = await resolver.resolve({ sessionId: "s-o", userQuery: "something nice", n: 3 });

  assert.deepEqual(result.categoriesUsed, ["__proto__", "HATS"]);
  assert.deepEqual(result.items, ["odd-1", "odd-2", "hat-1"]);
  assert.deepEqual(Object.entries(result.diagnostics.allocation), [
    ["__proto__", 2],
    ["HATS", 1],
  ]);
  assert.deepEqual(Object.entries(result.diagnostics.filled), [
    ["__proto__", 2],
    ["HATS", 1],
  ]);
});

test("an exhausted category returns a short result instead of failing", async () => {
  const { turn } = setup({ pool: { DRESSES: rankedCandidates("dress", 4) } });

  await turn({ sessionId: "s-x", userQuery: "dresses", n: 3 });
  const second = await turn({ sessionId: "s-x", userQuery: "dresses", n: 3 });

  assert.deepEqual(second.items, ["dress-4"]);
  assert.deepEqual(second.diagnostics.filled, { DRESSES: 1 });
});

test("a query-driven turn draws only from the query's categories", async () => {
  const { turn } = setup();
  await turn({ sessionId: "s-q", userQuery: "dresses", n: 3 });
  await turn({ sessionId: "s-q", userQuery: "wedding dress", n: 3 });

  const result = await turn({ sessionId: "s-q", userQuery: "a bag", n: 4 });

  assert.deepEqual(result.categoriesUsed, ["BAGS"]);
  assert.deepEqual(result.items, ["bag-1", "bag-2", "bag-3", "bag-4"]);
});

test("shortfall in one category is filled from the others", async () => {
  const { resolver } = setup();

  const result = await resolver.resolve({ sessionId: "s-d", userQuery: "shoes and a hat", n: 10 });

  assert.deepEqual(result.categoriesUsed, ["SHOES", "HATS"]);
  assert.deepEqual(result.diagnostics.allocation, { SHOES: 5, HATS: 5 });
  assert.deepEqual(result.diagnostics.filled, { SHOES: 7, HATS: 3 });
  assert.deepEqual(result.items, [
    "shoe-1",
    "shoe-2",
    "shoe-3",
    "shoe-4",
    "shoe-5",
    "shoe-6",
    "shoe-7",
    "hat-1",
    "hat-2",
    "hat-3",
  ]);
});

test("explicit exclusions and unavailable candidates are skipped", async () => {
  const pool = {
    DRESSES: [
      { id: "d-1", available: true },
      { id: "d-2", available: false },
      { id: "d-3", available: true },
      { id: "d-4", available: true },
      { id: "d-5", available: true },
    ],
  };
  const { resolver } = setup({ pool });

  const result = await resolver.resolve({
    sessionId: "s-e",
    userQuery: "dress",
    n: 2,
    explicitExclusions: ["d-1", "d-4"],
  });

  assert.deepEqual(result.items, ["d-3", "d-5"]);
  assert.equal(result.excludedCount, 2);
});

test("an item offered by two categories is used once, by the first", async () => {
  const pool = {
    SHOES: [
      { id: "shared", available: true },
      { id: "s-2", available: true },
    ],
    BAGS: [
      { id: "shared", available: true },
      { id: "b-2", available: true },
    ],
  };
  const { resolver } = setup({ pool });

  const result = await resolver.resolve({ sessionId: "s-u", userQuery: "shoes and a bag", n: 4 });

  assert.deepEqual(result.items, ["shared", "s-2", "b-2"]);
});

test("n of zero or less selects a tier but fetches nothing", async () => {
  const { resolver, supplier } = setup();

  const queried = await resolver.resolve({ sessionId: "s-z", userQuery: "dresses", n: 0 });
  assert.deepEqual(queried.items, []);
  assert.equal(queried.tierUsed, "query_driven");
  assert.deepEqual(queried.diagnostics.allocation, { DRESSES: 0 });

  const negative = await resolver.resolve({ sessionId: "s-z", userQuery: "something", n: -3 });
  assert.deepEqual(negative.items, []);
  assert.equal(negative.tierUsed, "diverse");

  const notANumber = await resolver.resolve({ sessionId: "s-z", userQuery: "dresses", n: Number.NaN });
  assert.deepEqual(notANumber.items, []);

  assert.deepEqual(supplier.fetchCalls, []);
  assert.equal(supplier.describeCalls, 0);
});

test("an empty pool yields an empty diverse result", async () => {
  const { resolver } = setup({ pool: {} });

  const result = await resolver.resolve({ sessionId: "s-0", userQuery: "something nice", n: 5 });

  assert.equal(result.tierUsed, "diverse");
  assert.deepEqual(result.categoriesUsed, []);
  assert.deepEqual(result.items, []);
});

test("a failing category is skipped with a warning and its slots move on", async () => {
  const { resolver, supplier, warnings } = setup();
  supplier.failing.add("SHOES");

  const result = await resolver.resolve({ sessionId: "s-f", userQuery: "shoes and a hat", n: 4 });

  assert.deepEqual(result.items, ["hat-1", "hat-2", "hat-3"]);
  assert.deepEqual(result.diagnostics.unavailableCategories, ["SHOES"]);
  assert.deepEqual(warnings.messages, [
    "CANDIDATES_UNAVAILABLE session=s-f category=SHOES: SUPPLIER_ERROR fetchCandidates SHOES: stub failure for SHOES",
  ]);
});

test("a supplier call that outlives its timeout counts as unavailable", async () => {
  const { resolver, supplier, warnings } = setup({ supplierTimeoutMs: 20 });
  supplier.hanging.add("DRESSES");

  const result = await resolver.resolve({ sessionId: "s-t", userQuery: "dresses", n: 2 });

  assert.deepEqual(result.items, []);
  assert.deepEqual(result.diagnostics.unavailableCategories, ["DRESSES"]);
  assert.match(warnings.messages[0] ?? "", /^CANDIDATES_UNAVAILABLE session=s-t category=DRESSES: SUPPLIER_TIMEOUT /);
});

test("a failing pool description leaves the diverse tier empty", async () => {
  const { resolver, supplier, warnings } = setup();
  supplier.failDescribe = true;

  const result = await resolver.resolve({ sessionId: "s-g", userQuery: "something nice", n: 3 });

  assert.equal(result.tierUsed, "diverse");
  assert.deepEqual(result.items, []);
  assert.match(warnings.messages[0] ?? "", /^CANDIDATE_POOL_UNAVAILABLE session=s-g: SUPPLIER_ERROR describePool/);
});

test("history labels missing from the taxonomy are dropped with a warning", async () => {
  const { resolver, store, warnings } = setup();
  await store.appendTurn("s-h", {
    userQuery: "old belts",
    detectedCategories: ["BELTS"],
    recommendedIds: ["belt-1"],
    tier: "query_driven",
  });

  const result = await resolver.resolve({ sessionId: "s-h", userQuery: "something nice", n: 1 });

  assert.equal(result.tierUsed, "diverse");
  assert.deepEqual(result.diagnostics.droppedCategories, ["BELTS"]);
  assert.equal(result.excludedCount, 1);
  assert.deepEqual(warnings.messages, ["TAXONOMY_MISMATCH session=s-h label=BELTS turn=1 taxonomy=test-1"]);
});
