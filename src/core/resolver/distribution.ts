import type { CategoryLabel } from "../taxonomy/taxonomy.types";

export type SlotPlan = ReadonlyArray<{ readonly category: CategoryLabel; readonly slots: number }>;

/** `floor(n/k)` each; the first `n mod k` categories take one more. */
export function planDistribution(n: number, categories: readonly CategoryLabel[]): SlotPlan {
  const k = categories.length;
  if (k === 0 || n <= 0) {
    return categories.map((category) => ({ category, slots: 0 }));
  }
  const base = Math.floor(n / k);
  const remainder = n % k;
  return categories.map((category, idx) => ({
    category,
    slots: base + (idx < remainder ? 1 : 0),
  }));
}

/**
 * Final slot counts after shortfalls move down the category order. Whatever is
 * still unplaced after the last category is offered again, in order, to
 * categories with eligible items left over.
 */
export function cascadeSlots(
  plan: SlotPlan,
  eligibleCounts: ReadonlyMap<CategoryLabel, number>
): Map<CategoryLabel, number> {
  const filled = new Map<CategoryLabel, number>();
  let carry = 0;

  for (const { category, slots } of plan) {
    const eligible = eligibleCounts.get(category) ?? 0;
    const wanted = slots + carry;
    const taken = Math.min(wanted, eligible);
    filled.set(category, taken);
    carry = wanted - taken;
  }

  for (const { category } of plan) {
    if (carry === 0) {
      break;
    }
    const taken = filled.get(category) ?? 0;
    const extra = Math.min((eligibleCounts.get(category) ?? 0) - taken, carry);
    if (extra > 0) {
      filled.set(category, taken + extra);
      carry -= extra;
    }
  }

  return filled;
}
