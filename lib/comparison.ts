// lib/comparison.ts
// Before/after delta by class label (multiset difference, floored at zero per class).
// No spatial matching: two same-class detections anywhere in the frame are interchangeable.

import type { ComparisonResult, DamageClass, Detection, Rates } from "../app/types";
import {
  type AggregateOptions, aggregate, assertDetections, assertRates, countClasses,
} from "./costAggregator";
import type { PriceTable } from "./priceTable";

/**
 * after[c] - before[c], floored at 0, for every class seen in `after`.
 * Zero entries are kept so a class that did not grow is still reported.
 */
export function newDamageCounts(
  beforeCounts: ReadonlyMap<DamageClass, number>,
  afterCounts: ReadonlyMap<DamageClass, number>
): Map<DamageClass, number> {
  const delta = new Map<DamageClass, number>();
  for (const [cls, n] of afterCounts) {
    delta.set(cls, Math.max(0, n - (beforeCounts.get(cls) ?? 0)));
  }
  return delta;
}

/** One synthetic detection per new occurrence; confidence and geometry are dropped. */
export function expandCounts(counts: ReadonlyMap<DamageClass, number>): Detection[] {
  const out: Detection[] = [];
  for (const [cls, n] of counts) {
    for (let i = 0; i < n; i++) out.push({ class: cls, confidence: null });
  }
  return out;
}

export function compare(
  before: readonly Detection[],
  after: readonly Detection[],
  rates: Rates,
  table: PriceTable,
  opts: AggregateOptions = {}
): ComparisonResult {
  assertDetections(before, "before detections");
  assertDetections(after, "after detections");
  assertRates(rates);

  const beforeCounts = countClasses(before);
  const afterCounts = countClasses(after);
  const delta = newDamageCounts(beforeCounts, afterCounts);

  return {
    before_counts: Object.fromEntries(beforeCounts),
    after_counts: Object.fromEntries(afterCounts),
    new_damage_counts: Object.fromEntries(delta),
    new_damage_costs: aggregate(expandCounts(delta), rates, table, opts),
  };
}
