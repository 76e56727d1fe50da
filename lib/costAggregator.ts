// lib/costAggregator.ts
// --------------------------------------------------------------------------------------
// Detections → per-class costs + totals.
// Pure: the same (detections, rates, table, vehicle type) always yields the same summary.
// Rates are passed in; nothing is read from the environment here.
// --------------------------------------------------------------------------------------

import type {
  CostRule, CostSummary, DamageClass, Detection, PerClassCost, Rates,
} from "../app/types";
import { NO_PRICE_NOTE } from "../app/types";
import { InvalidInputError } from "./errors";
import {
  type Micros, formatUsd, hoursToMicros, microsToUsd, microsToWholeDollars, usdToMicros,
} from "./money";
import type { PriceLookup, PriceTable } from "./priceTable";
import { DetectionListSchema, RatesSchema, describeIssues } from "./schema";

export type AggregateOptions = {
  /** Selects the rule set; unknown or absent types use the table default. */
  vehicleType?: string | null;
};

/** Class → occurrences, in first-appearance order. */
export function countClasses(detections: readonly Pick<Detection, "class">[]): Map<DamageClass, number> {
  const counts = new Map<DamageClass, number>();
  for (const d of detections) counts.set(d.class, (counts.get(d.class) ?? 0) + 1);
  return counts;
}

export function assertDetections(input: unknown, label = "detections"): asserts input is Detection[] {
  const res = DetectionListSchema.safeParse(input);
  if (!res.success) throw new InvalidInputError(`Invalid ${label}: ${describeIssues(res.error)}`);
}

export function assertRates(input: unknown): asserts input is Rates {
  const res = RatesSchema.safeParse(input);
  if (!res.success) throw new InvalidInputError(`Invalid rates: ${describeIssues(res.error)}`);
}

/** Unit cost of a rule-priced item, in micro-dollars. */
export function unitCostMicros(rule: CostRule, rates: Rates): Micros {
  if (rule.kind === "flat") return usdToMicros(rule.per_item_usd);
  return (
    usdToMicros(rule.parts_usd) +
    hoursToMicros(rule.labor_hours, rates.labor_rate) +
    hoursToMicros(rule.paint_hours, rates.paint_rate) +
    usdToMicros(rates.materials_flat)
  );
}

type Line = { cost: PerClassCost; minMicros: Micros; maxMicros: Micros | null };

function priceLine(count: number, hit: PriceLookup, rates: Rates): Line {
  if (hit.kind === "rule") {
    const unit = unitCostMicros(hit.rule, rates);
    const subtotal = unit * count;
    return {
      minMicros: subtotal,
      maxMicros: subtotal,
      cost: {
        count,
        priced: true,
        source: "rule",
        matched_key: hit.key,
        cost_each: microsToUsd(unit),
        min_each: microsToUsd(unit),
        max_each: microsToUsd(unit),
        subtotal_min: microsToUsd(subtotal),
        subtotal_max: microsToUsd(subtotal),
        open_ended: false,
        range_text: `${formatUsd(microsToUsd(unit))} each`,
      },
    };
  }

  if (hit.kind === "legacy") {
    const minEach = usdToMicros(hit.range.min_usd);
    const maxEach = hit.range.max_usd === null ? null : usdToMicros(hit.range.max_usd);
    const minMicros = minEach * count;
    const maxMicros = maxEach === null ? null : maxEach * count;
    const minUsd = microsToUsd(minEach);
    const maxUsd = maxEach === null ? null : microsToUsd(maxEach);
    const range_text =
      maxUsd === null ? `≥ ${formatUsd(minUsd)} each`
      : maxUsd === minUsd ? `${formatUsd(minUsd)} each`
      : `${formatUsd(minUsd)} – ${formatUsd(maxUsd)} each`;
    return {
      minMicros,
      maxMicros,
      cost: {
        count,
        priced: true,
        source: "legacy",
        matched_key: hit.key,
        cost_each: null,
        min_each: minUsd,
        max_each: maxUsd,
        subtotal_min: microsToUsd(minMicros),
        subtotal_max: maxMicros === null ? null : microsToUsd(maxMicros),
        open_ended: maxEach === null,
        range_text,
      },
    };
  }

  return {
    minMicros: 0,
    maxMicros: 0,
    cost: {
      count,
      priced: false,
      source: "unpriced",
      matched_key: null,
      cost_each: null,
      min_each: null,
      max_each: null,
      subtotal_min: 0,
      subtotal_max: 0,
      open_ended: false,
      range_text: NO_PRICE_NOTE,
      note: NO_PRICE_NOTE,
    },
  };
}

/**
 * Group detections by class, price each class through the table and sum.
 * Throws InvalidInputError (before computing anything) on malformed detections or rates.
 */
export function aggregate(
  detections: readonly Detection[],
  rates: Rates,
  table: PriceTable,
  opts: AggregateOptions = {}
): CostSummary {
  assertDetections(detections);
  assertRates(rates);

  const counts = countClasses(detections);
  const perClass = new Map<DamageClass, PerClassCost>();
  let minMicros = 0;
  let maxMicros = 0;
  let openEnded = false;

  for (const [cls, count] of counts) {
    const line = priceLine(count, table.lookup(cls, opts.vehicleType), rates);
    perClass.set(cls, line.cost);
    minMicros += line.minMicros;
    if (line.maxMicros === null) openEnded = true;
    else maxMicros += line.maxMicros;
  }

  // Object.fromEntries defines own properties, so labels like "__proto__" survive
  return {
    counts: Object.fromEntries(counts),
    per_class_costs: Object.fromEntries(perClass),
    totals: {
      min: microsToWholeDollars(minMicros),
      max: openEnded ? null : microsToWholeDollars(maxMicros),
      open_ended: openEnded,
      currency: "USD",
    },
  };
}

/** Unit price for one detection of a class in a summary (lower bound for ranges). */
export function eachCostUsd(summary: CostSummary, cls: DamageClass): number | null {
  const line = Object.prototype.hasOwnProperty.call(summary.per_class_costs, cls)
    ? summary.per_class_costs[cls]
    : undefined;
  if (!line) return null;
  return line.cost_each ?? line.min_each;
}
