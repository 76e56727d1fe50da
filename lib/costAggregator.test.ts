import assert from "node:assert/strict";
import test from "node:test";

import type { Detection, Rates } from "../app/types";
import { aggregate, eachCostUsd, unitCostMicros } from "./costAggregator";
import { InvalidInputError } from "./errors";
import { formatTotals } from "./money";
import { PriceTable, parsePriceAssets } from "./priceTable";

const rates: Rates = { labor_rate: 95, paint_rate: 120, materials_flat: 0 };

const table = new PriceTable(
  parsePriceAssets(
    { Minor: { parts_usd: 200, labor_hours: 1.5, paint_hours: 0.5 }, Glass: { per_item_usd: 450 } },
    { Severe: "$2,000+", Moderate: "$800 - $2,000" }
  )
);

const det = (cls: string): Detection => ({ class: cls, confidence: 0.9 });

test("unit cost is parts + labor + paint + materials", () => {
  const rule = { kind: "structured" as const, parts_usd: 200, labor_hours: 1.5, paint_hours: 0.5 };
  assert.equal(unitCostMicros(rule, rates), 402_500_000);
  assert.equal(unitCostMicros(rule, { ...rates, materials_flat: 50 }), 452_500_000);
  assert.equal(unitCostMicros({ kind: "flat", per_item_usd: 450 }, { ...rates, materials_flat: 50 }), 450_000_000);
});

test("sub-cent unit costs are summed before the single rounding", () => {
  const quarterHour = new PriceTable(parsePriceAssets({ Touchup: { labor_hours: 0.25 } }, undefined));
  const s = aggregate([det("Touchup"), det("Touchup")], { labor_rate: 94.99, paint_rate: 0, materials_flat: 0 }, quarterHour);
  // 2 × 23.7475 = 47.495: rounding each unit to 23.75 first would give 48
  assert.equal(s.per_class_costs.Touchup?.cost_each, 23.75);
  assert.equal(s.per_class_costs.Touchup?.subtotal_min, 47.5);
  assert.deepEqual(s.totals, { min: 47, max: 47, open_ended: false, currency: "USD" });
});

test("one Minor prices at 402.50 and rounds the total to 403", () => {
  const s = aggregate([det("Minor")], rates, table);
  assert.deepEqual(s.counts, { Minor: 1 });
  assert.deepEqual(s.per_class_costs.Minor, {
    count: 1,
    priced: true,
    source: "rule",
    matched_key: "Minor",
    cost_each: 402.5,
    min_each: 402.5,
    max_each: 402.5,
    subtotal_min: 402.5,
    subtotal_max: 402.5,
    open_ended: false,
    range_text: "$402.50 each",
  });
  assert.deepEqual(s.totals, { min: 403, max: 403, open_ended: false, currency: "USD" });
});

test("two Minor sum to 805", () => {
  const s = aggregate([det("Minor"), det("Minor")], rates, table);
  assert.equal(s.counts.Minor, 2);
  assert.equal(s.per_class_costs.Minor?.subtotal_min, 805);
  assert.deepEqual(s.totals, { min: 805, max: 805, open_ended: false, currency: "USD" });
});

test("an unknown class is counted but adds nothing", () => {
  const s = aggregate([det("Minor"), det("Unknown")], rates, table);
  assert.deepEqual(s.counts, { Minor: 1, Unknown: 1 });
  assert.deepEqual(s.per_class_costs.Unknown, {
    count: 1,
    priced: false,
    source: "unpriced",
    matched_key: null,
    cost_each: null,
    min_each: null,
    max_each: null,
    subtotal_min: 0,
    subtotal_max: 0,
    open_ended: false,
    range_text: "no price configured",
    note: "no price configured",
  });
  assert.deepEqual(s.totals, { min: 403, max: 403, open_ended: false, currency: "USD" });
});

test("an open-ended legacy class leaves the total without a maximum", () => {
  const s = aggregate([det("Minor"), det("Severe")], rates, table);
  assert.equal(s.per_class_costs.Severe?.range_text, "≥ $2,000 each");
  assert.equal(s.per_class_costs.Severe?.subtotal_max, null);
  assert.deepEqual(s.totals, { min: 2403, max: null, open_ended: true, currency: "USD" });
  assert.equal(formatTotals(s.totals), "≥ $2,403");
});

test("a kyat legacy band is priced in dollars", () => {
  const kyat = new PriceTable(parsePriceAssets({}, { Severe: "500,000 MMK – 2,500,000+ MMK" }, { mmkPerUsd: 2000 }));
  const s = aggregate([det("Severe")], rates, kyat);
  assert.equal(s.per_class_costs.Severe?.range_text, "≥ $250 each");
  assert.deepEqual(s.totals, { min: 250, max: null, open_ended: true, currency: "USD" });
});

test("a closed legacy band multiplies both ends by the count", () => {
  const s = aggregate([det("Moderate"), det("Moderate")], rates, table);
  const line = s.per_class_costs.Moderate;
  assert.equal(line?.source, "legacy");
  assert.equal(line?.cost_each, null);
  assert.equal(line?.range_text, "$800 – $2,000 each");
  assert.equal(line?.subtotal_min, 1600);
  assert.equal(line?.subtotal_max, 4000);
  assert.deepEqual(s.totals, { min: 1600, max: 4000, open_ended: false, currency: "USD" });
});

test("an empty list is the zero total", () => {
  assert.deepEqual(aggregate([], rates, table), {
    counts: {},
    per_class_costs: {},
    totals: { min: 0, max: 0, open_ended: false, currency: "USD" },
  });
});

test("aggregating twice gives the same summary", () => {
  const input = [det("Minor"), det("Glass"), det("Severe"), det("Minor")];
  assert.deepEqual(aggregate(input, rates, table), aggregate(input, rates, table));
  assert.deepEqual(table.lookup("Glass"), { kind: "rule", key: "Glass", vehicle_type: "default", rule: { kind: "flat", per_item_usd: 450 } });
});

test("prototype-looking labels are kept as ordinary classes", () => {
  const s = aggregate([det("__proto__")], rates, table);
  assert.deepEqual(Object.keys(s.counts), ["__proto__"]);
  assert.equal(eachCostUsd(s, "__proto__"), null);
  assert.equal(eachCostUsd(s, "toString"), null);
});

test("eachCostUsd uses the unit price, or the lower bound for bands", () => {
  const s = aggregate([det("Minor"), det("Moderate")], rates, table);
  assert.equal(eachCostUsd(s, "Minor"), 402.5);
  assert.equal(eachCostUsd(s, "Moderate"), 800);
});

test("malformed detections and rates are rejected before computing", () => {
  assert.throws(() => aggregate([{ class: "" }], rates, table), InvalidInputError);
  assert.throws(() => aggregate([{ class: "Minor", confidence: 1.5 }], rates, table), /Invalid detections: 0.confidence/);
  assert.throws(
    () => aggregate([det("Minor")], { ...rates, labor_rate: -1 }, table),
    (e: unknown) => e instanceof InvalidInputError && e.message.startsWith("Invalid rates: labor_rate")
  );
});
