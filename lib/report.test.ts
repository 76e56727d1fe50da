import assert from "node:assert/strict";
import test from "node:test";

import type { ComparePayload, PredictPayload, Rates } from "../app/types";
import { aggregate } from "./costAggregator";
import { PriceTable, parsePriceAssets } from "./priceTable";
import { escapeHtml, renderCompareReport, renderSingleReport } from "./report";

const rates: Rates = { labor_rate: 95, paint_rate: 120, materials_flat: 0 };
const table = new PriceTable(
  parsePriceAssets({ Minor: { parts_usd: 200, labor_hours: 1.5, paint_hours: 0.5 } }, { Severe: "$2,000+" })
);

test("escapeHtml covers markup and quotes", () => {
  assert.equal(escapeHtml(`<b>"x" & 'y'</b>`), "&lt;b&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/b&gt;");
});

test("the single report lists each class and escapes labels", () => {
  const summary = aggregate([{ class: "Minor" }, { class: "<img>" }], rates, table);
  const payload: PredictPayload = {
    ...summary,
    schema_version: "2.0.0",
    run_id: "run-1",
    image_sha256: "abc123",
    vehicle_type: "default",
    image: { width: null, height: null },
    detections: [],
    rates,
    quality: null,
    claim_id: 7,
  };
  const html = renderSingleReport(payload);
  assert.ok(html.includes("<title>Estimate #7</title>"));
  assert.ok(html.includes("<tr><td>Minor</td><td>1</td><td>$402.50 each</td><td>$402.50</td></tr>"));
  assert.ok(html.includes("<tr><td>&lt;img&gt;</td><td>1</td><td>no price configured</td><td>—</td></tr>"));
  assert.ok(html.includes(`<p class="total">Total: $403</p>`));
});

test("open-ended subtotals and totals read as a lower bound", () => {
  const summary = aggregate([{ class: "Severe" }], rates, table);
  const payload: PredictPayload = {
    ...summary,
    schema_version: "2.0.0",
    run_id: "run-2",
    image_sha256: "abc123",
    vehicle_type: "default",
    image: { width: null, height: null },
    detections: [],
    rates,
    quality: null,
    claim_id: 8,
  };
  const html = renderSingleReport(payload);
  assert.ok(html.includes("<tr><td>Severe</td><td>1</td><td>≥ $2,000 each</td><td>≥ $2,000</td></tr>"));
  assert.ok(html.includes(`<p class="total">Total: ≥ $2,000</p>`));
});

test("a comparison with no new damage says so", () => {
  const payload: ComparePayload = {
    schema_version: "2.0.0",
    run_id: "run-3",
    before_sha256: "b",
    after_sha256: "a",
    vehicle_type: "default",
    before_detections: [],
    after_detections: [],
    before_counts: {},
    after_counts: {},
    new_damage_counts: {},
    new_damage_costs: aggregate([], rates, table),
    rates,
    claim_id: 9,
  };
  const html = renderCompareReport(payload);
  assert.ok(html.includes(`<tr><td colspan="4">No damage detected</td></tr>`));
  assert.ok(html.includes(`<p class="total">New damage total: $0</p>`));
});

test("a snapshot is embedded with its URL escaped", () => {
  const payload: ComparePayload = {
    schema_version: "2.0.0",
    run_id: "run-4",
    before_sha256: "b",
    after_sha256: "a",
    vehicle_type: "car",
    before_detections: [],
    after_detections: [],
    before_counts: {},
    after_counts: {},
    new_damage_counts: {},
    new_damage_costs: aggregate([], rates, table),
    rates,
    claim_id: 10,
  };
  const html = renderCompareReport(payload, { snapshotUrl: `data:image/jpeg;base64,AAA"onerror="x` });
  assert.ok(
    html.includes(`<img src="data:image/jpeg;base64,AAA&quot;onerror=&quot;x" alt="Inspected vehicle" style="max-width:100%">`)
  );
});
