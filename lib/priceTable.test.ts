import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { ConfigError } from "./errors";
import { PriceTable, loadPriceTable, normalizeClassKey, parsePriceAssets } from "./priceTable";

const table = new PriceTable(
  parsePriceAssets(
    {
      car: { Minor: { parts_usd: 200, labor_hours: 1.5, paint_hours: 0.5 } },
      suv: { Minor: { per_item_usd: 600 } },
    },
    { Severe: "$2,000+", Minor: "$300 - $800" }
  )
);

test("normalizeClassKey trims, lowercases and applies aliases", () => {
  assert.equal(normalizeClassKey("  Serve "), "severe");
  assert.equal(normalizeClassKey("Glass Shatter"), "glass shatter");
  assert.equal(normalizeClassKey("constructor"), "constructor");
});

test("car is the default rule set and unknown types fall back to it", () => {
  assert.equal(table.defaultVehicleType, "car");
  assert.deepEqual(table.vehicleTypes, ["car", "suv"]);
  assert.equal(table.resolveVehicleType("SUV"), "suv");
  assert.equal(table.resolveVehicleType("boat"), "car");
  assert.equal(table.resolveVehicleType(null), "car");
});

test("without a car set the first set in file order is the default", () => {
  const t = new PriceTable(parsePriceAssets({ truck: {}, van: {} }, undefined));
  assert.equal(t.defaultVehicleType, "truck");
});

test("rules match exactly, per vehicle type", () => {
  assert.deepEqual(table.lookup("Minor"), {
    kind: "rule",
    key: "Minor",
    vehicle_type: "car",
    rule: { kind: "structured", parts_usd: 200, labor_hours: 1.5, paint_hours: 0.5 },
  });
  assert.deepEqual(table.lookup("Minor", "suv"), {
    kind: "rule",
    key: "Minor",
    vehicle_type: "suv",
    rule: { kind: "flat", per_item_usd: 600 },
  });
});

test("a label that misses the rules falls back to legacy, exact then normalized", () => {
  assert.deepEqual(table.lookup("minor"), {
    kind: "legacy",
    key: "Minor",
    range: { min_usd: 300, max_usd: 800, text: "$300 - $800" },
  });
  assert.deepEqual(table.lookup("serve"), {
    kind: "legacy",
    key: "Severe",
    range: { min_usd: 2000, max_usd: null, text: "$2,000+" },
  });
  assert.deepEqual(table.lookup("Unknown"), { kind: "unpriced" });
  assert.deepEqual(table.lookup("toString"), { kind: "unpriced" });
});

test("an unparseable legacy entry fails the load with a ConfigError", () => {
  assert.throws(
    () => parsePriceAssets({ Minor: { per_item_usd: 1 } }, { Bad: "call us" }),
    (e: unknown) => e instanceof ConfigError && /unparseable price range "call us"/.test(e.message)
  );
});

test("loadPriceTable reads the bundled assets", () => {
  const t = loadPriceTable({
    rulesPath: path.resolve("data/cost_rules.json"),
    legacyPath: path.resolve("data/car_damage_price.json"),
  });
  assert.deepEqual(t.stats(), { vehicleTypes: 3, rules: 24, legacy: 7 });
  assert.equal(t.defaultVehicleType, "car");
});

test("the bundled rules are keyed by the detector's labels", () => {
  const t = loadPriceTable({
    rulesPath: path.resolve("data/cost_rules.json"),
    legacyPath: path.resolve("data/car_damage_price.json"),
  });
  assert.deepEqual(t.lookup("Minor"), {
    kind: "rule",
    key: "Minor",
    vehicle_type: "car",
    rule: { kind: "structured", parts_usd: 120, labor_hours: 1.5, paint_hours: 1 },
  });
  assert.equal(t.lookup("Severe", "truck").kind, "rule");
  assert.deepEqual(t.lookup("Moderate", "suv"), {
    kind: "rule",
    key: "Moderate",
    vehicle_type: "suv",
    rule: { kind: "structured", parts_usd: 420, labor_hours: 3.5, paint_hours: 2.4 },
  });
  // only the legacy fallback normalizes labels
  assert.equal(t.lookup("frame damage").kind, "legacy");
});

test("a kyat legacy map loads only with an exchange rate", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prices-"));
  const rulesPath = path.join(dir, "rules.json");
  const legacyPath = path.join(dir, "legacy.json");
  fs.writeFileSync(rulesPath, JSON.stringify({ Minor: { per_item_usd: 100 } }));
  fs.writeFileSync(legacyPath, JSON.stringify({ Severe: "500,000 MMK – 2,500,000+ MMK" }));

  assert.throws(
    () => loadPriceTable({ rulesPath, legacyPath }),
    (e: unknown) => e instanceof ConfigError && /no FX_MMK_PER_USD rate is configured/.test(e.message)
  );
  const t = loadPriceTable({ rulesPath, legacyPath, mmkPerUsd: 2000 });
  assert.deepEqual(t.lookup("Severe"), {
    kind: "legacy",
    key: "Severe",
    range: { min_usd: 250, max_usd: null, text: "500,000 MMK – 2,500,000+ MMK" },
  });
  fs.rmSync(dir, { recursive: true, force: true });
});

test("a missing legacy file is tolerated, a missing rules file is not", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prices-"));
  const rulesPath = path.join(dir, "rules.json");
  fs.writeFileSync(rulesPath, JSON.stringify({ Minor: { per_item_usd: 100 } }));

  const t = loadPriceTable({ rulesPath, legacyPath: path.join(dir, "absent.json") });
  assert.deepEqual(t.stats(), { vehicleTypes: 1, rules: 1, legacy: 0 });

  assert.throws(
    () => loadPriceTable({ rulesPath: path.join(dir, "absent.json"), legacyPath: rulesPath }),
    ConfigError
  );
  fs.rmSync(dir, { recursive: true, force: true });
});
