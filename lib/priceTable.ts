// lib/priceTable.ts
// --------------------------------------------------------------------------------------
// Price table: structured cost rules (optionally one set per vehicle type) composed with
// a coarse legacy min/max table through a two-stage lookup.
// - Rules:  exact label match only.
// - Legacy: exact label first, then the normalized label (case, whitespace, aliases).
// - Neither: unpriced. Callers still report the class, just without a price.
// Loaded once per process; nothing here mutates after construction.
// --------------------------------------------------------------------------------------

import fs from "fs";
import { ZodError } from "zod";
import type { CostRule, DamageClass, LegacyRange } from "../app/types";
import { ConfigError } from "./errors";
import { CostRulesFileSchema, type LegacyParseOptions, describeIssues, legacyFileSchema } from "./schema";
import { isRecord } from "./util";

export const DEFAULT_RULE_SET = "default";

// Model label typos seen in the wild → configured keys
const CLASS_ALIASES: ReadonlyMap<string, string> = new Map([["serve", "severe"]]);

export function normalizeClassKey(name: string): string {
  const base = name.trim().toLowerCase();
  return CLASS_ALIASES.get(base) ?? base;
}

export type PriceLookup =
  | { kind: "rule"; key: string; vehicle_type: string; rule: CostRule }
  | { kind: "legacy"; key: string; range: LegacyRange }
  | { kind: "unpriced" };

export type PriceTableInput = {
  /** vehicleType → (class → rule). A flat rule file is a single DEFAULT_RULE_SET entry. */
  ruleSets: Record<string, Record<DamageClass, CostRule>>;
  legacy?: Record<DamageClass, LegacyRange>;
};

export class PriceTable {
  private readonly ruleSets: ReadonlyMap<string, ReadonlyMap<DamageClass, CostRule>>;
  private readonly legacyExact: ReadonlyMap<DamageClass, LegacyRange>;
  private readonly legacyNormalized: ReadonlyMap<string, { key: string; range: LegacyRange }>;
  readonly defaultVehicleType: string;

  constructor(input: PriceTableInput) {
    const sets = new Map<string, ReadonlyMap<DamageClass, CostRule>>();
    for (const [vehicleType, rules] of Object.entries(input.ruleSets)) {
      const frozen = new Map<DamageClass, CostRule>();
      for (const [cls, rule] of Object.entries(rules)) frozen.set(cls, Object.freeze({ ...rule }));
      sets.set(normalizeClassKey(vehicleType), frozen);
    }
    if (sets.size === 0) sets.set(DEFAULT_RULE_SET, new Map());
    this.ruleSets = sets;

    const firstSet = sets.keys().next().value ?? DEFAULT_RULE_SET;
    this.defaultVehicleType = sets.has("car") ? "car" : firstSet;

    const exact = new Map<DamageClass, LegacyRange>();
    const normalized = new Map<string, { key: string; range: LegacyRange }>();
    for (const [cls, range] of Object.entries(input.legacy ?? {})) {
      const r = Object.freeze({ ...range });
      exact.set(cls, r);
      const nk = normalizeClassKey(cls);
      // first key in file order wins a normalized collision
      if (!normalized.has(nk)) normalized.set(nk, { key: cls, range: r });
    }
    this.legacyExact = exact;
    this.legacyNormalized = normalized;
  }

  /** Configured vehicle types, in file order. */
  get vehicleTypes(): string[] {
    return Array.from(this.ruleSets.keys());
  }

  /** Configured set for the requested type, else the default set. */
  resolveVehicleType(requested?: string | null): string {
    if (requested) {
      const vt = normalizeClassKey(requested);
      if (this.ruleSets.has(vt)) return vt;
    }
    return this.defaultVehicleType;
  }

  lookup(cls: DamageClass, vehicleType?: string | null): PriceLookup {
    const vt = this.resolveVehicleType(vehicleType);
    const rule = this.ruleSets.get(vt)?.get(cls);
    if (rule) return { kind: "rule", key: cls, vehicle_type: vt, rule };

    const exact = this.legacyExact.get(cls);
    if (exact) return { kind: "legacy", key: cls, range: exact };

    const norm = this.legacyNormalized.get(normalizeClassKey(cls));
    if (norm) return { kind: "legacy", key: norm.key, range: norm.range };

    return { kind: "unpriced" };
  }

  /** Counts for startup logging. */
  stats() {
    let rules = 0;
    for (const set of this.ruleSets.values()) rules += set.size;
    return { vehicleTypes: this.ruleSets.size, rules, legacy: this.legacyExact.size };
  }
}

/* ──────────────────────────────────────────────────────────────────────────
 * Asset loading
 * ------------------------------------------------------------------------ */

function readJson(path: string, label: string, optional: boolean): unknown {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (e) {
    const code = isRecord(e) ? e["code"] : undefined;
    if (optional && code === "ENOENT") return undefined;
    throw new ConfigError(`Cannot read ${label} at ${path}`, { cause: e });
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (e) {
    throw new ConfigError(`${label} at ${path} is not valid JSON`, { cause: e });
  }
}

export function parsePriceAssets(
  rulesJson: unknown,
  legacyJson: unknown,
  opts: LegacyParseOptions = {}
): PriceTableInput {
  try {
    const rules = CostRulesFileSchema.parse(rulesJson);
    const legacy = legacyJson === undefined ? {} : legacyFileSchema(opts).parse(legacyJson);
    return { ruleSets: rules.sets, legacy };
  } catch (e) {
    if (e instanceof ZodError) throw new ConfigError(`Invalid price asset: ${describeIssues(e)}`, { cause: e });
    throw e;
  }
}

export type PriceAssetSource = LegacyParseOptions & { rulesPath: string; legacyPath: string };

export function loadPriceTable(paths: PriceAssetSource): PriceTable {
  const rulesJson = readJson(paths.rulesPath, "cost rules", false);
  const legacyJson = readJson(paths.legacyPath, "legacy price map", true);
  if (legacyJson === undefined) {
    console.warn(`[prices] no legacy price map at ${paths.legacyPath}; fallback disabled`);
  }

  const table = new PriceTable(parsePriceAssets(rulesJson, legacyJson, { mmkPerUsd: paths.mmkPerUsd }));
  const s = table.stats();
  console.info(
    `[prices] loaded ${s.rules} rules across ${s.vehicleTypes} vehicle type(s), ${s.legacy} legacy ranges; default=${table.defaultVehicleType}`
  );
  return table;
}
