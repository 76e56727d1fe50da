import { z } from "zod";
import type { CostRule, LegacyRange } from "../app/types";

const usd = z.number().finite().nonnegative();
const hours = z.number().finite().nonnegative();

/* ──────────────────────────────────────────────────────────────────────────
 * Price assets
 * ------------------------------------------------------------------------ */

const FlatRule = z
  .object({ per_item_usd: usd })
  .strict()
  .transform((r): CostRule => ({ kind: "flat", per_item_usd: r.per_item_usd }));

// labor_h / paint_h are the short keys older rule files use.
const StructuredRule = z
  .object({
    parts_usd: usd.optional(),
    labor_hours: hours.optional(),
    labor_h: hours.optional(),
    paint_hours: hours.optional(),
    paint_h: hours.optional(),
  })
  .strict()
  .refine((r) => Object.keys(r).length > 0, { message: "empty cost rule" })
  .transform((r): CostRule => ({
    kind: "structured",
    parts_usd: r.parts_usd ?? 0,
    labor_hours: r.labor_hours ?? r.labor_h ?? 0,
    paint_hours: r.paint_hours ?? r.paint_h ?? 0,
  }));

export const CostRuleSchema = z.union([FlatRule, StructuredRule]);

export const RuleMapSchema = z.record(CostRuleSchema);

/** Either `class -> rule` or `vehicleType -> (class -> rule)`. */
export const CostRulesFileSchema = z.union([
  RuleMapSchema.transform((flat) => ({ nested: false as const, sets: { default: flat } })),
  z.record(RuleMapSchema).transform((sets) => ({ nested: true as const, sets })),
]);

export type LegacyParseOptions = {
  /** Kyat per US dollar; MMK ranges are rejected without it. */
  mmkPerUsd?: number;
};

export type ParsedRange = { min_usd: number; max_usd: number | null };

export type RangeParse = { ok: true; range: ParsedRange } | { ok: false; message: string };

const CURRENCY_CODE = /\b[A-Z]{3}\b/g;

/**
 * Parse "$150 – $500", "150,000 MMK – 500,000+ MMK" or "1,200+" into a USD band.
 * A single number or a "+" leaves the band open above. Bare numbers and "$" are USD;
 * MMK is converted at `mmkPerUsd`; any other currency code is refused.
 */
export function parseLegacyRangeText(text: string, opts: LegacyParseOptions = {}): RangeParse {
  const fail = (why: string): RangeParse => ({ ok: false, message: `price range "${text}" ${why}` });

  const codes = new Set(text.match(CURRENCY_CODE) ?? []);
  if (text.includes("$")) codes.add("USD");
  if (codes.size > 1) return fail(`mixes currencies (${[...codes].join(", ")})`);
  const [code = "USD"] = codes;

  let perUsd = 1;
  if (code === "MMK") {
    if (!opts.mmkPerUsd) return fail("is in MMK but no FX_MMK_PER_USD rate is configured");
    perUsd = opts.mmkPerUsd;
  } else if (code !== "USD") {
    return fail(`is in ${code}; only USD and MMK are supported`);
  }

  const normalized = text.replace(/,/g, "").replace(/[–—]/g, "-");
  const hasPlus = normalized.includes("+");
  const nums = normalized
    .split("-")
    .map((part) => part.match(/\d+(?:\.\d+)?/))
    .filter((m): m is RegExpMatchArray => m !== null)
    .map((m) => Number(m[0]) / perUsd);

  if (nums.length === 0) return { ok: false, message: `unparseable price range "${text}"` };
  if (nums.length === 1) return { ok: true, range: { min_usd: nums[0], max_usd: null } };
  const [min, max] = nums;
  if (max < min) return fail("has its upper bound below its lower bound");
  return { ok: true, range: { min_usd: min, max_usd: hasPlus ? null : max } };
}

const LegacyObject = z
  .object({ min_usd: usd, max_usd: usd.nullable().default(null) })
  .strict()
  .refine((r) => r.max_usd === null || r.max_usd >= r.min_usd, { message: "max_usd below min_usd" });

/** Legacy map: `class -> range text | { min_usd, max_usd }`, normalized to USD bands. */
export function legacyFileSchema(opts: LegacyParseOptions = {}) {
  const entry = z.union([z.string(), LegacyObject]).transform((v, ctx): LegacyRange => {
    if (typeof v !== "string") {
      const text = v.max_usd === null ? `${v.min_usd}+` : `${v.min_usd} – ${v.max_usd}`;
      return { min_usd: v.min_usd, max_usd: v.max_usd, text };
    }
    const parsed = parseLegacyRangeText(v, opts);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.message });
      return z.NEVER;
    }
    return { ...parsed.range, text: v };
  });
  return z.record(entry);
}

/* ──────────────────────────────────────────────────────────────────────────
 * Core inputs
 * ------------------------------------------------------------------------ */

const unit = z.number().finite().min(0).max(1);

export const DetectionSchema = z.object({
  class: z.string().refine((s) => s.trim().length > 0, { message: "class must be a non-empty label" }),
  confidence: unit.nullable().optional(),
  bbox_rel: z.tuple([unit, unit, unit, unit]).optional(),
});

export const DetectionListSchema = z.array(DetectionSchema);

export const RatesSchema = z.object({
  labor_rate: usd,
  paint_rate: usd,
  materials_flat: usd,
});

/** "detections.2.class: class must be a non-empty label" */
export function describeIssues(err: z.ZodError): string {
  return err.issues
    .slice(0, 5)
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
