// app/types.ts
// -------------------------------------------------------------------------------------------------
// Shared type definitions for the Car Damage Estimator.
// These types are consumed by the core (lib/), the route handlers (/api/predict, /api/compare,
// /api/claims) and the client UI. Keep this file as the single source of truth to avoid drift.
// -------------------------------------------------------------------------------------------------

/* ──────────────────────────────────────────────────────────────────────────
 * Detection primitives
 * ------------------------------------------------------------------------ */

/** Normalized bounding box (x, y, w, h) in [0..1] space, origin top-left. */
export type BBoxRel = [number, number, number, number];

/** Opaque model label ("minor", "severe", "dent", ...). Compared by exact string match. */
export type DamageClass = string;

export type Detection = {
  class: DamageClass;
  confidence?: number | null; // 0..1 when the model reports it
  bbox_rel?: BBoxRel;
};

export type ImageDims = { width: number | null; height: number | null };

export type DetectionResult = {
  detections: Detection[];
  image: ImageDims;
};

/* ──────────────────────────────────────────────────────────────────────────
 * Price table
 * ------------------------------------------------------------------------ */

/** parts + labor hours × labor rate + paint hours × paint rate + materials. */
export type StructuredCostRule = {
  kind: "structured";
  parts_usd: number;
  labor_hours: number;
  paint_hours: number;
};

/** Fixed unit price; rates do not apply. */
export type FlatCostRule = {
  kind: "flat";
  per_item_usd: number;
};

export type CostRule = StructuredCostRule | FlatCostRule;

/** Coarse fallback band. max_usd null means no finite upper bound. */
export type LegacyRange = {
  min_usd: number;
  max_usd: number | null;
  text: string;
};

export type Rates = {
  labor_rate: number;     // USD / labor hour
  paint_rate: number;     // USD / paint hour
  materials_flat: number; // USD per priced item
};

/* ──────────────────────────────────────────────────────────────────────────
 * Cost aggregation output
 * ------------------------------------------------------------------------ */

export type PriceSource = "rule" | "legacy" | "unpriced";

export const NO_PRICE_NOTE = "no price configured" as const;

export type PerClassCost = {
  count: number;
  priced: boolean;
  source: PriceSource;
  /** Table key the class resolved to (may differ from the label for normalized legacy hits). */
  matched_key: string | null;
  /** Unit cost in dollars and cents (rule-priced classes only). */
  cost_each: number | null;
  min_each: number | null;
  max_each: number | null;
  subtotal_min: number;
  subtotal_max: number | null;
  open_ended: boolean;
  /** Display text, e.g. "$402.50 each", "$150 – $500 each", "≥ $500 each". */
  range_text: string;
  note?: typeof NO_PRICE_NOTE;
};

export type Totals = {
  min: number;
  max: number | null;
  open_ended: boolean;
  currency: "USD";
};

export type CostSummary = {
  counts: Record<DamageClass, number>;
  per_class_costs: Record<DamageClass, PerClassCost>;
  totals: Totals;
};

export type ComparisonResult = {
  before_counts: Record<DamageClass, number>;
  after_counts: Record<DamageClass, number>;
  new_damage_counts: Record<DamageClass, number>;
  new_damage_costs: CostSummary;
};

/* ──────────────────────────────────────────────────────────────────────────
 * Vehicle gate (optional OpenAI hint)
 * ------------------------------------------------------------------------ */

export type Vehicle = {
  make: string | null;
  model: string | null;
  color: string | null;
  confidence: number; // 0..1
};

export type VehicleGate = {
  is_vehicle: boolean;
  quality_ok: boolean;
  issues: string[]; // e.g., ["blurry","low_light"]
  vehicle_type: string | null;
  vehicle: Vehicle;
};

/* ──────────────────────────────────────────────────────────────────────────
 * Route payloads
 * ------------------------------------------------------------------------ */

/** Bumped whenever a payload field changes meaning. */
export const SCHEMA_VERSION = "2.0.0";

export type ApiError = { error: string; error_code?: string };

export type PricedDetection = Detection & { each_cost_usd: number | null };

export type PredictPayload = CostSummary & {
  schema_version: string;
  run_id: string;
  image_sha256: string;
  vehicle_type: string;
  image: ImageDims;
  detections: PricedDetection[];
  rates: Rates;
  quality: VehicleGate | null;
  claim_id: number;
};

export type ComparePayload = ComparisonResult & {
  schema_version: string;
  run_id: string;
  before_sha256: string;
  after_sha256: string;
  vehicle_type: string;
  before_detections: Detection[];
  after_detections: Detection[];
  rates: Rates;
  claim_id: number;
};

/* ──────────────────────────────────────────────────────────────────────────
 * Claims
 * ------------------------------------------------------------------------ */

export type ClaimType = "single" | "compare";

export type Claim = {
  id: number;
  type: ClaimType;
  counts: Record<DamageClass, number>;
  new_damage_counts: Record<DamageClass, number> | null;
  total_usd: number;
  total_max_usd: number | null;
  open_ended: boolean;
  currency: "USD";
  vehicle_type: string | null;
  image_sha256: string | null;
  before_sha256: string | null;
  after_sha256: string | null;
  created_at: string; // ISO-8601
};

export type ClaimPage = {
  data: Claim[];
  current_page: number;
  per_page: number;
  total: number;
  last_page: number;
};
