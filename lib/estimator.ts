// lib/estimator.ts
// --------------------------------------------------------------------------------------
// Request-level orchestration shared by the route handlers:
// detect → (gate) → aggregate/compare → record claim → payload.
// Everything it touches is passed in, so tests swap the detector and store freely.
// --------------------------------------------------------------------------------------

import crypto from "crypto";
import {
  type ComparePayload, type PredictPayload, type PricedDetection, type Rates, type VehicleGate, SCHEMA_VERSION,
} from "../app/types";
import type { ClaimStore } from "./claims";
import { compare } from "./comparison";
import { aggregate, eachCostUsd } from "./costAggregator";
import type { DamageDetector, ImageSource } from "./detection";
import { errorMessage } from "./errors";
import type { PriceTable } from "./priceTable";
import type { VehicleGateChecker } from "./vehicleGate";

export type EstimatorDeps = {
  rates: Rates;
  table: PriceTable;
  detector: DamageDetector;
  claims: ClaimStore;
  gate?: VehicleGateChecker | null;
  newId?: () => string;
};

export type SingleRequest = { image: ImageSource; imageSha256: string; vehicleType?: string | null };

export type CompareRequest = {
  before: ImageSource;
  beforeSha256: string;
  after: ImageSource;
  afterSha256: string;
  vehicleType?: string | null;
};

function runId(deps: EstimatorDeps): string {
  return deps.newId ? deps.newId() : crypto.randomUUID();
}

async function runGate(gate: VehicleGateChecker | null | undefined, image: ImageSource): Promise<VehicleGate | null> {
  if (!gate) return null;
  try {
    return await gate.check(image);
  } catch (e) {
    console.warn(`[gate] vehicle check failed, continuing without it: ${errorMessage(e)}`);
    return null;
  }
}

export async function estimateSingle(deps: EstimatorDeps, req: SingleRequest): Promise<PredictPayload> {
  const [detected, quality] = await Promise.all([
    deps.detector.detect(req.image),
    runGate(deps.gate, req.image),
  ]);

  const vehicleType = deps.table.resolveVehicleType(req.vehicleType ?? quality?.vehicle_type);
  const summary = aggregate(detected.detections, deps.rates, deps.table, { vehicleType });

  const detections: PricedDetection[] = detected.detections.map((d) => ({
    ...d,
    each_cost_usd: eachCostUsd(summary, d.class),
  }));

  const claim = deps.claims.create({
    type: "single",
    counts: summary.counts,
    new_damage_counts: null,
    total_usd: summary.totals.min,
    total_max_usd: summary.totals.max,
    open_ended: summary.totals.open_ended,
    currency: summary.totals.currency,
    vehicle_type: vehicleType,
    image_sha256: req.imageSha256,
    before_sha256: null,
    after_sha256: null,
  });

  return {
    schema_version: SCHEMA_VERSION,
    run_id: runId(deps),
    image_sha256: req.imageSha256,
    vehicle_type: vehicleType,
    image: detected.image,
    detections,
    ...summary,
    rates: { ...deps.rates },
    quality,
    claim_id: claim.id,
  };
}

/** Both photos are detected concurrently; the vehicle gate is not consulted here. */
export async function estimateCompare(deps: EstimatorDeps, req: CompareRequest): Promise<ComparePayload> {
  const [before, after] = await Promise.all([
    deps.detector.detect(req.before),
    deps.detector.detect(req.after),
  ]);

  const vehicleType = deps.table.resolveVehicleType(req.vehicleType);
  const result = compare(before.detections, after.detections, deps.rates, deps.table, { vehicleType });
  const totals = result.new_damage_costs.totals;

  const claim = deps.claims.create({
    type: "compare",
    counts: result.after_counts,
    new_damage_counts: result.new_damage_counts,
    total_usd: totals.min,
    total_max_usd: totals.max,
    open_ended: totals.open_ended,
    currency: totals.currency,
    vehicle_type: vehicleType,
    image_sha256: null,
    before_sha256: req.beforeSha256,
    after_sha256: req.afterSha256,
  });

  return {
    schema_version: SCHEMA_VERSION,
    run_id: runId(deps),
    before_sha256: req.beforeSha256,
    after_sha256: req.afterSha256,
    vehicle_type: vehicleType,
    before_detections: before.detections,
    after_detections: after.detections,
    ...result,
    rates: { ...deps.rates },
    claim_id: claim.id,
  };
}
