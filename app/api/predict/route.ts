// app/api/predict/route.ts
// --------------------------------------------------------------------------------------
// POST /api/predict — one photo → detections, per-class costs, totals, claim.
// --------------------------------------------------------------------------------------
// Input (multipart/form-data):
// - image: File (image/*)  or  imageUrl: http(s) string
// - vehicle_type (optional): picks the rule set; falls back to the gate's guess, then "car"
//
// Output: PredictPayload. Errors: { error, error_code } with the error's status.
// --------------------------------------------------------------------------------------

import { NextRequest, NextResponse } from "next/server";
import { estimateSingle } from "../../../lib/estimator";
import { getRuntime } from "../../../lib/runtime";
import { readImageField, readOptionalText } from "../../../lib/uploads";
import { errorResponse, makeRateLimiter } from "../_shared";

export const runtime = "nodejs";

let limiter: ReturnType<typeof makeRateLimiter> | null = null;

export async function POST(req: NextRequest) {
  console.time("predict_total");
  try {
    const { config, deps } = getRuntime();
    limiter ??= makeRateLimiter("predict", config.rateLimit.windowMs, config.rateLimit.max);
    const rl = limiter(req);
    if (!rl.ok) return rl.res;

    const form = await req.formData();
    const { source, sha256 } = await readImageField(form, { file: "image", url: "imageUrl" }, config.uploads.maxBytes);

    const payload = await estimateSingle(deps, {
      image: source,
      imageSha256: sha256,
      vehicleType: readOptionalText(form, "vehicle_type"),
    });

    console.info(
      `[predict] claim=${payload.claim_id} type=${payload.vehicle_type} detections=${payload.detections.length} total=${payload.totals.min}`
    );
    return NextResponse.json(payload);
  } catch (e: unknown) {
    return errorResponse(e, "predict");
  } finally {
    console.timeEnd("predict_total");
  }
}
