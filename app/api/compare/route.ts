// app/api/compare/route.ts
// --------------------------------------------------------------------------------------
// POST /api/compare — before/after photos → new damage by class, priced.
// --------------------------------------------------------------------------------------
// Input (multipart/form-data):
// - before | beforeUrl, after | afterUrl
// - vehicle_type (optional; default rule set otherwise)
// --------------------------------------------------------------------------------------

import { NextRequest, NextResponse } from "next/server";
import { estimateCompare } from "../../../lib/estimator";
import { getRuntime } from "../../../lib/runtime";
import { readImageField, readOptionalText } from "../../../lib/uploads";
import { errorResponse, makeRateLimiter } from "../_shared";

export const runtime = "nodejs";

let limiter: ReturnType<typeof makeRateLimiter> | null = null;

export async function POST(req: NextRequest) {
  console.time("compare_total");
  try {
    const { config, deps } = getRuntime();
    limiter ??= makeRateLimiter("compare", config.rateLimit.windowMs, config.rateLimit.max);
    const rl = limiter(req);
    if (!rl.ok) return rl.res;

    const form = await req.formData();
    const maxBytes = config.uploads.maxBytes;
    const before = await readImageField(form, { file: "before", url: "beforeUrl" }, maxBytes);
    const after = await readImageField(form, { file: "after", url: "afterUrl" }, maxBytes);

    const payload = await estimateCompare(deps, {
      before: before.source,
      beforeSha256: before.sha256,
      after: after.source,
      afterSha256: after.sha256,
      vehicleType: readOptionalText(form, "vehicle_type"),
    });

    console.info(
      `[compare] claim=${payload.claim_id} type=${payload.vehicle_type} new_total=${payload.new_damage_costs.totals.min}`
    );
    return NextResponse.json(payload);
  } catch (e: unknown) {
    return errorResponse(e, "compare");
  } finally {
    console.timeEnd("compare_total");
  }
}
