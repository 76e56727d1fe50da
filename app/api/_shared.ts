// app/api/_shared.ts
import { NextRequest, NextResponse } from "next/server";
import { ERR, type ErrorCode, EstimatorError, errorMessage } from "../../lib/errors";
import { FixedWindowLimiter, type RLState } from "../../lib/rateLimit";

/** ---------- Error helper (consistent across routes) ---------- */
export function errJson(message: string, code: ErrorCode, status = 400) {
  return NextResponse.json({ error: message, error_code: code }, { status });
}

/** Known errors keep their code/status; anything else is logged and becomes E_SERVER. */
export function errorResponse(e: unknown, scope: string) {
  if (e instanceof EstimatorError) {
    if (e.status >= 500) console.error(`[${scope}] ${e.code}: ${e.message}`);
    return errJson(e.message, e.code, e.status);
  }
  console.error(`[${scope}] unexpected error`, e);
  return errJson(errorMessage(e), ERR.SERVER, 500);
}

/** ---------- Rate limiting (per-IP, in-memory) ---------- */
export type RateBucket = "predict" | "compare";

declare global {
  // eslint-disable-next-line no-var
  var __RATE_LIMITS__: Map<RateBucket, Map<string, RLState>> | undefined;
}

export function clientIp(req: NextRequest): string {
  const xf = req.headers.get("x-forwarded-for") || "";
  return xf.split(",")[0]?.trim() || req.headers.get("x-real-ip") || "0.0.0.0";
}

export function makeRateLimiter(bucket: RateBucket, windowMs: number, maxRequests: number) {
  const buckets = globalThis.__RATE_LIMITS__ ?? (globalThis.__RATE_LIMITS__ = new Map<RateBucket, Map<string, RLState>>());
  let states = buckets.get(bucket);
  if (!states) {
    states = new Map<string, RLState>();
    buckets.set(bucket, states);
  }
  const limiter = new FixedWindowLimiter(states, windowMs, maxRequests);

  return (req: NextRequest) => {
    const decision = limiter.hit(clientIp(req));
    if (decision.ok) return { ok: true as const };
    const res = errJson("Too many requests. Please wait a moment and try again.", ERR.RATE_LIMIT, 429);
    res.headers.set("Retry-After", String(decision.retryAfterSec));
    return { ok: false as const, res };
  };
}
