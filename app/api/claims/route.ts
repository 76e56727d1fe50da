// app/api/claims/route.ts
// GET /api/claims?type=single|compare&page=N — newest first, 20 per page.

import { NextRequest, NextResponse } from "next/server";
import type { ClaimType } from "../../types";
import { InvalidInputError } from "../../../lib/errors";
import { getRuntime } from "../../../lib/runtime";
import { errorResponse } from "../_shared";

export const runtime = "nodejs";

function parseType(raw: string | null): ClaimType | null {
  if (!raw) return null;
  if (raw === "single" || raw === "compare") return raw;
  throw new InvalidInputError(`type must be "single" or "compare"`);
}

export async function GET(req: NextRequest) {
  try {
    const params = req.nextUrl.searchParams;
    const type = parseType(params.get("type"));
    const page = Number(params.get("page") ?? "1");
    return NextResponse.json(getRuntime().deps.claims.list({ type, page }));
  } catch (e: unknown) {
    return errorResponse(e, "claims");
  }
}
