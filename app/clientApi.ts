// app/clientApi.ts
// Browser-side helpers: image compression, calls to /api/*, and payload guards for
// anything that comes back from the network or out of localStorage.

import {
  type Claim, type ClaimPage, type ComparePayload, type CostSummary, type PredictPayload, SCHEMA_VERSION,
} from "./types";

/* ──────────────────────────────────────────────────────────────────────────
 * Guards
 * ------------------------------------------------------------------------ */

function isObj(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function hasSummaryShape(v: Record<string, unknown>): boolean {
  return isObj(v["counts"]) && isObj(v["per_class_costs"]) && isObj(v["totals"]);
}

export function isPredictPayload(v: unknown): v is PredictPayload {
  return isObj(v) && v["schema_version"] === SCHEMA_VERSION && hasSummaryShape(v) && Array.isArray(v["detections"]);
}

export function isComparePayload(v: unknown): v is ComparePayload {
  return (
    isObj(v) &&
    v["schema_version"] === SCHEMA_VERSION &&
    isObj(v["new_damage_counts"]) &&
    isObj(v["new_damage_costs"]) &&
    hasSummaryShape(v["new_damage_costs"]) &&
    Array.isArray(v["before_detections"]) &&
    Array.isArray(v["after_detections"])
  );
}

function isClaim(v: unknown): v is Claim {
  return isObj(v) && typeof v["id"] === "number" && (v["type"] === "single" || v["type"] === "compare");
}

export function isClaimPage(v: unknown): v is ClaimPage {
  return isObj(v) && Array.isArray(v["data"]) && v["data"].every(isClaim) && typeof v["last_page"] === "number";
}

/* ──────────────────────────────────────────────────────────────────────────
 * Errors
 * ------------------------------------------------------------------------ */

export class ApiCallError extends Error {
  constructor(message: string, readonly code: string | null, readonly status: number) {
    super(message);
    this.name = "ApiCallError";
  }
}

function friendlyApiError(code: string | null, raw: string, status: number): string {
  switch (code) {
    case "E_BAD_URL":
      return "That link isn’t usable. Paste a direct http(s) image URL (JPG/PNG/WebP).";
    case "E_TOO_LARGE":
      return "That photo is too large. Try a smaller image.";
    case "E_DETECTION_UNAVAILABLE":
      return "The damage detector is unavailable right now. Please try again shortly.";
    case "E_RATE_LIMIT":
      return "Too many requests. Please wait a moment and try again.";
    default:
      if (status >= 500) return "Our service hit a hiccup while processing the image. Please try again in a moment.";
      return raw || "We couldn’t process that image or link. Try a different photo or a direct image URL.";
  }
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ApiCallError(friendlyApiError(null, "", res.status), null, res.status);
  }
}

async function call<T>(input: string, init: RequestInit | undefined, guard: (v: unknown) => v is T): Promise<T> {
  const res = await fetch(input, init);
  const body = await readJson(res);
  if (!res.ok) {
    const code = isObj(body) && typeof body["error_code"] === "string" ? body["error_code"] : null;
    const raw = isObj(body) && typeof body["error"] === "string" ? body["error"] : "";
    throw new ApiCallError(friendlyApiError(code, raw, res.status), code, res.status);
  }
  if (!guard(body)) throw new ApiCallError("Unexpected response from the server.", null, res.status);
  return body;
}

export function postPredict(form: FormData): Promise<PredictPayload> {
  return call("/api/predict", { method: "POST", body: form }, isPredictPayload);
}

export function postCompare(form: FormData): Promise<ComparePayload> {
  return call("/api/compare", { method: "POST", body: form }, isComparePayload);
}

export function fetchClaims(type: "" | "single" | "compare", page: number): Promise<ClaimPage> {
  const qs = new URLSearchParams({ page: String(page) });
  if (type) qs.set("type", type);
  return call(`/api/claims?${qs.toString()}`, undefined, isClaimPage);
}

/* ──────────────────────────────────────────────────────────────────────────
 * Image utils
 * ------------------------------------------------------------------------ */

export function loadImage(src: string) {
  return new Promise<HTMLImageElement>((resolve, reject) => {
    const img = new Image(); img.crossOrigin = "anonymous";
    img.onload = () => resolve(img); img.onerror = reject; img.src = src;
  });
}

/** Downscale to at most maxW wide and re-encode as JPEG before upload. */
export async function compress(file: File, maxW = 1600, quality = 0.72): Promise<File> {
  const url = URL.createObjectURL(file);
  try {
    const img = await loadImage(url);
    const scale = Math.min(1, maxW / img.width);
    const w = Math.round(img.width * scale), h = Math.round(img.height * scale);
    const canvas = document.createElement("canvas"); canvas.width = w; canvas.height = h;
    const ctx = canvas.getContext("2d");
    if (!ctx) return file;
    ctx.drawImage(img, 0, 0, w, h);
    const blob = await new Promise<Blob | null>((res) => canvas.toBlob(res, "image/jpeg", quality));
    return blob ? new File([blob], "upload.jpg", { type: "image/jpeg" }) : file;
  } finally {
    URL.revokeObjectURL(url);
  }
}

/* ──────────────────────────────────────────────────────────────────────────
 * Photo slots
 * ------------------------------------------------------------------------ */

export type SlotValue = { file: File | null; url: string };

export type SlotMode = "upload" | "url" | "camera";

/** A slot holding only a link (e.g. restored from storage) opens on the Link tab. */
export function slotModeFor(slot: SlotValue, current: SlotMode): SlotMode {
  if (!slot.file && slot.url.trim() !== "" && current === "upload") return "url";
  return current;
}

/** Appends the slot to a form under `fileField` or `urlField`; false when the slot is empty. */
export function appendSlot(form: FormData, slot: SlotValue, fileField: string, urlField: string, file?: File): boolean {
  const f = file ?? slot.file;
  if (f) {
    form.append(fileField, f);
    return true;
  }
  const url = slot.url.trim();
  if (!url) return false;
  form.append(urlField, url);
  return true;
}

/** Overlay colour: classes missing from the summary are drawn as priced. */
export function isClassPriced(summary: CostSummary | null | undefined, cls: string): boolean {
  if (!summary || !Object.prototype.hasOwnProperty.call(summary.per_class_costs, cls)) return true;
  return summary.per_class_costs[cls]?.priced ?? true;
}

/* ──────────────────────────────────────────────────────────────────────────
 * localStorage
 * ------------------------------------------------------------------------ */

export const STORAGE_KEYS = {
  single: "cde:last-single",
  compare: "cde:last-compare",
  inputs: "cde:last-inputs",
} as const;

export type SavedInputs = { singleUrl: string; beforeUrl: string; afterUrl: string; vehicleType: string };

export const EMPTY_INPUTS: SavedInputs = { singleUrl: "", beforeUrl: "", afterUrl: "", vehicleType: "" };

export function loadStored<T>(key: string, guard: (v: unknown) => v is T): T | null {
  try {
    const raw = window.localStorage.getItem(key);
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    return guard(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function saveStored(key: string, value: unknown): void {
  try {
    window.localStorage.setItem(key, JSON.stringify(value));
  } catch (e) {
    console.warn("[storage] could not persist", key, e);
  }
}

export function isSavedInputs(v: unknown): v is SavedInputs {
  return (
    isObj(v) &&
    typeof v["singleUrl"] === "string" &&
    typeof v["beforeUrl"] === "string" &&
    typeof v["afterUrl"] === "string" &&
    typeof v["vehicleType"] === "string"
  );
}
