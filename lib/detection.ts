// lib/detection.ts
// --------------------------------------------------------------------------------------
// Detection adapter: hosted Roboflow inference → labelled detections.
// --------------------------------------------------------------------------------------
// Behavior:
// - Uploads: POST raw base64 in body (no data: prefix). URLs: POST with ?image=<url>.
// - Predictions may sit under `predictions`, `result.predictions` or `outputs`.
// - Labels come from `class`, `class_name` or `label`; unlabelled predictions are dropped.
// - Boxes are normalized to [0..1] from center-format pixels (per-pred or top-level dims)
//   or taken from min/max corners.
// - Transport failures are retried; if the model still cannot answer the caller gets a
//   DetectionUnavailableError and no estimate is attempted.
// --------------------------------------------------------------------------------------

import type { BBoxRel, Detection, DetectionResult } from "../app/types";
import type { RoboflowConfig } from "./config";
import { DetectionUnavailableError, errorMessage } from "./errors";
import { clamp01, getNum, getStr, isRecord, withRetry } from "./util";

export type ImageSource =
  | { kind: "upload"; bytes: Buffer; mime: string }
  | { kind: "url"; url: string };

export interface DamageDetector {
  detect(image: ImageSource): Promise<DetectionResult>;
}

export function toDataUrl(image: ImageSource): string {
  return image.kind === "upload"
    ? `data:${image.mime || "image/jpeg"};base64,${image.bytes.toString("base64")}`
    : image.url;
}

/* ──────────────────────────────────────────────────────────────────────────
 * Response parsing
 * ------------------------------------------------------------------------ */

function extractPredictions(obj: unknown): unknown[] {
  if (!isRecord(obj)) return [];
  if (Array.isArray(obj.predictions)) return obj.predictions;
  if (isRecord(obj.result) && Array.isArray(obj.result.predictions)) return obj.result.predictions;
  if (Array.isArray(obj.outputs)) return obj.outputs;
  return [];
}

function toRelBox(p: Record<string, unknown>, globalW?: number, globalH?: number): BBoxRel | undefined {
  const W = getNum(p, "image_width") ?? globalW;
  const H = getNum(p, "image_height") ?? globalH;
  const cx = getNum(p, "x");
  const cy = getNum(p, "y");
  const w = getNum(p, "width");
  const h = getNum(p, "height");

  // Center format (pixels) → top-left origin, normalized
  if (cx !== undefined && cy !== undefined && w !== undefined && h !== undefined && W && H && W > 0 && H > 0) {
    return [clamp01((cx - w / 2) / W), clamp01((cy - h / 2) / H), clamp01(w / W), clamp01(h / H)];
  }

  // Corner format, already normalized
  const xmin = getNum(p, "x_min");
  const ymin = getNum(p, "y_min");
  const xmax = getNum(p, "x_max");
  const ymax = getNum(p, "y_max");
  if (xmin !== undefined && ymin !== undefined && xmax !== undefined && ymax !== undefined) {
    return [clamp01(xmin), clamp01(ymin), clamp01(xmax - xmin), clamp01(ymax - ymin)];
  }
  return undefined;
}

export function parseRoboflowResponse(body: unknown): DetectionResult {
  const imgRec: Record<string, unknown> = isRecord(body) && isRecord(body.image) ? body.image : {};
  const globalW = getNum(imgRec, "width");
  const globalH = getNum(imgRec, "height");

  const detections: Detection[] = [];
  for (const p of extractPredictions(body)) {
    if (!isRecord(p)) continue;
    const cls = getStr(p, "class") ?? getStr(p, "class_name") ?? getStr(p, "label");
    if (!cls) continue;

    const conf = getNum(p, "confidence") ?? getNum(p, "conf");
    const det: Detection = { class: cls, confidence: conf === undefined ? null : clamp01(conf) };
    const box = toRelBox(p, globalW, globalH);
    if (box) det.bbox_rel = box;
    detections.push(det);
  }

  return { detections, image: { width: globalW ?? null, height: globalH ?? null } };
}

/* ──────────────────────────────────────────────────────────────────────────
 * Roboflow client
 * ------------------------------------------------------------------------ */

class UpstreamHttpError extends Error {
  constructor(readonly status: number, snippet: string) {
    super(`Roboflow responded ${status}: ${snippet}`);
    this.name = "UpstreamHttpError";
  }
}

// 4xx (other than 429) will not heal on retry
function isRetryable(e: unknown) {
  return !(e instanceof UpstreamHttpError && e.status >= 400 && e.status < 500 && e.status !== 429);
}

export type RoboflowDetectorOptions = {
  fetch?: typeof fetch;
  baseDelayMs?: number;
};

export class RoboflowDetector implements DamageDetector {
  private readonly fetchImpl: typeof fetch;
  private readonly baseDelayMs: number;

  constructor(private readonly cfg: RoboflowConfig, opts: RoboflowDetectorOptions = {}) {
    this.fetchImpl = opts.fetch ?? fetch;
    this.baseDelayMs = opts.baseDelayMs ?? 300;
  }

  get configured(): boolean {
    return Boolean(this.cfg.apiKey && this.cfg.model && this.cfg.version);
  }

  /** Request URL + init for one inference call. The URL carries the API key; do not log it. */
  buildRequest(image: ImageSource): { url: string; init: RequestInit } {
    const { apiKey, model, version, confidence, overlap } = this.cfg;
    let url = `https://detect.roboflow.com/${encodeURIComponent(model)}/${encodeURIComponent(version)}?api_key=${encodeURIComponent(apiKey)}`;
    if (confidence) url += `&confidence=${encodeURIComponent(confidence)}`;
    if (overlap) url += `&overlap=${encodeURIComponent(overlap)}`;

    if (image.kind === "upload") {
      return {
        url,
        init: {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: image.bytes.toString("base64"),
        },
      };
    }
    return { url: `${url}&image=${encodeURIComponent(image.url)}`, init: { method: "POST" } };
  }

  async detect(image: ImageSource): Promise<DetectionResult> {
    if (!this.configured) {
      throw new DetectionUnavailableError(
        "Damage detection model is not configured (set ROBOFLOW_API_KEY, ROBOFLOW_MODEL and ROBOFLOW_VERSION)"
      );
    }

    const { url, init } = this.buildRequest(image);
    let text: string;
    try {
      text = await withRetry(
        async () => {
          const res = await this.fetchImpl(url, init);
          const body = await res.text();
          if (!res.ok) throw new UpstreamHttpError(res.status, body.slice(0, 240));
          return body;
        },
        {
          tries: this.cfg.tries,
          timeoutMs: this.cfg.timeoutMs,
          baseDelayMs: this.baseDelayMs,
          retryable: isRetryable,
        }
      );
    } catch (e) {
      console.error(`[detect] roboflow ${this.cfg.model}/${this.cfg.version} failed: ${errorMessage(e)}`);
      throw new DetectionUnavailableError("Damage detection service is unavailable. Please try again shortly.", { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      throw new DetectionUnavailableError("Damage detection service returned an unreadable response", { cause: e });
    }
    return parseRoboflowResponse(parsed);
  }
}
