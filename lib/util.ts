// lib/util.ts
import crypto from "crypto";

/** ---------- Type guards / helpers ---------- */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function getNum(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function getStr(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" && v.trim() ? v : undefined;
}

export function clamp01(n: number) { return Math.max(0, Math.min(1, n)); }

export function sha256(buf: Buffer) { return crypto.createHash("sha256").update(buf).digest("hex"); }
export function sha256String(s: string) { return crypto.createHash("sha256").update(s, "utf8").digest("hex"); }

/** ---------- Retry with timeout ---------- */
export type RetryOptions = {
  tries?: number;
  timeoutMs?: number;
  baseDelayMs?: number;
  /** Return false to stop retrying on errors that will not heal (e.g. 4xx). */
  retryable?: (e: unknown) => boolean;
};

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const tries = Math.max(1, opts.tries ?? 3);
  const timeoutMs = opts.timeoutMs ?? 10_000;
  const base = opts.baseDelayMs ?? 300;
  const retryable = opts.retryable ?? (() => true);
  let lastErr: unknown;

  const withTimeout = <U>(p: Promise<U>, ms: number) =>
    new Promise<U>((resolve, reject) => {
      const to = setTimeout(() => reject(new Error(`timeout after ${ms}ms`)), ms);
      p.then((v) => { clearTimeout(to); resolve(v); })
       .catch((e: unknown) => { clearTimeout(to); reject(e); });
    });

  for (let i = 0; i < tries; i++) {
    try {
      // eslint-disable-next-line no-await-in-loop
      return await withTimeout(fn(), timeoutMs);
    } catch (e) {
      lastErr = e;
      if (!retryable(e) || i === tries - 1) break;
      // jittered backoff
      // eslint-disable-next-line no-await-in-loop
      await new Promise((r) => setTimeout(r, base * Math.pow(2, i) + Math.random() * 150));
    }
  }
  throw lastErr;
}
