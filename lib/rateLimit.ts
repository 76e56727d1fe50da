// lib/rateLimit.ts
// Per-key fixed-window counter behind the POST routes. State lives in a caller-owned
// Map (pinned on globalThis by the routes). The map is bounded: once it reaches
// `maxKeys`, expired windows are swept, then the oldest keys are dropped.

export type RLState = { count: number; resetAt: number };

export type RateDecision = { ok: true } | { ok: false; retryAfterSec: number };

export const MAX_TRACKED_KEYS = 10_000;

export class FixedWindowLimiter {
  constructor(
    private readonly states: Map<string, RLState>,
    private readonly windowMs: number,
    private readonly maxRequests: number,
    private readonly maxKeys = MAX_TRACKED_KEYS
  ) {}

  hit(key: string, now = Date.now()): RateDecision {
    const s = this.states.get(key);
    if (!s || s.resetAt <= now) {
      if (!s) this.makeRoom(now);
      this.states.set(key, { count: 1, resetAt: now + this.windowMs });
      return { ok: true };
    }
    if (s.count >= this.maxRequests) {
      return { ok: false, retryAfterSec: Math.max(0, Math.ceil((s.resetAt - now) / 1000)) };
    }
    s.count += 1;
    return { ok: true };
  }

  get size(): number {
    return this.states.size;
  }

  private makeRoom(now: number) {
    if (this.states.size < this.maxKeys) return;
    for (const [k, s] of this.states) {
      if (s.resetAt <= now) this.states.delete(k);
    }
    // still full: drop in insertion order
    for (const k of this.states.keys()) {
      if (this.states.size < this.maxKeys) break;
      this.states.delete(k);
    }
  }
}
