// lib/claims.ts
// Claim records for completed estimates (single + compare), newest first, 20 per page.
// The default store is process-wide and in-memory, pinned on globalThis so dev-mode
// module reloads do not drop it.

import type { Claim, ClaimPage, ClaimType } from "../app/types";

export const CLAIMS_PER_PAGE = 20;

/** Oldest claims are dropped past this many. */
export const MAX_STORED_CLAIMS = 10_000;

export type NewClaim = Omit<Claim, "id" | "created_at">;

export type ClaimQuery = { type?: ClaimType | null; page?: number; perPage?: number };

export interface ClaimStore {
  create(input: NewClaim): Claim;
  get(id: number): Claim | undefined;
  list(query?: ClaimQuery): ClaimPage;
}

function positiveIntOr(n: number | undefined, fallback: number): number {
  return n !== undefined && Number.isFinite(n) && n >= 1 ? Math.floor(n) : fallback;
}

export class InMemoryClaimStore implements ClaimStore {
  private readonly rows: Claim[] = [];
  private nextId = 1;

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly capacity = MAX_STORED_CLAIMS
  ) {}

  create(input: NewClaim): Claim {
    const claim: Claim = Object.freeze({ ...input, id: this.nextId++, created_at: this.now().toISOString() });
    this.rows.push(claim);
    if (this.rows.length > this.capacity) this.rows.splice(0, this.rows.length - this.capacity);
    return claim;
  }

  get(id: number): Claim | undefined {
    return this.rows.find((c) => c.id === id);
  }

  list(query: ClaimQuery = {}): ClaimPage {
    const perPage = positiveIntOr(query.perPage, CLAIMS_PER_PAGE);
    const filtered = this.rows
      .filter((c) => !query.type || c.type === query.type)
      .sort((a, b) => b.id - a.id);
    const lastPage = Math.max(1, Math.ceil(filtered.length / perPage));
    const page = positiveIntOr(query.page, 1);
    const start = (page - 1) * perPage;
    return {
      data: filtered.slice(start, start + perPage),
      current_page: page,
      per_page: perPage,
      total: filtered.length,
      last_page: lastPage,
    };
  }
}

declare global {
  // eslint-disable-next-line no-var
  var __CLAIMS__: InMemoryClaimStore | undefined;
}

export function sharedClaimStore(): ClaimStore {
  return globalThis.__CLAIMS__ ?? (globalThis.__CLAIMS__ = new InMemoryClaimStore());
}
