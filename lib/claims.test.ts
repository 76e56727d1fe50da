import assert from "node:assert/strict";
import test from "node:test";

import type { ClaimType } from "../app/types";
import { CLAIMS_PER_PAGE, InMemoryClaimStore, type NewClaim } from "./claims";

const claim = (type: ClaimType, total: number): NewClaim => ({
  type,
  counts: { Minor: 1 },
  new_damage_counts: type === "compare" ? { Minor: 1 } : null,
  total_usd: total,
  total_max_usd: total,
  open_ended: false,
  currency: "USD",
  vehicle_type: "car",
  image_sha256: type === "single" ? "sha-image" : null,
  before_sha256: type === "compare" ? "sha-before" : null,
  after_sha256: type === "compare" ? "sha-after" : null,
});

const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

test("create assigns ids and timestamps and freezes the record", () => {
  const store = new InMemoryClaimStore(fixedNow);
  const a = store.create(claim("single", 403));
  const b = store.create(claim("compare", 1403));
  assert.equal(a.id, 1);
  assert.equal(b.id, 2);
  assert.equal(a.created_at, "2026-01-02T03:04:05.000Z");
  assert.equal(Object.isFrozen(a), true);
  assert.deepEqual(store.get(2), b);
  assert.equal(store.get(3), undefined);
});

test("list is newest first, 20 per page", () => {
  const store = new InMemoryClaimStore(fixedNow);
  for (let i = 1; i <= 25; i++) store.create(claim("single", i));

  const first = store.list();
  assert.equal(CLAIMS_PER_PAGE, 20);
  assert.equal(first.data.length, 20);
  assert.equal(first.data[0]?.id, 25);
  assert.deepEqual(
    { current_page: first.current_page, per_page: first.per_page, total: first.total, last_page: first.last_page },
    { current_page: 1, per_page: 20, total: 25, last_page: 2 }
  );

  const second = store.list({ page: 2 });
  assert.deepEqual(second.data.map((c) => c.id), [5, 4, 3, 2, 1]);
  assert.deepEqual(store.list({ page: 3 }).data, []);
});

test("list filters by type and tolerates a bad page number", () => {
  const store = new InMemoryClaimStore(fixedNow);
  store.create(claim("single", 1));
  store.create(claim("compare", 2));
  store.create(claim("single", 3));

  assert.deepEqual(store.list({ type: "single" }).data.map((c) => c.id), [3, 1]);
  assert.deepEqual(store.list({ type: "compare" }).data.map((c) => c.id), [2]);
  assert.equal(store.list({ page: Number.NaN }).current_page, 1);
  assert.equal(store.list({ page: 0 }).current_page, 1);
});

test("an empty store still has one page", () => {
  assert.deepEqual(new InMemoryClaimStore().list(), {
    data: [],
    current_page: 1,
    per_page: 20,
    total: 0,
    last_page: 1,
  });
});

test("past capacity the oldest claims are dropped and ids keep counting", () => {
  const store = new InMemoryClaimStore(fixedNow, 3);
  for (let i = 1; i <= 5; i++) store.create(claim("single", i));

  assert.equal(store.get(1), undefined);
  assert.equal(store.get(2), undefined);
  assert.deepEqual(store.list().data.map((c) => c.id), [5, 4, 3]);
  assert.equal(store.list().total, 3);
  assert.equal(store.create(claim("compare", 6)).id, 6);
  assert.deepEqual(store.list().data.map((c) => c.id), [6, 5, 4]);
});
