import assert from "node:assert/strict";
import test from "node:test";

import {
  formatTotals, formatUsd, hoursToMicros, microsToUsd, microsToWholeDollars, usdToMicros,
} from "./money";

test("hours and dollars convert to integer micro-dollars without cent rounding", () => {
  assert.equal(usdToMicros(402.5), 402_500_000);
  assert.equal(usdToMicros(0.1 + 0.2), 300_000);
  assert.equal(hoursToMicros(1.5, 95), 142_500_000);
  assert.equal(hoursToMicros(0.25, 94.99), 23_747_500);
  assert.equal(microsToUsd(402_500_000), 402.5);
  assert.equal(microsToUsd(23_747_500), 23.75);
  assert.equal(microsToUsd(0), 0);
});

test("totals round half away from zero", () => {
  assert.equal(microsToWholeDollars(402_500_000), 403);
  assert.equal(microsToWholeDollars(402_499_999), 402);
  assert.equal(microsToWholeDollars(47_495_000), 47);
  assert.equal(microsToWholeDollars(-1_500_000), -2);
  assert.equal(microsToWholeDollars(0), 0);
});

test("formatUsd shows cents only when there are some", () => {
  assert.equal(formatUsd(402.5), "$402.50");
  assert.equal(formatUsd(1200), "$1,200");
  assert.equal(formatUsd(0), "$0");
});

test("formatTotals renders point, range and open-ended totals", () => {
  assert.equal(formatTotals({ min: 403, max: 403, open_ended: false }), "$403");
  assert.equal(formatTotals({ min: 150, max: 500, open_ended: false }), "$150 – $500");
  assert.equal(formatTotals({ min: 2000, max: null, open_ended: true }), "≥ $2,000");
});
