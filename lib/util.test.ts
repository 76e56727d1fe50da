import assert from "node:assert/strict";
import test from "node:test";

import { clamp01, getNum, getStr, isRecord, sha256, withRetry } from "./util";

test("guards reject arrays, NaN and blank strings", () => {
  assert.equal(isRecord({}), true);
  assert.equal(isRecord([]), false);
  assert.equal(isRecord(null), false);
  assert.equal(getNum({ a: Number.NaN }, "a"), undefined);
  assert.equal(getNum({ a: 3 }, "a"), 3);
  assert.equal(getStr({ a: "  " }, "a"), undefined);
  assert.equal(clamp01(1.4), 1);
  assert.equal(clamp01(-2), 0);
});

test("sha256 hashes raw bytes as hex", () => {
  assert.equal(sha256(Buffer.from("abc")), "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
});

test("withRetry retries until the call succeeds", async () => {
  let calls = 0;
  const result = await withRetry(
    async () => {
      calls += 1;
      if (calls < 3) throw new Error("flaky");
      return "ok";
    },
    { tries: 3, baseDelayMs: 0 }
  );
  assert.equal(result, "ok");
  assert.equal(calls, 3);
});

test("withRetry stops on a non-retryable error", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new Error("bad request");
      },
      { tries: 5, baseDelayMs: 0, retryable: () => false }
    ),
    /bad request/
  );
  assert.equal(calls, 1);
});

test("withRetry times out a hung attempt", async () => {
  await assert.rejects(
    withRetry(() => new Promise<never>(() => undefined), { tries: 1, timeoutMs: 10 }),
    /timeout after 10ms/
  );
});
