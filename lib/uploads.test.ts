import assert from "node:assert/strict";
import test from "node:test";

import { ERR, EstimatorError } from "./errors";
import { readImageField, readOptionalText } from "./uploads";
import { sha256String } from "./util";

const NAMES = { file: "image", url: "imageUrl" };
const MAX = 1024;

function form(entries: Record<string, string | File>): FormData {
  const fd = new FormData();
  for (const [k, v] of Object.entries(entries)) fd.append(k, v);
  return fd;
}

async function rejectsWith(p: Promise<unknown>, code: string, status: number) {
  await assert.rejects(p, (e: unknown) => e instanceof EstimatorError && e.code === code && e.status === status);
}

test("an uploaded image is read and hashed", async () => {
  const fd = form({ image: new File(["abc"], "car.jpg", { type: "image/jpeg" }) });
  const { source, sha256 } = await readImageField(fd, NAMES, MAX);
  assert.equal(sha256, "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  assert.equal(source.kind, "upload");
  if (source.kind === "upload") {
    assert.equal(source.mime, "image/jpeg");
    assert.equal(source.bytes.toString("utf8"), "abc");
  }
});

test("a URL is passed through and hashed as text", async () => {
  const url = "https://example.com/car.jpg";
  const { source, sha256 } = await readImageField(form({ imageUrl: `  ${url} ` }), NAMES, MAX);
  assert.deepEqual(source, { kind: "url", url });
  assert.equal(sha256, sha256String(url));
});

test("an empty file slot falls through to the URL", async () => {
  const fd = form({
    image: new File([], "empty.jpg", { type: "image/jpeg" }),
    imageUrl: "https://example.com/car.jpg",
  });
  const { source } = await readImageField(fd, NAMES, MAX);
  assert.equal(source.kind, "url");
});

test("missing, oversized, non-image and non-http inputs are rejected", async () => {
  await rejectsWith(readImageField(form({}), NAMES, MAX), ERR.NO_IMAGE, 400);
  await rejectsWith(
    readImageField(form({ image: new File(["abc"], "car.jpg", { type: "image/jpeg" }) }), NAMES, 2),
    ERR.TOO_LARGE,
    413
  );
  await rejectsWith(
    readImageField(form({ image: new File(["abc"], "notes.txt", { type: "text/plain" }) }), NAMES, MAX),
    ERR.INVALID_INPUT,
    400
  );
  await rejectsWith(readImageField(form({ imageUrl: "ftp://example.com/car.jpg" }), NAMES, MAX), ERR.BAD_URL, 400);
  await rejectsWith(readImageField(form({ imageUrl: "not a url" }), NAMES, MAX), ERR.BAD_URL, 400);
});

test("readOptionalText trims and lowercases", () => {
  assert.equal(readOptionalText(form({ vehicle_type: " SUV " }), "vehicle_type"), "suv");
  assert.equal(readOptionalText(form({ vehicle_type: "  " }), "vehicle_type"), null);
  assert.equal(readOptionalText(form({}), "vehicle_type"), null);
});
