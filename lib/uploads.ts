// lib/uploads.ts
// Pull one image out of a multipart form: an uploaded file, or an http(s) URL the
// detector fetches itself. Either way the result carries a sha256 for the audit trail.

import type { ImageSource } from "./detection";
import { ERR, EstimatorError, InvalidInputError } from "./errors";
import { sha256, sha256String } from "./util";

export type ImageFieldNames = { file: string; url: string };

export type ReadImage = { source: ImageSource; sha256: string };

function fileField(form: FormData, name: string): File | null {
  const v = form.get(name);
  return v === null || typeof v === "string" || v.size === 0 ? null : v;
}

function textField(form: FormData, name: string): string | null {
  const v = form.get(name);
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

export async function readImageField(
  form: FormData,
  names: ImageFieldNames,
  maxBytes: number
): Promise<ReadImage> {
  const file = fileField(form, names.file);
  const imageUrl = textField(form, names.url);

  if (file) {
    if (file.type && !file.type.startsWith("image/")) {
      throw new InvalidInputError(`${names.file} must be an image (got ${file.type})`);
    }
    if (file.size > maxBytes) {
      throw new EstimatorError(`${names.file} exceeds ${maxBytes} bytes`, ERR.TOO_LARGE, 413);
    }
    const bytes = Buffer.from(await file.arrayBuffer());
    return { source: { kind: "upload", bytes, mime: file.type || "image/jpeg" }, sha256: sha256(bytes) };
  }

  if (!imageUrl) {
    throw new InvalidInputError(`No ${names.file} or ${names.url} provided`, ERR.NO_IMAGE);
  }

  let u: URL;
  try {
    u = new URL(imageUrl);
  } catch {
    throw new InvalidInputError(`Invalid ${names.url}`, ERR.BAD_URL);
  }
  if (!/^https?:$/.test(u.protocol)) {
    throw new InvalidInputError(`${names.url} must be http(s)`, ERR.BAD_URL);
  }
  return { source: { kind: "url", url: imageUrl }, sha256: sha256String(imageUrl) };
}

/** Optional short text field, lowercased (e.g. vehicle_type). */
export function readOptionalText(form: FormData, name: string): string | null {
  return textField(form, name)?.toLowerCase() ?? null;
}
