// lib/vehicleGate.ts
// --------------------------------------------------------------------------------------
// OpenAI quick gate: vehicle present? quality OK? which vehicle type?
// Optional. Only built when OPENAI_API_KEY is set; its vehicle_type picks the rule set
// when the request does not name one. Everything else is a hint for the UI.
// --------------------------------------------------------------------------------------

import OpenAI from "openai";
import type { Vehicle, VehicleGate } from "../app/types";
import { type ImageSource, toDataUrl } from "./detection";
import { isRecord } from "./util";

export interface VehicleGateChecker {
  check(image: ImageSource): Promise<VehicleGate>;
}

function strOrNull(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}

/** Parse the model's JSON; a garbled answer reads as "vehicle, usable, type unknown". */
export function parseGateResponse(raw: string, vehicleTypes: readonly string[]): VehicleGate {
  const parsed = safeJson(raw);
  const pv: Record<string, unknown> = isRecord(parsed) ? parsed : {};
  const vehicleObj: Record<string, unknown> = isRecord(pv["vehicle"]) ? pv["vehicle"] : {};
  const vehicle: Vehicle = {
    make: strOrNull(vehicleObj["make"]),
    model: strOrNull(vehicleObj["model"]),
    color: strOrNull(vehicleObj["color"]),
    confidence: typeof vehicleObj["confidence"] === "number" ? Math.max(0, Math.min(1, vehicleObj["confidence"])) : 0.6,
  };

  const typeRaw = strOrNull(pv["vehicle_type"])?.toLowerCase() ?? null;

  return {
    is_vehicle: typeof pv["is_vehicle"] === "boolean" ? pv["is_vehicle"] : true,
    quality_ok: typeof pv["quality_ok"] === "boolean" ? pv["quality_ok"] : true,
    issues: Array.isArray(pv["issues"]) ? pv["issues"].map(String) : [],
    vehicle_type: typeRaw && vehicleTypes.includes(typeRaw) ? typeRaw : null,
    vehicle,
  };
}

export class OpenAIVehicleGate implements VehicleGateChecker {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly vehicleTypes: readonly string[]
  ) {}

  private systemPrompt() {
    const types = this.vehicleTypes.map((t) => `"${t}"`).join("|") || "null";
    return `
Return ONLY JSON with this shape:

{
  "is_vehicle": boolean,
  "quality_ok": boolean,
  "issues": string[],
  "vehicle_type": ${types} | null,
  "vehicle": { "make": string|null, "model": string|null, "color": string|null, "confidence": number }
}

Rules:
- "issues" can include: "not_vehicle", "blurry", "low_light", "heavy_occlusion", "cropped", "too_small".
- If unsure about vehicle_type/make/model/color, set null but always provide numeric "confidence" [0..1].
- Be conservative; JSON only.
`.trim();
  }

  async check(image: ImageSource): Promise<VehicleGate> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: this.systemPrompt() },
        {
          role: "user",
          content: [
            { type: "text", text: "Classify whether this is a usable vehicle image for damage assessment." },
            { type: "image_url", image_url: { url: toDataUrl(image) } },
          ],
        },
      ],
    });
    return parseGateResponse(completion.choices?.[0]?.message?.content ?? "{}", this.vehicleTypes);
  }
}
