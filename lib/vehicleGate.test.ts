import assert from "node:assert/strict";
import test from "node:test";

import { parseGateResponse } from "./vehicleGate";

const TYPES = ["car", "suv", "truck"];

test("a garbled answer reads as a usable vehicle of unknown type", () => {
  assert.deepEqual(parseGateResponse("not json", TYPES), {
    is_vehicle: true,
    quality_ok: true,
    issues: [],
    vehicle_type: null,
    vehicle: { make: null, model: null, color: null, confidence: 0.6 },
  });
});

test("a full answer is trimmed, clamped and mapped onto configured types", () => {
  const raw = JSON.stringify({
    is_vehicle: false,
    quality_ok: false,
    issues: ["blurry", 3],
    vehicle_type: "SUV",
    vehicle: { make: " Toyota ", model: " ", color: "red", confidence: 1.7 },
  });
  assert.deepEqual(parseGateResponse(raw, TYPES), {
    is_vehicle: false,
    quality_ok: false,
    issues: ["blurry", "3"],
    vehicle_type: "suv",
    vehicle: { make: "Toyota", model: null, color: "red", confidence: 1 },
  });
});

test("a vehicle type with no rule set is dropped", () => {
  assert.equal(parseGateResponse(JSON.stringify({ vehicle_type: "boat" }), TYPES).vehicle_type, null);
  assert.equal(parseGateResponse("[1,2]", TYPES).is_vehicle, true);
});
