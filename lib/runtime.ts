// lib/runtime.ts
// Lazily built process-wide dependencies for the route handlers.
// Config and price assets are read on first use; a bad asset fails every request with
// the same ConfigError until the process is restarted with a fixed file.

import OpenAI from "openai";
import { sharedClaimStore } from "./claims";
import { type AppConfig, loadConfig } from "./config";
import { RoboflowDetector } from "./detection";
import type { EstimatorDeps } from "./estimator";
import { loadPriceTable } from "./priceTable";
import { OpenAIVehicleGate } from "./vehicleGate";

export type Runtime = { config: AppConfig; deps: EstimatorDeps };

let _runtime: Runtime | null = null;

export function getRuntime(): Runtime {
  if (_runtime) return _runtime;

  const config = loadConfig();
  const table = loadPriceTable(config.prices);
  const detector = new RoboflowDetector(config.roboflow);
  if (!detector.configured) {
    console.warn("[detect] ROBOFLOW_API_KEY / ROBOFLOW_MODEL / ROBOFLOW_VERSION not set; estimates will return 503");
  }

  const gate = config.vehicleGate.apiKey
    ? new OpenAIVehicleGate(new OpenAI({ apiKey: config.vehicleGate.apiKey }), config.vehicleGate.model, table.vehicleTypes)
    : null;

  _runtime = {
    config,
    deps: { rates: config.rates, table, detector, claims: sharedClaimStore(), gate },
  };
  return _runtime;
}
