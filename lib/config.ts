// lib/config.ts
// --------------------------------------------------------------------------------------
// Process configuration, read once at startup and passed down explicitly.
// The three rate overrides land in `rates`, which the aggregator takes as a parameter.
// --------------------------------------------------------------------------------------

import path from "path";
import { z } from "zod";
import type { Rates } from "../app/types";
import { ConfigError } from "./errors";
import type { PriceAssetSource } from "./priceTable";
import { describeIssues } from "./schema";

// Unset and empty env vars both fall back to the default ("" would coerce to 0).
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const money = (def: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().finite().nonnegative().default(def));
const positiveInt = (def: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(def));
const text = (def: string) => z.preprocess(blankToUndefined, z.string().trim().default(def));

const EnvSchema = z.object({
  // Rates (USD)
  LABOR_RATE_USD: money(95),
  PAINT_RATE_USD: money(120),
  MATERIALS_USD: money(50),

  // Price assets
  PRICE_RULES_PATH: text("data/cost_rules.json"),
  LEGACY_PRICE_PATH: text("data/car_damage_price.json"),
  // Kyat per dollar for legacy ranges written in MMK
  FX_MMK_PER_USD: z.preprocess(blankToUndefined, z.coerce.number().finite().positive().default(2100)),

  // Roboflow hosted detection (CONF / OVERLAP pass through; "" → provider defaults)
  ROBOFLOW_API_KEY: text(""),
  ROBOFLOW_MODEL: text(""),
  ROBOFLOW_VERSION: text(""),
  ROBOFLOW_CONF: text(""),
  ROBOFLOW_OVERLAP: text(""),
  ROBOFLOW_TIMEOUT_MS: positiveInt(15_000),
  ROBOFLOW_TRIES: positiveInt(3),

  // Optional OpenAI vehicle gate
  OPENAI_API_KEY: text(""),
  MODEL_VEHICLE: text("gpt-4o-mini"),

  // Request guards
  MAX_UPLOAD_BYTES: positiveInt(8 * 1024 * 1024),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  RATE_LIMIT_MAX: positiveInt(20),
});

export type RoboflowConfig = {
  apiKey: string;
  model: string;
  version: string;
  confidence: string;
  overlap: string;
  timeoutMs: number;
  tries: number;
};

export type AppConfig = {
  rates: Readonly<Rates>;
  prices: PriceAssetSource;
  roboflow: RoboflowConfig;
  vehicleGate: { apiKey: string | null; model: string };
  uploads: { maxBytes: number };
  rateLimit: { windowMs: number; max: number };
};

export function loadConfig(env: Record<string, string | undefined> = process.env, cwd = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    rates: Object.freeze({
      labor_rate: e.LABOR_RATE_USD,
      paint_rate: e.PAINT_RATE_USD,
      materials_flat: e.MATERIALS_USD,
    }),
    prices: {
      rulesPath: path.resolve(cwd, e.PRICE_RULES_PATH),
      legacyPath: path.resolve(cwd, e.LEGACY_PRICE_PATH),
      mmkPerUsd: e.FX_MMK_PER_USD,
    },
    roboflow: {
      apiKey: e.ROBOFLOW_API_KEY,
      model: e.ROBOFLOW_MODEL,
      version: e.ROBOFLOW_VERSION,
      confidence: e.ROBOFLOW_CONF,
      overlap: e.ROBOFLOW_OVERLAP,
      timeoutMs: e.ROBOFLOW_TIMEOUT_MS,
      tries: e.ROBOFLOW_TRIES,
    },
    vehicleGate: {
      apiKey: e.OPENAI_API_KEY || null,
      model: e.MODEL_VEHICLE,
    },
    uploads: { maxBytes: e.MAX_UPLOAD_BYTES },
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
  };
}
