"use client";

/**
 * Car Damage Estimator — Client UI
 * Tabs: Single image → /api/predict, Before / After → /api/compare, Claims → /api/claims
 * - Upload, link or camera capture per photo; detection overlay (object-contain aware)
 * - Per-class costs with "no price configured" markers; totals as point, range or ≥ min
 * - Last inputs and results survive a reload (localStorage)
 * - Printable report with an overlay snapshot
 */

import { useCallback, useEffect, useState } from "react";
import { renderCompareReport, renderSingleReport } from "../lib/report";
import {
  EMPTY_INPUTS, STORAGE_KEYS, type SavedInputs, type SlotValue, appendSlot, compress, isClassPriced,
  isComparePayload, isPredictPayload, isSavedInputs, loadStored, postCompare, postPredict, saveStored,
} from "./clientApi";
import { ClaimsPanel } from "./components/ClaimsPanel";
import { CostBreakdown } from "./components/CostBreakdown";
import { overlaySnapshot } from "./components/DetectionOverlay";
import { ImageSlot } from "./components/ImageSlot";
import type { ComparePayload, Detection, PredictPayload } from "./types";

type Tab = "single" | "compare" | "claims";

// Mirrors the sets in data/cost_rules.json; "" lets the server decide.
const VEHICLE_TYPES = ["", "car", "suv", "truck"] as const;

const EMPTY_SLOT: SlotValue = { file: null, url: "" };

/** Opens the report in a new window and hands it to the browser's print dialog. */
function printHtml(html: string): boolean {
  const w = window.open("", "_blank");
  if (!w) return false;
  w.document.open();
  w.document.write(html);
  w.document.close();
  w.focus();
  w.print();
  return true;
}

async function snapshotFor(slot: SlotValue, detections: readonly Detection[], isPriced: (cls: string) => boolean) {
  const src = slot.file ? URL.createObjectURL(slot.file) : slot.url.trim();
  if (!src) return undefined;
  try {
    return await overlaySnapshot(src, detections, isPriced);
  } catch (e: unknown) {
    // cross-origin links without CORS taint the canvas
    console.warn("[report] snapshot failed", e);
    return undefined;
  } finally {
    if (slot.file) URL.revokeObjectURL(src);
  }
}

function VehicleTypeSelect({ value, onChange }: { value: string; onChange: (v: string) => void }) {
  return (
    <label className="flex items-center gap-2 text-sm text-slate-700">
      Vehicle type
      <select value={value} onChange={(e) => onChange(e.target.value)}
        className="rounded-lg border border-slate-300 bg-white/70 px-2 py-1 text-sm">
        {VEHICLE_TYPES.map((t) => <option key={t} value={t}>{t || "Auto-detect"}</option>)}
      </select>
    </label>
  );
}

function ErrorBox({ message }: { message: string }) {
  if (!message) return null;
  return <div className="rounded-lg border border-rose-200/70 bg-rose-50/80 p-3 text-sm text-rose-700">{message}</div>;
}

function Meta({ rows }: { rows: [string, string][] }) {
  return (
    <div className="rounded-2xl border border-white/30 bg-white/60 backdrop-blur-xl p-5">
      <div className="text-sm font-medium mb-2">Audit</div>
      <div className="grid grid-cols-1 gap-y-1 text-xs sm:grid-cols-2">
        {rows.map(([k, v]) => (
          <div key={k} className="truncate"><span className="text-slate-500">{k}:</span> {v}</div>
        ))}
      </div>
    </div>
  );
}

export default function Home() {
  const [tab, setTab] = useState<Tab>("single");
  const [vehicleType, setVehicleType] = useState("");
  const [showOverlay, setShowOverlay] = useState(true);

  // Inputs
  const [single, setSingle] = useState<SlotValue>(EMPTY_SLOT);
  const [before, setBefore] = useState<SlotValue>(EMPTY_SLOT);
  const [after, setAfter] = useState<SlotValue>(EMPTY_SLOT);

  // Results
  const [predict, setPredict] = useState<PredictPayload | null>(null);
  const [comparison, setComparison] = useState<ComparePayload | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState("");
  const [claimsVersion, setClaimsVersion] = useState(0);

  // Restore last session
  useEffect(() => {
    const inputs = loadStored(STORAGE_KEYS.inputs, isSavedInputs) ?? EMPTY_INPUTS;
    setSingle({ file: null, url: inputs.singleUrl });
    setBefore({ file: null, url: inputs.beforeUrl });
    setAfter({ file: null, url: inputs.afterUrl });
    setVehicleType(inputs.vehicleType);
    setPredict(loadStored(STORAGE_KEYS.single, isPredictPayload));
    setComparison(loadStored(STORAGE_KEYS.compare, isComparePayload));
  }, []);

  useEffect(() => {
    const inputs: SavedInputs = {
      singleUrl: single.file ? "" : single.url,
      beforeUrl: before.file ? "" : before.url,
      afterUrl: after.file ? "" : after.url,
      vehicleType,
    };
    saveStored(STORAGE_KEYS.inputs, inputs);
  }, [single, before, after, vehicleType]);

  const switchTab = useCallback((t: Tab) => { setTab(t); setError(""); }, []);

  const runSingle = useCallback(async (e: React.FormEvent) => {
    e.preventDefault();
    setLoading(true); setError("");
    try {
      const form = new FormData();
      const file = single.file ? await compress(single.file) : undefined;
      if (!appendSlot(form, single, "image", "imageUrl", file)) { setError("Please choose a photo or paste an image link."); return; }
      if (vehicleType) form.append("vehicle_type", vehicleType);

      const payload = await postPredict(form);
      setPredict(payload);
      saveStored(STORAGE_KEYS.single, payload);
      setClaimsVersion((v) => v + 1);
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : "We couldn’t process that image or link.");
    } finally {
      setLoading(false);
    }
  }, [single, vehicleType]);

  const runCompare = useCallback(async (e: React.FormEvent) => {
    e.preventDefault();
    setLoading(true); setError("");
    try {
      const form = new FormData();
      const [bf, af] = await Promise.all([
        before.file ? compress(before.file) : undefined,
        after.file ? compress(after.file) : undefined,
      ]);
      const hasBefore = appendSlot(form, before, "before", "beforeUrl", bf);
      const hasAfter = appendSlot(form, after, "after", "afterUrl", af);
      if (!hasBefore || !hasAfter) { setError("Both a before and an after photo are needed."); return; }
      if (vehicleType) form.append("vehicle_type", vehicleType);

      const payload = await postCompare(form);
      setComparison(payload);
      saveStored(STORAGE_KEYS.compare, payload);
      setClaimsVersion((v) => v + 1);
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : "We couldn’t compare those photos.");
    } finally {
      setLoading(false);
    }
  }, [before, after, vehicleType]);

  const singlePriced = useCallback((cls: string) => isClassPriced(predict, cls), [predict]);
  const comparePriced = useCallback((cls: string) => isClassPriced(comparison?.new_damage_costs, cls), [comparison]);

  const handlePrint = useCallback(async () => {
    let html: string | null = null;
    if (tab === "single" && predict) {
      const snapshotUrl = await snapshotFor(single, predict.detections, singlePriced);
      html = renderSingleReport(predict, { snapshotUrl });
    } else if (tab === "compare" && comparison) {
      const snapshotUrl = await snapshotFor(after, comparison.after_detections, comparePriced);
      html = renderCompareReport(comparison, { snapshotUrl });
    }
    if (html && !printHtml(html)) setError("Allow pop-ups for this site to print the report.");
  }, [tab, predict, comparison, single, after, singlePriced, comparePriced]);

  const canPrint = (tab === "single" && Boolean(predict)) || (tab === "compare" && Boolean(comparison));
  const gate = predict?.quality ?? null;

  const tabButton = (t: Tab, text: string) => (
    <button type="button" onClick={() => switchTab(t)}
      className={`px-4 py-2 text-sm font-medium ${tab === t ? "bg-indigo-600 text-white" : "bg-white/70 text-slate-700 hover:bg-white/90"}`}>
      {text}
    </button>
  );

  return (
    <main className="relative min-h-screen text-slate-900">
      <div className="fixed inset-0 -z-10 bg-gradient-to-br from-slate-50 via-indigo-50 to-sky-50" />

      {/* Header */}
      <header className="border-b border-white/30 bg-white/60 backdrop-blur-xl shadow-[0_4px_20px_rgba(0,0,0,0.05)]">
        <div className="mx-auto max-w-7xl px-6 py-5 flex flex-col sm:flex-row sm:items-center sm:justify-between gap-3">
          <div>
            <h1 className="text-xl sm:text-2xl font-semibold tracking-tight">Car Damage Estimator</h1>
            <p className="text-sm text-slate-600">Detect damage on a vehicle photo, price it from the configured rate tables, and compare before/after shots for new damage.</p>
          </div>
          <button type="button" onClick={() => void handlePrint()} disabled={!canPrint}
            className="inline-flex items-center justify-center rounded-lg border border-slate-300 bg-white/70 px-3 py-2 text-sm font-medium disabled:opacity-50 hover:shadow-sm focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-indigo-500"
            title={canPrint ? "Print report" : "Run an estimate first"}>
            Print report
          </button>
        </div>
      </header>

      <div className="mx-auto max-w-7xl px-6 py-6 space-y-6">
        <div className="flex flex-wrap items-center justify-between gap-3">
          <div className="flex rounded-lg overflow-hidden border border-slate-200/70">
            {tabButton("single", "Single image")}
            {tabButton("compare", "Before / After")}
            {tabButton("claims", "Claims")}
          </div>
          {tab !== "claims" && (
            <div className="flex items-center gap-4">
              <VehicleTypeSelect value={vehicleType} onChange={setVehicleType} />
              <label className="flex items-center gap-2 text-sm text-slate-700 select-none">
                <input type="checkbox" checked={showOverlay} onChange={(e) => setShowOverlay(e.target.checked)} />
                Show boxes
              </label>
            </div>
          )}
        </div>

        <ErrorBox message={error} />

        {tab === "single" && (
          <form onSubmit={runSingle} className="grid gap-6 lg:grid-cols-12">
            <section className="lg:col-span-5 space-y-3">
              <ImageSlot id="single" title="Vehicle photo" value={single} onChange={setSingle}
                detections={predict?.detections ?? []} isPriced={singlePriced} showOverlay={showOverlay} />
              <button type="submit" disabled={loading}
                className="w-full rounded-lg bg-indigo-600 px-4 py-2 text-sm font-medium text-white disabled:opacity-50 hover:bg-indigo-700">
                {loading ? "Estimating…" : "Estimate repair cost"}
              </button>
            </section>
            <section className="lg:col-span-7 space-y-4">
              {gate && (!gate.is_vehicle || !gate.quality_ok) && (
                <div className="rounded-lg border border-amber-200/70 bg-amber-50/80 p-3 text-sm text-amber-800">
                  {gate.is_vehicle ? "The photo may be hard to assess" : "This may not be a vehicle photo"}
                  {gate.issues.length ? `: ${gate.issues.join(", ")}` : "."}
                </div>
              )}
              {predict ? (
                <>
                  <CostBreakdown title={`Estimated repair cost · ${predict.vehicle_type}`} summary={predict} />
                  <Meta rows={[
                    ["Claim", `#${predict.claim_id}`],
                    ["Detections", String(predict.detections.length)],
                    ["Vehicle", gate ? [gate.vehicle.color, gate.vehicle.make, gate.vehicle.model].filter(Boolean).join(" ") || "—" : "—"],
                    ["Rates", `labor $${predict.rates.labor_rate}/h · paint $${predict.rates.paint_rate}/h · materials $${predict.rates.materials_flat}`],
                    ["Schema", predict.schema_version],
                    ["runId", predict.run_id],
                    ["image_sha256", predict.image_sha256],
                  ]} />
                </>
              ) : (
                <div className="rounded-2xl border border-dashed border-slate-300 p-8 text-center text-sm text-slate-500">
                  Add a photo and run an estimate to see per-damage costs here.
                </div>
              )}
            </section>
          </form>
        )}

        {tab === "compare" && (
          <form onSubmit={runCompare} className="space-y-6">
            <div className="grid gap-6 md:grid-cols-2">
              <ImageSlot id="before" title="Before" value={before} onChange={setBefore}
                detections={comparison?.before_detections ?? []} isPriced={comparePriced} showOverlay={showOverlay} />
              <ImageSlot id="after" title="After" value={after} onChange={setAfter}
                detections={comparison?.after_detections ?? []} isPriced={comparePriced} showOverlay={showOverlay} />
            </div>
            <button type="submit" disabled={loading}
              className="w-full rounded-lg bg-indigo-600 px-4 py-2 text-sm font-medium text-white disabled:opacity-50 hover:bg-indigo-700">
              {loading ? "Comparing…" : "Find new damage"}
            </button>
            {comparison && (
              <>
                <CostBreakdown title={`New damage · ${comparison.vehicle_type}`} summary={comparison.new_damage_costs}
                  emptyText="No new damage between the two photos." />
                <Meta rows={[
                  ["Claim", `#${comparison.claim_id}`],
                  ["Before", Object.entries(comparison.before_counts).map(([c, n]) => `${c} ×${n}`).join(", ") || "none"],
                  ["After", Object.entries(comparison.after_counts).map(([c, n]) => `${c} ×${n}`).join(", ") || "none"],
                  ["runId", comparison.run_id],
                  ["before_sha256", comparison.before_sha256],
                  ["after_sha256", comparison.after_sha256],
                ]} />
              </>
            )}
          </form>
        )}

        {tab === "claims" && <ClaimsPanel refreshKey={claimsVersion} />}
      </div>
    </main>
  );
}
