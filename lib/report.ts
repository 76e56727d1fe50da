// lib/report.ts
// Printable HTML reports built from a payload. Labels come from the detector and the
// price files, so every interpolated string goes through escapeHtml.

import type { ComparePayload, CostSummary, PerClassCost, PredictPayload } from "../app/types";
import { formatTotals, formatUsd } from "./money";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function subtotalText(c: PerClassCost): string {
  if (!c.priced) return "—";
  if (c.subtotal_max === null) return `≥ ${formatUsd(c.subtotal_min)}`;
  if (c.subtotal_max === c.subtotal_min) return formatUsd(c.subtotal_min);
  return `${formatUsd(c.subtotal_min)} – ${formatUsd(c.subtotal_max)}`;
}

function costRows(perClass: CostSummary["per_class_costs"]): string {
  const rows = Object.entries(perClass).map(
    ([cls, c]) =>
      `<tr><td>${escapeHtml(cls)}</td><td>${c.count}</td><td>${escapeHtml(c.range_text)}</td><td>${escapeHtml(subtotalText(c))}</td></tr>`
  );
  if (!rows.length) return `<tr><td colspan="4">No damage detected</td></tr>`;
  return rows.join("\n");
}

function page(title: string, body: string): string {
  return `<!doctype html>
<html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title>
<style>
body{font-family:system-ui,sans-serif;margin:24px;color:#111}
table{border-collapse:collapse;width:100%;margin:12px 0}
td,th{border:1px solid #ccc;padding:6px 8px;text-align:left}
.total{font-size:18px;font-weight:600}
.muted{color:#666;font-size:12px}
</style></head><body>
${body}
</body></html>`;
}

export type ReportOptions = {
  /** Photo with the detection overlay baked in (data: URL). */
  snapshotUrl?: string;
};

function snapshot(opts: ReportOptions): string {
  return opts.snapshotUrl ? `<img src="${escapeHtml(opts.snapshotUrl)}" alt="Inspected vehicle" style="max-width:100%">` : "";
}

const TABLE_HEAD = `<tr><th>Damage</th><th>Count</th><th>Unit price</th><th>Subtotal</th></tr>`;

export function renderSingleReport(p: PredictPayload, opts: ReportOptions = {}): string {
  const body = `<h1>Repair estimate</h1>
<p class="muted">Claim #${p.claim_id} · run ${escapeHtml(p.run_id)} · vehicle type ${escapeHtml(p.vehicle_type)}</p>
${snapshot(opts)}
<table>${TABLE_HEAD}
${costRows(p.per_class_costs)}
</table>
<p class="total">Total: ${escapeHtml(formatTotals(p.totals))}</p>
<p class="muted">Image sha256 ${escapeHtml(p.image_sha256)}</p>`;
  return page(`Estimate #${p.claim_id}`, body);
}

export function renderCompareReport(p: ComparePayload, opts: ReportOptions = {}): string {
  const body = `<h1>New damage estimate</h1>
<p class="muted">Claim #${p.claim_id} · run ${escapeHtml(p.run_id)} · vehicle type ${escapeHtml(p.vehicle_type)}</p>
${snapshot(opts)}
<table>${TABLE_HEAD}
${costRows(p.new_damage_costs.per_class_costs)}
</table>
<p class="total">New damage total: ${escapeHtml(formatTotals(p.new_damage_costs.totals))}</p>
<p class="muted">Before sha256 ${escapeHtml(p.before_sha256)} · after sha256 ${escapeHtml(p.after_sha256)}</p>`;
  return page(`Comparison #${p.claim_id}`, body);
}
