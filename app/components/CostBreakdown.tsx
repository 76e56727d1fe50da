"use client";

import { formatTotals, formatUsd } from "../../lib/money";
import type { CostSummary, PerClassCost } from "../types";

function subtotal(c: PerClassCost) {
  if (!c.priced) return "—";
  if (c.subtotal_max === null) return `≥ ${formatUsd(c.subtotal_min)}`;
  if (c.subtotal_max === c.subtotal_min) return formatUsd(c.subtotal_min);
  return `${formatUsd(c.subtotal_min)} – ${formatUsd(c.subtotal_max)}`;
}

function sourceBadge(c: PerClassCost) {
  if (c.source === "rule") return <span className="rounded border border-emerald-200 bg-emerald-50 px-1.5 py-0.5 text-[11px] text-emerald-700">rule</span>;
  if (c.source === "legacy") return <span className="rounded border border-sky-200 bg-sky-50 px-1.5 py-0.5 text-[11px] text-sky-700">range</span>;
  return <span className="rounded border border-amber-200 bg-amber-50 px-1.5 py-0.5 text-[11px] text-amber-700">{c.note ?? "no price configured"}</span>;
}

export function CostBreakdown({ title, summary, emptyText = "No damage detected." }: {
  title: string;
  summary: CostSummary;
  emptyText?: string;
}) {
  const rows = Object.entries(summary.per_class_costs);
  const unpriced = rows.filter(([, c]) => !c.priced).length;

  return (
    <div className="rounded-2xl border border-white/30 bg-white/60 backdrop-blur-xl p-5 shadow-[0_8px_30px_rgb(0,0,0,0.06)]">
      <div className="flex items-center justify-between mb-2">
        <div className="text-sm font-medium text-slate-900">{title}</div>
        <div className="text-xl font-semibold tracking-tight">{formatTotals(summary.totals)}</div>
      </div>

      {rows.length === 0 ? (
        <div className="text-sm text-slate-500">{emptyText}</div>
      ) : (
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-slate-500">
              <th className="py-1 font-normal">Damage</th>
              <th className="py-1 font-normal">Count</th>
              <th className="py-1 font-normal">Unit price</th>
              <th className="py-1 font-normal text-right">Subtotal</th>
            </tr>
          </thead>
          <tbody>
            {rows.map(([cls, c]) => (
              <tr key={cls} className="border-t border-slate-200/70">
                <td className="py-1.5">
                  <div className="flex items-center gap-2">
                    <span className="font-medium text-slate-900">{cls}</span>
                    {sourceBadge(c)}
                  </div>
                </td>
                <td className="py-1.5">{c.count}</td>
                <td className="py-1.5 text-slate-700">{c.priced ? c.range_text : "—"}</td>
                <td className="py-1.5 text-right">{subtotal(c)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      {summary.totals.open_ended && (
        <div className="mt-2 text-[12px] text-amber-700">At least one class has no upper price bound; the total is a minimum.</div>
      )}
      {unpriced > 0 && (
        <div className="mt-1 text-[12px] text-slate-500">
          {unpriced} class{unpriced === 1 ? "" : "es"} detected without a configured price; not included in the total.
        </div>
      )}
    </div>
  );
}
