"use client";

import { useCallback, useEffect, useState } from "react";
import { formatTotals } from "../../lib/money";
import { fetchClaims } from "../clientApi";
import type { Claim, ClaimPage } from "../types";

type Filter = "" | "single" | "compare";

function countsText(counts: Record<string, number> | null) {
  if (!counts) return "—";
  const parts = Object.entries(counts).filter(([, n]) => n > 0).map(([cls, n]) => `${cls} ×${n}`);
  return parts.length ? parts.join(", ") : "none";
}

function ClaimRow({ c }: { c: Claim }) {
  return (
    <tr className="border-t border-slate-200/70 align-top">
      <td className="py-1.5">#{c.id}</td>
      <td className="py-1.5">
        <span className={`rounded-full border px-2 py-0.5 text-[11px] ${c.type === "single" ? "border-indigo-200 bg-indigo-50 text-indigo-700" : "border-sky-200 bg-sky-50 text-sky-700"}`}>
          {c.type}
        </span>
      </td>
      <td className="py-1.5 text-slate-700">{c.vehicle_type ?? "—"}</td>
      <td className="py-1.5 text-slate-700">{countsText(c.type === "compare" ? c.new_damage_counts : c.counts)}</td>
      <td className="py-1.5 text-right font-medium">
        {formatTotals({ min: c.total_usd, max: c.total_max_usd, open_ended: c.open_ended })}
      </td>
      <td className="py-1.5 text-right text-[12px] text-slate-500">{new Date(c.created_at).toLocaleString()}</td>
    </tr>
  );
}

/** Recorded estimates, newest first; refreshes whenever `refreshKey` changes. */
export function ClaimsPanel({ refreshKey }: { refreshKey: number }) {
  const [filter, setFilter] = useState<Filter>("");
  const [page, setPage] = useState(1);
  const [data, setData] = useState<ClaimPage | null>(null);
  const [error, setError] = useState("");
  const [loading, setLoading] = useState(false);

  const load = useCallback(async (f: Filter, p: number) => {
    setLoading(true); setError("");
    try {
      setData(await fetchClaims(f, p));
    } catch (e: unknown) {
      setError(e instanceof Error ? e.message : "Could not load claims.");
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => { void load(filter, page); }, [load, filter, page, refreshKey]);

  return (
    <div className="rounded-2xl border border-white/30 bg-white/60 backdrop-blur-xl p-5 shadow-[0_8px_30px_rgb(0,0,0,0.06)] space-y-3">
      <div className="flex flex-wrap items-center justify-between gap-2">
        <div className="text-sm font-medium text-slate-900">Claims</div>
        <select value={filter} onChange={(e) => {
            const v = e.target.value;
            setFilter(v === "single" || v === "compare" ? v : ""); setPage(1);
          }}
          className="rounded-lg border border-slate-300 bg-white/70 px-2 py-1 text-xs">
          <option value="">All</option>
          <option value="single">Single image</option>
          <option value="compare">Before / after</option>
        </select>
      </div>

      {error && <div className="rounded-lg border border-rose-200/70 bg-rose-50/80 p-3 text-sm text-rose-700">{error}</div>}

      {data && data.data.length > 0 ? (
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-slate-500">
              <th className="py-1 font-normal">Id</th>
              <th className="py-1 font-normal">Type</th>
              <th className="py-1 font-normal">Vehicle</th>
              <th className="py-1 font-normal">Damage</th>
              <th className="py-1 font-normal text-right">Total</th>
              <th className="py-1 font-normal text-right">Created</th>
            </tr>
          </thead>
          <tbody>{data.data.map((c) => <ClaimRow key={c.id} c={c} />)}</tbody>
        </table>
      ) : (
        !loading && <div className="text-sm text-slate-500">No claims recorded yet.</div>
      )}

      {data && data.last_page > 1 && (
        <div className="flex items-center justify-between text-xs text-slate-600">
          <button type="button" disabled={page <= 1} onClick={() => setPage((p) => p - 1)}
            className="rounded-lg border border-slate-300 bg-white/70 px-2 py-1 disabled:opacity-50">Previous</button>
          <span>Page {data.current_page} of {data.last_page} · {data.total} claims</span>
          <button type="button" disabled={page >= data.last_page} onClick={() => setPage((p) => p + 1)}
            className="rounded-lg border border-slate-300 bg-white/70 px-2 py-1 disabled:opacity-50">Next</button>
        </div>
      )}
    </div>
  );
}
