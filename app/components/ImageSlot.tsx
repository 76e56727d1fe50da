/* eslint-disable @next/next/no-img-element */
"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import { type SlotMode, type SlotValue, slotModeFor } from "../clientApi";
import type { Detection } from "../types";
import { CameraCapture } from "./CameraCapture";
import { DetectionOverlay } from "./DetectionOverlay";

/** One photo input (upload, link or camera) with its preview and detection overlay. */
export function ImageSlot({
  id, title, value, onChange, detections, isPriced, showOverlay,
}: {
  id: string;
  title: string;
  value: SlotValue;
  onChange: (v: SlotValue) => void;
  detections: readonly Detection[];
  isPriced: (cls: string) => boolean;
  showOverlay: boolean;
}) {
  const [mode, setMode] = useState<SlotMode>(() => slotModeFor(value, "upload"));
  const [objectUrl, setObjectUrl] = useState("");
  const imgRef = useRef<HTMLImageElement>(null);

  useEffect(() => { setMode((m) => slotModeFor(value, m)); }, [value]);

  useEffect(() => {
    if (!value.file) { setObjectUrl(""); return; }
    const u = URL.createObjectURL(value.file);
    setObjectUrl(u);
    return () => URL.revokeObjectURL(u);
  }, [value.file]);

  const preview = value.file ? objectUrl : value.url.trim();

  const switchMode = useCallback((next: SlotMode) => {
    setMode(next);
    if (next === "url") onChange({ file: null, url: value.url });
    else onChange({ file: value.file, url: "" });
  }, [onChange, value.file, value.url]);

  const onFile = useCallback((e: React.ChangeEvent<HTMLInputElement>) => {
    onChange({ file: e.target.files?.[0] ?? null, url: "" });
  }, [onChange]);

  const tab = (m: SlotMode, text: string) => (
    <button type="button" onClick={() => switchMode(m)}
      className={`flex-1 px-3 py-1.5 text-xs font-medium ${mode === m ? "bg-indigo-600 text-white" : "bg-white/70 text-slate-700 hover:bg-white/90"}`}>
      {text}
    </button>
  );

  return (
    <div className="rounded-2xl border border-white/30 bg-white/60 backdrop-blur-xl p-4 shadow-[0_8px_30px_rgb(0,0,0,0.06)] space-y-3">
      <div className="text-sm font-medium text-slate-900">{title}</div>
      <div className="flex rounded-lg overflow-hidden border border-slate-200/70">
        {tab("upload", "Upload")}
        {tab("url", "Link")}
        {tab("camera", "Camera")}
      </div>

      {mode === "upload" && (
        <label htmlFor={`${id}-file`} className="text-sm font-medium block">
          Photo
          <input id={`${id}-file`} type="file" accept="image/*" onChange={onFile}
            className="mt-1 block w-full text-sm file:mr-3 file:rounded-md file:border-0 file:bg-indigo-50 file:px-3 file:py-1.5 file:text-indigo-700" />
        </label>
      )}
      {mode === "url" && (
        <label htmlFor={`${id}-url`} className="text-sm font-medium block">
          Image URL
          <input id={`${id}-url`} type="url" placeholder="https://…" value={value.url}
            onChange={(e) => onChange({ file: null, url: e.target.value })}
            className="mt-1 block w-full rounded-lg border border-slate-300 bg-white/80 px-3 py-2 text-sm focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-indigo-500" />
        </label>
      )}
      {mode === "camera" && (
        <CameraCapture
          onCapture={(f) => { onChange({ file: f, url: "" }); setMode("upload"); }}
          onClose={() => setMode("upload")}
        />
      )}

      {preview ? (
        <div className="relative">
          <img ref={imgRef} src={preview} alt={title} className="max-h-80 w-full rounded-lg object-contain bg-slate-100" />
          <DetectionOverlay imgRef={imgRef} detections={detections} show={showOverlay} isPriced={isPriced} />
        </div>
      ) : (
        <div className="flex h-48 items-center justify-center rounded-lg border border-dashed border-slate-300 text-sm text-slate-500">
          No photo yet
        </div>
      )}
    </div>
  );
}
