"use client";

import { useCallback, useEffect, useRef, useState } from "react";

/**
 * Inline camera: opens the rear camera when available, grabs one frame as a JPEG File.
 * The stream is stopped on capture, cancel and unmount.
 */
export function CameraCapture({ onCapture, onClose }: { onCapture: (f: File) => void; onClose: () => void }) {
  const videoRef = useRef<HTMLVideoElement>(null);
  const streamRef = useRef<MediaStream | null>(null);
  const [error, setError] = useState("");

  const stop = useCallback(() => {
    streamRef.current?.getTracks().forEach((t) => t.stop());
    streamRef.current = null;
  }, []);

  useEffect(() => {
    let cancelled = false;
    if (!navigator.mediaDevices?.getUserMedia) {
      setError("This browser can’t open the camera. Upload a photo instead.");
      return;
    }
    navigator.mediaDevices
      .getUserMedia({ video: { facingMode: { ideal: "environment" } }, audio: false })
      .then((stream) => {
        if (cancelled) { stream.getTracks().forEach((t) => t.stop()); return; }
        streamRef.current = stream;
        const video = videoRef.current;
        if (video) {
          video.srcObject = stream;
          return video.play();
        }
      })
      .catch((e: unknown) => {
        console.warn("[camera] getUserMedia failed", e);
        setError("Camera access was denied or is unavailable.");
      });
    return () => { cancelled = true; stop(); };
  }, [stop]);

  const capture = useCallback(() => {
    const video = videoRef.current;
    if (!video || !video.videoWidth) return;
    const canvas = document.createElement("canvas");
    canvas.width = video.videoWidth; canvas.height = video.videoHeight;
    const ctx = canvas.getContext("2d");
    if (!ctx) return;
    ctx.drawImage(video, 0, 0);
    canvas.toBlob((blob) => {
      if (!blob) { setError("Could not capture a frame. Try again."); return; }
      stop();
      onCapture(new File([blob], `capture-${Date.now()}.jpg`, { type: "image/jpeg" }));
    }, "image/jpeg", 0.9);
  }, [onCapture, stop]);

  const cancel = useCallback(() => { stop(); onClose(); }, [onClose, stop]);

  return (
    <div className="space-y-2">
      {error ? (
        <div className="rounded-lg border border-rose-200/70 bg-rose-50/80 p-3 text-sm text-rose-700">{error}</div>
      ) : (
        <video ref={videoRef} playsInline muted className="w-full rounded-lg bg-black/80" />
      )}
      <div className="flex gap-2">
        <button type="button" onClick={capture} disabled={Boolean(error)}
          className="rounded-lg bg-indigo-600 px-3 py-1.5 text-sm font-medium text-white disabled:opacity-50 hover:bg-indigo-700">
          Capture
        </button>
        <button type="button" onClick={cancel}
          className="rounded-lg border border-slate-300 bg-white/70 px-3 py-1.5 text-sm hover:bg-white/90">
          Cancel
        </button>
      </div>
    </div>
  );
}
