"use client";

import { useEffect, useRef } from "react";
import { loadImage } from "../clientApi";
import type { BBoxRel, Detection } from "../types";

const FONT = "12px system-ui, -apple-system, Segoe UI, Roboto, sans-serif";
const STROKE = "#10b981";
const FILL = "rgba(16,185,129,0.2)";
const UNPRICED_STROKE = "#f59e0b";
const UNPRICED_FILL = "rgba(245,158,11,0.2)";

type Boxed = Detection & { bbox_rel: BBoxRel };

function boxed(dets: readonly Detection[]): Boxed[] {
  return dets.filter((d): d is Boxed => Array.isArray(d.bbox_rel));
}

function boxLabel(d: Detection) {
  return typeof d.confidence === "number" ? `${d.class} ${Math.round(d.confidence * 100)}%` : d.class;
}

/** Shared by the live overlay and the print snapshot; draws in the given pixel frame. */
function drawBoxes(
  ctx: CanvasRenderingContext2D,
  dets: Boxed[],
  frame: { x: number; y: number; w: number; h: number },
  isPriced: (cls: string) => boolean
) {
  ctx.lineWidth = 2;
  ctx.font = FONT;
  ctx.textBaseline = "top";

  dets.forEach((d) => {
    const [nx, ny, nw, nh] = d.bbox_rel;
    const x = frame.x + nx * frame.w;
    const y = frame.y + ny * frame.h;
    const w = nw * frame.w;
    const h = nh * frame.h;
    const priced = isPriced(d.class);

    ctx.strokeStyle = priced ? STROKE : UNPRICED_STROKE;
    ctx.fillStyle = priced ? FILL : UNPRICED_FILL;
    ctx.beginPath();
    ctx.rect(x, y, w, h);
    ctx.fill();
    ctx.stroke();

    // label pill
    const text = boxLabel(d);
    const pad = 4, lh = 16;
    const tw = ctx.measureText(text).width + pad * 2;
    const ly = Math.max(0, y - lh - 2);
    ctx.fillStyle = "rgba(0,0,0,0.75)";
    ctx.fillRect(x, ly, tw, lh);
    ctx.fillStyle = "#fff";
    ctx.fillText(text, x + pad, ly + 2);
  });
}

/** Canvas overlay that matches an <img> rendered with object-contain (letterbox aware). */
export function DetectionOverlay({
  imgRef, detections, show, isPriced,
}: {
  imgRef: React.RefObject<HTMLImageElement>;
  detections: readonly Detection[];
  show: boolean;
  isPriced: (cls: string) => boolean;
}) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const img = imgRef.current;
    const canvas = canvasRef.current;
    if (!img || !canvas) return;

    const draw = () => {
      const parentRect = canvas.parentElement?.getBoundingClientRect();
      const imgRect = img.getBoundingClientRect();
      const cssW = imgRect.width;
      const cssH = imgRect.height;

      canvas.style.position = "absolute";
      canvas.style.left = `${parentRect ? imgRect.left - parentRect.left : 0}px`;
      canvas.style.top = `${parentRect ? imgRect.top - parentRect.top : 0}px`;
      canvas.style.width = `${cssW}px`;
      canvas.style.height = `${cssH}px`;
      canvas.style.pointerEvents = "none";

      const dpr = window.devicePixelRatio || 1;
      canvas.width = Math.round(cssW * dpr);
      canvas.height = Math.round(cssH * dpr);

      const ctx = canvas.getContext("2d");
      if (!ctx) return;
      ctx.setTransform(1, 0, 0, 1, 0, 0);
      ctx.clearRect(0, 0, canvas.width, canvas.height);
      if (!show || cssW <= 0 || cssH <= 0) return;

      // object-contain letterbox
      const naturalW = img.naturalWidth || cssW;
      const naturalH = img.naturalHeight || cssH;
      const scale = Math.min(cssW / naturalW, cssH / naturalH);
      const renderedW = naturalW * scale;
      const renderedH = naturalH * scale;

      ctx.scale(dpr, dpr);
      drawBoxes(
        ctx,
        boxed(detections),
        { x: (cssW - renderedW) / 2, y: (cssH - renderedH) / 2, w: renderedW, h: renderedH },
        isPriced
      );
    };

    draw();
    img.addEventListener("load", draw);
    const ro = new ResizeObserver(draw);
    ro.observe(img);

    return () => {
      ro.disconnect();
      img.removeEventListener("load", draw);
    };
  }, [imgRef, detections, show, isPriced]);

  return <canvas ref={canvasRef} aria-hidden="true" />;
}

/** JPEG data URL of the photo with boxes baked in, for the printable report. */
export async function overlaySnapshot(
  src: string,
  detections: readonly Detection[],
  isPriced: (cls: string) => boolean,
  targetW = 1200
): Promise<string> {
  const img = await loadImage(src);
  const scale = Math.min(1, targetW / img.naturalWidth);
  const w = Math.round(img.naturalWidth * scale), h = Math.round(img.naturalHeight * scale);
  const canvas = document.createElement("canvas"); canvas.width = w; canvas.height = h;
  const ctx = canvas.getContext("2d");
  if (!ctx) return src;
  ctx.fillStyle = "#ffffff"; ctx.fillRect(0, 0, w, h); ctx.drawImage(img, 0, 0, w, h);
  drawBoxes(ctx, boxed(detections), { x: 0, y: 0, w, h }, isPriced);
  return canvas.toDataURL("image/jpeg", 0.92);
}
