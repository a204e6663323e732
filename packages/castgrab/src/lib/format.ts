import type { ProgressSnapshot } from "./download/types.js";

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/** Longest ETA shown before capping: 99:59:59 */
const MAX_ETA_SECONDS = 99 * 3600 + 59 * 60 + 59;

export const UNKNOWN_ETA = "--:--";

/**
 * Human-readable byte count with two decimals, base 1024.
 */
export function formatBytes(bytes: number): string {
  let size = bytes;
  for (const unit of BYTE_UNITS) {
    if (size < 1024 || unit === "TB") {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} TB`;
}

/**
 * Size in megabytes as listed in episode tables.
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

/**
 * Format remaining seconds as H:MM:SS, or M:SS under an hour.
 */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return UNKNOWN_ETA;
  }

  const total = Math.floor(Math.min(seconds, MAX_ETA_SECONDS) + 0.5);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const ss = String(s).padStart(2, "0");

  return h > 0 ? `${h}:${String(m).padStart(2, "0")}:${ss}` : `${m}:${ss}`;
}

/**
 * One-line progress summary. Without a known size only the rate is shown.
 */
export function formatProgressLine(snapshot: ProgressSnapshot): string {
  const rate = `${formatBytes(snapshot.rateBytesPerSec)}/s`;

  if (snapshot.percent === null) {
    return `${formatBytes(snapshot.bytesDownloaded)} · ${rate}`;
  }

  return `${snapshot.percent}% · ${rate} · ETA ${formatEta(snapshot.etaSeconds)}`;
}
