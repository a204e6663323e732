import type { ProgressSnapshot } from "./types.js";

/** Floor for elapsed time so the first chunk never divides by zero */
export const MIN_ELAPSED_SECONDS = 1e-6;

export const UNKNOWN_ETA_SECONDS = -1;

/**
 * Compute the progress snapshot for a transfer.
 *
 * @param bytesDownloaded - Bytes written so far
 * @param totalBytes - Expected size, 0 when unknown
 * @param elapsedMs - Time since the transfer started
 */
export function computeProgress(
  bytesDownloaded: number,
  totalBytes: number,
  elapsedMs: number
): ProgressSnapshot {
  const known = totalBytes > 0;
  const elapsedSeconds = Math.max(elapsedMs / 1000, MIN_ELAPSED_SECONDS);
  const rateBytesPerSec = bytesDownloaded / elapsedSeconds;

  return {
    bytesDownloaded,
    totalBytes,
    percent: known ? Math.floor((bytesDownloaded * 100) / totalBytes) : null,
    rateBytesPerSec,
    etaSeconds:
      known && rateBytesPerSec > 0
        ? (totalBytes - bytesDownloaded) / rateBytesPerSec
        : UNKNOWN_ETA_SECONDS,
  };
}

/**
 * Lets presentation code coalesce progress events; the final event of a
 * transfer should be forced through.
 */
export function createProgressThrottle(
  intervalMs: number,
  now: () => number
): (force?: boolean) => boolean {
  let last: number | undefined;

  return (force = false) => {
    const current = now();
    if (force || last === undefined || current - last >= intervalMs) {
      last = current;
      return true;
    }
    return false;
  };
}
