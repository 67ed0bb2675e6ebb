const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Formats a run's wall-clock length as `H:MM:SS`, with `.mmm` appended when
 * there is a millisecond part.
 */
export function formatElapsed(ms: number): string {
  const totalMs = Math.max(0, Math.round(ms));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  const base = `${hours}:${pad(minutes)}:${pad(seconds)}`;
  return millis ? `${base}.${pad(millis, 3)}` : base;
}

/** Elapsed time between two instants; `0:00:00` when the run never stopped. */
export const formatRunDuration = (startedAt: Date, stoppedAt: Date | undefined): string =>
  stoppedAt ? formatElapsed(stoppedAt.getTime() - startedAt.getTime()) : formatElapsed(0);

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Short per-test duration: `850ms`, `12.3s`, `2m 5s`. */
export function formatDuration(seconds: number): string {
  const ms = seconds * 1000;
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}
