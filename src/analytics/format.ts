/**
 * Display formatting for dashboard metrics.
 */

/** `numerator / denominator` as a percentage with one decimal, "0%" for a zero denominator. */
export function rate(numerator: number, denominator: number): string {
  if (denominator === 0) return '0%';
  return `${((numerator / denominator) * 100).toFixed(1)}%`;
}

/**
 * Render a talk time. Up to an hour is shown in minutes ("45m", "60m"),
 * beyond that as hours and minutes ("1h 5m").
 */
export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  if (minutes <= 60) return `${minutes}m`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/** Integer with thousands separators. */
export function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
