/**
 * Display formatting helpers
 */

export function formatGiB(size: number): string {
  if (size >= 1024) {
    return `${parseFloat((size / 1024).toFixed(2))} TiB`;
  }
  return `${size} GiB`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${parseFloat(seconds.toFixed(1))}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds % 60);
  return `${minutes}m ${rest}s`;
}

/** Age of a date in whole days, relative to now */
export function formatAge(date: Date, now: Date = new Date()): string {
  const days = Math.floor((now.getTime() - date.getTime()) / (24 * 60 * 60 * 1000));
  return days === 1 ? "1 day" : `${days} days`;
}
