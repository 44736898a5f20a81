/**
 * Format seconds as HH:MM:SS. Hours are not wrapped at 24.
 */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  return [hours, minutes, secs].map(part => String(part).padStart(2, '0')).join(':');
}

/**
 * Format a percentage with one decimal place
 */
export function formatPercent(pct: number): string {
  return pct.toFixed(1);
}
