const UNITS = ['KB', 'MB', 'GB'] as const;

/**
 * Human-readable byte count: "1023 B", "1.0 KB", "2.5 MB".
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  let value: number = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}
