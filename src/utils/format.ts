/**
 * Human-readable formatting for the CLI report
 */

const numberFormatter = new Intl.NumberFormat('en-US');

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatNumber(value?: number | null): string {
  if (value === null || value === undefined) {
    return '--';
  }

  return numberFormatter.format(value);
}

/**
 * Binary units, one decimal above bytes: 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatDuration(durationMs: number | null | undefined): string {
  if (durationMs === null || durationMs === undefined || durationMs < 0) {
    return 'N/A';
  }

  if (durationMs < 1000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = Math.round(durationMs / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainder = seconds % 60;
  return `${minutes}m ${remainder}s`;
}
