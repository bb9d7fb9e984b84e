/**
 * Byte size formatting
 */

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human readable size with one decimal, base 1024 (e.g. "1.5 GB")
 */
export function formatBytes(bytes: number): string {
  let value = Math.max(0, bytes);
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}
