function formatNumber(value: number): string {
  const s = value.toFixed(1);
  return s.endsWith('.0') ? s.slice(0, -2) : s;
}

/**
 * Human-readable duration for a value in seconds.
 *
 * Sub-millisecond values are shown in whole microseconds (`250μs`); anything
 * else in seconds with at most four decimals and no trailing zeros
 * (`0.0123s`, `1.5s`). Zero is `0s`.
 */
export function formatDuration(seconds: number): string {
  const n = Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
  if (n === 0) return '0s';
  const micros = Math.round(n * 1_000_000);
  if (micros < 1000) {
    return `${micros}μs`;
  }
  return `${Number(n.toFixed(4))}s`;
}

/**
 * Human-readable byte count (`512 B`, `1.5 KB`, `2 MB`).
 */
export function formatBytes(size: number): string {
  const n = Number.isFinite(size) ? Math.max(0, Math.floor(size)) : 0;
  const KB = 1024;
  const MB = KB * 1024;
  const GB = MB * 1024;

  if (n >= GB) return `${formatNumber(n / GB)} GB`;
  if (n >= MB) return `${formatNumber(n / MB)} MB`;
  if (n >= KB) return `${formatNumber(n / KB)} KB`;
  return `${n} B`;
}

/**
 * Byte count in the form the ORM writes into its log lines: two decimals and
 * an upper-case unit (`1.50 KB`).
 */
export function formatLogBytes(size: number): string {
  const n = Number.isFinite(size) ? Math.max(0, size) : 0;
  const units = ['B', 'KB', 'MB', 'GB'] as const;
  let value = n;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}
