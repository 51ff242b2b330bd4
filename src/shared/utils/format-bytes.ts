const BYTES_PER_MIB = 1024 * 1024;
const BYTES_PER_GIB = 1024 * 1024 * 1024;

/**
 * Size in MiB with four decimals, e.g. `0.0012`
 */
export function formatMiB(bytes: number): string {
  return (bytes / BYTES_PER_MIB).toFixed(4);
}

/**
 * Size in GiB with two decimals, e.g. `13.50`
 */
export function formatGiB(bytes: number): string {
  return (bytes / BYTES_PER_GIB).toFixed(2);
}
