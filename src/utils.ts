/**
 * dbscout utilities
 */

/**
 * Wrap a promise with a timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = "Operation timed out"
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(message)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Format bytes to human readable
 */
export function formatBytes(bytes: number | string | null | undefined): string {
  if (bytes === null || bytes === undefined) return "N/A";

  // pg returns bigint columns as strings
  const num = typeof bytes === "string" ? parseFloat(bytes) : bytes;

  if (isNaN(num) || num < 0) return "N/A";
  if (num === 0) return "0 B";
  if (num > 1e18) return "N/A";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(num) / Math.log(k)), sizes.length - 1);
  return `${(num / Math.pow(k, i)).toFixed(1)} ${sizes[i]}`;
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return "<1ms";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Elapsed wall-clock seconds since `startMs` (a Date.now() reading)
 */
export function secondsSince(startMs: number): number {
  return (Date.now() - startMs) / 1000;
}

/**
 * Coerce a catalog value to a number; pg hands bigint and numeric back as
 * strings. null stays null.
 */
export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const num = typeof value === "number" ? value : Number(value);
  return Number.isFinite(num) ? num : null;
}

/**
 * Pretty JSON for tool results. bigint values are rendered as strings.
 */
export function toJsonText(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v),
    2
  );
}
