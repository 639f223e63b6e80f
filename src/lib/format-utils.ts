/**
 * Shared formatting utilities for the narrative text attached to results
 */

/**
 * Format the size of a loss or gain without its sign.
 * Loss tables store losses as negative numbers; narratives say "lost 75%".
 *
 * @example
 * formatMagnitude(-74.6) // "75%"
 * formatMagnitude(12.25, 1) // "12.3%"
 */
export function formatMagnitude(value: number, decimals: number = 0): string {
  if (isNaN(value)) return "0%";
  return `${Math.abs(value).toFixed(decimals)}%`;
}

/**
 * Format a share of the portfolio (already 0-100) with one decimal.
 *
 * @example
 * formatShare(68.04) // "68.0%"
 */
export function formatShare(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Join items into a readable list: "A", "A and B", "A, B and C".
 */
export function formatList(items: readonly string[]): string {
  if (items.length === 0) return "";
  if (items.length === 1) return items[0];
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}
