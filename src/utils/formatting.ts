/**
 * Shared formatting utilities
 */

import { SIZE_THRESHOLD_K, SIZE_THRESHOLD_M } from './constants.js';

/**
 * Format character count for display
 * @param chars - Number of characters
 * @returns Formatted string: "N chars", "N.NK chars", or "N.NM chars"
 */
export function formatSize(chars: number): string {
  if (chars < SIZE_THRESHOLD_K) {
    return `${chars} chars`;
  } else if (chars < SIZE_THRESHOLD_M) {
    return `${(chars / SIZE_THRESHOLD_K).toFixed(1)}K chars`;
  }
  return `${(chars / SIZE_THRESHOLD_M).toFixed(1)}M chars`;
}

/**
 * Format a dollar amount; sub-cent costs keep four decimals
 */
export function formatCost(cost: number): string {
  if (cost > 0 && cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}

/**
 * Compact single-line JSON for console display
 */
export function formatJsonInline(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}
