/**
 * Tabular Insight - Utilities
 *
 * Shared helpers for keyword matching and text formatting.
 */

import type { VisualizationType } from './types.js';

// ============================================================================
// Keyword Matching
// ============================================================================

/**
 * Check if a name contains any keyword, case-insensitively
 *
 * @example
 * containsKeyword("Order_Date", ["date", "time"])  // true
 * containsKeyword("customer", ["to"])               // true
 */
export function containsKeyword(name: string, keywords: readonly string[]): boolean {
    const lower = name.toLowerCase();
    return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

export function anyNameContains(names: readonly string[], keywords: readonly string[]): boolean {
    return names.some((name) => containsKeyword(name, keywords));
}

// ============================================================================
// Text
// ============================================================================

/**
 * Capitalize the first letter of each word
 *
 * @example
 * toTitleCase("strong positive")  // "Strong Positive"
 */
export function toTitleCase(str: string): string {
    return str.replace(/\b([a-z])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Plain-language name of a visualization type
 *
 * @example
 * describeVisualization("3d_scatter")       // "scatter"
 * describeVisualization("generic_scatter")  // "generic scatter"
 */
export function describeVisualization(type: VisualizationType): string {
    return type.replace('3d_', '').replace(/_/g, ' ');
}

