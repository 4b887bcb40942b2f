/**
 * Tabular Insight - Statistics
 *
 * Numeric primitives shared by the profiler and the insight modules,
 * plus the per-column statistical summary.
 *
 * Conventions:
 * - Variance and standard deviation are sample estimates (n - 1).
 * - Quantiles interpolate linearly between order statistics.
 * - Too few values or zero variance yield NaN.
 */

import _ from 'lodash';
import type {
    CategoricalSummary,
    Column,
    ColumnTypes,
    NumericSummary,
    StatisticalSummary,
    Table,
} from './types.js';
import { countMissing, isMissing, numericValues, presentValues } from './table.js';

// ============================================================================
// Moments
// ============================================================================

export function mean(values: readonly number[]): number {
    return values.length === 0 ? NaN : _.sum(values) / values.length;
}

export function variance(values: readonly number[]): number {
    if (values.length < 2) return NaN;
    const center = mean(values);
    return _.sumBy(values, (value) => (value - center) ** 2) / (values.length - 1);
}

export function standardDeviation(values: readonly number[]): number {
    return Math.sqrt(variance(values));
}

/**
 * Adjusted Fisher-Pearson skewness.
 * NaN below three values, 0 for a constant series.
 */
export function skewness(values: readonly number[]): number {
    const n = values.length;
    if (n < 3) return NaN;

    const center = mean(values);
    let m2 = 0;
    let m3 = 0;
    for (const value of values) {
        const deviation = value - center;
        m2 += deviation ** 2;
        m3 += deviation ** 3;
    }

    // floating-point residue of a constant series
    if (m2 < 1e-14) return 0;

    return ((n * Math.sqrt(n - 1)) / (n - 2)) * (m3 / m2 ** 1.5);
}

// ============================================================================
// Order Statistics
// ============================================================================

export function sortAscending(values: readonly number[]): number[] {
    return [...values].sort((a, b) => a - b);
}

/** Quantile of an ascending series, 0 ≤ q ≤ 1 */
export function quantileSorted(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return NaN;

    const position = (sorted.length - 1) * q;
    const lower = Math.floor(position);
    const upper = Math.ceil(position);
    const low = sorted[lower] ?? NaN;
    const high = sorted[upper] ?? NaN;

    return low + (high - low) * (position - lower);
}

export function quantile(values: readonly number[], q: number): number {
    return quantileSorted(sortAscending(values), q);
}

export function median(values: readonly number[]): number {
    return quantile(values, 0.5);
}

// ============================================================================
// Association
// ============================================================================

/** Pearson correlation; NaN when either series is constant or shorter than two */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
    const n = Math.min(xs.length, ys.length);
    if (n < 2) return NaN;

    const meanX = mean(xs.slice(0, n));
    const meanY = mean(ys.slice(0, n));

    let covariance = 0;
    let sumSqX = 0;
    let sumSqY = 0;
    for (let i = 0; i < n; i++) {
        const dx = (xs[i] ?? meanX) - meanX;
        const dy = (ys[i] ?? meanY) - meanY;
        covariance += dx * dy;
        sumSqX += dx * dx;
        sumSqY += dy * dy;
    }

    const denominator = Math.sqrt(sumSqX * sumSqY);
    if (denominator === 0) return NaN;

    return Math.max(-1, Math.min(1, covariance / denominator));
}

/** Rows where both columns hold finite numbers */
export function pairedValues(a: Column, b: Column): { xs: number[]; ys: number[] } {
    const xs: number[] = [];
    const ys: number[] = [];
    const length = Math.min(a.values.length, b.values.length);

    for (let row = 0; row < length; row++) {
        const x = a.values[row];
        const y = b.values[row];
        if (typeof x === 'number' && Number.isFinite(x) && typeof y === 'number' && Number.isFinite(y)) {
            xs.push(x);
            ys.push(y);
        }
    }

    return { xs, ys };
}

export function columnCorrelation(a: Column, b: Column): { r: number; n: number } {
    const { xs, ys } = pairedValues(a, b);
    return { r: pearson(xs, ys), n: xs.length };
}

/** Least-squares slope of the series against its positions 0..n-1 */
export function indexSlope(values: readonly number[]): number {
    const n = values.length;
    if (n < 2) return NaN;

    const meanX = (n - 1) / 2;
    const meanY = mean(values);
    let numerator = 0;
    let denominator = 0;

    values.forEach((value, position) => {
        numerator += (position - meanX) * (value - meanY);
        denominator += (position - meanX) ** 2;
    });

    return numerator / denominator;
}

// ============================================================================
// Distribution Shape
// ============================================================================

/**
 * Equal-width histogram over [min, max]; the last bin is closed.
 * A constant series is binned over [v - 0.5, v + 0.5].
 */
export function histogram(values: readonly number[], bins: number): number[] {
    const counts = new Array<number>(bins).fill(0);
    if (values.length === 0) return counts;

    let low = _.min(values) ?? 0;
    let high = _.max(values) ?? 0;
    if (low === high) {
        low -= 0.5;
        high += 0.5;
    }

    const width = (high - low) / bins;
    for (const value of values) {
        const bin = value >= high ? bins - 1 : Math.floor((value - low) / width);
        counts[Math.min(bins - 1, Math.max(0, bin))] += 1;
    }

    return counts;
}

/** Interior bins strictly higher than both neighbours */
export function countPeaks(counts: readonly number[]): number {
    let peaks = 0;
    for (let i = 1; i < counts.length - 1; i++) {
        const here = counts[i] ?? 0;
        if (here > (counts[i - 1] ?? 0) && here > (counts[i + 1] ?? 0)) {
            peaks++;
        }
    }
    return peaks;
}

// ============================================================================
// Column Summary
// ============================================================================

export function summarizeNumeric(values: readonly number[]): NumericSummary {
    return {
        mean: mean(values),
        std: standardDeviation(values),
        min: _.min(values) ?? NaN,
        max: _.max(values) ?? NaN,
        median: median(values),
    };
}

function cellKey(value: unknown): string {
    return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Distinct count and most frequent value.
 * Ties go to the value that sorts first.
 */
export function summarizeCategorical(column: Column): CategoricalSummary {
    const counts = _.countBy(presentValues(column), cellKey);
    const ranked = Object.entries(counts).sort(([valueA, countA], [valueB, countB]) =>
        countB - countA || (valueA < valueB ? -1 : valueA > valueB ? 1 : 0)
    );

    return {
        uniqueCount: ranked.length,
        mostCommon: ranked[0]?.[0] ?? null,
    };
}

export function computeStatisticalSummary(table: Table, columnTypes: ColumnTypes): StatisticalSummary {
    const numeric: Record<string, NumericSummary> = {};
    const categorical: Record<string, CategoricalSummary> = {};
    const missingValues: Record<string, number> = {};

    for (const column of table.columns) {
        missingValues[column.name] = countMissing(column);

        const type = columnTypes[column.name];
        if (type === 'numeric') {
            const values = numericValues(column);
            if (values.length > 0) {
                numeric[column.name] = summarizeNumeric(values);
            }
        } else if (type === 'categorical' && column.values.some((value) => !isMissing(value))) {
            categorical[column.name] = summarizeCategorical(column);
        }
    }

    return { numeric, categorical, missingValues };
}
