/**
 * Outlier detection with the interquartile-range fence.
 */

import type { ColumnTypes, GraphInsight, Table } from '../types.js';
import { LIMITS, THRESHOLDS } from '../constants.js';
import { columnsOfType } from '../classify.js';
import { numericValues } from '../table.js';
import { quantileSorted, sortAscending } from '../stats.js';

export interface OutlierFence {
    readonly lower: number;
    readonly upper: number;
}

export function iqrFence(values: readonly number[]): OutlierFence {
    const sorted = sortAscending(values);
    const q1 = quantileSorted(sorted, 0.25);
    const q3 = quantileSorted(sorted, 0.75);
    const iqr = q3 - q1;

    return {
        lower: q1 - THRESHOLDS.iqrMultiplier * iqr,
        upper: q3 + THRESHOLDS.iqrMultiplier * iqr,
    };
}

export function detectAnomalies(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const insights: GraphInsight[] = [];

    for (const column of columnsOfType(table, columnTypes, 'numeric')) {
        const values = numericValues(column);
        if (values.length < LIMITS.minSamples) continue;

        const { lower, upper } = iqrFence(values);
        const outlierCount = values.filter((value) => value < lower || value > upper).length;
        const outlierPct = (outlierCount / values.length) * 100;

        if (outlierPct > THRESHOLDS.outlierPct) {
            insights.push({
                category: 'anomaly',
                title: `Outliers Detected in ${column.name}`,
                description: `${outlierPct.toFixed(1)}% of ${column.name} values are statistical outliers`,
                confidence: 0.9,
                severity: outlierPct > THRESHOLDS.highOutlierPct ? 'high' : 'medium',
                dataPoints: {
                    column: column.name,
                    outlier_count: outlierCount,
                    outlier_pct: outlierPct,
                    bounds: [lower, upper],
                },
                recommendation: `Investigate outliers in ${column.name} - may indicate errors or special cases`,
            });
        }
    }

    return insights;
}
