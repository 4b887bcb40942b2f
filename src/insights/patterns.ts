/**
 * Pattern detection: multimodal numeric distributions and time-based content.
 */

import type { ColumnTypes, GraphInsight, Table } from '../types.js';
import { LIMITS, THRESHOLDS } from '../constants.js';
import { columnsOfType } from '../classify.js';
import { numericValues } from '../table.js';
import { countPeaks, histogram } from '../stats.js';
import { detectTemporal } from '../structure.js';

function multimodalInsights(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const numeric = columnsOfType(table, columnTypes, 'numeric');
    if (numeric.length < 2) return [];

    const insights: GraphInsight[] = [];

    for (const column of numeric.slice(0, LIMITS.leadingNumericColumns)) {
        const values = numericValues(column);
        if (values.length < LIMITS.minSamples) continue;

        const peaks = countPeaks(histogram(values, THRESHOLDS.histogramBins));
        if (peaks >= THRESHOLDS.minPeaks) {
            insights.push({
                category: 'pattern',
                title: `Multimodal Distribution in ${column.name}`,
                description: `${column.name} shows ${peaks} distinct clusters or groups`,
                confidence: 0.75,
                severity: 'medium',
                dataPoints: { column: column.name, peaks },
                recommendation: `Consider grouping or segmentation analysis for ${column.name}`,
            });
        }
    }

    return insights;
}

export function detectPatterns(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const insights = multimodalInsights(table, columnTypes);

    const names = table.columns.map((column) => column.name);
    if (detectTemporal(names, columnTypes)) {
        insights.push({
            category: 'pattern',
            title: 'Temporal Data Detected',
            description: 'Data contains time-based information suitable for trend analysis',
            confidence: 1,
            severity: 'low',
            dataPoints: { type: 'temporal' },
            recommendation: 'Consider time-series analysis or animated visualizations',
        });
    }

    return insights;
}
