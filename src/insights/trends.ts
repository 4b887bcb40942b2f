/**
 * Trend detection.
 *
 * Two independent checks:
 * - linear co-movement between the leading numeric columns
 * - a fitted slope along the row order, when that order is non-decreasing
 */

import _ from 'lodash';
import type { Column, ColumnTypes, GraphInsight, Table } from '../types.js';
import { LIMITS, THRESHOLDS } from '../constants.js';
import { columnsOfType } from '../classify.js';
import { isIndexMonotonic, numericValues } from '../table.js';
import { columnCorrelation, indexSlope } from '../stats.js';
import { toTitleCase } from '../utils.js';

function correlationTrends(numeric: readonly Column[]): GraphInsight[] {
    if (numeric.length < 2) return [];

    const insights: GraphInsight[] = [];
    const leading = numeric.slice(0, LIMITS.leadingNumericColumns);

    leading.forEach((first, i) => {
        for (const second of numeric.slice(i + 1, LIMITS.trendPartnerColumns)) {
            const { r, n } = columnCorrelation(first, second);
            if (n < LIMITS.minSamples || !Number.isFinite(r)) continue;

            const strength = Math.abs(r);
            if (strength <= THRESHOLDS.strongCorrelation) continue;

            const direction = r > 0 ? 'positive' : 'negative';
            const level = strength > THRESHOLDS.veryStrongCorrelation ? 'strong' : 'moderate';

            insights.push({
                category: 'trend',
                title: `${toTitleCase(level)} ${toTitleCase(direction)} Correlation`,
                description: `${first.name} and ${second.name} show ${level} ${direction} correlation (r=${r.toFixed(3)})`,
                confidence: strength,
                severity: strength > THRESHOLDS.veryStrongCorrelation ? 'high' : 'medium',
                dataPoints: { col1: first.name, col2: second.name, correlation: r },
                recommendation: `Strong relationship between ${first.name} and ${second.name} suggests predictive potential`,
            });
        }
    });

    return insights;
}

function indexTrends(table: Table, numeric: readonly Column[]): GraphInsight[] {
    if (!isIndexMonotonic(table)) return [];

    const insights: GraphInsight[] = [];

    for (const column of numeric.slice(0, LIMITS.leadingNumericColumns)) {
        const values = numericValues(column);
        if (values.length < LIMITS.minSamples) continue;

        const range = (_.max(values) ?? 0) - (_.min(values) ?? 0);
        if (range <= 0) continue;

        const slope = indexSlope(values);
        const normalizedSlope = (slope * values.length) / range;
        if (Math.abs(normalizedSlope) <= THRESHOLDS.normalizedSlope) continue;

        const direction = normalizedSlope > 0 ? 'increasing' : 'decreasing';
        insights.push({
            category: 'trend',
            title: `${toTitleCase(direction)} Trend in ${column.name}`,
            description: `${column.name} shows a clear ${direction} trend over the dataset`,
            confidence: Math.min(Math.abs(normalizedSlope), 1),
            severity: 'medium',
            dataPoints: { column: column.name, slope, normalized_slope: normalizedSlope },
            recommendation: `Monitor ${column.name} - trend suggests continued ${direction} pattern`,
        });
    }

    return insights;
}

export function detectTrends(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const numeric = columnsOfType(table, columnTypes, 'numeric');
    return [...correlationTrends(numeric), ...indexTrends(table, numeric)];
}
