/**
 * Distribution shape of numeric columns: skewness and relative spread.
 */

import type { ColumnTypes, GraphInsight, Table } from '../types.js';
import { THRESHOLDS } from '../constants.js';
import { columnsOfType } from '../classify.js';
import { numericValues } from '../table.js';
import { mean, skewness, standardDeviation } from '../stats.js';

export function extractStatisticalInsights(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const insights: GraphInsight[] = [];

    for (const column of columnsOfType(table, columnTypes, 'numeric')) {
        const values = numericValues(column);
        if (values.length === 0) continue;

        const name = column.name;
        const average = mean(values);
        const std = standardDeviation(values);
        const skew = skewness(values);

        if (Math.abs(skew) > THRESHOLDS.skewness) {
            const direction = skew > 0 ? 'right' : 'left';
            insights.push({
                category: 'statistical',
                title: `Skewed Distribution in ${name}`,
                description: `${name} shows ${direction}-skewed distribution (skewness: ${skew.toFixed(2)})`,
                confidence: Math.min(Math.abs(skew) / 3, 1),
                severity: Math.abs(skew) > THRESHOLDS.highSkewness ? 'high' : 'medium',
                dataPoints: { column: name, skewness: skew, mean: average },
                recommendation: `Consider log transformation or outlier investigation for ${name}`,
            });
        }

        if (average !== 0) {
            const cv = (std / Math.abs(average)) * 100;
            if (cv > THRESHOLDS.coefficientOfVariation) {
                insights.push({
                    category: 'statistical',
                    title: `High Variability in ${name}`,
                    description: `${name} has high variability (CV: ${cv.toFixed(1)}%)`,
                    confidence: 0.9,
                    severity: 'medium',
                    dataPoints: { column: name, cv, std },
                    recommendation: `High variability in ${name} may indicate multiple subgroups`,
                });
            }
        }
    }

    return insights;
}
