/**
 * Categorical → numeric influence, measured as the spread of group means
 * relative to the overall spread.
 */

import _ from 'lodash';
import type { Column, ColumnTypes, GraphInsight, Table } from '../types.js';
import { LIMITS, THRESHOLDS } from '../constants.js';
import { columnsOfType } from '../classify.js';
import { isMissing } from '../table.js';
import { mean, variance } from '../stats.js';

/**
 * Between-group variance of means over overall variance.
 * Null when fewer than two groups qualify or the column is constant.
 */
export function groupVarianceRatio(categorical: Column, numeric: Column): number | null {
    const groups = new Map<string, number[]>();
    const values: number[] = [];

    numeric.values.forEach((value, row) => {
        if (typeof value !== 'number' || !Number.isFinite(value)) return;
        values.push(value);

        const category = categorical.values[row];
        if (category === undefined || isMissing(category)) return;

        const key = category instanceof Date ? category.toISOString() : String(category);
        const members = groups.get(key) ?? [];
        members.push(value);
        groups.set(key, members);
    });

    const groupMeans = [...groups.values()]
        .filter((members) => members.length >= THRESHOLDS.minGroupSize)
        .map(mean);
    if (groupMeans.length < THRESHOLDS.minGroups) return null;

    const overall = variance(values);
    if (!(overall > 0)) return null;

    return variance(groupMeans) / overall;
}

export function detectRelationshipInsights(table: Table, columnTypes: ColumnTypes): GraphInsight[] {
    const categorical = columnsOfType(table, columnTypes, 'categorical').slice(0, LIMITS.relationshipColumns);
    const numeric = columnsOfType(table, columnTypes, 'numeric').slice(0, LIMITS.relationshipColumns);

    return _.flatMap(categorical, (cat) =>
        numeric.flatMap((num): GraphInsight[] => {
            const ratio = groupVarianceRatio(cat, num);
            if (ratio === null || ratio <= THRESHOLDS.varianceRatio) return [];

            return [{
                category: 'relationship',
                title: `${cat.name} Influences ${num.name}`,
                description: `${cat.name} groups show distinct ${num.name} values`,
                confidence: Math.min(ratio, 1),
                severity: 'medium',
                dataPoints: { categorical: cat.name, numeric: num.name, variance_ratio: ratio },
                recommendation: `Use ${cat.name} for color/grouping in visualizations`,
            }];
        })
    );
}
