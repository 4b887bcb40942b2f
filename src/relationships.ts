/**
 * Tabular Insight - Column Relationships
 *
 * Pairwise Pearson correlation of numeric columns, bucketed by strength.
 */

import type { ColumnRelationship, ColumnTypes, RelationshipKind, Table } from './types.js';
import { THRESHOLDS } from './constants.js';
import { columnsOfType } from './classify.js';
import { columnCorrelation } from './stats.js';

/** Strength bucket of a correlation coefficient, or null below the moderate threshold */
export function classifyCorrelation(r: number): RelationshipKind | null {
    if (!Number.isFinite(r)) return null;

    const strength = Math.abs(r);
    if (strength > THRESHOLDS.strongCorrelation) {
        return r > 0 ? 'strong_correlation' : 'strong_negative_correlation';
    }
    if (strength > THRESHOLDS.moderateCorrelation) {
        return r > 0 ? 'moderate_correlation' : 'moderate_negative_correlation';
    }
    return null;
}

export function analyzeRelationships(table: Table, columnTypes: ColumnTypes): ColumnRelationship[] {
    const numeric = columnsOfType(table, columnTypes, 'numeric');
    const relationships: ColumnRelationship[] = [];

    numeric.forEach((outer, i) => {
        for (const inner of numeric.slice(i + 1)) {
            const kind = classifyCorrelation(columnCorrelation(outer, inner).r);
            if (kind) {
                relationships.push({ columnA: outer.name, columnB: inner.name, kind });
            }
        }
    });

    return relationships;
}
