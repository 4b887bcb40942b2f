/**
 * Tabular Insight - Insight Aggregation
 *
 * Runs the insight modules in a fixed order and derives the report views:
 * category lists, recommendations, key findings and the prose summary.
 *
 * Each module returns its own list; nothing is shared between modules,
 * and the concatenation order is part of the report contract.
 */

import _ from 'lodash';
import type {
    CellValue,
    ColumnTypes,
    DataSummary,
    GraphInsight,
    InsightCategory,
    Table,
    VisualizationType,
} from './types.js';
import { CELL_BYTES, LIMITS, SCATTER_VISUALIZATIONS, SEVERITY_WEIGHTS, THRESHOLDS } from './constants.js';
import { columnsOfType } from './classify.js';
import { isMissing, rowCount } from './table.js';
import { describeVisualization } from './utils.js';
import { extractStatisticalInsights } from './insights/statistical.js';
import { detectPatterns } from './insights/patterns.js';
import { detectAnomalies } from './insights/anomalies.js';
import { detectTrends } from './insights/trends.js';
import { detectRelationshipInsights } from './insights/relationships.js';
import { detectNetworkInsights } from './insights/network.js';

// ============================================================================
// Collection
// ============================================================================

type InsightModule = (table: Table, columnTypes: ColumnTypes) => GraphInsight[];

const INSIGHT_MODULES: readonly InsightModule[] = [
    extractStatisticalInsights,
    detectPatterns,
    detectAnomalies,
    detectTrends,
    detectRelationshipInsights,
];

export function collectInsights(
    table: Table,
    columnTypes: ColumnTypes,
    visualizationType: VisualizationType
): GraphInsight[] {
    const insights = INSIGHT_MODULES.flatMap((module) => module(table, columnTypes));

    if (visualizationType === 'network') {
        insights.push(...detectNetworkInsights(table));
    }

    return insights;
}

export function descriptionsOf(insights: readonly GraphInsight[], category: InsightCategory): string[] {
    return insights.filter((insight) => insight.category === category).map((insight) => insight.description);
}

// ============================================================================
// Data Summary
// ============================================================================

function cellBytes(value: CellValue): number {
    if (typeof value === 'string') {
        return CELL_BYTES.scalar + CELL_BYTES.stringOverhead + value.length;
    }
    return CELL_BYTES.scalar;
}

export function summarizeData(table: Table, columnTypes: ColumnTypes): DataSummary {
    const rows = rowCount(table);
    const cells = rows * table.columns.length;
    const cellValues = table.columns.flatMap((column) => [...column.values]);
    const missing = cellValues.filter((value) => isMissing(value)).length;
    const bytes = _.sumBy(cellValues, cellBytes);

    return {
        totalRecords: rows,
        totalColumns: table.columns.length,
        numericColumns: columnsOfType(table, columnTypes, 'numeric').length,
        categoricalColumns: columnsOfType(table, columnTypes, 'categorical').length,
        missingValues: missing,
        missingPercentage: cells === 0 ? 0 : (missing / cells) * 100,
        memoryUsageMb: bytes / 1024 / 1024,
    };
}

// ============================================================================
// Derived Views
// ============================================================================

export function buildRecommendations(
    insights: readonly GraphInsight[],
    table: Table,
    columnTypes: ColumnTypes,
    summary: DataSummary,
    visualizationType: VisualizationType
): string[] {
    const recommendations = insights
        .filter((insight) => insight.confidence > THRESHOLDS.recommendationConfidence)
        .flatMap((insight) => (insight.recommendation ? [insight.recommendation] : []));

    if (summary.totalRecords > THRESHOLDS.largeDataset) {
        recommendations.push('Consider aggregation or sampling for better performance with large datasets');
    }

    if (summary.missingPercentage > THRESHOLDS.missingPct) {
        recommendations.push(
            `Dataset has ${summary.missingPercentage.toFixed(1)}% missing values - consider imputation or filtering`
        );
    }

    if (SCATTER_VISUALIZATIONS.has(visualizationType)) {
        const [firstCategorical] = columnsOfType(table, columnTypes, 'categorical');
        if (firstCategorical) {
            recommendations.push(`Use ${firstCategorical.name} for color encoding to reveal patterns`);
        }
    }

    return recommendations.slice(0, LIMITS.maxRecommendations);
}

export function insightScore(insight: GraphInsight): number {
    return insight.confidence * SEVERITY_WEIGHTS[insight.severity];
}

/** Highest confidence × severity first; equal scores keep module order */
export function extractKeyFindings(insights: readonly GraphInsight[]): string[] {
    return [...insights]
        .sort((a, b) => insightScore(b) - insightScore(a))
        .slice(0, LIMITS.maxKeyFindings)
        .map((insight) => `${insight.title}: ${insight.description}`);
}

export function composeSummary(
    insights: readonly GraphInsight[],
    visualizationType: VisualizationType,
    summary: DataSummary
): string {
    const count = (category: InsightCategory) =>
        insights.filter((insight) => insight.category === category).length;

    const highConfidence = insights.filter((insight) => insight.confidence > THRESHOLDS.summaryConfidence).length;
    const patterns = count('pattern');
    const anomalies = count('anomaly');
    const trends = count('trend');

    const sentences = [
        `This ${describeVisualization(visualizationType)} visualization represents a dataset with ` +
        `${summary.totalRecords} records and ${summary.totalColumns} variables.`,
        highConfidence > 0 && `Analysis identified ${highConfidence} high-confidence insights.`,
        patterns > 0 && `Detected ${patterns} distinct patterns in the data structure.`,
        anomalies > 0 && `Found ${anomalies} anomalies that may require attention.`,
        trends > 0 && `Identified ${trends} significant trends or correlations.`,
    ];

    return sentences.filter((sentence): sentence is string => typeof sentence === 'string').join(' ');
}
