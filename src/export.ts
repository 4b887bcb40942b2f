/**
 * Tabular Insight - Export
 *
 * Serializable records of reports and profiles, with the snake_case keys
 * downstream consumers read.
 */

import type {
    AnalyticsReport,
    DataPointValue,
    DataProfile,
    GraphInsight,
    NumericSummary,
    RelationshipKind,
    SemanticType,
    VisualizationType,
} from './types.js';
import type { InsightJson, ReportJson } from './validation.js';

// ============================================================================
// Report
// ============================================================================

function exportDataPoint(value: DataPointValue): number | string | boolean | number[] {
    if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    return [...value];
}

export function exportInsight(insight: GraphInsight): InsightJson {
    const dataPoints: Record<string, number | string | boolean | number[]> = {};
    for (const [key, value] of Object.entries(insight.dataPoints)) {
        dataPoints[key] = exportDataPoint(value);
    }

    return {
        category: insight.category,
        title: insight.title,
        description: insight.description,
        confidence: insight.confidence,
        severity: insight.severity,
        data_points: dataPoints,
        recommendation: insight.recommendation ?? null,
    };
}

export function exportReport(report: AnalyticsReport): ReportJson {
    const summary = report.dataSummary;

    return {
        timestamp: report.timestamp,
        visualization_type: report.visualizationType,
        data_summary: {
            total_records: summary.totalRecords,
            total_columns: summary.totalColumns,
            numeric_columns: summary.numericColumns,
            categorical_columns: summary.categoricalColumns,
            missing_values: summary.missingValues,
            missing_percentage: summary.missingPercentage,
            memory_usage_mb: summary.memoryUsageMb,
        },
        insights: report.insights.map(exportInsight),
        patterns: [...report.patterns],
        anomalies: [...report.anomalies],
        trends: [...report.trends],
        recommendations: [...report.recommendations],
        summary: report.naturalLanguageSummary,
        key_findings: [...report.keyFindings],
    };
}

export function serializeReport(report: AnalyticsReport): string {
    return JSON.stringify(exportReport(report), null, 2);
}

// ============================================================================
// Profile
// ============================================================================

type NumericSummaryJson = Record<keyof NumericSummary, number | null>;

export interface ProfileJson {
    row_count: number;
    column_count: number;
    column_names: string[];
    column_types: Record<string, SemanticType>;
    has_temporal: boolean;
    has_categorical: boolean;
    has_numeric: boolean;
    has_network_structure: boolean;
    has_spatial: boolean;
    relationships: [string, string, RelationshipKind][];
    statistical_summary: {
        numeric_stats: Record<string, NumericSummaryJson>;
        categorical_stats: Record<string, { unique_values: number; most_common: string | null }>;
        missing_values: Record<string, number>;
    };
    suggested_visualizations: VisualizationType[];
    confidence_scores: Record<string, number>;
}

const finiteOrNull = (value: number): number | null => (Number.isFinite(value) ? value : null);

export function exportProfile(profile: DataProfile): ProfileJson {
    const { numeric, categorical, missingValues } = profile.statisticalSummary;

    const numericStats: Record<string, NumericSummaryJson> = {};
    for (const [name, stats] of Object.entries(numeric)) {
        numericStats[name] = {
            mean: finiteOrNull(stats.mean),
            std: finiteOrNull(stats.std),
            min: finiteOrNull(stats.min),
            max: finiteOrNull(stats.max),
            median: finiteOrNull(stats.median),
        };
    }

    const categoricalStats: ProfileJson['statistical_summary']['categorical_stats'] = {};
    for (const [name, stats] of Object.entries(categorical)) {
        categoricalStats[name] = { unique_values: stats.uniqueCount, most_common: stats.mostCommon };
    }

    const confidenceScores: Record<string, number> = {};
    for (const type of profile.suggestedVisualizations) {
        confidenceScores[type] = profile.confidenceScores[type] ?? 0;
    }

    return {
        row_count: profile.rowCount,
        column_count: profile.columnCount,
        column_names: [...profile.columnNames],
        column_types: { ...profile.columnTypes },
        has_temporal: profile.hasTemporal,
        has_categorical: profile.hasCategorical,
        has_numeric: profile.hasNumeric,
        has_network_structure: profile.hasNetworkStructure,
        has_spatial: profile.hasSpatial,
        relationships: profile.relationships.map(({ columnA, columnB, kind }) => [columnA, columnB, kind]),
        statistical_summary: {
            numeric_stats: numericStats,
            categorical_stats: categoricalStats,
            missing_values: { ...missingValues },
        },
        suggested_visualizations: [...profile.suggestedVisualizations],
        confidence_scores: confidenceScores,
    };
}
