/**
 * Tabular Insight - Text Formatting
 *
 * Plain-text renderings of profiles and reports for terminals and logs.
 */

import type { AnalyticsReport, DataProfile } from './types.js';

const RULE = '='.repeat(60);

/** Items listed per report section */
const SECTION_ITEMS = 3;

const MAX_RELATIONSHIPS = 5;
const MAX_SUGGESTIONS = 3;

const flag = (value: boolean) => (value ? 'yes' : 'no');

const percent = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;

function section(title: string, items: readonly string[], numbered: boolean, limit = items.length): string[] {
    if (items.length === 0) return [];

    return [
        '',
        `${title} (${items.length}):`,
        ...items.slice(0, limit).map((item, i) => (numbered ? `  ${i + 1}. ${item}` : `  - ${item}`)),
    ];
}

export function formatProfile(profile: DataProfile): string {
    const lines = [
        RULE,
        'DATA PROFILE',
        RULE,
        `Dimensions: ${profile.rowCount} rows x ${profile.columnCount} columns`,
        '',
        'Column Types:',
        ...profile.columnNames.map((name) => `  - ${name}: ${profile.columnTypes[name] ?? 'unknown'}`),
        '',
        'Data Characteristics:',
        `  - Temporal data: ${flag(profile.hasTemporal)}`,
        `  - Categorical data: ${flag(profile.hasCategorical)}`,
        `  - Numeric data: ${flag(profile.hasNumeric)}`,
        `  - Network structure: ${flag(profile.hasNetworkStructure)}`,
        `  - Spatial data: ${flag(profile.hasSpatial)}`,
    ];

    if (profile.relationships.length > 0) {
        lines.push('', 'Detected Relationships:');
        for (const { columnA, columnB, kind } of profile.relationships.slice(0, MAX_RELATIONSHIPS)) {
            lines.push(`  - ${columnA} <-> ${columnB}: ${kind}`);
        }
    }

    lines.push('', 'Recommended Visualizations:');
    profile.suggestedVisualizations.slice(0, MAX_SUGGESTIONS).forEach((type, i) => {
        const confidence = profile.confidenceScores[type] ?? 0;
        lines.push(`  ${i + 1}. ${type.toUpperCase()} (confidence: ${percent(confidence)})`);
    });
    lines.push(RULE);

    return lines.join('\n');
}

export function formatReport(report: AnalyticsReport): string {
    const summary = report.dataSummary;

    const lines = [
        RULE,
        `ANALYTICS REPORT: ${report.visualizationType.toUpperCase()}`,
        RULE,
        '',
        'Data Summary:',
        `  Records: ${summary.totalRecords}`,
        `  Columns: ${summary.totalColumns} (${summary.numericColumns} numeric, ` +
            `${summary.categoricalColumns} categorical)`,
    ];

    if (summary.missingPercentage > 0) {
        lines.push(`  Missing Values: ${summary.missingValues} (${summary.missingPercentage.toFixed(1)}%)`);
    }

    lines.push('', `Key Findings (${report.keyFindings.length}):`);
    report.keyFindings.forEach((finding, i) => lines.push(`  ${i + 1}. ${finding}`));

    lines.push(
        ...section('Patterns Detected', report.patterns, false, SECTION_ITEMS),
        ...section('Anomalies Found', report.anomalies, false, SECTION_ITEMS),
        ...section('Trends Identified', report.trends, false, SECTION_ITEMS),
        ...section('Recommendations', report.recommendations, true),
        '',
        'Summary:',
        `  ${report.naturalLanguageSummary}`,
        RULE
    );

    return lines.join('\n');
}
