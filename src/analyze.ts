import type { AnalyticsReport, AnalyzeOptions, Table, VisualizationType } from './types.js';
import { resolveLogger } from './types.js';
import { classifyColumns } from './classify.js';
import { assertVisualizationType } from './recommend.js';
import { validateTable } from './table.js';
import {
    buildRecommendations,
    collectInsights,
    composeSummary,
    descriptionsOf,
    extractKeyFindings,
    summarizeData,
} from './aggregate.js';

export function analyze(
    table: Table,
    visualizationType: VisualizationType,
    options: AnalyzeOptions = {}
): AnalyticsReport {
    const { now = () => new Date() } = options;
    const logger = resolveLogger(options);

    validateTable(table);
    const vizType = assertVisualizationType(visualizationType);

    logger.info('Starting insight analysis...');

    // Step 1: Classify columns
    const columnTypes = classifyColumns(table);
    const dataSummary = summarizeData(table, columnTypes);
    logger.debug(
        `${dataSummary.totalRecords} records, ${dataSummary.numericColumns} numeric and ` +
        `${dataSummary.categoricalColumns} categorical columns`
    );

    // Step 2: Run insight modules
    const insights = collectInsights(table, columnTypes, vizType);
    logger.info(`Extracted ${insights.length} insights`);

    // Step 3: Derive views
    const report: AnalyticsReport = {
        timestamp: now().toISOString(),
        visualizationType: vizType,
        dataSummary,
        insights,
        patterns: descriptionsOf(insights, 'pattern'),
        anomalies: descriptionsOf(insights, 'anomaly'),
        trends: descriptionsOf(insights, 'trend'),
        recommendations: buildRecommendations(insights, table, columnTypes, dataSummary, vizType),
        naturalLanguageSummary: composeSummary(insights, vizType, dataSummary),
        keyFindings: extractKeyFindings(insights),
    };

    logger.info(
        `Report: ${report.patterns.length} patterns, ${report.anomalies.length} anomalies, ` +
        `${report.trends.length} trends, ${report.recommendations.length} recommendations`
    );
    logger.info('Insight analysis complete');

    return report;
}
