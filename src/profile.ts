/**
 * Tabular Insight - Profiling
 *
 * Composition root for column classification, structural detection,
 * relationship analysis and visualization recommendation.
 */

import type {
    DataProfile,
    DecideOptions,
    ProfileOptions,
    Table,
    VisualizationDecision,
    VisualizationType,
} from './types.js';
import { resolveLogger } from './types.js';
import { classifyColumns, columnsOfType } from './classify.js';
import { detectStructure } from './structure.js';
import { analyzeRelationships } from './relationships.js';
import { computeStatisticalSummary } from './stats.js';
import { chooseVisualization, recommendVisualizations, resolveBindings } from './recommend.js';
import { rowCount, validateTable } from './table.js';

export function profile(table: Table, options: ProfileOptions = {}): DataProfile {
    const logger = resolveLogger(options);
    validateTable(table);

    const rows = rowCount(table);
    const columnNames = table.columns.map((column) => column.name);
    logger.info(`Profiling dataset: ${rows} rows × ${columnNames.length} columns`);

    const columnTypes = classifyColumns(table);
    const numericCount = columnsOfType(table, columnTypes, 'numeric').length;
    const categoricalCount = columnsOfType(table, columnTypes, 'categorical').length;
    logger.debug(
        `Column types: ${columnNames.map((name) => `${name}=${columnTypes[name]}`).join(', ')}`
    );

    const signals = detectStructure(columnNames, columnTypes);
    const relationships = analyzeRelationships(table, columnTypes);
    logger.debug(`Detected ${relationships.length} column relationships`);

    const candidates = recommendVisualizations({
        ...signals,
        rowCount: rows,
        numericCount,
        categoricalCount,
        hasCategorical: categoricalCount > 0,
    });

    const confidenceScores: Partial<Record<VisualizationType, number>> = {};
    for (const candidate of candidates) {
        confidenceScores[candidate.type] = candidate.confidence;
    }

    logger.info(
        `Recommended: ${candidates.map((c) => `${c.type} (${(c.confidence * 100).toFixed(1)}%)`).join(', ')}`
    );

    return {
        rowCount: rows,
        columnCount: columnNames.length,
        columnNames,
        columnTypes,
        ...signals,
        hasCategorical: categoricalCount > 0,
        hasNumeric: numericCount > 0,
        relationships,
        statisticalSummary: computeStatisticalSummary(table, columnTypes),
        suggestedVisualizations: candidates.map((candidate) => candidate.type),
        confidenceScores,
    };
}

/**
 * Profile the table and settle on one visualization.
 * A preference is honoured only when the recommender lists it.
 */
export function decideVisualization(table: Table, options: DecideOptions = {}): VisualizationDecision {
    const logger = resolveLogger(options);
    const dataProfile = profile(table, options);

    const candidates = dataProfile.suggestedVisualizations.map((type) => ({
        type,
        confidence: dataProfile.confidenceScores[type] ?? 0,
    }));
    const { choice, preferred } = chooseVisualization(candidates, options.preference);

    if (options.preference !== undefined && !preferred) {
        logger.warn(`Preference ${options.preference} is not a candidate for this dataset, using ${choice.type}`);
    }
    logger.info(
        `${preferred ? 'Using preference' : 'Autonomous decision'}: ${choice.type} ` +
        `(confidence: ${(choice.confidence * 100).toFixed(1)}%)`
    );

    return {
        type: choice.type,
        confidence: choice.confidence,
        source: preferred ? 'preference' : 'autonomous',
        profile: dataProfile,
        params: resolveBindings(table, dataProfile.columnTypes, choice.type, options.bindings),
    };
}
