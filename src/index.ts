/**
 * Tabular Insight
 *
 * Profile tabular data, pick a 3D visualization and explain what it shows.
 * Column types + Structure + Visualization + Insights.
 *
 * @example
 * ```typescript
 * import { generate } from 'tabular-insight';
 *
 * // Single table (array of records)
 * const result = generate([{...}, {...}]);
 *
 * // Multi-table input, one result per table
 * const batch = generate({
 *   edges: [{...}, {...}],
 *   readings: [{...}, {...}]
 * });
 *
 * // Steering the decision
 * const chosen = generate(data, { preference: '3d_surface', verbose: true });
 * ```
 */

import { detect } from './detect.js';
import { fromRecords, validateTable } from './table.js';
import { decideVisualization } from './profile.js';
import { analyze } from './analyze.js';
import type { PlainRecord } from './detect.js';
import type {
    AnalyticsReport,
    AnalyzeOptions,
    DecideOptions,
    Logger,
    VisualizationDecision,
} from './types.js';
import { InvalidInputError, resolveLogger } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions extends DecideOptions, AnalyzeOptions {}

/** Decision and report for one table */
export interface TableResult {
    decision: VisualizationDecision;
    report: AnalyticsReport;
}

/** Scalar properties that sat beside the table arrays in the input */
export type InputMetadata = Readonly<Record<string, unknown>>;

export interface SingleResult extends TableResult {
    type: 'single';
    metadata?: InputMetadata;
}

export type BatchEntry = ({ ok: true } & TableResult) | { ok: false; error: InvalidInputError };

/** Result for multi-table input, keyed by table name */
export interface BatchResult {
    type: 'batch';
    results: Record<string, BatchEntry>;
    metadata?: InputMetadata;
}

/** Union type for generate() return value */
export type GenerateResult = SingleResult | BatchResult;

// ============================================================================
// Single Table Processing
// ============================================================================

function processTable(
    records: readonly PlainRecord[],
    tableName: string,
    logger: Logger,
    options: GenerateOptions
): TableResult {
    const table = fromRecords(records);
    validateTable(table);
    logger.debug(`[${tableName}] ${table.columns.length} columns, ${records.length} rows`);

    const decision = decideVisualization(table, options);
    const report = analyze(table, decision.type, options);

    return { decision, report };
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Profile, decide and analyze JSON-like data.
 *
 * Input with a single table yields one result. Input with several tables
 * yields one entry per table; a table with invalid input becomes a failed
 * entry instead of aborting the batch.
 */
export function generate(data: unknown, options: GenerateOptions = {}): GenerateResult {
    const logger = resolveLogger(options);

    // 1. Detect input shape and normalize
    const { shape, tables, metadata } = detect(data);
    const entries = Object.entries(tables);

    logger.info(`Detected input shape: ${shape}`);
    logger.info(`Tables found: ${entries.map(([name]) => name).join(', ')}`);

    // 2. Single table path
    const [first] = entries;
    if (shape === 'single' && first) {
        const [tableName, records] = first;
        return {
            type: 'single',
            ...processTable(records, tableName, logger, options),
            ...(metadata && { metadata }),
        };
    }

    // 3. Multi-table path
    const results: Record<string, BatchEntry> = {};

    for (const [tableName, records] of entries) {
        logger.info(`Processing table "${tableName}" (${records.length} records)`);

        try {
            results[tableName] = { ok: true, ...processTable(records, tableName, logger, options) };
        } catch (error) {
            if (!(error instanceof InvalidInputError)) {
                throw error;
            }
            logger.warn(`[${tableName}] ${error.message}`);
            results[tableName] = { ok: false, error };
        }
    }

    return { type: 'batch', results, ...(metadata && { metadata }) };
}

/**
 * Type guard to check if result is a batch
 */
export function isBatchResult(result: GenerateResult): result is BatchResult {
    return result.type === 'batch';
}

/**
 * Type guard to check if result is single-table
 */
export function isSingleResult(result: GenerateResult): result is SingleResult {
    return result.type === 'single';
}

// ============================================================================
// Re-exports
// ============================================================================

export { profile, decideVisualization } from './profile.js';
export { analyze } from './analyze.js';
export { detect, ROOT_TABLE } from './detect.js';
export type { DetectedTables, InputShape, PlainRecord } from './detect.js';
export { fromColumns, fromRecords, toTable, validateTable, getColumn, isMissing } from './table.js';
export { classifyColumns } from './classify.js';
export { recommendVisualizations, resolveBindings, isVisualizationType, VISUALIZATION_TYPES } from './recommend.js';
export { exportProfile, exportReport, serializeReport } from './export.js';
export type { ProfileJson } from './export.js';
export { parseReportJson, ReportJsonSchema } from './validation.js';
export type { ReportJson, InsightJson, DataSummaryJson } from './validation.js';
export { formatProfile, formatReport } from './format.js';
export { consoleLogger, silentLogger, InvalidInputError, ReportValidationError } from './types.js';
export type * from './types.js';
