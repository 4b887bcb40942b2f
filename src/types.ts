/**
 * Tabular Insight - Type Definitions
 *
 * Tables, profiles, insights and reports.
 * Every value produced by the engine is created in a single call and never mutated.
 */

// ============================================================================
// Table
// ============================================================================

export type CellValue = number | string | boolean | Date | null;

/** Declared (storage) type of a column, as reported by whoever built the table */
export type ColumnDtype = 'number' | 'date' | 'string' | 'boolean' | 'unknown';

export interface Column {
    readonly name: string;
    readonly dtype: ColumnDtype;
    readonly values: readonly CellValue[];
}

export interface Table {
    readonly columns: readonly Column[];
    /** Ordering key, one entry per row. Row position is used when absent. */
    readonly index?: readonly (number | string)[];
}

// ============================================================================
// Profile
// ============================================================================

export type SemanticType = 'numeric' | 'temporal' | 'categorical' | 'unknown';

export type ColumnTypes = Readonly<Record<string, SemanticType>>;

export type RelationshipKind =
    | 'strong_correlation'
    | 'strong_negative_correlation'
    | 'moderate_correlation'
    | 'moderate_negative_correlation';

export interface ColumnRelationship {
    readonly columnA: string;
    readonly columnB: string;
    readonly kind: RelationshipKind;
}

export interface NumericSummary {
    readonly mean: number;
    readonly std: number;
    readonly min: number;
    readonly max: number;
    readonly median: number;
}

export interface CategoricalSummary {
    readonly uniqueCount: number;
    readonly mostCommon: string | null;
}

export interface StatisticalSummary {
    readonly numeric: Readonly<Record<string, NumericSummary>>;
    readonly categorical: Readonly<Record<string, CategoricalSummary>>;
    readonly missingValues: Readonly<Record<string, number>>;
}

export type VisualizationType =
    | 'network'
    | '3d_scatter'
    | '3d_surface'
    | '3d_line'
    | '3d_bar'
    | '3d_mesh'
    | 'generic_scatter';

export interface VisualizationCandidate {
    readonly type: VisualizationType;
    readonly confidence: number;
}

export interface StructuralSignals {
    readonly hasTemporal: boolean;
    readonly hasNetworkStructure: boolean;
    readonly hasSpatial: boolean;
}

export interface DataProfile extends StructuralSignals {
    readonly rowCount: number;
    readonly columnCount: number;
    readonly columnNames: readonly string[];
    readonly columnTypes: ColumnTypes;
    readonly hasCategorical: boolean;
    readonly hasNumeric: boolean;
    readonly relationships: readonly ColumnRelationship[];
    readonly statisticalSummary: StatisticalSummary;
    readonly suggestedVisualizations: readonly VisualizationType[];
    readonly confidenceScores: Readonly<Partial<Record<VisualizationType, number>>>;
}

/** Column bindings handed to the rendering layer */
export interface VisualizationParams {
    readonly x?: string;
    readonly y?: string;
    readonly z?: string;
    readonly color?: string;
    readonly size?: string;
    readonly source?: string;
    readonly target?: string;
    readonly weight?: string;
}

export interface VisualizationDecision {
    readonly type: VisualizationType;
    readonly confidence: number;
    readonly source: 'autonomous' | 'preference';
    readonly profile: DataProfile;
    readonly params: VisualizationParams;
}

// ============================================================================
// Insights
// ============================================================================

export type InsightCategory = 'statistical' | 'pattern' | 'anomaly' | 'trend' | 'relationship';

export type Severity = 'low' | 'medium' | 'high';

export type DataPointValue = number | string | boolean | readonly number[];

export interface GraphInsight {
    readonly category: InsightCategory;
    readonly title: string;
    readonly description: string;
    readonly confidence: number;
    readonly severity: Severity;
    readonly dataPoints: Readonly<Record<string, DataPointValue>>;
    readonly recommendation?: string;
}

export interface DataSummary {
    readonly totalRecords: number;
    readonly totalColumns: number;
    readonly numericColumns: number;
    readonly categoricalColumns: number;
    readonly missingValues: number;
    readonly missingPercentage: number;
    readonly memoryUsageMb: number;
}

export interface AnalyticsReport {
    readonly timestamp: string;
    readonly visualizationType: VisualizationType;
    readonly dataSummary: DataSummary;
    readonly insights: readonly GraphInsight[];
    readonly patterns: readonly string[];
    readonly anomalies: readonly string[];
    readonly trends: readonly string[];
    readonly recommendations: readonly string[];
    readonly naturalLanguageSummary: string;
    readonly keyFindings: readonly string[];
}

// ============================================================================
// Options
// ============================================================================

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface ProfileOptions {
    /** Receives progress messages; overrides `verbose` */
    logger?: Logger;
    /** Log progress to console */
    verbose?: boolean;
}

export interface DecideOptions extends ProfileOptions {
    /** Visualization to use when the recommender lists it */
    preference?: VisualizationType;
    /** Explicit column bindings, merged over the automatic ones */
    bindings?: VisualizationParams;
}

export interface AnalyzeOptions extends ProfileOptions {
    /** Clock used for the report timestamp */
    now?: () => Date;
}

// ============================================================================
// Logging
// ============================================================================

export const consoleLogger: Logger = {
    debug: (message) => console.debug(`tabular-insight: ${message}`),
    info: (message) => console.log(`tabular-insight: ${message}`),
    warn: (message) => console.warn(`tabular-insight: ${message}`),
    error: (message) => console.error(`tabular-insight: ${message}`),
};

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

export function resolveLogger(options: ProfileOptions = {}): Logger {
    return options.logger ?? (options.verbose ? consoleLogger : silentLogger);
}

// ============================================================================
// Errors
// ============================================================================

export type InvalidInputReason =
    | 'primitive'
    | 'empty'
    | 'no_columns'
    | 'ragged'
    | 'duplicate_column'
    | 'unknown_column'
    | 'unknown_visualization';

const INVALID_INPUT_MESSAGES: Record<InvalidInputReason, string> = {
    primitive: 'Invalid input: expected an array or object',
    empty: 'Invalid input: no rows found',
    no_columns: 'Invalid input: table has no columns',
    ragged: 'Invalid input: columns have different lengths',
    duplicate_column: 'Invalid input: duplicate column name',
    unknown_column: 'Invalid input: column does not exist',
    unknown_visualization: 'Invalid input: unknown visualization type',
};

export class InvalidInputError extends Error {
    public readonly name = 'InvalidInputError' as const;

    constructor(
        public readonly reason: InvalidInputReason,
        public readonly detail?: string
    ) {
        super(detail ? `${INVALID_INPUT_MESSAGES[reason]} (${detail})` : INVALID_INPUT_MESSAGES[reason]);
    }
}

export class ReportValidationError extends Error {
    public readonly name = 'ReportValidationError' as const;

    constructor(
        message: string,
        public readonly raw: string,
        public readonly errors: readonly string[]
    ) {
        super(message);
    }
}
