/**
 * Tabular Insight - Constants & Keyword Sets
 *
 * Centralized thresholds and column-name keywords.
 *
 * Keyword matching is substring based and case-insensitive, so short keywords
 * ("to", "x") also match inside longer names ("customer", "index").
 */

import type { Severity, VisualizationType } from './types.js';

// ============================================================================
// Column-Name Keywords
// ============================================================================

export const TEMPORAL_KEYWORDS: readonly string[] = ['date', 'time', 'timestamp', 'year', 'month', 'day'];

export const SPATIAL_KEYWORDS: readonly string[] = ['x', 'y', 'z', 'lat', 'lon', 'latitude', 'longitude'];

export const NETWORK_KEYWORDS = {
    source: ['source', 'from', 'node1'],
    target: ['target', 'to', 'node2'],
    node: 'node',
    edge: 'edge',
} as const;

// ============================================================================
// Thresholds
// ============================================================================

export const THRESHOLDS = {
    /** |r| above which a correlation is strong */
    strongCorrelation: 0.7,
    /** |r| above which a correlation is moderate */
    moderateCorrelation: 0.4,
    /** |r| above which a trend is called strong rather than moderate */
    veryStrongCorrelation: 0.9,
    skewness: 1.0,
    highSkewness: 2.0,
    /** Coefficient of variation, in percent */
    coefficientOfVariation: 50,
    iqrMultiplier: 1.5,
    /** Outlier share, in percent */
    outlierPct: 5,
    highOutlierPct: 10,
    normalizedSlope: 0.3,
    varianceRatio: 0.3,
    minGroupSize: 3,
    minGroups: 2,
    histogramBins: 10,
    minPeaks: 2,
    hubDegreeFactor: 2,
    sparseDensity: 0.1,
    moderateDensity: 0.5,
    /** Insights above this confidence feed the recommendations */
    recommendationConfidence: 0.7,
    /** Insights above this confidence count as high-confidence in the summary */
    summaryConfidence: 0.8,
    largeDataset: 1000,
    /** Missing share, in percent */
    missingPct: 5,
} as const;

export const LIMITS = {
    /** Minimum non-missing values for distribution, outlier and trend checks */
    minSamples: 10,
    /** Numeric columns inspected by the pattern and trend modules */
    leadingNumericColumns: 3,
    /** Exclusive upper column index for pairwise trend partners */
    trendPartnerColumns: 4,
    /** Columns of each kind crossed by the relationship module */
    relationshipColumns: 2,
    maxRecommendations: 5,
    maxKeyFindings: 5,
    minRowsForSurface: 10,
    maxRowsForBar: 100,
    maxCategoricalForBar: 2,
    minNumericFor3d: 3,
} as const;

// ============================================================================
// Scoring
// ============================================================================

export const SEVERITY_WEIGHTS: Record<Severity, number> = {
    low: 1,
    medium: 2,
    high: 3,
};

export const FALLBACK_VISUALIZATION: VisualizationType = 'generic_scatter';

export const FALLBACK_CONFIDENCE = 0.5;

export const SCATTER_VISUALIZATIONS: ReadonlySet<VisualizationType> = new Set<VisualizationType>([
    '3d_scatter',
    'generic_scatter',
]);

// ============================================================================
// Memory Estimate (bytes per cell)
// ============================================================================

export const CELL_BYTES = {
    scalar: 8,
    stringOverhead: 49,
} as const;
