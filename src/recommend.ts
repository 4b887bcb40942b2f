/**
 * Tabular Insight - Visualization Recommendation
 *
 * A rule table maps dataset signals to (type, confidence) candidates.
 * Every rule is evaluated; all that fire are ranked by confidence,
 * ties keeping table order. When nothing fires a single fallback is returned.
 */

import type {
    ColumnTypes,
    StructuralSignals,
    Table,
    VisualizationCandidate,
    VisualizationParams,
    VisualizationType,
} from './types.js';
import { InvalidInputError } from './types.js';
import { FALLBACK_CONFIDENCE, FALLBACK_VISUALIZATION, LIMITS } from './constants.js';
import { columnsOfType } from './classify.js';
import { findEdgeColumns } from './structure.js';
import { getColumn } from './table.js';

// ============================================================================
// Types
// ============================================================================

export interface RecommendationSignals extends StructuralSignals {
    readonly rowCount: number;
    readonly numericCount: number;
    readonly categoricalCount: number;
    readonly hasCategorical: boolean;
}

interface VisualizationRule {
    type: VisualizationType;
    applies: (signals: RecommendationSignals) => boolean;
    confidence: (signals: RecommendationSignals) => number;
}

// ============================================================================
// Rules
// ============================================================================

const VISUALIZATION_RULES: readonly VisualizationRule[] = [
    {
        type: 'network',
        applies: (s) => s.hasNetworkStructure,
        confidence: () => 0.95,
    },
    {
        type: '3d_scatter',
        applies: (s) => s.numericCount >= LIMITS.minNumericFor3d,
        confidence: (s) => Math.min(0.9, 0.6 + 0.1 * s.numericCount),
    },
    {
        type: '3d_surface',
        applies: (s) => s.numericCount === LIMITS.minNumericFor3d && s.rowCount >= LIMITS.minRowsForSurface,
        confidence: () => 0.75,
    },
    {
        type: '3d_line',
        applies: (s) => s.hasTemporal && s.numericCount >= 2,
        confidence: () => 0.8,
    },
    {
        type: '3d_bar',
        applies: (s) =>
            s.hasCategorical &&
            s.numericCount >= 1 &&
            s.categoricalCount <= LIMITS.maxCategoricalForBar &&
            s.rowCount <= LIMITS.maxRowsForBar,
        confidence: () => 0.7,
    },
    {
        type: '3d_mesh',
        applies: (s) => s.hasSpatial && s.numericCount >= LIMITS.minNumericFor3d,
        confidence: () => 0.85,
    },
];

export const VISUALIZATION_TYPES: readonly VisualizationType[] = [
    ...VISUALIZATION_RULES.map((rule) => rule.type),
    FALLBACK_VISUALIZATION,
];

export function isVisualizationType(value: unknown): value is VisualizationType {
    return VISUALIZATION_TYPES.some((type) => type === value);
}

export function assertVisualizationType(value: string): VisualizationType {
    if (!isVisualizationType(value)) {
        throw new InvalidInputError('unknown_visualization', value);
    }
    return value;
}

// ============================================================================
// Ranking
// ============================================================================

export function recommendVisualizations(signals: RecommendationSignals): VisualizationCandidate[] {
    const candidates = VISUALIZATION_RULES
        .filter((rule) => rule.applies(signals))
        .map((rule) => ({ type: rule.type, confidence: rule.confidence(signals) }));

    if (candidates.length === 0) {
        return [{ type: FALLBACK_VISUALIZATION, confidence: FALLBACK_CONFIDENCE }];
    }

    // Array.prototype.sort is stable, so equal scores keep rule order
    return candidates.sort((a, b) => b.confidence - a.confidence);
}

/**
 * The top candidate, or the preferred type when the candidates list it.
 * `preferred` is false whenever the top candidate was used.
 */
export function chooseVisualization(
    candidates: readonly VisualizationCandidate[],
    preference?: VisualizationType
): { choice: VisualizationCandidate; preferred: boolean } {
    const preferred = preference === undefined
        ? undefined
        : candidates.find((candidate) => candidate.type === preference);

    if (preferred) {
        return { choice: preferred, preferred: true };
    }

    const [top] = candidates;
    return {
        choice: top ?? { type: FALLBACK_VISUALIZATION, confidence: FALLBACK_CONFIDENCE },
        preferred: false,
    };
}

// ============================================================================
// Column Bindings
// ============================================================================

function pick(names: readonly (string | undefined)[]): string | undefined {
    return names.find((name): name is string => name !== undefined);
}

/**
 * Default column bindings for a visualization type, with overrides applied.
 * Prefers typed columns and falls back to table order.
 */
export function resolveBindings(
    table: Table,
    columnTypes: ColumnTypes,
    type: VisualizationType,
    overrides: VisualizationParams = {}
): VisualizationParams {
    for (const name of Object.values(overrides)) {
        if (name !== undefined) getColumn(table, name);
    }

    const all = table.columns.map((column) => column.name);
    const numeric = columnsOfType(table, columnTypes, 'numeric').map((column) => column.name);
    const categorical = columnsOfType(table, columnTypes, 'categorical').map((column) => column.name);

    let defaults: VisualizationParams;

    switch (type) {
        case 'network': {
            const edges = findEdgeColumns(all);
            const source = pick([edges.source, all[0]]);
            defaults = {
                source,
                target: pick([edges.target, ...all.filter((name) => name !== source)]),
            };
            break;
        }
        case '3d_bar':
            defaults = {
                x: pick([categorical[0], all[0]]),
                y: pick([categorical[1], numeric[0], all[1]]),
                z: pick([numeric[0], all[2]]),
            };
            break;
        default:
            defaults = {
                x: pick([numeric[0], all[0]]),
                y: pick([numeric[1], all[1]]),
                z: pick([numeric[2], all[2]]),
            };
            break;
    }

    const merged: Record<string, string> = {};
    for (const [key, value] of Object.entries({ ...defaults, ...overrides })) {
        if (value !== undefined) merged[key] = value;
    }
    return merged;
}
