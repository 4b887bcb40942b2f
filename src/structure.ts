/**
 * Tabular Insight - Structural Patterns
 *
 * Dataset-level signals from column names and semantic types:
 * temporal content, graph edge lists, spatial coordinates.
 *
 * Names are matched by substring, so "from_address" reads as an edge
 * endpoint. Semantic roles such as "edge source" cannot be recovered from
 * declared types, which is why names are consulted at all.
 */

import type { ColumnTypes, StructuralSignals } from './types.js';
import { NETWORK_KEYWORDS, SPATIAL_KEYWORDS, TEMPORAL_KEYWORDS } from './constants.js';
import { anyNameContains, containsKeyword } from './utils.js';

export interface EdgeColumns {
    readonly source?: string;
    readonly target?: string;
}

export function detectTemporal(columnNames: readonly string[], columnTypes: ColumnTypes): boolean {
    if (columnNames.some((name) => columnTypes[name] === 'temporal')) {
        return true;
    }
    return anyNameContains(columnNames, TEMPORAL_KEYWORDS);
}

export function detectNetworkStructure(columnNames: readonly string[]): boolean {
    const hasSource = anyNameContains(columnNames, NETWORK_KEYWORDS.source);
    const hasTarget = anyNameContains(columnNames, NETWORK_KEYWORDS.target);
    if (hasSource && hasTarget) {
        return true;
    }

    const hasNode = anyNameContains(columnNames, [NETWORK_KEYWORDS.node]);
    const hasEdge = anyNameContains(columnNames, [NETWORK_KEYWORDS.edge]);
    return hasNode && hasEdge;
}

export function detectSpatial(columnNames: readonly string[]): boolean {
    return anyNameContains(columnNames, SPATIAL_KEYWORDS);
}

export function detectStructure(columnNames: readonly string[], columnTypes: ColumnTypes): StructuralSignals {
    return {
        hasTemporal: detectTemporal(columnNames, columnTypes),
        hasNetworkStructure: detectNetworkStructure(columnNames),
        hasSpatial: detectSpatial(columnNames),
    };
}

/**
 * Pick the edge-list endpoint columns.
 * A name matching a source keyword is never taken as the target;
 * later matches replace earlier ones.
 */
export function findEdgeColumns(columnNames: readonly string[]): EdgeColumns {
    let source: string | undefined;
    let target: string | undefined;

    for (const name of columnNames) {
        if (containsKeyword(name, NETWORK_KEYWORDS.source)) {
            source = name;
        } else if (containsKeyword(name, NETWORK_KEYWORDS.target)) {
            target = name;
        }
    }

    return {
        ...(source !== undefined && { source }),
        ...(target !== undefined && { target }),
    };
}
