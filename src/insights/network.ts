/**
 * Edge-list analytics: graph density and hub nodes.
 */

import type { CellValue, Column, GraphInsight, Table } from '../types.js';
import { THRESHOLDS } from '../constants.js';
import { findEdgeColumns } from '../structure.js';
import { getColumn, isMissing, rowCount } from '../table.js';
import { toTitleCase } from '../utils.js';

export type DensityLevel = 'sparse' | 'moderate' | 'dense';

export function densityLevel(density: number): DensityLevel {
    if (density < THRESHOLDS.sparseDensity) return 'sparse';
    if (density < THRESHOLDS.moderateDensity) return 'moderate';
    return 'dense';
}

function nodeKey(value: CellValue): string {
    return value instanceof Date ? value.toISOString() : String(value);
}

/** Combined in + out degree per node, in order of first appearance */
export function nodeDegrees(source: Column, target: Column): Map<string, number> {
    const degrees = new Map<string, number>();
    const rows = Math.max(source.values.length, target.values.length);

    for (let row = 0; row < rows; row++) {
        for (const value of [source.values[row], target.values[row]]) {
            if (value === undefined || isMissing(value)) continue;
            const key = nodeKey(value);
            degrees.set(key, (degrees.get(key) ?? 0) + 1);
        }
    }

    return degrees;
}

export function detectNetworkInsights(table: Table): GraphInsight[] {
    const edges = findEdgeColumns(table.columns.map((column) => column.name));
    if (edges.source === undefined || edges.target === undefined) return [];

    const source = getColumn(table, edges.source);
    const target = getColumn(table, edges.target);
    const degrees = nodeDegrees(source, target);
    const nodes = degrees.size;
    const edgeCount = rowCount(table);
    const insights: GraphInsight[] = [];

    if (nodes > 1) {
        const density = edgeCount / (nodes * (nodes - 1));
        const level = densityLevel(density);
        insights.push({
            category: 'pattern',
            title: `${toTitleCase(level)} Network`,
            description: `Network has ${nodes} nodes and ${edgeCount} edges (density: ${density.toFixed(3)})`,
            confidence: 1,
            severity: 'low',
            dataPoints: { nodes, edges: edgeCount, density },
            recommendation: `Network is ${level}, consider hub analysis`,
        });
    }

    if (nodes > 0) {
        const meanDegree = [...degrees.values()].reduce((sum, degree) => sum + degree, 0) / nodes;
        const hubs = [...degrees.entries()].filter(
            ([, degree]) => degree > meanDegree * THRESHOLDS.hubDegreeFactor
        );

        // Highest degree first; equal degrees by node label
        const [topHub] = [...hubs].sort(([nameA, a], [nameB, b]) => {
            if (a !== b) return b - a;
            return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
        });
        if (topHub) {
            const [hubName, hubDegree] = topHub;
            insights.push({
                category: 'pattern',
                title: 'Network Hubs Detected',
                description: `${hubs.length} hub nodes identified, top hub: ${hubName} (${hubDegree} connections)`,
                confidence: 0.95,
                severity: 'high',
                dataPoints: { hub_count: hubs.length, top_hub: hubName, top_connections: hubDegree },
                recommendation: 'Focus on hub nodes for network influence analysis',
            });
        }
    }

    return insights;
}
