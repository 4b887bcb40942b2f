import { describe, it, expect } from 'vitest';
import {
    buildRecommendations,
    collectInsights,
    composeSummary,
    descriptionsOf,
    extractKeyFindings,
    summarizeData,
} from '../src/aggregate.js';
import { classifyColumns } from '../src/classify.js';
import { fromColumns } from '../src/table.js';
import type { DataSummary, GraphInsight, Table } from '../src/types.js';
import { edgeTable } from './fixtures.js';

const insight = (overrides: Partial<GraphInsight>): GraphInsight => ({
    category: 'statistical',
    title: 'Title',
    description: 'Description',
    confidence: 0.5,
    severity: 'low',
    dataPoints: {},
    ...overrides,
});

const summary = (overrides: Partial<DataSummary> = {}): DataSummary => ({
    totalRecords: 10,
    totalColumns: 2,
    numericColumns: 1,
    categoricalColumns: 1,
    missingValues: 0,
    missingPercentage: 0,
    memoryUsageMb: 0,
    ...overrides,
});

const plainTable: Table = fromColumns({ v: [1, 2, 3] });

describe('collectInsights', () => {
    it('runs network analysis only for network visualizations', () => {
        const table = edgeTable();
        const types = classifyColumns(table);

        expect(collectInsights(table, types, 'network').map((i) => i.title)).toEqual(['Moderate Network']);
        expect(collectInsights(table, types, 'generic_scatter')).toEqual([]);
    });
});

describe('descriptionsOf', () => {
    it('keeps descriptions of one category in order', () => {
        const insights = [
            insight({ category: 'pattern', description: 'first' }),
            insight({ category: 'trend', description: 'other' }),
            insight({ category: 'pattern', description: 'second' }),
        ];
        expect(descriptionsOf(insights, 'pattern')).toEqual(['first', 'second']);
    });
});

describe('summarizeData', () => {
    it('counts columns, missing cells and estimated memory', () => {
        const table = fromColumns({ a: [1, 2, null], b: ['ab', 'c', null] });

        expect(summarizeData(table, classifyColumns(table))).toEqual({
            totalRecords: 3,
            totalColumns: 2,
            numericColumns: 1,
            categoricalColumns: 1,
            missingValues: 2,
            missingPercentage: (2 / 6) * 100,
            memoryUsageMb: 149 / 1024 / 1024,
        });
    });
});

describe('buildRecommendations', () => {
    it('keeps recommendations of confident insights only', () => {
        const insights = [
            insight({ confidence: 0.9, recommendation: 'act' }),
            insight({ confidence: 0.7, recommendation: 'borderline' }),
            insight({ confidence: 0.95 }),
        ];
        expect(buildRecommendations(insights, plainTable, classifyColumns(plainTable), summary(), '3d_line')).toEqual(
            ['act']
        );
    });

    it('adds dataset notices and a color hint for scatter plots', () => {
        const table = fromColumns({ a: [1, 2, null], b: ['ab', 'c', null] });
        const types = classifyColumns(table);

        expect(buildRecommendations([], table, types, summarizeData(table, types), '3d_scatter')).toEqual([
            'Dataset has 33.3% missing values - consider imputation or filtering',
            'Use b for color encoding to reveal patterns',
        ]);
    });

    it('suggests sampling for large datasets', () => {
        const types = classifyColumns(plainTable);
        expect(buildRecommendations([], plainTable, types, summary({ totalRecords: 1001 }), 'network')).toEqual([
            'Consider aggregation or sampling for better performance with large datasets',
        ]);
    });

    it('caps the list at five', () => {
        const insights = Array.from({ length: 7 }, (_, i) =>
            insight({ confidence: 0.9, recommendation: `step ${i}` })
        );
        const result = buildRecommendations(insights, plainTable, classifyColumns(plainTable), summary(), '3d_bar');

        expect(result).toEqual(['step 0', 'step 1', 'step 2', 'step 3', 'step 4']);
    });
});

describe('extractKeyFindings', () => {
    it('ranks by confidence times severity, keeping order on ties', () => {
        const insights = [
            insight({ title: 'A', description: 'low', confidence: 0.9, severity: 'low' }),
            insight({ title: 'B', description: 'high', confidence: 0.5, severity: 'high' }),
            insight({ title: 'C', description: 'medium', confidence: 0.75, severity: 'medium' }),
        ];

        expect(extractKeyFindings(insights)).toEqual(['B: high', 'C: medium', 'A: low']);
    });

    it('returns at most five findings', () => {
        const insights = Array.from({ length: 8 }, (_, i) => insight({ title: `T${i}` }));
        expect(extractKeyFindings(insights)).toHaveLength(5);
    });
});

describe('composeSummary', () => {
    it('describes the dataset and counts insights by category', () => {
        const insights = [
            insight({ category: 'pattern', confidence: 1 }),
            insight({ category: 'anomaly', confidence: 0.9 }),
            insight({ category: 'trend', confidence: 0.5 }),
        ];

        expect(composeSummary(insights, '3d_scatter', summary())).toBe(
            'This scatter visualization represents a dataset with 10 records and 2 variables. ' +
            'Analysis identified 2 high-confidence insights. ' +
            'Detected 1 distinct patterns in the data structure. ' +
            'Found 1 anomalies that may require attention. ' +
            'Identified 1 significant trends or correlations.'
        );
    });

    it('omits sentences with zero counts', () => {
        expect(composeSummary([], 'generic_scatter', summary({ totalRecords: 4, totalColumns: 1 }))).toBe(
            'This generic scatter visualization represents a dataset with 4 records and 1 variables.'
        );
    });
});
