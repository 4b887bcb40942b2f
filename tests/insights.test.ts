import { describe, it, expect } from 'vitest';
import { extractStatisticalInsights } from '../src/insights/statistical.js';
import { detectPatterns } from '../src/insights/patterns.js';
import { detectAnomalies, iqrFence } from '../src/insights/anomalies.js';
import { detectTrends } from '../src/insights/trends.js';
import { detectRelationshipInsights, groupVarianceRatio } from '../src/insights/relationships.js';
import { classifyColumns } from '../src/classify.js';
import { fromColumns } from '../src/table.js';
import type { ColumnTypes, GraphInsight, Table } from '../src/types.js';
import { range } from './fixtures.js';

type Module = (table: Table, columnTypes: ColumnTypes) => GraphInsight[];

const run = (module: Module, table: Table) => module(table, classifyColumns(table));

const titles = (insights: readonly GraphInsight[]) => insights.map((insight) => insight.title);

describe('extractStatisticalInsights', () => {
    it('flags a skewed, highly variable column', () => {
        const table = fromColumns({ v: [1, 1, 1, 1, 1, 1, 1, 1, 1, 50] });
        const [skew, spread] = run(extractStatisticalInsights, table);

        expect(skew?.title).toBe('Skewed Distribution in v');
        expect(skew?.description).toBe('v shows right-skewed distribution (skewness: 3.16)');
        expect(skew?.severity).toBe('high');
        expect(skew?.confidence).toBe(1);

        expect(spread?.title).toBe('High Variability in v');
        expect(spread?.description).toBe('v has high variability (CV: 262.6%)');
        expect(spread?.confidence).toBe(0.9);
    });

    it('reports left skew', () => {
        const table = fromColumns({ v: [50, 50, 50, 50, 50, 50, 50, 50, 50, 1] });
        const [skew] = run(extractStatisticalInsights, table);

        expect(skew?.description).toBe('v shows left-skewed distribution (skewness: -3.16)');
    });

    it('stays quiet for symmetric, tight columns', () => {
        expect(run(extractStatisticalInsights, fromColumns({ v: range(10, 19) }))).toEqual([]);
    });

    it('skips the variation check for a zero mean', () => {
        expect(run(extractStatisticalInsights, fromColumns({ v: [-1, 1, -1, 1] }))).toEqual([]);
    });

    it('skips columns without values', () => {
        const table: Table = { columns: [{ name: 'v', dtype: 'number', values: [null, null] }] };
        expect(run(extractStatisticalInsights, table)).toEqual([]);
    });
});

describe('detectPatterns', () => {
    const bimodal = [0, 1.5, 1.5, 1.5, 1.5, 8.5, 8.5, 8.5, 8.5, 10];

    it('finds multimodal columns when two numeric columns exist', () => {
        const table = fromColumns({ a: bimodal, b: range(1, 10) });
        const insights = run(detectPatterns, table);

        expect(insights).toHaveLength(1);
        expect(insights[0]?.title).toBe('Multimodal Distribution in a');
        expect(insights[0]?.description).toBe('a shows 2 distinct clusters or groups');
        expect(insights[0]?.dataPoints).toEqual({ column: 'a', peaks: 2 });
    });

    it('needs at least two numeric columns', () => {
        expect(run(detectPatterns, fromColumns({ a: bimodal }))).toEqual([]);
    });

    it('reports time-based content', () => {
        const table = fromColumns({ timestamp: ['t1', 't2'], amount: [1, 2] });
        expect(titles(run(detectPatterns, table))).toEqual(['Temporal Data Detected']);
    });
});

describe('detectAnomalies', () => {
    it('flags a column with seeded outliers', () => {
        const values = [...range(0, 99).map((i) => i * 0.01), ...new Array<number>(10).fill(1000)];
        const [insight] = run(detectAnomalies, fromColumns({ v: values }));

        expect(insight?.title).toBe('Outliers Detected in v');
        expect(insight?.description).toBe('9.1% of v values are statistical outliers');
        expect(insight?.severity).toBe('medium');
        expect(insight?.dataPoints.outlier_count).toBe(10);
        expect(insight?.dataPoints.outlier_pct).toBeGreaterThanOrEqual(5);
    });

    it('ignores evenly spread and short columns', () => {
        expect(run(detectAnomalies, fromColumns({ v: range(1, 20) }))).toEqual([]);
        expect(run(detectAnomalies, fromColumns({ v: [1, 2, 3, 1000] }))).toEqual([]);
    });

    it('fences at 1.5 interquartile ranges', () => {
        expect(iqrFence([1, 2, 3, 4, 5])).toEqual({ lower: -1, upper: 7 });
    });
});

describe('detectTrends', () => {
    it('finds a strong positive trend for y = 2x + noise', () => {
        const x = range(1, 20);
        const y = x.map((value) => 2 * value + (value % 2 === 0 ? 0.1 : -0.1));
        const insights = run(detectTrends, fromColumns({ x, y }));

        expect(titles(insights)).toEqual([
            'Strong Positive Correlation',
            'Increasing Trend in x',
            'Increasing Trend in y',
        ]);

        const [correlation] = insights;
        expect(correlation?.confidence).toBeGreaterThanOrEqual(0.9);
        expect(correlation?.severity).toBe('high');
        expect(correlation?.dataPoints.col1).toBe('x');
        expect(correlation?.dataPoints.col2).toBe('y');
    });

    it('finds a negative trend', () => {
        const x = range(1, 10);
        const insights = run(detectTrends, fromColumns({ x, y: x.map((value) => 100 - 3 * value) }));

        expect(titles(insights)).toEqual([
            'Strong Negative Correlation',
            'Increasing Trend in x',
            'Decreasing Trend in y',
        ]);
        expect(insights[0]?.description).toBe('x and y show strong negative correlation (r=-1.000)');
    });

    it('fits the slope along row order', () => {
        const [trend] = run(detectTrends, fromColumns({ x: range(1, 12) }));

        expect(trend?.title).toBe('Increasing Trend in x');
        expect(trend?.dataPoints.slope).toBeCloseTo(1);
        expect(trend?.dataPoints.normalized_slope).toBeCloseTo(12 / 11);
        expect(trend?.confidence).toBe(1);
    });

    it('skips the slope when the index is not ordered', () => {
        const table = fromColumns({ x: range(1, 12) });
        const shuffled: Table = { ...table, index: range(1, 12).reverse() };

        expect(run(detectTrends, shuffled)).toEqual([]);
    });

    it('skips constant and short columns', () => {
        expect(run(detectTrends, fromColumns({ x: new Array<number>(12).fill(3) }))).toEqual([]);
        expect(run(detectTrends, fromColumns({ x: range(1, 5) }))).toEqual([]);
    });
});

describe('detectRelationshipInsights', () => {
    const group = ['a', 'a', 'a', 'b', 'b', 'b', 'c', 'c', 'c'];

    it('flags categories that separate a numeric column', () => {
        const table = fromColumns({ group, score: [1, 2, 3, 11, 12, 13, 21, 22, 23] });
        const [insight] = run(detectRelationshipInsights, table);

        expect(insight?.title).toBe('group Influences score');
        expect(insight?.confidence).toBe(1);
        expect(insight?.dataPoints.variance_ratio).toBeCloseTo(100 / 75.75);
    });

    it('ignores groups with the same mean', () => {
        const table = fromColumns({ group, score: [1, 2, 3, 1, 2, 3, 1, 2, 3] });
        expect(run(detectRelationshipInsights, table)).toEqual([]);
    });

    it('needs two groups of at least three members', () => {
        const table = fromColumns({ group: ['a', 'a', 'a', 'b', 'b'], score: [1, 2, 3, 10, 11] });
        const [cat, num] = table.columns;

        expect(cat && num && groupVarianceRatio(cat, num)).toBeNull();
    });
});
