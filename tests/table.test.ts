import { describe, it, expect } from 'vitest';
import { detect } from '../src/detect.js';
import {
    fromColumns,
    fromRecords,
    getColumn,
    inferDtype,
    isIndexMonotonic,
    isMissing,
    numericValues,
    rowCount,
    toTable,
    validateTable,
} from '../src/table.js';
import { invalidReason } from './fixtures.js';

describe('detect', () => {
    it('treats an array of records as one root table', () => {
        expect(detect([{ a: 1 }, { a: 2 }])).toEqual({
            shape: 'single',
            tables: { root: [{ a: 1 }, { a: 2 }] },
        });
    });

    it('turns nested arrays into positional columns', () => {
        expect(detect([[1, 2], [3, 4]]).tables.root).toEqual([
            { '[0]': 1, '[1]': 2 },
            { '[0]': 3, '[1]': 4 },
        ]);
    });

    it('wraps primitives in a value column', () => {
        expect(detect([3, 1]).tables.root).toEqual([{ value: 3 }, { value: 1 }]);
    });

    it('keeps only the records of a mixed array', () => {
        expect(detect([{ a: 1 }, 5, { a: 2 }]).tables.root).toEqual([{ a: 1 }, { a: 2 }]);
    });

    it('splits an object of arrays into tables and metadata', () => {
        const result = detect({ edges: [{ s: 1 }], nodes: [{ id: 1 }], name: 'graph' });

        expect(result.shape).toBe('multi-table');
        expect(Object.keys(result.tables)).toEqual(['edges', 'nodes']);
        expect(result.metadata).toEqual({ name: 'graph' });
    });

    it('reports a single array property as a single table', () => {
        const result = detect({ rows: [{ a: 1 }], version: 2 });

        expect(result.shape).toBe('single');
        expect(result.tables).toEqual({ rows: [{ a: 1 }] });
        expect(result.metadata).toEqual({ version: 2 });
    });

    it('reads an object without arrays as one row', () => {
        expect(detect({ a: 1, b: 'x' }).tables).toEqual({ root: [{ a: 1, b: 'x' }] });
    });

    it('rejects primitives and empty input', () => {
        expect(invalidReason(() => detect(42))).toBe('primitive');
        expect(invalidReason(() => detect(null))).toBe('primitive');
        expect(invalidReason(() => detect([]))).toBe('empty');
        expect(invalidReason(() => detect({}))).toBe('empty');
    });
});

describe('inferDtype', () => {
    it('reads numbers, booleans and strings', () => {
        expect(inferDtype([1, 2.5, null])).toBe('number');
        expect(inferDtype([true, false])).toBe('boolean');
        expect(inferDtype(['a', 'b'])).toBe('string');
    });

    it('promotes date strings and Date instances to date', () => {
        expect(inferDtype(['2024-01-01T00:00:00Z', '2024-02-01T10:30:00Z'])).toBe('date');
        expect(inferDtype([new Date(0), null])).toBe('date');
    });

    it('keeps time-only and week strings as text', () => {
        expect(inferDtype(['12:30:00', '13:45:10'])).toBe('string');
        expect(inferDtype(['2024-W03', '2024-W04'])).toBe('string');
    });

    it('falls back to string for mixed primitives', () => {
        expect(inferDtype([1, 'a'])).toBe('string');
        expect(inferDtype([new Date(0), 'a'])).toBe('string');
    });

    it('marks nested and empty columns unknown', () => {
        expect(inferDtype([{ a: 1 }])).toBe('unknown');
        expect(inferDtype([null, undefined])).toBe('unknown');
        expect(inferDtype([])).toBe('unknown');
    });
});

describe('fromRecords', () => {
    it('orders columns by first appearance and fills absent keys', () => {
        const table = fromRecords([{ a: 1, b: 'x' }, { a: 2, c: true }]);

        expect(table.columns).toEqual([
            { name: 'a', dtype: 'number', values: [1, 2] },
            { name: 'b', dtype: 'string', values: ['x', null] },
            { name: 'c', dtype: 'boolean', values: [null, true] },
        ]);
    });

    it('parses date strings into Date cells', () => {
        const [column] = fromRecords([{ when: '2024-01-01T00:00:00Z' }]).columns;

        expect(column?.dtype).toBe('date');
        expect(column?.values[0]).toEqual(new Date('2024-01-01T00:00:00Z'));
    });

    it('keeps time-of-day values instead of dropping them', () => {
        const table = fromRecords([
            { t: '12:30:00', v: 1 },
            { t: '13:45:10', v: 2 },
        ]);

        expect(getColumn(table, 't')).toEqual({ name: 't', dtype: 'string', values: ['12:30:00', '13:45:10'] });
    });

    it('stores nested values as JSON text', () => {
        const [column] = fromRecords([{ meta: { k: 1 } }]).columns;

        expect(column?.dtype).toBe('unknown');
        expect(column?.values).toEqual(['{"k":1}']);
    });

    it('rejects records without keys', () => {
        expect(invalidReason(() => fromRecords([{}, {}]))).toBe('no_columns');
    });
});

describe('toTable', () => {
    it('builds a validated table from any single-table input', () => {
        const table = toTable([{ v: 1 }, { v: 2 }, { v: 3 }]);

        expect(rowCount(table)).toBe(3);
        expect(getColumn(table, 'v').values).toEqual([1, 2, 3]);
    });
});

describe('table contract', () => {
    it('rejects tables without columns', () => {
        expect(invalidReason(() => validateTable({ columns: [] }))).toBe('no_columns');
    });

    it('rejects duplicate column names', () => {
        const table = {
            columns: [
                { name: 'a', dtype: 'number' as const, values: [1] },
                { name: 'a', dtype: 'number' as const, values: [2] },
            ],
        };
        expect(invalidReason(() => validateTable(table))).toBe('duplicate_column');
    });

    it('rejects columns of different lengths', () => {
        const table = {
            columns: [
                { name: 'a', dtype: 'number' as const, values: [1, 2] },
                { name: 'b', dtype: 'number' as const, values: [1] },
            ],
        };
        expect(invalidReason(() => validateTable(table))).toBe('ragged');
    });

    it('rejects an index of the wrong length', () => {
        const table = { columns: [{ name: 'a', dtype: 'number' as const, values: [1, 2] }], index: [0] };
        expect(invalidReason(() => validateTable(table))).toBe('ragged');
    });

    it('rejects unknown column names', () => {
        expect(invalidReason(() => getColumn(fromColumns({ a: [1] }), 'b'))).toBe('unknown_column');
    });
});

describe('missing values', () => {
    it('treats null, NaN and invalid dates as missing', () => {
        expect(isMissing(null)).toBe(true);
        expect(isMissing(NaN)).toBe(true);
        expect(isMissing(new Date('not a date'))).toBe(true);
        expect(isMissing(0)).toBe(false);
        expect(isMissing('')).toBe(false);
    });

    it('keeps only finite numbers', () => {
        const column = { name: 'v', dtype: 'number' as const, values: [1, null, NaN, Infinity, 2] };
        expect(numericValues(column)).toEqual([1, 2]);
    });
});

describe('isIndexMonotonic', () => {
    const column = { name: 'v', dtype: 'number' as const, values: [1, 2, 3, 4] };

    it('accepts row order and non-decreasing keys', () => {
        expect(isIndexMonotonic({ columns: [column] })).toBe(true);
        expect(isIndexMonotonic({ columns: [column], index: [1, 2, 2, 3] })).toBe(true);
        expect(isIndexMonotonic({ columns: [column], index: ['a', 'b', 'c', 'd'] })).toBe(true);
    });

    it('rejects decreasing and mixed keys', () => {
        expect(isIndexMonotonic({ columns: [column], index: [4, 3, 2, 1] })).toBe(false);
        expect(isIndexMonotonic({ columns: [column], index: [1, 'b', 3, 4] })).toBe(false);
    });

    it('rejects NaN keys', () => {
        expect(isIndexMonotonic({ columns: [column], index: [3, NaN, 1, 2] })).toBe(false);
        expect(isIndexMonotonic({ columns: [column], index: [1, 2, 3, NaN] })).toBe(false);
    });
});
