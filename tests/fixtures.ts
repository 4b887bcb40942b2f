import { vi } from 'vitest';
import { fromColumns } from '../src/table.js';
import { InvalidInputError } from '../src/types.js';
import type { Logger, Table } from '../src/types.js';

/** Directed edge list over 7 nodes (A-G) with 10 edges */
export const EDGE_RECORDS = [
    { source: 'A', target: 'B' },
    { source: 'A', target: 'C' },
    { source: 'A', target: 'D' },
    { source: 'B', target: 'C' },
    { source: 'C', target: 'D' },
    { source: 'D', target: 'E' },
    { source: 'E', target: 'F' },
    { source: 'F', target: 'G' },
    { source: 'G', target: 'A' },
    { source: 'B', target: 'E' },
];

export const edgeTable = (): Table =>
    fromColumns({
        source: EDGE_RECORDS.map((edge) => edge.source),
        target: EDGE_RECORDS.map((edge) => edge.target),
    });

/** Three numeric columns, 15 distinct rows */
export const xyzTable = (): Table =>
    fromColumns({
        x: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15],
        y: [7, 3, 12, 1, 15, 9, 4, 11, 6, 14, 2, 13, 8, 10, 5],
        z: [20, 35, 11, 42, 27, 16, 38, 23, 31, 14, 45, 19, 29, 33, 25],
    });

export const range = (from: number, to: number): number[] =>
    Array.from({ length: to - from + 1 }, (_, i) => from + i);

export function mockLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    } satisfies Logger;
}

/** Reason of the InvalidInputError thrown by fn, or undefined when nothing is thrown */
export function invalidReason(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof InvalidInputError) return error.reason;
        throw error;
    }
    return undefined;
}
