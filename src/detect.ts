/**
 * Tabular Insight - Input Detection
 *
 * Normalizes JSON-like input into named tables of plain records.
 *
 * @example
 * detect([{ a: 1 }, { a: 2 }])            // one table "root"
 * detect([[1, 2], [3, 4]])                // root rows { "[0]": 1, "[1]": 2 }
 * detect([3, 1, 4])                       // root rows { value: 3 }
 * detect({ edges: [...], nodes: [...] })  // two tables, scalar props as metadata
 */

import _ from 'lodash';
import { InvalidInputError } from './types.js';

export type PlainRecord = Record<string, unknown>;

/** `single` input yields one table; `multi-table` input yields one table per array property */
export type InputShape = 'single' | 'multi-table';

export interface DetectedTables {
    readonly shape: InputShape;
    readonly tables: Readonly<Record<string, readonly PlainRecord[]>>;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

export const ROOT_TABLE = 'root';

function isPlainRecord(value: unknown): value is PlainRecord {
    return _.isPlainObject(value);
}

function isRowArray(value: unknown): value is unknown[] {
    return Array.isArray(value);
}

function primitivesToRows(array: readonly unknown[]): PlainRecord[] {
    return array.map((value) => ({ value }));
}

function nestedArraysToRows(array: readonly unknown[][]): PlainRecord[] {
    return array.map((row) =>
        row.reduce<PlainRecord>((record, value, position) => {
            record[`[${position}]`] = value;
            return record;
        }, {})
    );
}

/**
 * Convert an array to rows, or null when its items mix objects with other shapes.
 */
function arrayToRows(array: readonly unknown[]): PlainRecord[] | null {
    if (array.every(isPlainRecord)) {
        return array.filter(isPlainRecord);
    }

    if (array.every(isRowArray)) {
        return nestedArraysToRows(array.filter(isRowArray));
    }

    if (array.every((value) => !_.isObject(value) || _.isDate(value))) {
        return primitivesToRows(array);
    }

    return null;
}

function detectFromArray(input: readonly unknown[]): DetectedTables {
    if (input.length === 0) {
        throw new InvalidInputError('empty');
    }

    const rows = arrayToRows(input) ?? input.filter(isPlainRecord);
    if (rows.length === 0) {
        throw new InvalidInputError('empty');
    }

    return { shape: 'single', tables: { [ROOT_TABLE]: rows } };
}

function detectFromObject(input: PlainRecord): DetectedTables {
    if (_.isEmpty(input)) {
        throw new InvalidInputError('empty');
    }

    const [arrayProps, scalarProps] = _.partition(
        Object.entries(input),
        ([, value]) => Array.isArray(value) && value.length > 0
    );

    if (arrayProps.length === 0) {
        return { shape: 'single', tables: { [ROOT_TABLE]: [input] } };
    }

    const tables: Record<string, PlainRecord[]> = {};

    for (const [key, value] of arrayProps) {
        const rows = Array.isArray(value) ? arrayToRows(value) : null;
        if (rows !== null) {
            tables[key] = rows;
        }
    }

    if (_.isEmpty(tables)) {
        throw new InvalidInputError('empty');
    }

    const metadata = Object.fromEntries(scalarProps);

    return {
        shape: Object.keys(tables).length > 1 ? 'multi-table' : 'single',
        tables,
        ...(!_.isEmpty(metadata) && { metadata }),
    };
}

export function detect(input: unknown): DetectedTables {
    if (Array.isArray(input)) {
        return detectFromArray(input);
    }

    if (isPlainRecord(input)) {
        return detectFromObject(input);
    }

    throw new InvalidInputError('primitive');
}
