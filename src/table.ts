/**
 * Tabular Insight - Tables
 *
 * Builds typed columns from plain records and enforces the table contract:
 * at least one column, unique names, equal lengths.
 */

import _ from 'lodash';
import { createCompoundSchema } from 'genson-js';
import { inferType } from '@jsonhero/json-infer-types';
import type { CellValue, Column, ColumnDtype, Table } from './types.js';
import { InvalidInputError } from './types.js';
import { detect, type PlainRecord } from './detect.js';

// ============================================================================
// Types
// ============================================================================

interface GensonSchema {
    type?: string | string[];
}

// ============================================================================
// Missing Values
// ============================================================================

export function isMissing(value: CellValue | undefined): value is null | undefined {
    if (value === null || value === undefined) return true;
    if (typeof value === 'number') return Number.isNaN(value);
    if (value instanceof Date) return Number.isNaN(value.getTime());
    return false;
}

export function presentValues(column: Column): CellValue[] {
    return column.values.filter((value) => !isMissing(value));
}

/** Finite numbers of a column, missing and non-numeric cells dropped */
export function numericValues(column: Column): number[] {
    return column.values.filter((value): value is number =>
        typeof value === 'number' && Number.isFinite(value)
    );
}

export function countMissing(column: Column): number {
    return column.values.length - presentValues(column).length;
}

// ============================================================================
// Table Contract
// ============================================================================

export function rowCount(table: Table): number {
    return table.columns[0]?.values.length ?? 0;
}

export function validateTable(table: Table): void {
    if (table.columns.length === 0) {
        throw new InvalidInputError('no_columns');
    }

    const seen = new Set<string>();
    for (const column of table.columns) {
        if (seen.has(column.name)) {
            throw new InvalidInputError('duplicate_column', column.name);
        }
        seen.add(column.name);
    }

    const rows = rowCount(table);
    const ragged = table.columns.find((column) => column.values.length !== rows);
    if (ragged) {
        throw new InvalidInputError('ragged', ragged.name);
    }

    if (table.index && table.index.length !== rows) {
        throw new InvalidInputError('ragged', 'index');
    }
}

export function getColumn(table: Table, name: string): Column {
    const column = table.columns.find((candidate) => candidate.name === name);
    if (!column) {
        throw new InvalidInputError('unknown_column', name);
    }
    return column;
}

/**
 * True when the ordering key never decreases.
 * Without an explicit index the rows are in positional order.
 */
export function isIndexMonotonic(table: Table): boolean {
    const index = table.index;
    if (!index) return true;

    for (let i = 1; i < index.length; i++) {
        const previous = index[i - 1];
        const current = index[i];
        if (typeof previous === 'number' && typeof current === 'number') {
            if (Number.isNaN(previous) || Number.isNaN(current) || current < previous) return false;
        } else if (typeof previous === 'string' && typeof current === 'string') {
            if (current < previous) return false;
        } else {
            return false;
        }
    }
    return true;
}

// ============================================================================
// Declared Type Inference
// ============================================================================

/** A datetime-formatted string that also parses to a valid Date; bare times and ISO weeks do not */
function isDateString(value: string): boolean {
    const inferred = inferType(value);
    if (inferred.name !== 'string' || inferred.format?.name !== 'datetime') return false;
    return !Number.isNaN(new Date(value).getTime());
}

function schemaTypes(values: readonly unknown[]): Set<string> {
    const schema: GensonSchema = createCompoundSchema([...values]);
    if (schema.type === undefined) return new Set();
    return new Set(Array.isArray(schema.type) ? schema.type : [schema.type]);
}

/**
 * Infer the declared type of a column from its raw values.
 *
 * Date instances win outright; otherwise the compound schema decides,
 * and uniformly date-formatted strings are promoted to `date`.
 */
export function inferDtype(values: readonly unknown[]): ColumnDtype {
    const present = values.filter((value) => value !== null && value !== undefined);
    if (present.length === 0) return 'unknown';

    if (present.every(_.isDate)) return 'date';
    if (present.some(_.isDate)) return 'string';

    const types = schemaTypes(present);
    types.delete('null');

    if (types.size === 0) return 'unknown';
    if ([...types].every((type) => type === 'integer' || type === 'number')) return 'number';
    if (types.size === 1 && types.has('boolean')) return 'boolean';
    if (types.size === 1 && types.has('string')) {
        const strings = present.filter(_.isString).filter((value) => value.trim() !== '');
        return strings.length > 0 && strings.every(isDateString) ? 'date' : 'string';
    }
    if (types.has('object') || types.has('array')) return 'unknown';

    return 'string';
}

function toCell(value: unknown, dtype: ColumnDtype): CellValue {
    if (value === null || value === undefined) return null;

    if (dtype === 'date' && _.isString(value)) {
        const parsed = new Date(value);
        return Number.isNaN(parsed.getTime()) ? null : parsed;
    }

    if (_.isNumber(value) || _.isString(value) || _.isBoolean(value) || _.isDate(value)) {
        return value;
    }

    return JSON.stringify(value);
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Build a table from plain records.
 * Column order follows first appearance; a key absent from a record is a missing cell.
 */
export function fromRecords(records: readonly PlainRecord[]): Table {
    const names = _.uniq(records.flatMap((record) => Object.keys(record)));

    if (names.length === 0) {
        throw new InvalidInputError('no_columns');
    }

    const columns: Column[] = names.map((name) => {
        const raw = records.map((record) => record[name]);
        const dtype = inferDtype(raw);
        return {
            name,
            dtype,
            values: raw.map((value) => toCell(value, dtype)),
        };
    });

    return { columns };
}

/** Build a table from columns given as name → values, inferring declared types */
export function fromColumns(data: Readonly<Record<string, readonly unknown[]>>): Table {
    const columns: Column[] = Object.entries(data).map(([name, raw]) => {
        const dtype = inferDtype(raw);
        return { name, dtype, values: raw.map((value) => toCell(value, dtype)) };
    });

    const table: Table = { columns };
    validateTable(table);
    return table;
}

/** Normalize any single-table input into a validated table */
export function toTable(input: unknown): Table {
    const { tables } = detect(input);
    const [records] = Object.values(tables);
    if (!records) {
        throw new InvalidInputError('empty');
    }

    const table = fromRecords(records);
    validateTable(table);
    return table;
}
