/**
 * Tabular Insight - Column Classification
 *
 * Assigns each column a semantic type from its values and declared type.
 * Empty columns fall back to the declared type alone.
 */

import type { CellValue, Column, ColumnDtype, ColumnTypes, SemanticType, Table } from './types.js';
import { presentValues } from './table.js';

const DTYPE_FALLBACK: Record<ColumnDtype, SemanticType> = {
    number: 'numeric',
    date: 'temporal',
    string: 'categorical',
    boolean: 'categorical',
    unknown: 'unknown',
};

const isFiniteNumber = (value: CellValue): boolean => typeof value === 'number' && Number.isFinite(value);

const isValidDate = (value: CellValue): boolean => value instanceof Date && !Number.isNaN(value.getTime());

export function classifyColumn(column: Column): SemanticType {
    const present = presentValues(column);

    if (present.length === 0) {
        return DTYPE_FALLBACK[column.dtype];
    }

    if (present.every(isFiniteNumber)) return 'numeric';
    if (present.every(isValidDate)) return 'temporal';
    if (column.dtype === 'string' || column.dtype === 'boolean') return 'categorical';

    return 'unknown';
}

export function classifyColumns(table: Table): ColumnTypes {
    const types: Record<string, SemanticType> = {};
    for (const column of table.columns) {
        types[column.name] = classifyColumn(column);
    }
    return types;
}

/**
 * Columns of one semantic type, in table order.
 * Object key order cannot be trusted for integer-like column names.
 */
export function columnsOfType(table: Table, columnTypes: ColumnTypes, type: SemanticType): Column[] {
    return table.columns.filter((column) => columnTypes[column.name] === type);
}
