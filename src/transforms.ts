/**
 * Column-level transformations: derived word counts and data type coercion
 */

import { isValid, parse, parseISO } from 'date-fns';
import type { ColumnConfig } from './config';
import { ColumnTransformError, describeError } from './errors';
import { CellValue, Table } from './types';

export type DataType = 'string' | 'int' | 'float' | 'bool' | 'date' | 'category';

const DTYPE_ALIASES = new Map<string, DataType>([
  ['string', 'string'],
  ['str', 'string'],
  ['text', 'string'],
  ['int', 'int'],
  ['integer', 'int'],
  ['number', 'int'],
  ['float', 'float'],
  ['decimal', 'float'],
  ['bool', 'bool'],
  ['boolean', 'bool'],
  ['date', 'date'],
  ['datetime', 'date'],
  ['category', 'category']
]);

const BOOLEAN_TOKENS = new Map<string, boolean>([
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false]
]);

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Tried in order after ISO-8601
const DATE_FORMATS = ['M/d/yyyy', 'M/d/yyyy H:mm', 'M/d/yyyy H:mm:ss', 'yyyy/M/d', 'd MMM yyyy', 'MMM d, yyyy', 'MMMM d, yyyy'];

export interface TransformResult {
  table: Table;
  warnings: ColumnTransformError[];
}

/**
 * Resolve a configured dtype token; unknown tokens (including "auto") map to undefined
 */
export function resolveDataType(token: string): DataType | undefined {
  return DTYPE_ALIASES.get(token.trim().toLowerCase());
}

/**
 * Text form of a cell, as used for word counts and string coercion
 */
export function toText(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) {
    return isValid(value) ? value.toISOString() : '';
  }
  return String(value);
}

/**
 * Number of whitespace-separated tokens in a cell
 */
export function countWords(value: CellValue): number {
  const text = toText(value).trim();
  return text ? text.split(/\s+/).length : 0;
}

function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return NUMERIC_TEXT.test(trimmed) ? Number(trimmed) : null;
  }
  return null;
}

function toDate(value: CellValue): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  const text = value.trim();
  const iso = parseISO(text);
  if (isValid(iso)) {
    return iso;
  }

  for (const format of DATE_FORMATS) {
    const parsed = parse(text, format, new Date(0));
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Coerce a column's values to the given data type.
 * Unparseable values become null; an int column holding fractional numbers throws.
 */
export function convertValues(column: string, values: CellValue[], dataType: DataType): CellValue[] {
  switch (dataType) {
    case 'string':
      return values.map(value => (value === null ? null : toText(value)));
    case 'int':
      return values.map(value => {
        const parsed = toNumber(value);
        if (parsed !== null && !Number.isInteger(parsed)) {
          throw new ColumnTransformError(column, `cannot safely convert non-integer value ${parsed} to int`);
        }
        return parsed;
      });
    case 'float':
      return values.map(toNumber);
    case 'bool':
      return values.map(value => {
        if (value === null) return null;
        return BOOLEAN_TOKENS.get(toText(value).toLowerCase()) ?? null;
      });
    case 'date':
      return values.map(toDate);
    case 'category':
      return [...values];
  }
}

/**
 * Distinct non-null values in first-seen order
 */
export function categoryDomain(values: CellValue[]): CellValue[] {
  const seen = new Set<string>();
  const domain: CellValue[] = [];
  for (const value of values) {
    if (value === null) continue;
    const key = `${typeof value}:${toText(value)}`;
    if (!seen.has(key)) {
      seen.add(key);
      domain.push(value);
    }
  }
  return domain;
}

/**
 * Apply configured column properties to a table.
 * The input table is left untouched; failures are collected per column and
 * never stop the remaining columns from being processed.
 */
export function applyColumnProperties(table: Table, config: ColumnConfig): TransformResult {
  const result: Table = {
    columns: [...table.columns],
    rows: table.rows.map(row => ({ ...row })),
    categories: { ...table.categories }
  };
  const warnings: ColumnTransformError[] = [];

  for (const [column, properties] of Object.entries(config)) {
    if (!table.columns.includes(column)) {
      continue;
    }

    try {
      if (properties.word_count) {
        const countColumn = `${column}_word_count`;
        for (const row of result.rows) {
          row[countColumn] = countWords(row[column] ?? null);
        }
        if (!result.columns.includes(countColumn)) {
          result.columns.push(countColumn);
        }
      }

      const dataType = properties.dtype ? resolveDataType(properties.dtype) : undefined;
      if (dataType) {
        const converted = convertValues(column, result.rows.map(row => row[column] ?? null), dataType);
        result.rows.forEach((row, index) => {
          row[column] = converted[index];
        });
        if (dataType === 'category') {
          result.categories[column] = categoryDomain(converted);
        } else {
          delete result.categories[column];
        }
      }
    } catch (error) {
      warnings.push(error instanceof ColumnTransformError ? error : new ColumnTransformError(column, describeError(error)));
    }
  }

  return { table: result, warnings };
}
