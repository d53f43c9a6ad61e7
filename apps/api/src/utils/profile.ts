import type { DtypeLabel, SchemaInfo } from '../types/schema';

export const SAMPLE_LIMIT = 1000;
export const PREVIEW_LIMIT = 5;

export type SampledRows = {
  columns: string[];
  rows: Record<string, unknown>[];
};

export const isMissing = (value: unknown) =>
  value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));

/** Integers past 2^53 stay exact as bigint. */
export const parseInteger = (text: string): number | bigint => {
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : BigInt(text);
};

// bigint has no JSON form
const previewValue = (value: unknown) => {
  if (isMissing(value)) return '';
  return typeof value === 'bigint' ? value.toString() : value;
};

const cellOf = (row: Record<string, unknown>, column: string) =>
  Object.hasOwn(row, column) ? row[column] : undefined;

const valueKey = (value: unknown) => {
  if (value instanceof Date) return `date:${value.getTime()}`;
  if (typeof value === 'object') return `json:${JSON.stringify(value)}`;
  return `${typeof value}:${String(value)}`;
};

// Integer and boolean columns with gaps widen the way a dataframe would store them.
export const inferDtype = (values: unknown[]): DtypeLabel => {
  const present = values.filter(v => !isMissing(v));
  if (!present.length) return 'object';
  const complete = present.length === values.length;

  if (present.every(v => typeof v === 'boolean')) return complete ? 'boolean' : 'object';
  if (present.every(v => v instanceof Date)) return 'datetime';
  if (present.every(v => typeof v === 'number' || typeof v === 'bigint')) {
    const integral = present.every(v => typeof v === 'bigint' || Number.isInteger(v));
    return integral && complete ? 'integer' : 'float';
  }
  return 'object';
};

export const emptySchemaInfo = (): SchemaInfo => ({
  columns: [],
  dtypes: {},
  nullCounts: {},
  uniqueCounts: {},
  rowCount: 0,
  sampleData: []
});

export const buildSchemaInfo = ({ columns, rows }: SampledRows): SchemaInfo => {
  const distinctColumns = Array.from(new Set(columns));
  const valuesByColumn = distinctColumns.map(col => [col, rows.map(r => cellOf(r, col))] as const);

  return {
    columns,
    dtypes: Object.fromEntries(valuesByColumn.map(([col, values]) => [col, inferDtype(values)])),
    nullCounts: Object.fromEntries(valuesByColumn.map(([col, values]) => [col, values.filter(isMissing).length])),
    uniqueCounts: Object.fromEntries(
      valuesByColumn.map(([col, values]) => [
        col,
        new Set(values.filter(v => !isMissing(v)).map(valueKey)).size
      ])
    ),
    rowCount: rows.length,
    sampleData: rows
      .slice(0, PREVIEW_LIMIT)
      .map(row => Object.fromEntries(distinctColumns.map(col => [col, previewValue(cellOf(row, col))])))
  };
};

export const countFor = (counts: Record<string, number>, column: string) =>
  Object.hasOwn(counts, column) ? counts[column] : 0;
