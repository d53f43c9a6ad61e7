import { SAMPLE_LIMIT, type SampledRows } from '../utils/profile';
import { collectColumns, decodeText } from './csv';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

const flattenEntries = (record: Record<string, unknown>, prefix: string): Array<[string, unknown]> =>
  Object.entries(record).flatMap(([key, value]): Array<[string, unknown]> => {
    const path = prefix ? `${prefix}.${key}` : key;
    return isRecord(value) ? flattenEntries(value, path) : [[path, value]];
  });

/** Nested objects become dotted-path keys; arrays are kept as values. */
export const flattenRecord = (record: Record<string, unknown>, prefix = '') =>
  Object.fromEntries(flattenEntries(record, prefix));

export const parseDocument = (bytes: Uint8Array, encoding: string): SampledRows => {
  const data: unknown = JSON.parse(decodeText(bytes, encoding));
  const items = Array.isArray(data) ? data.slice(0, SAMPLE_LIMIT) : [data];

  const rows = items.map((item, index) => {
    if (!isRecord(item)) {
      throw new Error(`JSON element ${index} is not an object`);
    }
    return flattenRecord(item);
  });

  return { columns: collectColumns(rows), rows };
};
