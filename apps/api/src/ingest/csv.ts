import fs from 'fs/promises';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { parseInteger, SAMPLE_LIMIT, type SampledRows } from '../utils/profile';

export const fileConfigSchema = z.object({
  filePath: z.string().min(1).optional(),
  fileData: z.instanceof(Uint8Array).optional(),
  delimiter: z.string().min(1).default(','),
  encoding: z.string().min(1).default('utf-8'),
  sheet: z.string().optional()
});

export type FileSourceConfig = z.infer<typeof fileConfigSchema>;

const NA_VALUES = new Set(['', 'NA', 'N/A', 'n/a', 'NaN', 'nan', 'null', 'NULL', 'None', '#N/A']);
const INTEGER = /^[-+]?\d+$/;
const FLOAT = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;
const BOOLEAN = /^(true|false)$/i;

export const coerceCell = (raw: string): string | number | bigint | boolean | null => {
  const value = raw.trim();
  if (NA_VALUES.has(value)) return null;
  if (INTEGER.test(value)) return parseInteger(value);
  if (FLOAT.test(value)) return Number(value);
  if (BOOLEAN.test(value)) return value.toLowerCase() === 'true';
  return raw;
};

export const loadBytes = async (config: FileSourceConfig): Promise<Buffer> => {
  if (config.fileData) return Buffer.from(config.fileData);
  if (config.filePath) return fs.readFile(config.filePath);
  throw new Error('filePath or fileData is required');
};

export const decodeText = (bytes: Uint8Array, encoding: string) =>
  new TextDecoder(encoding, { fatal: true }).decode(bytes);

export const parseDelimited = (bytes: Uint8Array, config: Pick<FileSourceConfig, 'delimiter' | 'encoding'>): SampledRows => {
  const text = decodeText(bytes, config.encoding);
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: config.delimiter,
    skipEmptyLines: true,
    dynamicTyping: false,
    // one extra row in case the header counts toward the preview
    preview: SAMPLE_LIMIT + 1
  });

  // ragged rows are kept; their absent cells read as missing
  const firstError = parsed.errors.find(error => error.type !== 'FieldMismatch');
  if (firstError) {
    throw new Error(`CSV parse error: ${firstError.message}`);
  }

  const columns = parsed.meta.fields ?? [];
  const rows = parsed.data
    .slice(0, SAMPLE_LIMIT)
    .map(row => Object.fromEntries(columns.map(col => [col, coerceCell(row[col] ?? '')])));

  return { columns, rows };
};

export const collectColumns = (rows: Record<string, unknown>[]) => {
  const seen = new Set<string>();
  rows.forEach(row => Object.keys(row).forEach(key => seen.add(key)));
  return Array.from(seen);
};

const headerRow = (worksheet: XLSX.WorkSheet) => {
  const [header = []] = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1 });
  return header.filter(cell => cell !== null && cell !== undefined && cell !== '').map(String);
};

export const parseSpreadsheet = (bytes: Buffer, config: Pick<FileSourceConfig, 'sheet'> = {}): SampledRows => {
  // sheetRows counts the header row
  const workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true, sheetRows: SAMPLE_LIMIT + 1 });
  const sheetName = config.sheet ?? workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) {
    throw new Error(`Worksheet not found: ${sheetName ?? '(none)'}`);
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: null }).slice(0, SAMPLE_LIMIT);
  return { columns: rows.length ? collectColumns(rows) : headerRow(worksheet), rows };
};
