import { errorMessage, UnsupportedSourceError } from '../errors';
import type { ProfileResult, SchemaInfo, SourceDescriptor, SourceType } from '../types/schema';
import { buildSchemaInfo, emptySchemaInfo, type SampledRows } from '../utils/profile';
import { fileConfigSchema, loadBytes, parseDelimited, parseSpreadsheet } from './csv';
import { postgresSourceSchema, samplePostgresTable } from './db';
import { parseDocument } from './json';

type SourceReader = (config: Record<string, unknown>) => Promise<SampledRows>;

const readers: Partial<Record<SourceType, SourceReader>> = {
  csv: async raw => {
    const config = fileConfigSchema.parse(raw);
    return parseDelimited(await loadBytes(config), config);
  },
  excel: async raw => {
    const config = fileConfigSchema.parse(raw);
    return parseSpreadsheet(await loadBytes(config), config);
  },
  json: async raw => {
    const config = fileConfigSchema.parse(raw);
    return parseDocument(await loadBytes(config), config.encoding);
  },
  postgresql: async raw => samplePostgresTable(postgresSourceSchema.parse(raw))
};

export const isSupportedSource = (type: SourceType) => Boolean(readers[type]);

/**
 * Profiles a bounded sample of the source. Read failures come back as
 * `{ ok: false }` with an empty schema; only an unsupported source kind rejects.
 */
export const profileSource = async (source: SourceDescriptor): Promise<ProfileResult> => {
  const reader = readers[source.type];
  if (!reader) throw new UnsupportedSourceError(source.type);

  try {
    const sample = await reader(source.config);
    return { ok: true, schema: buildSchemaInfo(sample) };
  } catch (err) {
    const reason = errorMessage(err, 'Source read failed');
    console.error(`[Profiler] Error analyzing source ${source.name}: ${reason}`);
    return { ok: false, schema: emptySchemaInfo(), reason };
  }
};

export const profile = async (source: SourceDescriptor): Promise<SchemaInfo> =>
  (await profileSource(source)).schema;

/** Returns copies of the sources with schema info filled in where it was missing. */
export const ensureProfiled = (sources: SourceDescriptor[]): Promise<SourceDescriptor[]> =>
  Promise.all(
    sources.map(async source => (source.schemaInfo ? source : { ...source, schemaInfo: await profile(source) }))
  );
