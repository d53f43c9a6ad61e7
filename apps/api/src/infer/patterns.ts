import type { DataPatterns, PartitionGranularity, SourceDescriptor } from '../types/schema';

const TEMPORAL_KEYWORDS = ['date', 'time', 'created', 'updated', 'timestamp'];
const GEO_KEYWORDS = ['lat', 'lon', 'city', 'country', 'region', 'address'];

const MONTHLY_THRESHOLD = 1_000_000;
const YEARLY_THRESHOLD = 100_000;

const matchesAny = (column: string, keywords: string[]) => {
  const lower = column.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
};

export const suggestPartitioning = (hasTemporalData: boolean, totalRows: number): PartitionGranularity | null => {
  if (!hasTemporalData) return null;
  if (totalRows > MONTHLY_THRESHOLD) return 'monthly';
  if (totalRows > YEARLY_THRESHOLD) return 'yearly';
  return null;
};

export const analyzePatterns = (sources: SourceDescriptor[]): DataPatterns => {
  const temporalColumns: string[] = [];
  const geographicalColumns: string[] = [];
  const dataTypesDistribution: Record<string, number> = {};
  let totalEstimatedRows = 0;

  for (const source of sources) {
    const schema = source.schemaInfo;
    if (!schema) continue;

    totalEstimatedRows += schema.rowCount;
    for (const col of schema.columns) {
      if (matchesAny(col, TEMPORAL_KEYWORDS)) temporalColumns.push(col);
      if (matchesAny(col, GEO_KEYWORDS)) geographicalColumns.push(col);
    }

    for (const col of new Set(schema.columns)) {
      const dtype = Object.hasOwn(schema.dtypes, col) ? schema.dtypes[col] : 'unknown';
      dataTypesDistribution[dtype] = (Object.hasOwn(dataTypesDistribution, dtype) ? dataTypesDistribution[dtype] : 0) + 1;
    }
  }

  const hasTemporalData = temporalColumns.length > 0;

  return {
    hasTemporalData,
    temporalColumns,
    hasGeographicalData: geographicalColumns.length > 0,
    geographicalColumns,
    totalEstimatedRows,
    dataTypesDistribution,
    suggestedPartitioning: suggestPartitioning(hasTemporalData, totalEstimatedRows)
  };
};
