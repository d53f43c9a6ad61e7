export type SourceType = 'csv' | 'postgresql' | 'clickhouse' | 'json' | 'excel' | 'rest_api';

export type TargetType = 'postgresql' | 'clickhouse' | 'hdfs';

export type UpdateFrequency = 'once' | 'hourly' | 'daily' | 'weekly' | 'realtime';

export type DtypeLabel = 'object' | 'integer' | 'float' | 'boolean' | 'datetime';

export type SchemaInfo = {
  columns: string[];
  dtypes: Record<string, string>;
  nullCounts: Record<string, number>;
  uniqueCounts: Record<string, number>;
  rowCount: number; // size of the bounded sample, not the full source
  sampleData: Record<string, unknown>[];
};

export type SourceDescriptor = {
  id: string;
  name: string;
  type: SourceType;
  config: Record<string, unknown>;
  schemaInfo?: SchemaInfo | null;
};

export type ProfileResult =
  | { ok: true; schema: SchemaInfo }
  | { ok: false; schema: SchemaInfo; reason: string };

export type DataRelationship = {
  source1Id: string;
  source2Id: string;
  joinType: string;
  joinKeys: Record<string, string>;
  confidence: number; // 0..1
};

export type PartitionGranularity = 'monthly' | 'yearly';

export type DataPatterns = {
  hasTemporalData: boolean;
  temporalColumns: string[];
  hasGeographicalData: boolean;
  geographicalColumns: string[];
  totalEstimatedRows: number;
  dataTypesDistribution: Record<string, number>;
  suggestedPartitioning: PartitionGranularity | null;
};

export type BusinessRequirements = {
  goal: string;
  targetMetrics: string[];
  updateFrequency: UpdateFrequency;
  expectedLoad: string;
  dataRetention: string;
};

export type StorageRecommendation = {
  primary: TargetType;
  reasoning: string;
  alternatives: TargetType[];
};

export type SchemaDesign = {
  mainTable: string;
  partitioning: string | null;
  indexes: string[];
  ddlScript: string;
};

export type EtlPipeline = {
  steps: string[];
  schedule: string;
  estimatedRuntime: string;
};

export type AIRecommendation = {
  storageRecommendation: StorageRecommendation;
  schemaDesign: SchemaDesign;
  etlPipeline: EtlPipeline;
};
