import type {
  AIRecommendation,
  BusinessRequirements,
  DataPatterns,
  SourceDescriptor,
  TargetType,
  UpdateFrequency
} from '../types/schema';
import type { Recommender } from './types';

const ANALYTICS_KEYWORDS = new Set(['sales', 'analytics', 'report', 'dashboard']);

const LARGE_VOLUME = 1_000_000;
const ANALYTICS_VOLUME = 100_000;

const SCHEDULES: Partial<Record<UpdateFrequency, string>> = {
  once: '# Run once manually',
  hourly: '0 * * * *',
  daily: '0 2 * * *',
  weekly: '0 2 * * 0'
};
const DEFAULT_SCHEDULE = '0 2 * * *';

export const isAnalyticsWorkload = (requirements: BusinessRequirements) =>
  requirements.targetMetrics.some(metric => ANALYTICS_KEYWORDS.has(metric.trim().toLowerCase()));

const chooseStorage = (analytics: boolean, patterns: DataPatterns): { storage: TargetType; reasoning: string } => {
  const totalRows = patterns.totalEstimatedRows;
  if (analytics && patterns.hasTemporalData && totalRows > ANALYTICS_VOLUME) {
    return { storage: 'clickhouse', reasoning: 'Analytical queries over a large volume of time-series data' };
  }
  if (totalRows > LARGE_VOLUME) {
    return { storage: 'clickhouse', reasoning: 'Large data volume calls for a columnar store' };
  }
  return { storage: 'postgresql', reasoning: 'Standard operational data with moderate load' };
};

const choosePartitioning = (storage: TargetType, patterns: DataPatterns) => {
  if (!patterns.hasTemporalData || storage !== 'clickhouse') return null;
  return patterns.totalEstimatedRows > LARGE_VOLUME ? 'PARTITION BY toYYYYMM(date)' : 'PARTITION BY toYear(date)';
};

// Column lists are placeholders: per-column unification across sources is left to the user.
export const renderDdl = (storage: TargetType, table: string, partitioning: string | null, indexes: string[]) => {
  if (storage === 'clickhouse') {
    return [
      `CREATE TABLE ${table}`,
      '(',
      '    date Date,',
      '    timestamp DateTime',
      '    -- Add your columns here based on source analysis',
      ') ENGINE = MergeTree()',
      ...(partitioning ? [partitioning] : []),
      `ORDER BY (${indexes.length ? indexes.join(', ') : 'date'})`
    ].join('\n');
  }

  return [
    `CREATE TABLE ${table} (`,
    '    id SERIAL PRIMARY KEY,',
    '    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP',
    '    -- Add your columns here based on source analysis',
    ');',
    ...(indexes.length ? [`CREATE INDEX ON ${table} (${indexes.join(', ')});`] : [])
  ].join('\n');
};

export const scheduleFor = (frequency: UpdateFrequency) => SCHEDULES[frequency] ?? DEFAULT_SCHEDULE;

export const buildRuleBasedRecommendation = (
  _sources: SourceDescriptor[],
  requirements: BusinessRequirements,
  patterns: DataPatterns
): AIRecommendation => {
  const analytics = isAnalyticsWorkload(requirements);
  const { storage, reasoning } = chooseStorage(analytics, patterns);
  const partitioning = choosePartitioning(storage, patterns);
  const indexes = patterns.temporalColumns.slice(0, 2);
  const mainTable = analytics ? 'analytics_data' : 'processed_data';

  return {
    storageRecommendation: {
      primary: storage,
      reasoning,
      alternatives: ['hdfs']
    },
    schemaDesign: {
      mainTable,
      partitioning,
      indexes,
      ddlScript: renderDdl(storage, mainTable, partitioning, indexes)
    },
    etlPipeline: {
      steps: ['Extract from sources', 'Join data on common keys', 'Apply transformations', `Load to ${storage}`],
      schedule: scheduleFor(requirements.updateFrequency),
      estimatedRuntime: '10-30 minutes'
    }
  };
};

export class RuleBasedRecommender implements Recommender {
  async recommend(sources: SourceDescriptor[], requirements: BusinessRequirements, patterns: DataPatterns) {
    return buildRuleBasedRecommendation(sources, requirements, patterns);
  }
}
