import { z } from 'zod';
import type { AIRecommendation, BusinessRequirements, DataPatterns, SourceDescriptor } from '../types/schema';

const KEY_FIELD_PREVIEW = 5;

const targetSchema = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(['postgresql', 'clickhouse', 'hdfs']));

const recommendationSchema = z.object({
  storageRecommendation: z.object({
    primary: targetSchema,
    reasoning: z.string(),
    alternatives: z.array(targetSchema).default([])
  }),
  schemaDesign: z.object({
    mainTable: z.string().min(1),
    partitioning: z
      .string()
      .nullish()
      .transform(value => value || null),
    indexes: z.array(z.string()).default([]),
    ddlScript: z.string()
  }),
  etlPipeline: z.object({
    steps: z.array(z.string()),
    schedule: z.string(),
    estimatedRuntime: z.string()
  })
});

const describeSource = (source: SourceDescriptor) => {
  const columns = source.schemaInfo?.columns ?? [];
  const rows = source.schemaInfo?.rowCount ?? 0;
  const keyFields = columns.length ? `, key fields: ${JSON.stringify(columns.slice(0, KEY_FIELD_PREVIEW))}` : '';
  return `- ${source.name} (${source.type}): ${columns.length} columns, ${rows} rows${keyFields}`;
};

export const buildRecommendationPrompt = (
  sources: SourceDescriptor[],
  requirements: BusinessRequirements,
  patterns: DataPatterns
) => `
You are an expert data engineer. Analyze the data sources and recommend a target design.

DATA SOURCES:
${sources.map(describeSource).join('\n')}

DATA PATTERNS:
- Temporal data: ${patterns.hasTemporalData}
- Temporal columns: ${JSON.stringify(patterns.temporalColumns)}
- Geographical data: ${patterns.hasGeographicalData}
- Total rows: ${patterns.totalEstimatedRows}

BUSINESS REQUIREMENTS:
- Goal: ${requirements.goal}
- Metrics: ${JSON.stringify(requirements.targetMetrics)}
- Update frequency: ${requirements.updateFrequency}
- Expected load: ${requirements.expectedLoad}
- Data retention: ${requirements.dataRetention}

TASK: Propose the optimal solution as JSON:

{
  "storageRecommendation": {
    "primary": "postgresql|clickhouse|hdfs",
    "reasoning": "detailed explanation of the choice",
    "alternatives": ["alternative1", "alternative2"]
  },
  "schemaDesign": {
    "mainTable": "table_name",
    "partitioning": "partitioning strategy or null",
    "indexes": ["index", "columns"],
    "ddlScript": "CREATE TABLE ..."
  },
  "etlPipeline": {
    "steps": ["step1", "step2", "step3"],
    "schedule": "cron expression",
    "estimatedRuntime": "expected runtime"
  }
}
`;

/**
 * Takes everything from the first `{` to the last `}` of the reply.
 * Stray braces in surrounding prose can widen the span past the real object.
 */
export const extractJsonObject = (text: string): unknown => {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) return null;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
};

export const parseRecommendation = (text: string): AIRecommendation | null => {
  const parsed = recommendationSchema.safeParse(extractJsonObject(text));
  return parsed.success ? parsed.data : null;
};
