import { z } from 'zod';

const countsSchema = z.record(z.number().int().nonnegative());

export const schemaInfoSchema = z.object({
  columns: z.array(z.string()),
  dtypes: z.record(z.string()),
  nullCounts: countsSchema,
  uniqueCounts: countsSchema,
  rowCount: z.number().int().nonnegative(),
  sampleData: z.array(z.record(z.unknown())).default([])
});

export const sourceDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(['csv', 'postgresql', 'clickhouse', 'json', 'excel', 'rest_api']),
  config: z.record(z.unknown()).default({}),
  schemaInfo: schemaInfoSchema.nullish()
});

export const businessRequirementsSchema = z.object({
  goal: z.string(),
  targetMetrics: z.array(z.string()).default([]),
  updateFrequency: z.enum(['once', 'hourly', 'daily', 'weekly', 'realtime']).default('daily'),
  expectedLoad: z.string().default(''),
  dataRetention: z.string().default('')
});

export const sourcesRequestSchema = z.object({
  sources: z.array(sourceDescriptorSchema).min(1)
});

export const analysisRequestSchema = sourcesRequestSchema.extend({
  businessRequirements: businessRequirementsSchema
});

export const uploadFieldsSchema = z.object({
  delimiter: z.string().min(1).optional(),
  encoding: z.string().min(1).optional()
});
