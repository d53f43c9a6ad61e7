import type { DataRelationship, SchemaInfo, SourceDescriptor } from '../types/schema';
import { countFor } from '../utils/profile';

export const DEFAULT_JOIN_TYPE = 'LEFT JOIN';

const KEY_PATTERNS = ['id', 'uuid', 'key', 'code'];

/** Exact, case-sensitive intersection in the first schema's column order. */
export const commonColumns = (left: SchemaInfo, right: SchemaInfo) => {
  const rightColumns = new Set(right.columns);
  return Array.from(new Set(left.columns)).filter(col => rightColumns.has(col));
};

const uniquenessRatio = (schema: SchemaInfo, column: string) =>
  countFor(schema.uniqueCounts, column) / Math.max(schema.rowCount, 1);

export const selectJoinKey = (common: string[], left: SchemaInfo, right: SchemaInfo): string | null => {
  for (const pattern of KEY_PATTERNS) {
    const match = common.find(col => col.toLowerCase().includes(pattern));
    if (match) return match;
  }

  let best: string | null = null;
  let bestScore = 0;
  for (const col of common) {
    const score = Math.min(uniquenessRatio(left, col), uniquenessRatio(right, col));
    if (score > bestScore) {
      best = col;
      bestScore = score;
    }
  }
  return best;
};

export const findRelationships = (sources: SourceDescriptor[]): DataRelationship[] => {
  const relationships: DataRelationship[] = [];

  sources.forEach((source1, i) => {
    sources.slice(i + 1).forEach(source2 => {
      const left = source1.schemaInfo;
      const right = source2.schemaInfo;
      if (!left || !right) return;

      const common = commonColumns(left, right);
      if (!common.length) return;

      const key = selectJoinKey(common, left, right);
      const widest = Math.max(new Set(left.columns).size, new Set(right.columns).size);

      relationships.push({
        source1Id: source1.id,
        source2Id: source2.id,
        joinType: DEFAULT_JOIN_TYPE,
        joinKeys: key ? { [key]: key } : {},
        confidence: common.length / widest
      });
    });
  });

  return relationships;
};
