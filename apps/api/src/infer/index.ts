import type { DataPatterns, DataRelationship, SourceDescriptor } from '../types/schema';
import { analyzePatterns } from './patterns';
import { findRelationships } from './relationships';

export type SourceAnalysis = {
  relationships: DataRelationship[];
  dataPatterns: DataPatterns;
};

export const analyzeSources = (sources: SourceDescriptor[]): SourceAnalysis => ({
  relationships: findRelationships(sources),
  dataPatterns: analyzePatterns(sources)
});

export { analyzePatterns, findRelationships };
