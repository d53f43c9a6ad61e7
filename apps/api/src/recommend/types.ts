import type { AIRecommendation, BusinessRequirements, DataPatterns, SourceDescriptor } from '../types/schema';

export interface Recommender {
  recommend(
    sources: SourceDescriptor[],
    requirements: BusinessRequirements,
    patterns: DataPatterns
  ): Promise<AIRecommendation>;
}

/** A text-generation service that answers a prompt with free text. */
export interface GenerativeBackend {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}
