import { errorMessage } from '../errors';
import type { AIRecommendation, BusinessRequirements, DataPatterns, SourceDescriptor } from '../types/schema';
import { buildRecommendationPrompt, parseRecommendation } from './prompt';
import { RuleBasedRecommender } from './rules';
import type { GenerativeBackend, Recommender } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type GenerativeRecommenderOptions = {
  timeoutMs?: number;
  fallback?: Recommender;
};

const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Asks each backend in turn for a JSON recommendation. A failed call, a timeout
 * or an unusable reply moves on to the next backend, then to the fallback.
 */
export class GenerativeRecommender implements Recommender {
  private readonly timeoutMs: number;
  private readonly fallback: Recommender;

  constructor(private readonly backends: GenerativeBackend[], options: GenerativeRecommenderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fallback = options.fallback ?? new RuleBasedRecommender();
  }

  async recommend(
    sources: SourceDescriptor[],
    requirements: BusinessRequirements,
    patterns: DataPatterns
  ): Promise<AIRecommendation> {
    const prompt = buildRecommendationPrompt(sources, requirements, patterns);

    for (const backend of this.backends) {
      try {
        const text = await withTimeout(backend.generate(prompt), this.timeoutMs, backend.name);
        const recommendation = parseRecommendation(text);
        if (recommendation) return recommendation;
        console.warn(`[Recommender] ${backend.name} reply had no usable JSON object`);
      } catch (err) {
        console.error(`[Recommender] ${backend.name} failed: ${errorMessage(err)}`);
      }
    }

    console.log('[Recommender] Falling back to rule-based recommendation');
    return this.fallback.recommend(sources, requirements, patterns);
  }
}
