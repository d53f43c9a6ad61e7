import type { AppConfig } from '../config';
import { createBackends } from './backends';
import { GenerativeRecommender } from './generative';
import { RuleBasedRecommender } from './rules';
import type { Recommender } from './types';

export const createRecommender = (config: AppConfig): Recommender => {
  const backends = createBackends(config);
  if (!backends.length) return new RuleBasedRecommender();
  return new GenerativeRecommender(backends, { timeoutMs: config.llmTimeoutMs });
};

export { GenerativeRecommender, RuleBasedRecommender };
export type { GenerativeBackend, Recommender } from './types';
