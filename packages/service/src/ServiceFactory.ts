import { validateEnv, type EnvConfig } from './config';
import { RetrievalService } from './RetrievalService';
import { logger } from './utils/logger';

/**
 * Map validated environment configuration onto a RetrievalService.
 */
export function createRetrievalService(env: EnvConfig = validateEnv()): RetrievalService {
  return new RetrievalService({
    minTokenLength: env.ONCOQA_MIN_TOKEN_LENGTH,
    conceptMinLength: env.ONCOQA_CONCEPT_MIN_LENGTH,
    maxKeywordsPerDocument: env.ONCOQA_MAX_KEYWORDS,
    graphCachePath: env.ONCOQA_GRAPH_CACHE_PATH,
    closestMatchCutoff: env.ONCOQA_CLOSEST_MATCH_CUTOFF,
  });
}

/**
 * Create a service and, when ONCOQA_DATASET_PATH is set, load that dataset.
 * Load errors propagate so the caller can stop before serving queries.
 */
export async function bootstrapRetrievalService(env: EnvConfig = validateEnv()): Promise<RetrievalService> {
  const service = createRetrievalService(env);
  if (env.ONCOQA_DATASET_PATH) {
    await service.load(env.ONCOQA_DATASET_PATH);
  } else {
    logger.warn('ONCOQA_DATASET_PATH not set, service starts without a dataset');
  }
  return service;
}
