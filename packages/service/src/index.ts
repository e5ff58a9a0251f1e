export { RetrievalService } from './RetrievalService';
export type { RetrievalServiceConfig, DatasetSnapshot, SearchResponse } from './RetrievalService';
export { loadDataset, datasetFingerprint, describeSource } from './DatasetLoader';
export type { LoadDatasetOptions, LoadedDataset } from './DatasetLoader';
export { GraphCache, buildOrLoadGraph } from './GraphCache';
export type { GraphBuildOptions } from './GraphCache';
export { createRetrievalService, bootstrapRetrievalService } from './ServiceFactory';
export { validateEnv } from './config';
export type { EnvConfig } from './config';
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
