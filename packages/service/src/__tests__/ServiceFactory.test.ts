import { join } from 'path';
import { validateEnv } from '../config';
import { bootstrapRetrievalService, createRetrievalService } from '../ServiceFactory';

const FIXTURE_PATH = join(__dirname, 'fixtures', 'clinical-qa.json');

describe('ServiceFactory', () => {
  test('should create an unloaded service from the environment', () => {
    const service = createRetrievalService(validateEnv({}));

    expect(service.isLoaded()).toBe(false);
  });

  test('should load the configured dataset on bootstrap', async () => {
    const service = await bootstrapRetrievalService(validateEnv({ ONCOQA_DATASET_PATH: FIXTURE_PATH }));

    expect(service.getSnapshot().store.size).toBe(5);
  });

  test('should apply the configured token length', async () => {
    const service = await bootstrapRetrievalService(
      validateEnv({ ONCOQA_DATASET_PATH: FIXTURE_PATH, ONCOQA_MIN_TOKEN_LENGTH: '4' })
    );

    // 'for' appears in two prompts but is now shorter than a token
    expect(service.search({ query: 'for' }).total).toBe(0);
  });

  test('should start without a dataset when none is configured', async () => {
    const service = await bootstrapRetrievalService(validateEnv({}));

    expect(service.isLoaded()).toBe(false);
  });
});
