import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DatasetNotLoadedError, LoadError } from '@oncoqa/core';
import { RetrievalService } from '../RetrievalService';

const FIXTURE_PATH = join(__dirname, 'fixtures', 'clinical-qa.json');

const ids = (page: { results: Array<{ document: { id: number } }> }): number[] =>
  page.results.map((result) => result.document.id);

describe('RetrievalService', () => {
  describe('Before loading', () => {
    test('should reject queries until a dataset is published', () => {
      const service = new RetrievalService();

      expect(service.isLoaded()).toBe(false);
      expect(() => service.search({ query: 'dose' })).toThrow(DatasetNotLoadedError);
      expect(() => service.relatedConcepts({ query: 'dose' })).toThrow(DatasetNotLoadedError);
      expect(() => service.closestMatch({ question: 'dose' })).toThrow(DatasetNotLoadedError);
    });
  });

  describe('Ranked search', () => {
    const service = new RetrievalService();

    beforeAll(async () => {
      await service.load(FIXTURE_PATH);
    });

    test('should weight prompt matches above completion matches', () => {
      const page = service.search({ query: 'atezolizumab PD-L1' });

      expect(page.results.map((r) => [r.document.id, r.score])).toEqual([
        [2, 5],
        [1, 3],
        [0, 2],
        [3, 2],
      ]);
      expect(page.results[0].promptMatches).toBe(2);
      expect(page.results[0].completionMatches).toBe(1);
      expect(page.results[0].matchedTokens).toEqual(['atezolizumab', 'pdl1']);
    });

    test('should return nothing for an empty query', () => {
      expect(service.search({ query: '   ' })).toEqual({ results: [], total: 0, offset: 0 });
    });

    test('should paginate after ranking', () => {
      const page = service.search({ query: 'atezolizumab', limit: 2, offset: 1 });

      expect(ids(page)).toEqual([1, 2]);
      expect(page.total).toBe(4);
      expect(page.offset).toBe(1);
    });

    test('should return an empty page past the end', () => {
      const page = service.search({ query: 'atezolizumab', offset: 10 });

      expect(page.results).toEqual([]);
      expect(page.total).toBe(4);
    });

    test('should apply the minimum score', () => {
      expect(ids(service.search({ query: 'atezolizumab pdl1', minScore: 3 }))).toEqual([2, 1]);
    });

    test('should apply keyword filters case-insensitively', () => {
      expect(ids(service.search({ query: 'atezolizumab pdl1', keywordFilters: ['PDL1'] }))).toEqual([2, 1]);
    });

    test('should apply facet filters', () => {
      expect(ids(service.search({ query: 'atezolizumab', categoryFilters: { cancer_type: ['SCLC'] } }))).toEqual([2]);
      expect(ids(service.search({ query: 'atezolizumab', categoryFilters: { genes: ['PD-1', 'PD-L1'] } }))).toEqual([
        1, 2,
      ]);
    });

    test('should ignore empty facet filters', () => {
      expect(ids(service.search({ query: 'atezolizumab', categoryFilters: { cancer_type: [] } }))).toEqual([0, 1, 2, 3]);
    });

    test('should reject malformed requests', () => {
      expect(() => service.search({ query: 'dose', minScore: -1 })).toThrow();
      expect(() => service.search({ query: 'dose', limit: 0 })).toThrow();
    });
  });

  describe('Related concepts', () => {
    const service = new RetrievalService();

    beforeAll(async () => {
      await service.load(FIXTURE_PATH);
    });

    test('should return weighted neighbors', () => {
      expect(service.relatedConcepts({ query: 'atezolizumab', topN: 2 })).toEqual([
        { concept: 'nsclc', kind: 'cancer_type', label: 'NSCLC', weight: 3 },
        { concept: 'pdl1', kind: 'gene', label: 'PD-L1', weight: 2 },
      ]);
    });

    test('should return nothing for unknown terms', () => {
      expect(service.relatedConcepts({ query: 'xylophone' })).toEqual([]);
    });
  });

  describe('Closest match', () => {
    const service = new RetrievalService();

    beforeAll(async () => {
      await service.load(FIXTURE_PATH);
    });

    test('should return the document with the most similar prompt', () => {
      const match = service.closestMatch({ question: 'What is the dose of atezolizumab for NSCLC' });

      expect(match?.document.id).toBe(0);
      expect(match?.ratio).toBe(1);
    });

    test('should return null for a blank question', () => {
      expect(service.closestMatch({ question: '  ' })).toBeNull();
    });

    test('should return null below the cutoff', async () => {
      const strict = new RetrievalService({ closestMatchCutoff: 1 });
      await strict.load(FIXTURE_PATH);

      expect(strict.closestMatch({ question: 'zzzz' })).toBeNull();
    });
  });

  describe('Loading', () => {
    test('should share one load between concurrent callers of the same path', async () => {
      const service = new RetrievalService();
      const first = service.load(FIXTURE_PATH);
      const second = service.load(FIXTURE_PATH);

      expect(second).toBe(first);
      const snapshot = await first;
      expect(service.getSnapshot()).toBe(snapshot);
      expect(snapshot.store.size).toBe(5);
      expect(snapshot.source).toBe(FIXTURE_PATH);
    });

    test('should keep the published snapshot when a reload fails', async () => {
      const service = new RetrievalService();
      const published = await service.load([{ prompt: 'What is PD-L1?', completion: 'A checkpoint ligand' }]);

      await expect(service.load(join(tmpdir(), 'oncoqa-does-not-exist.json'))).rejects.toBeInstanceOf(LoadError);
      expect(service.getSnapshot()).toBe(published);
    });

    test('should not let an older load replace a newer snapshot', async () => {
      const service = new RetrievalService();
      const older = service.load(FIXTURE_PATH);
      const newer = service.load([{ prompt: 'What is PD-L1?', completion: 'A checkpoint ligand' }]);

      const [olderSnapshot, newerSnapshot] = await Promise.all([older, newer]);

      expect(olderSnapshot.store.size).toBe(5);
      expect(service.getSnapshot()).toBe(newerSnapshot);
      expect(service.search({ query: 'atezolizumab' }).total).toBe(0);
    });

    test('should serve the old snapshot to a query made before a reload', async () => {
      const service = new RetrievalService();
      await service.load(FIXTURE_PATH);
      const before = service.getSnapshot();

      await service.load([{ prompt: 'What is PD-L1?', completion: 'A checkpoint ligand' }]);

      expect(before.store.size).toBe(5);
      expect(service.getSnapshot().store.size).toBe(1);
    });
  });

  describe('Graph cache', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'oncoqa-service-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('should reload the persisted graph on the next start', async () => {
      const graphCachePath = join(dir, 'graph.msgpack');
      const first = await new RetrievalService({ graphCachePath }).load(FIXTURE_PATH);
      const second = await new RetrievalService({ graphCachePath }).load(FIXTURE_PATH);

      expect(second.fingerprint).toBe(first.fingerprint);
      expect(second.graph.edges()).toEqual(first.graph.edges());
      expect(second.graph).not.toBe(first.graph);
    });
  });
});
