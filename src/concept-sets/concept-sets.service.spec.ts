import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  createVocabularyStore,
  FixtureConcept,
  vocabularyProviders,
  VocabularyFixture,
} from '../vocabulary/testing/vocabulary-fixture';
import { VocabularyStoreService } from '../vocabulary/vocabulary-store.service';
import type { ConceptSetItem } from './concept-set.types';
import { ConceptSetsService, MAX_BOTTOM_UP_PASSES } from './concept-sets.service';

const item = (conceptId: number, flags: Partial<ConceptSetItem> = {}): ConceptSetItem => ({
  conceptId,
  excluded: false,
  includeDescendants: false,
  includeMapped: false,
  ...flags,
});

const concepts = (...ids: number[]): FixtureConcept[] =>
  ids.map((id) => ({ concept_id: id, concept_name: `Concept ${id}` }));

/**
 * A chain of ancestors A1..An (ids 101..100+n). A1 sits above the leaves 200
 * and 201; every later A(k) sits above A(k-1) and one extra leaf 209 + k.
 * Each bottom-up pass can only climb one rung.
 */
function ladderFixture(rungs: number): VocabularyFixture {
  const rung = (k: number) => 100 + k;
  const leaf = (k: number) => 210 + k;

  const below = new Map<number, Map<number, number>>();
  below.set(rung(1), new Map([[200, 1], [201, 1]]));
  for (let k = 2; k <= rungs; k++) {
    const desc = new Map<number, number>([
      [rung(k - 1), 1],
      [leaf(k - 1), 1],
    ]);
    for (const [id, sep] of below.get(rung(k - 1)) ?? []) desc.set(id, sep + 1);
    below.set(rung(k), desc);
  }

  const ancestors: Array<[number, number, number]> = [];
  for (const [ancestor, desc] of below) {
    for (const [descendant, sep] of desc) ancestors.push([ancestor, descendant, sep]);
  }

  const ids = [200, 201];
  for (let k = 1; k <= rungs; k++) ids.push(rung(k));
  for (let k = 1; k < rungs; k++) ids.push(leaf(k));
  return { concepts: concepts(...ids), ancestors };
}

// The leaves of a ladder with `rungs` rungs
function ladderLeaves(rungs: number): ConceptSetItem[] {
  const ids = [200, 201];
  for (let k = 1; k < rungs; k++) ids.push(210 + k);
  return ids.map((id) => item(id));
}

const conceptIds = (items: ConceptSetItem[]) => items.map((i) => i.conceptId);

describe('ConceptSetsService', () => {
  let service: ConceptSetsService;
  let store: VocabularyStoreService;

  async function createService(fixture?: VocabularyFixture): Promise<void> {
    store = await createVocabularyStore(fixture);
    const moduleRef = await Test.createTestingModule({
      providers: [ConceptSetsService, ...vocabularyProviders(store)],
    }).compile();
    service = moduleRef.get(ConceptSetsService);
  }

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  afterEach(async () => {
    await store.onModuleDestroy();
  });

  describe('bottom-up', () => {
    it('replaces children by an ancestor whose descendants they cover', async () => {
      await createService({
        concepts: [{ concept_id: 1, concept_name: 'Parent' }, ...concepts(2, 3)],
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
        ],
      });

      const result = await service.optimize([item(2), item(3)]);

      expect(result).toEqual({
        status: 'ok',
        strategy: 'bottom_up',
        optimizedItems: [
          {
            conceptId: 1,
            conceptName: 'Parent',
            excluded: false,
            includeDescendants: true,
            includeMapped: false,
          },
        ],
        removedItems: [item(2), item(3)],
        addedItems: [
          {
            conceptId: 1,
            conceptName: 'Parent',
            excluded: false,
            includeDescendants: true,
            includeMapped: false,
          },
        ],
        removedCount: 2,
        passes: 1,
        iterationLimitReached: false,
      });
    });

    it('leaves an optimized set unchanged on a second run', async () => {
      await createService({
        concepts: concepts(1, 2, 3),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
        ],
      });

      const first = await service.optimize([item(2), item(3)]);
      const second = await service.optimize(first.optimizedItems);

      expect(second.status).toBe('ok');
      expect(second.strategy).toBe('none');
      expect(second.optimizedItems).toEqual(first.optimizedItems);
    });

    it('keeps the set when the ancestor has an uncovered descendant', async () => {
      await createService({
        concepts: concepts(1, 2, 3, 4),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
          [1, 4, 1],
        ],
      });

      const result = await service.optimize([item(2), item(3)]);

      expect(result.strategy).toBe('none');
      expect(result.optimizedItems).toEqual([item(2), item(3)]);
    });

    it('counts descendants covered through an expanded item', async () => {
      await createService({
        concepts: concepts(1, 2, 3, 4),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
          [1, 4, 2],
          [2, 4, 1],
        ],
      });

      const result = await service.optimize([item(2, { includeDescendants: true }), item(3)]);

      expect(result.strategy).toBe('bottom_up');
      expect(result.optimizedItems.map((i) => i.conceptId)).toEqual([1]);
    });

    it('does not count excluded items as coverage', async () => {
      await createService({
        concepts: concepts(1, 2, 3, 4),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
          [1, 4, 1],
        ],
      });
      const items = [item(2), item(3), item(4, { excluded: true })];

      const result = await service.optimize(items);

      expect(result.strategy).toBe('none');
      expect(result.optimizedItems).toEqual(items);
    });

    it('stops after the pass limit', async () => {
      await createService(ladderFixture(11));

      const result = await service.optimize(ladderLeaves(11));

      expect(conceptIds(result.optimizedItems)).toEqual([220, 110]);
      // 200 and 201, then one rung and one leaf per later pass
      expect(result.removedCount).toBe(20);
      expect(conceptIds(result.removedItems).sort((a, b) => a - b)).toEqual([
        101, 102, 103, 104, 105, 106, 107, 108, 109,
        200, 201, 211, 212, 213, 214, 215, 216, 217, 218, 219,
      ]);
      expect(conceptIds(result.addedItems)).toEqual([
        101, 102, 103, 104, 105, 106, 107, 108, 109, 110,
      ]);
      expect(result.passes).toBe(MAX_BOTTOM_UP_PASSES);
      expect(result.iterationLimitReached).toBe(true);
    });

    it('does not flag the limit when the last allowed pass finishes the work', async () => {
      await createService(ladderFixture(10));

      const result = await service.optimize(ladderLeaves(10));

      expect(conceptIds(result.optimizedItems)).toEqual([110]);
      expect(result.passes).toBe(MAX_BOTTOM_UP_PASSES);
      expect(result.iterationLimitReached).toBe(false);
    });

    it('reports ancestors replaced in a later pass as both added and removed', async () => {
      await createService({
        concepts: concepts(1, 2, 3, 4, 10, 20, 100),
        ancestors: [
          [10, 1, 1],
          [10, 2, 1],
          [20, 3, 1],
          [20, 4, 1],
          [100, 10, 1],
          [100, 20, 1],
          [100, 1, 2],
          [100, 2, 2],
          [100, 3, 2],
          [100, 4, 2],
        ],
      });

      const result = await service.optimize([item(1), item(2), item(3), item(4)]);

      expect(result.strategy).toBe('bottom_up');
      expect(conceptIds(result.optimizedItems)).toEqual([100]);
      expect(conceptIds(result.removedItems)).toEqual([1, 2, 3, 4, 10, 20]);
      expect(result.removedCount).toBe(6);
      expect(conceptIds(result.addedItems)).toEqual([10, 20, 100]);
      expect(result.passes).toBe(2);
      expect(result.iterationLimitReached).toBe(false);
    });

    it('lets the ancestor with more children claim a shared child', async () => {
      // 7 covers {2, 3, 4}; 1 covers {4, 6} and loses 4 to 7
      await createService({
        concepts: concepts(1, 2, 3, 4, 6, 7),
        ancestors: [
          [7, 2, 1],
          [7, 3, 1],
          [7, 4, 1],
          [1, 4, 1],
          [1, 6, 1],
        ],
      });

      const result = await service.optimize([item(2), item(3), item(4), item(6)]);

      expect(conceptIds(result.optimizedItems)).toEqual([6, 7]);
      expect(conceptIds(result.removedItems)).toEqual([2, 3, 4]);
      expect(conceptIds(result.addedItems)).toEqual([7]);
      expect(result.passes).toBe(1);
    });

    it('breaks a tie in children by the lower ancestor id', async () => {
      await createService({
        concepts: concepts(2, 3, 4, 8, 9),
        ancestors: [
          [9, 2, 1],
          [9, 3, 1],
          [8, 3, 1],
          [8, 4, 1],
        ],
      });

      const result = await service.optimize([item(2), item(3), item(4)]);

      expect(conceptIds(result.optimizedItems)).toEqual([2, 8]);
      expect(conceptIds(result.addedItems)).toEqual([8]);
    });

    it('handles sets larger than one statement can bind', async () => {
      await createService({
        concepts: concepts(1, 2, 3),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
        ],
      });
      const unknown = Array.from({ length: 40_000 }, (_, i) => item(10_000 + i));

      const result = await service.optimize([item(2), item(3), ...unknown]);

      expect(result.status).toBe('ok');
      expect(result.strategy).toBe('bottom_up');
      expect(conceptIds(result.removedItems)).toEqual([2, 3]);
      expect(conceptIds(result.addedItems)).toEqual([1]);
      expect(result.optimizedItems).toHaveLength(40_001);
      expect(result.optimizedItems[40_000].conceptId).toBe(1);
    });
  });

  describe('top-down', () => {
    it('drops items already below an expanded item', async () => {
      await createService({
        concepts: concepts(1, 2, 3),
        ancestors: [
          [1, 2, 1],
          [1, 3, 1],
        ],
      });

      const result = await service.optimize([item(1, { includeDescendants: true }), item(2)]);

      expect(result.strategy).toBe('top_down');
      expect(result.optimizedItems).toEqual([item(1, { includeDescendants: true })]);
      expect(result.removedItems).toEqual([item(2)]);
      expect(result.addedItems).toEqual([]);
      expect(result.passes).toBe(0);
    });
  });

  describe('without a vocabulary', () => {
    it('returns the input unchanged', async () => {
      await createService();
      const items = [item(2), item(3)];

      const result = await service.optimize(items);

      expect(result.status).toBe('unavailable');
      expect(result.strategy).toBe('none');
      expect(result.optimizedItems).toEqual(items);
    });
  });
});
