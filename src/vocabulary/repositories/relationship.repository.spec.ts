import { Test } from '@nestjs/testing';
import {
  createVocabularyStore,
  vocabularyProviders,
  VocabularyFixture,
} from '../testing/vocabulary-fixture';
import { VocabularyStoreService } from '../vocabulary-store.service';
import { RelationshipRepository } from './relationship.repository';

const FIXTURE: VocabularyFixture = {
  concepts: [
    { concept_id: 1, concept_name: 'Hypertensive disorder' },
    { concept_id: 2, concept_name: 'Essential hypertension' },
    { concept_id: 3, concept_name: 'Old hypertension', invalid_reason: 'U' },
    { concept_id: 4, concept_name: 'I10', vocabulary_id: 'ICD10' },
    {
      concept_id: 5,
      concept_name: 'Lisinopril 10 MG Oral Tablet',
      domain_id: 'Drug',
      concept_class_id: 'Clinical Drug',
    },
    {
      concept_id: 6,
      concept_name: 'Lisinopril',
      domain_id: 'Drug',
      concept_class_id: 'Ingredient',
    },
  ],
  relationships: [
    [1, 2, 'Maps to'],
    [1, 3, 'Maps to'],
    [1, 4, 'Mapped from'],
    [1, 5, 'Mapped from'],
    [1, 6, 'Maps to'],
    [2, 1, 'Is a'],
  ],
};

describe('RelationshipRepository', () => {
  let repo: RelationshipRepository;
  let store: VocabularyStoreService;

  beforeEach(async () => {
    store = await createVocabularyStore(FIXTURE);
    const moduleRef = await Test.createTestingModule({
      providers: vocabularyProviders(store),
    }).compile();
    repo = moduleRef.get(RelationshipRepository);
  });

  afterEach(async () => {
    await store.onModuleDestroy();
  });

  describe('findEnrichmentTargets', () => {
    it('keeps valid same-vocabulary targets and clinical drugs only', async () => {
      const found = await repo.findEnrichmentTargets([1], ['Maps to', 'Mapped from']);

      expect(found.map((f) => f.concept.conceptId).sort((a, b) => a - b)).toEqual([
        2, 5,
      ]);
      expect(found.every((f) => f.sourceId === 1)).toBe(true);
    });

    it('follows only the requested relationships', async () => {
      const found = await repo.findEnrichmentTargets([1, 2], ['Is a']);

      expect(found).toEqual([
        { sourceId: 2, concept: expect.objectContaining({ conceptId: 1 }) },
      ]);
    });
  });
});
