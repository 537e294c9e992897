import { Test } from '@nestjs/testing';
import type { Kysely } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DbRouter } from '../../db/db-router';
import { createCurationDb } from '../../db/testing/sqlite-curation-db';
import type { DB } from '../../db/types';
import type { Mapping } from './domain.types';
import { MappingRepository } from './mapping.repository';

const row = (
  general_concept_id: number,
  concept_id: number,
  source: Mapping['source'],
  recommended = 0,
) => ({ general_concept_id, concept_id, source, recommended, unit_concept_id: null });

const derived = (generalConceptId: number, conceptId: number, recommended: boolean): Mapping => ({
  generalConceptId,
  conceptId,
  unitConceptId: null,
  recommended,
  source: 'derived',
});

describe('MappingRepository', () => {
  let db: Kysely<DB>;
  let repository: MappingRepository;

  beforeEach(async () => {
    db = createCurationDb();
    await db
      .insertInto('concept_mappings')
      .values([
        row(1, 10, 'manual', 1),
        row(1, 11, 'derived', 1),
        row(2, 20, 'manual'),
        row(2, 21, 'derived'),
      ])
      .execute();

    const moduleRef = await Test.createTestingModule({
      providers: [
        MappingRepository,
        { provide: DatabaseService, useValue: { db: new DbRouter(db) } },
      ],
    }).compile();
    repository = moduleRef.get(MappingRepository);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('reads', () => {
    it('maps rows to mappings in insertion order', async () => {
      const mappings = await repository.findAll();

      expect(mappings[0]).toEqual({
        generalConceptId: 1,
        conceptId: 10,
        unitConceptId: null,
        recommended: true,
        source: 'manual',
      });
      expect(mappings.map((m) => m.conceptId)).toEqual([10, 11, 20, 21]);
    });

    it('filters by general concept', async () => {
      const mappings = await repository.findByGeneralConcept(2);

      expect(mappings.map((m) => [m.conceptId, m.source])).toEqual([
        [20, 'manual'],
        [21, 'derived'],
      ]);
    });
  });

  describe('replaceDerived', () => {
    it('replaces only the derived rows', async () => {
      const result = await repository.replaceDerived([
        derived(1, 12, true),
        derived(2, 22, false),
      ]);

      expect(result).toEqual({ deleted: 2, inserted: 2 });
      const mappings = await repository.findAll();
      expect(mappings.map((m) => [m.conceptId, m.source, m.recommended])).toEqual([
        [10, 'manual', true],
        [20, 'manual', false],
        [12, 'derived', true],
        [22, 'derived', false],
      ]);
    });

    it('rolls the whole replacement back when an insert fails', async () => {
      await expect(
        repository.replaceDerived([derived(1, 12, true), derived(1, 0, false)]),
      ).rejects.toThrow();

      const mappings = await repository.findAll();
      expect(mappings.map((m) => m.conceptId)).toEqual([10, 11, 20, 21]);
    });

    it('clears the derived rows when nothing is derived', async () => {
      await expect(repository.replaceDerived([])).resolves.toEqual({
        deleted: 2,
        inserted: 0,
      });
    });
  });
});
