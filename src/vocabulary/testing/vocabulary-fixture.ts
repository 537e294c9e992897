import type { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import {
  AncestorRepository,
  ConceptRepository,
  RelationshipRepository,
  SynonymRepository,
} from '../repositories';
import type { ConceptTable, RelationshipTable, VocabularyTableName } from '../types';
import {
  createIndexes,
  createTables,
  insertRecords,
  snapshotFromDatabase,
  TableRecord,
} from '../vocabulary-loader';
import { VocabularySnapshot } from '../vocabulary-snapshot';
import { VocabularyStoreService } from '../vocabulary-store.service';
import { VOCABULARY_TABLES } from '../vocabulary-tables';
import { findMissingClosurePairs } from './transitivity';

export type FixtureConcept = Partial<ConceptTable> &
  Pick<ConceptTable, 'concept_id' | 'concept_name'>;

export type FixtureRelationshipKind = Partial<RelationshipTable> &
  Pick<RelationshipTable, 'relationship_id' | 'reverse_relationship_id'>;

export interface VocabularyFixture {
  concepts: FixtureConcept[];
  // [concept_id_1, concept_id_2, relationship_id]
  relationships?: Array<[number, number, string]>;
  // [ancestor, descendant, min separation]; max separation equals min
  ancestors?: Array<[number, number, number]>;
  // [concept_id, synonym, language_concept_id]
  synonyms?: Array<[number, string, number | null]>;
  relationshipKinds?: FixtureRelationshipKind[];
  // Tables left out of the database entirely
  omitTables?: VocabularyTableName[];
}

export class InvalidFixtureError extends Error {}

export const IS_A_KINDS: FixtureRelationshipKind[] = [
  { relationship_id: 'Is a', reverse_relationship_id: 'Subsumes', defines_ancestry: 1 },
  { relationship_id: 'Subsumes', reverse_relationship_id: 'Is a', defines_ancestry: 1 },
  { relationship_id: 'Maps to', reverse_relationship_id: 'Mapped from', defines_ancestry: 0 },
  { relationship_id: 'Mapped from', reverse_relationship_id: 'Maps to', defines_ancestry: 0 },
];

function conceptRecord(c: FixtureConcept): ConceptTable {
  return {
    domain_id: 'Condition',
    vocabulary_id: 'SNOMED',
    concept_class_id: 'Clinical Finding',
    standard_concept: 'S',
    concept_code: String(c.concept_id),
    valid_start_date: '1970-01-01',
    valid_end_date: '2099-12-31',
    invalid_reason: null,
    ...c,
  };
}

function kindRecord(k: FixtureRelationshipKind): RelationshipTable {
  return {
    relationship_name: k.relationship_id,
    is_hierarchical: k.defines_ancestry ?? 0,
    defines_ancestry: 0,
    relationship_concept_id: null,
    ...k,
  };
}

/**
 * Builds an in-memory vocabulary snapshot. Rejects closure tables that are
 * not transitive.
 */
export function buildVocabularySnapshot(
  fixture: VocabularyFixture,
): VocabularySnapshot {
  const ancestors = fixture.ancestors ?? [];
  const missing = findMissingClosurePairs(
    ancestors.map(([ancestorId, descendantId]) => ({ ancestorId, descendantId })),
  );
  if (missing.length > 0) {
    const pairs = missing.map((p) => `(${p.ancestorId}, ${p.descendantId})`);
    throw new InvalidFixtureError(
      `Ancestor closure is not transitive, missing ${pairs.join(', ')}`,
    );
  }

  const omitted = new Set(fixture.omitTables ?? []);
  const definitions = VOCABULARY_TABLES.filter((t) => !omitted.has(t.table));
  const database = new Database(':memory:');
  createTables(database, definitions);

  const records: Record<VocabularyTableName, TableRecord[]> = {
    concept: fixture.concepts.map(conceptRecord),
    concept_relationship: (fixture.relationships ?? []).map(([c1, c2, rel]) => ({
      concept_id_1: c1,
      concept_id_2: c2,
      relationship_id: rel,
    })),
    concept_ancestor: ancestors.map(([a, d, sep]) => ({
      ancestor_concept_id: a,
      descendant_concept_id: d,
      min_levels_of_separation: sep,
      max_levels_of_separation: sep,
    })),
    concept_synonym: (fixture.synonyms ?? []).map(([id, name, lang]) => ({
      concept_id: id,
      concept_synonym_name: name,
      language_concept_id: lang,
    })),
    relationship: (fixture.relationshipKinds ?? IS_A_KINDS).map(kindRecord),
  };
  for (const def of definitions) {
    insertRecords(database, def, records[def.table]);
  }
  createIndexes(database, definitions);

  return snapshotFromDatabase(database, { kind: 'sqlite', path: ':memory:' });
}

/** A store with `fixture` already published, or with no snapshot at all. */
export async function createVocabularyStore(
  fixture?: VocabularyFixture,
): Promise<VocabularyStoreService> {
  const store = new VocabularyStoreService(
    new ConfigService({ VOCABULARY_AUTOLOAD: 'false' }),
  );
  if (fixture) {
    await store.publish(buildVocabularySnapshot(fixture));
  }
  return store;
}

/** Providers of the vocabulary module bound to `store`. */
export function vocabularyProviders(store: VocabularyStoreService): Provider[] {
  return [
    { provide: VocabularyStoreService, useValue: store },
    ConceptRepository,
    RelationshipRepository,
    AncestorRepository,
    SynonymRepository,
  ];
}
