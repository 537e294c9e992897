import { Injectable } from '@nestjs/common';
import { sql } from 'kysely';
import type { Selectable } from 'kysely';
import { chunk, unique } from '../../common/batch';
import { normalizeSearchText } from '../../common/text';
import type { ConceptTable } from '../types';
import { VocabularyStoreService } from '../vocabulary-store.service';
import {
  isValid,
  ScoredConcept,
  toStandardFlag,
  VocabularyConcept,
} from '../vocabulary.types';
import { standardValidConcept, validConcept } from './sql-filters';

export interface ConceptSearchOptions {
  limit: number;
  // rows scoring at or below this are dropped
  minScore: number;
  domainId?: string;
  vocabularyIds?: readonly string[];
  standardOnly?: boolean;
}

export function toVocabularyConcept(
  row: Selectable<ConceptTable>,
): VocabularyConcept {
  return {
    conceptId: row.concept_id,
    conceptName: row.concept_name,
    domainId: row.domain_id,
    vocabularyId: row.vocabulary_id,
    conceptClassId: row.concept_class_id,
    conceptCode: row.concept_code,
    standardFlag: toStandardFlag(row.standard_concept),
    valid: isValid(row.invalid_reason),
  };
}

@Injectable()
export class ConceptRepository {
  constructor(private readonly store: VocabularyStoreService) {}

  async findById(conceptId: number): Promise<VocabularyConcept | null> {
    const row = await this.store.executeRead((db) =>
      db
        .selectFrom('concept')
        .selectAll()
        .where('concept_id', '=', conceptId)
        .executeTakeFirst(),
    );
    return row ? toVocabularyConcept(row) : null;
  }

  async findByIds(
    conceptIds: readonly number[],
  ): Promise<Map<number, VocabularyConcept>> {
    const found = new Map<number, VocabularyConcept>();
    for (const ids of chunk(unique(conceptIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept')
          .selectAll()
          .where('concept_id', 'in', ids)
          .execute(),
      );
      for (const row of rows) found.set(row.concept_id, toVocabularyConcept(row));
    }
    return found;
  }

  /**
   * Valid concepts of a class among the given ids, optionally restricted to
   * a set of vocabularies.
   */
  async findValidOfClass(
    conceptIds: readonly number[],
    conceptClassId: string,
    vocabularyIds?: readonly string[],
  ): Promise<VocabularyConcept[]> {
    const result: VocabularyConcept[] = [];
    for (const ids of chunk(unique(conceptIds))) {
      const rows = await this.store.executeRead((db) => {
        let query = db
          .selectFrom('concept as c')
          .selectAll('c')
          .where('c.concept_id', 'in', ids)
          .where('c.concept_class_id', '=', conceptClassId)
          .where(validConcept('c'));
        if (vocabularyIds && vocabularyIds.length > 0) {
          query = query.where('c.vocabulary_id', 'in', [...vocabularyIds]);
        }
        return query.execute();
      });
      result.push(...rows.map(toVocabularyConcept));
    }
    return result;
  }

  async findValidByNameIgnoringCase(
    name: string,
    conceptClassId: string,
    vocabularyIds: readonly string[],
  ): Promise<VocabularyConcept[]> {
    const rows = await this.store.executeRead((db) =>
      db
        .selectFrom('concept as c')
        .selectAll('c')
        .where((eb) => eb(eb.fn<string>('lower', ['c.concept_name']), '=', name.toLowerCase()))
        .where('c.concept_class_id', '=', conceptClassId)
        .where('c.vocabulary_id', 'in', [...vocabularyIds])
        .where(validConcept('c'))
        .execute(),
    );
    return rows.map(toVocabularyConcept);
  }

  /**
   * Name search over the whole concept table. Both sides are compared after
   * `search_text` normalization: a name containing the query scores 1,
   * anything else its Jaro-Winkler similarity to the query. Best scores
   * first, then shorter names.
   */
  async search(
    query: string,
    options: ConceptSearchOptions,
  ): Promise<ScoredConcept[]> {
    const needle = normalizeSearchText(query);
    if (needle === '') return [];

    const rows = await this.store.executeRead((db) => {
      const name = sql<string>`search_text(${sql.ref('c.concept_name')})`;
      const score = sql<number>`CASE WHEN instr(${name}, ${needle}) > 0 THEN 1.0
        ELSE jaro_winkler_similarity(${name}, ${needle}) END`;

      let q = db
        .selectFrom('concept as c')
        .selectAll('c')
        .select(score.as('score'))
        .where(score, '>', options.minScore);
      if (options.domainId) {
        q = q.where('c.domain_id', '=', options.domainId);
      }
      if (options.vocabularyIds && options.vocabularyIds.length > 0) {
        q = q.where('c.vocabulary_id', 'in', [...options.vocabularyIds]);
      }
      if (options.standardOnly) {
        q = q.where(standardValidConcept('c'));
      }
      return q
        .orderBy('score', 'desc')
        .orderBy(sql`length(${sql.ref('c.concept_name')})`)
        .orderBy('c.concept_id')
        .limit(options.limit)
        .execute();
    });

    return rows.map((row) => ({ ...toVocabularyConcept(row), score: row.score }));
  }
}
