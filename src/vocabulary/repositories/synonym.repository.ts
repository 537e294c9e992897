import { Injectable } from '@nestjs/common';
import { VocabularyStoreService } from '../vocabulary-store.service';
import type { ConceptSynonym } from '../vocabulary.types';

@Injectable()
export class SynonymRepository {
  constructor(private readonly store: VocabularyStoreService) {}

  /** Synonyms of a concept with the name of their language concept, if known. */
  async findByConceptId(conceptId: number): Promise<ConceptSynonym[]> {
    return this.store.executeRead(async (db, snapshot) => {
      if (!snapshot.hasTable('concept_synonym')) return [];

      const rows = await db
        .selectFrom('concept_synonym as cs')
        .leftJoin('concept as lang', 'lang.concept_id', 'cs.language_concept_id')
        .select([
          'cs.concept_synonym_name',
          'cs.language_concept_id',
          'lang.concept_name as language',
        ])
        .where('cs.concept_id', '=', conceptId)
        .execute();

      return rows.map(
        (r): ConceptSynonym => ({
          synonym: r.concept_synonym_name,
          language: r.language,
          languageConceptId: r.language_concept_id,
        }),
      );
    });
  }
}
