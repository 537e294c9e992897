import { Injectable, Logger } from '@nestjs/common';
import { chunk, unique } from '../../common/batch';
import { HierarchyDirectionResolver } from '../hierarchy-direction';
import { VocabularyStoreService } from '../vocabulary-store.service';
import { VocabularySnapshot } from '../vocabulary-snapshot';
import type {
  RelatedConcept,
  RelationshipEdge,
  RelationshipKind,
  SourcedConcept,
} from '../vocabulary.types';
import { toVocabularyConcept } from './concept.repository';
import { enrichmentTarget, standardValidConcept } from './sql-filters';

export interface ConceptPair {
  sourceId: number;
  targetId: number;
}

@Injectable()
export class RelationshipRepository {
  private readonly logger = new Logger(RelationshipRepository.name);

  // Hierarchical kinds never change within a snapshot
  private readonly resolvers = new WeakMap<
    VocabularySnapshot,
    Promise<HierarchyDirectionResolver>
  >();

  constructor(private readonly store: VocabularyStoreService) {}

  // ============================================
  // RELATED CONCEPTS
  // ============================================

  /** Targets of relationships leaving `conceptId`; dangling targets are dropped by the join. */
  async findRelated(
    conceptId: number,
    standardValidOnly: boolean,
  ): Promise<RelatedConcept[]> {
    const rows = await this.store.executeRead((db) => {
      let query = db
        .selectFrom('concept_relationship as cr')
        .innerJoin('concept as c', 'c.concept_id', 'cr.concept_id_2')
        .select([
          'c.concept_id',
          'c.concept_name',
          'c.vocabulary_id',
          'c.concept_code',
          'cr.relationship_id',
        ])
        .where('cr.concept_id_1', '=', conceptId);
      if (standardValidOnly) {
        query = query.where(standardValidConcept('c'));
      }
      return query.execute();
    });

    return rows.map((r) => ({
      conceptId: r.concept_id,
      conceptName: r.concept_name,
      vocabularyId: r.vocabulary_id,
      conceptCode: r.concept_code,
      relationshipId: r.relationship_id,
    }));
  }

  // ============================================
  // EDGE TRAVERSAL
  // ============================================

  async findForward(
    sourceIds: readonly number[],
    relationshipIds: readonly string[],
  ): Promise<ConceptPair[]> {
    const pairs: ConceptPair[] = [];
    for (const ids of chunk(unique(sourceIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_relationship')
          .select(['concept_id_1', 'concept_id_2'])
          .where('concept_id_1', 'in', ids)
          .where('relationship_id', 'in', [...relationshipIds])
          .execute(),
      );
      pairs.push(
        ...rows.map((r) => ({ sourceId: r.concept_id_1, targetId: r.concept_id_2 })),
      );
    }
    return pairs;
  }

  /**
   * Targets of the given relationships that mapping enrichment may derive
   * from their source. See `enrichmentTarget`.
   */
  async findEnrichmentTargets(
    sourceIds: readonly number[],
    relationshipIds: readonly string[],
  ): Promise<SourcedConcept[]> {
    const found: SourcedConcept[] = [];
    for (const ids of chunk(unique(sourceIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_relationship as cr')
          .innerJoin('concept as s', 's.concept_id', 'cr.concept_id_1')
          .innerJoin('concept as c', 'c.concept_id', 'cr.concept_id_2')
          .selectAll('c')
          .select('cr.concept_id_1 as source_id')
          .where('cr.concept_id_1', 'in', ids)
          .where('cr.relationship_id', 'in', [...relationshipIds])
          .where(enrichmentTarget('s', 'c'))
          .execute(),
      );
      found.push(
        ...rows.map((row) => ({
          sourceId: row.source_id,
          concept: toVocabularyConcept(row),
        })),
      );
    }
    return found;
  }

  /** Rows whose second concept is one of `targetIds`. */
  async findBackward(
    targetIds: readonly number[],
    relationshipIds: readonly string[],
  ): Promise<ConceptPair[]> {
    const pairs: ConceptPair[] = [];
    for (const ids of chunk(unique(targetIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_relationship')
          .select(['concept_id_1', 'concept_id_2'])
          .where('concept_id_2', 'in', ids)
          .where('relationship_id', 'in', [...relationshipIds])
          .execute(),
      );
      pairs.push(
        ...rows.map((r) => ({ sourceId: r.concept_id_1, targetId: r.concept_id_2 })),
      );
    }
    return pairs;
  }

  // ============================================
  // HIERARCHY
  // ============================================

  async getDirectionResolver(): Promise<HierarchyDirectionResolver> {
    return this.store.executeRead((_db, snapshot) => {
      let resolver = this.resolvers.get(snapshot);
      if (!resolver) {
        resolver = this.buildResolver(snapshot);
        this.resolvers.set(snapshot, resolver);
      }
      return resolver;
    });
  }

  private async buildResolver(
    snapshot: VocabularySnapshot,
  ): Promise<HierarchyDirectionResolver> {
    try {
      const kinds = await this.loadKinds(snapshot);
      if (kinds.length === 0) {
        this.logger.warn('No hierarchical relationship kinds in this vocabulary');
      }
      return new HierarchyDirectionResolver(kinds);
    } catch (error) {
      // A failed lookup is not cached
      this.resolvers.delete(snapshot);
      throw error;
    }
  }

  private async loadKinds(
    snapshot: VocabularySnapshot,
  ): Promise<RelationshipKind[]> {
    if (!snapshot.hasTable('relationship')) return [];
    const rows = await snapshot.db
      .selectFrom('relationship')
      .select(['relationship_id', 'reverse_relationship_id', 'defines_ancestry'])
      .where('defines_ancestry', '=', 1)
      .execute();
    return rows.map((r) => ({
      relationshipId: r.relationship_id,
      reverseRelationshipId: r.reverse_relationship_id,
      definesAncestry: r.defines_ancestry === 1,
    }));
  }

  /**
   * Hierarchical edges with both ends inside `conceptIds`.
   */
  async findEdgesAmong(
    conceptIds: readonly number[],
    relationshipIds: readonly string[],
  ): Promise<RelationshipEdge[]> {
    if (relationshipIds.length === 0) return [];
    const members = new Set(conceptIds);
    const edges: RelationshipEdge[] = [];
    for (const ids of chunk([...members])) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_relationship')
          .select(['concept_id_1', 'concept_id_2', 'relationship_id'])
          .where('concept_id_1', 'in', ids)
          .where('relationship_id', 'in', [...relationshipIds])
          .execute(),
      );
      for (const r of rows) {
        if (!members.has(r.concept_id_2)) continue;
        edges.push({
          conceptId1: r.concept_id_1,
          conceptId2: r.concept_id_2,
          relationshipId: r.relationship_id,
        });
      }
    }
    return edges;
  }

  /** Edges of the given kinds with `conceptId` at either end. */
  async findEdgesTouching(
    conceptId: number,
    relationshipIds: readonly string[],
  ): Promise<RelationshipEdge[]> {
    if (relationshipIds.length === 0) return [];
    const rows = await this.store.executeRead((db) =>
      db
        .selectFrom('concept_relationship')
        .select(['concept_id_1', 'concept_id_2', 'relationship_id'])
        .where((eb) =>
          eb.or([
            eb('concept_id_1', '=', conceptId),
            eb('concept_id_2', '=', conceptId),
          ]),
        )
        .where('relationship_id', 'in', [...relationshipIds])
        .execute(),
    );
    return rows.map((r) => ({
      conceptId1: r.concept_id_1,
      conceptId2: r.concept_id_2,
      relationshipId: r.relationship_id,
    }));
  }
}
