import { Injectable, Logger } from '@nestjs/common';
import { chunk, unique } from '../../common/batch';
import { VocabularyStoreService } from '../vocabulary-store.service';
import type { SourcedConcept, VocabularyConcept } from '../vocabulary.types';
import { toVocabularyConcept } from './concept.repository';
import {
  enrichmentTarget,
  inIdList,
  standardValidConcept,
  validConcept,
} from './sql-filters';

export type ClosureDirection = 'ancestors' | 'descendants';

export interface ClosureConcept {
  concept: VocabularyConcept;
  minSeparation: number;
}

export interface ClosurePair {
  ancestorId: number;
  descendantId: number;
}

export interface ClosureQueryOptions {
  standardValidOnly?: boolean;
  includeSelf?: boolean;
}

/**
 * Point queries over the ancestor closure, always keyed by an ancestor or a
 * descendant id so that only the rows touching the request are read.
 */
@Injectable()
export class AncestorRepository {
  private readonly logger = new Logger(AncestorRepository.name);

  constructor(private readonly store: VocabularyStoreService) {}

  // ============================================
  // 1. NEIGHBOURHOOD OF ONE CONCEPT
  // ============================================

  /**
   * Concepts on the other side of the closure rows of `conceptId`, one entry
   * per concept with its smallest separation. Rows pointing at concepts that
   * are missing from the concept table are skipped.
   */
  async findClosureConcepts(
    conceptId: number,
    direction: ClosureDirection,
    options: ClosureQueryOptions = {},
  ): Promise<ClosureConcept[]> {
    const [anchor, other] =
      direction === 'ancestors'
        ? (['ca.descendant_concept_id', 'ca.ancestor_concept_id'] as const)
        : (['ca.ancestor_concept_id', 'ca.descendant_concept_id'] as const);

    const rows = await this.store.executeRead((db) => {
      let query = db
        .selectFrom('concept_ancestor as ca')
        .innerJoin('concept as c', 'c.concept_id', other)
        .selectAll('c')
        .select('ca.min_levels_of_separation')
        .where(anchor, '=', conceptId);
      if (!options.includeSelf) {
        query = query.where(other, '!=', conceptId);
      }
      if (options.standardValidOnly) {
        query = query.where(standardValidConcept('c'));
      }
      return query.execute();
    });

    const byConcept = new Map<number, ClosureConcept>();
    for (const row of rows) {
      const seen = byConcept.get(row.concept_id);
      if (!seen || row.min_levels_of_separation < seen.minSeparation) {
        byConcept.set(row.concept_id, {
          concept: toVocabularyConcept(row),
          minSeparation: row.min_levels_of_separation,
        });
      }
    }

    if (!options.standardValidOnly) {
      await this.reportDanglingRows(conceptId, direction, rows.length, options);
    }
    return [...byConcept.values()];
  }

  private async reportDanglingRows(
    conceptId: number,
    direction: ClosureDirection,
    joined: number,
    options: ClosureQueryOptions,
  ): Promise<void> {
    const [anchor, other] =
      direction === 'ancestors'
        ? (['descendant_concept_id', 'ancestor_concept_id'] as const)
        : (['ancestor_concept_id', 'descendant_concept_id'] as const);

    const res = await this.store.executeRead((db) => {
      let query = db
        .selectFrom('concept_ancestor')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .where(anchor, '=', conceptId);
      if (!options.includeSelf) {
        query = query.where(other, '!=', conceptId);
      }
      return query.executeTakeFirst();
    });

    const skipped = Number(res?.count ?? 0) - joined;
    if (skipped > 0) {
      this.logger.debug(
        `Skipped ${skipped} ${direction} closure rows of ${conceptId} with no concept`,
      );
    }
  }

  /**
   * Distinct valid descendants of `ancestorId` matching a class, domain and
   * vocabulary filter, ordered by name.
   */
  async findValidDescendantsOfClass(
    ancestorId: number,
    filter: { conceptClassId: string; domainId: string; vocabularyIds: readonly string[] },
  ): Promise<VocabularyConcept[]> {
    const rows = await this.store.executeRead((db) =>
      db
        .selectFrom('concept_ancestor as ca')
        .innerJoin('concept as c', 'c.concept_id', 'ca.descendant_concept_id')
        .selectAll('c')
        .distinct()
        .where('ca.ancestor_concept_id', '=', ancestorId)
        .where('c.concept_class_id', '=', filter.conceptClassId)
        .where('c.domain_id', '=', filter.domainId)
        .where('c.vocabulary_id', 'in', [...filter.vocabularyIds])
        .where(validConcept('c'))
        .orderBy('c.concept_name')
        .orderBy('c.concept_id')
        .execute(),
    );
    return rows.map(toVocabularyConcept);
  }

  // ============================================
  // 2. SET QUERIES
  // ============================================

  /** Proper ancestors of each of `descendantIds`. */
  async findAncestorPairs(
    descendantIds: readonly number[],
  ): Promise<ClosurePair[]> {
    const pairs: ClosurePair[] = [];
    for (const ids of chunk(unique(descendantIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_ancestor')
          .select(['ancestor_concept_id', 'descendant_concept_id'])
          .where('descendant_concept_id', 'in', ids)
          .whereRef('ancestor_concept_id', '!=', 'descendant_concept_id')
          .execute(),
      );
      pairs.push(...rows.map(toPair));
    }
    return pairs;
  }

  /**
   * Closure rows from each of `ancestorIds` that land in `withinIds`. Self
   * rows are kept when the closure has them.
   */
  async findDescendantPairs(
    ancestorIds: readonly number[],
    withinIds: readonly number[],
  ): Promise<ClosurePair[]> {
    if (withinIds.length === 0) return [];
    const targets = unique(withinIds);

    const pairs: ClosurePair[] = [];
    for (const ids of chunk(unique(ancestorIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_ancestor as ca')
          .select(['ca.ancestor_concept_id', 'ca.descendant_concept_id'])
          .where('ca.ancestor_concept_id', 'in', ids)
          .where(inIdList('ca.descendant_concept_id', targets))
          .execute(),
      );
      pairs.push(...rows.map(toPair));
    }
    return pairs;
  }

  /**
   * Descendants (self rows included) of each source concept that mapping
   * enrichment may derive from it. See `enrichmentTarget`.
   */
  async findEnrichmentDescendants(
    sourceIds: readonly number[],
  ): Promise<SourcedConcept[]> {
    const found: SourcedConcept[] = [];
    for (const ids of chunk(unique(sourceIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_ancestor as ca')
          .innerJoin('concept as s', 's.concept_id', 'ca.ancestor_concept_id')
          .innerJoin('concept as c', 'c.concept_id', 'ca.descendant_concept_id')
          .selectAll('c')
          .select('ca.ancestor_concept_id as source_id')
          .where('ca.ancestor_concept_id', 'in', ids)
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

  /** Number of proper descendants of each ancestor. */
  async countDescendants(
    ancestorIds: readonly number[],
  ): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    for (const ids of chunk(unique(ancestorIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_ancestor')
          .select((eb) => [
            'ancestor_concept_id',
            eb.fn.count<number>('descendant_concept_id').distinct().as('total'),
          ])
          .where('ancestor_concept_id', 'in', ids)
          .whereRef('ancestor_concept_id', '!=', 'descendant_concept_id')
          .groupBy('ancestor_concept_id')
          .execute(),
      );
      for (const row of rows) counts.set(row.ancestor_concept_id, Number(row.total));
    }
    return counts;
  }

  /**
   * Number of proper descendants of each ancestor that are covered: either a
   * member of `memberIds` or below one of `expandedIds` in the closure.
   */
  async countCoveredDescendants(
    ancestorIds: readonly number[],
    memberIds: readonly number[],
    expandedIds: readonly number[],
  ): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    if (memberIds.length === 0) return counts;

    const members = unique(memberIds);
    const expanded = unique(expandedIds);
    for (const ids of chunk(unique(ancestorIds))) {
      const rows = await this.store.executeRead((db) =>
        db
          .selectFrom('concept_ancestor as ca')
          .select((eb) => [
            'ca.ancestor_concept_id',
            eb.fn.count<number>('ca.descendant_concept_id').distinct().as('covered'),
          ])
          .where('ca.ancestor_concept_id', 'in', ids)
          .whereRef('ca.ancestor_concept_id', '!=', 'ca.descendant_concept_id')
          .where((eb) =>
            expanded.length === 0
              ? inIdList('ca.descendant_concept_id', members)
              : eb.or([
                  inIdList('ca.descendant_concept_id', members),
                  eb.exists(
                    eb
                      .selectFrom('concept_ancestor as cx')
                      .select('cx.ancestor_concept_id')
                      .whereRef('cx.descendant_concept_id', '=', 'ca.descendant_concept_id')
                      .where(inIdList('cx.ancestor_concept_id', expanded)),
                  ),
                ]),
          )
          .groupBy('ca.ancestor_concept_id')
          .execute(),
      );
      for (const row of rows) counts.set(row.ancestor_concept_id, Number(row.covered));
    }
    return counts;
  }
}

function toPair(row: {
  ancestor_concept_id: number;
  descendant_concept_id: number;
}): ClosurePair {
  return {
    ancestorId: row.ancestor_concept_id,
    descendantId: row.descendant_concept_id,
  };
}
