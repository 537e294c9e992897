import { Injectable, Logger } from '@nestjs/common';
import { errorMessage, StoreUnavailableError } from '../common/errors';
import { compareText } from '../common/text';
import { MappingRepository } from '../database/repositories';
import {
  AncestorRepository,
  ClosureConcept,
  ConceptRepository,
  ConceptSearchOptions,
  RelationshipRepository,
  SynonymRepository,
} from '../vocabulary/repositories';
import type {
  ConceptSynonym,
  HierarchyLabel,
  HierarchyNeighbor,
  RecommendationCandidate,
  RelatedConcept,
  ScoredConcept,
  VocabularyConcept,
} from '../vocabulary/vocabulary.types';

export const RXNORM_VOCABULARIES = ['RxNorm', 'RxNorm Extension'] as const;

export const DEFAULT_SEARCH_LIMIT = 100;
export const DEFAULT_MIN_SCORE = 0.75;

export interface ConceptSearchResult {
  concepts: ScoredConcept[];
  total: number;
  // ms
  took: number;
}

/**
 * Read-only queries over the loaded vocabulary. Every operation degrades to
 * an empty result when the vocabulary is unavailable or a query fails.
 */
@Injectable()
export class ConceptsService {
  private readonly logger = new Logger(ConceptsService.name);

  constructor(
    private readonly conceptRepo: ConceptRepository,
    private readonly relationshipRepo: RelationshipRepository,
    private readonly ancestorRepo: AncestorRepository,
    private readonly synonymRepo: SynonymRepository,
    private readonly mappingRepo: MappingRepository,
  ) {}

  // ==========================================
  // 1. CONCEPT LOOKUP
  // ==========================================

  async findConcept(conceptId: number): Promise<VocabularyConcept | null> {
    return this.degrade('findConcept', null, () =>
      this.conceptRepo.findById(conceptId),
    );
  }

  /** Concepts whose name contains, or nearly matches, `query`. */
  async searchConcepts(
    query: string,
    options: Partial<ConceptSearchOptions> = {},
  ): Promise<ConceptSearchResult> {
    const started = Date.now();
    const concepts = await this.degrade('searchConcepts', [], () =>
      this.conceptRepo.search(query, {
        ...options,
        limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
        minScore: options.minScore ?? DEFAULT_MIN_SCORE,
      }),
    );
    return { concepts, total: concepts.length, took: Date.now() - started };
  }

  // ==========================================
  // 2. RELATIONSHIPS
  // ==========================================

  async relatedConcepts(
    conceptId: number,
    filterToStandardValid = false,
  ): Promise<RelatedConcept[]> {
    return this.degrade('relatedConcepts', [], async () => {
      const rows = await this.relationshipRepo.findRelated(
        conceptId,
        filterToStandardValid,
      );

      if (filterToStandardValid) {
        return rows.sort(
          (a, b) =>
            compareText(a.relationshipId, b.relationshipId) ||
            a.conceptId - b.conceptId,
        );
      }

      // Most frequent relationship kinds first
      const frequency = new Map<string, number>();
      for (const row of rows) {
        frequency.set(row.relationshipId, (frequency.get(row.relationshipId) ?? 0) + 1);
      }
      const weight = (id: string) => frequency.get(id) ?? 0;
      return rows.sort(
        (a, b) =>
          weight(b.relationshipId) - weight(a.relationshipId) ||
          compareText(a.relationshipId, b.relationshipId) ||
          compareText(a.conceptName, b.conceptName),
      );
    });
  }

  async descendantConcepts(conceptId: number): Promise<RelatedConcept[]> {
    return this.degrade('descendantConcepts', [], async () => {
      const links = await this.ancestorRepo.findClosureConcepts(
        conceptId,
        'descendants',
        { standardValidOnly: true, includeSelf: true },
      );
      return links
        .map(({ concept }) => ({
          conceptId: concept.conceptId,
          conceptName: concept.conceptName,
          vocabularyId: concept.vocabularyId,
          conceptCode: concept.conceptCode,
          relationshipId: 'Is a',
        }))
        .sort(
          (a, b) =>
            compareText(a.conceptName, b.conceptName) || a.conceptId - b.conceptId,
        );
    });
  }

  // ==========================================
  // 3. HIERARCHY
  // ==========================================

  async hierarchyNeighbors(conceptId: number): Promise<HierarchyNeighbor[]> {
    return this.degrade('hierarchyNeighbors', [], async () => {
      const options = { standardValidOnly: true };
      const [ancestors, descendants, resolver] = await Promise.all([
        this.ancestorRepo.findClosureConcepts(conceptId, 'ancestors', options),
        this.ancestorRepo.findClosureConcepts(conceptId, 'descendants', options),
        this.relationshipRepo.getDirectionResolver(),
      ]);

      // Labels decided by a direct hierarchical edge
      const direct = new Map<number, HierarchyLabel>();
      const edges = await this.relationshipRepo.findEdgesTouching(
        conceptId,
        resolver.hierarchicalKinds,
      );
      for (const edge of edges) {
        const oriented = resolver.orient(edge);
        if (!oriented || oriented.parentId === oriented.childId) continue;
        if (oriented.parentId === conceptId) {
          direct.set(oriented.childId, 'Descendant');
        } else if (oriented.childId === conceptId) {
          direct.set(oriented.parentId, 'Ancestor');
        }
      }

      // A concept on both sides of a cyclic closure counts as an ancestor
      const neighbours = new Map<number, { link: ClosureConcept; label: HierarchyLabel }>();
      for (const link of ancestors) {
        neighbours.set(link.concept.conceptId, { link, label: 'Ancestor' });
      }
      for (const link of descendants) {
        if (!neighbours.has(link.concept.conceptId)) {
          neighbours.set(link.concept.conceptId, { link, label: 'Descendant' });
        }
      }

      return [...neighbours.values()]
        .map(({ link, label }): HierarchyNeighbor => {
          const directLabel = direct.get(link.concept.conceptId);
          return {
            conceptId: link.concept.conceptId,
            conceptName: link.concept.conceptName,
            vocabularyId: link.concept.vocabularyId,
            conceptCode: link.concept.conceptCode,
            relationshipId: directLabel ?? label,
            minSeparation: link.minSeparation,
            direct: directLabel !== undefined,
          };
        })
        .sort(
          (a, b) =>
            labelRank(a.relationshipId) - labelRank(b.relationshipId) ||
            compareText(a.conceptName, b.conceptName) ||
            a.conceptId - b.conceptId,
        );
    });
  }

  // ==========================================
  // 4. SYNONYMS
  // ==========================================

  async synonyms(conceptId: number): Promise<ConceptSynonym[]> {
    return this.degrade('synonyms', [], async () => {
      const rows = await this.synonymRepo.findByConceptId(conceptId);
      return rows.sort((a, b) => compareText(a.synonym, b.synonym));
    });
  }

  // ==========================================
  // 5. RECOMMENDATIONS
  // ==========================================

  async allRelatedForRecommendation(
    conceptId: number,
    existingMappings: ReadonlySet<number>,
  ): Promise<RecommendationCandidate[]> {
    const [related, descendants] = await Promise.all([
      this.relatedConcepts(conceptId, false),
      this.descendantConcepts(conceptId),
    ]);

    const seen = new Set<number>();
    const candidates: RecommendationCandidate[] = [];
    for (const row of [...related, ...descendants]) {
      if (seen.has(row.conceptId)) continue;
      seen.add(row.conceptId);
      candidates.push({ ...row, recommended: existingMappings.has(row.conceptId) });
    }

    return candidates.sort(
      (a, b) =>
        Number(b.recommended) - Number(a.recommended) ||
        compareText(a.conceptName, b.conceptName),
    );
  }

  /**
   * Recommendation candidates for `conceptId`, flagged against the concepts
   * already mapped to `generalConceptId`.
   */
  async recommendationsForGeneralConcept(
    conceptId: number,
    generalConceptId?: number,
  ): Promise<RecommendationCandidate[]> {
    const mapped = new Set<number>();
    if (generalConceptId !== undefined) {
      const id = generalConceptId;
      const rows = await this.degrade('recommendationsForGeneralConcept', [], () =>
        this.mappingRepo.findByGeneralConcept(id),
      );
      rows.forEach((m) => mapped.add(m.conceptId));
    }
    return this.allRelatedForRecommendation(conceptId, mapped);
  }

  // ==========================================
  // 6. DRUGS
  // ==========================================

  async clinicalDrugsFromIngredient(
    ingredientId: number,
  ): Promise<VocabularyConcept[]> {
    return this.degrade('clinicalDrugsFromIngredient', [], async () => {
      const drugs = await this.ancestorRepo.findValidDescendantsOfClass(
        ingredientId,
        {
          conceptClassId: 'Clinical Drug',
          domainId: 'Drug',
          vocabularyIds: RXNORM_VOCABULARIES,
        },
      );
      return drugs.sort(
        (a, b) =>
          compareText(a.conceptName, b.conceptName) || a.conceptId - b.conceptId,
      );
    });
  }

  private async degrade<T>(
    operation: string,
    fallback: T,
    query: () => Promise<T>,
  ): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.logger.warn(`${operation}: ${error.message}`);
      } else {
        this.logger.warn(`${operation} failed: ${errorMessage(error)}`);
      }
      return fallback;
    }
  }
}

function labelRank(label: HierarchyLabel): number {
  return label === 'Ancestor' ? 0 : 1;
}
