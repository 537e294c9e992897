import { Injectable, Logger } from '@nestjs/common';
import { EnrichmentPreconditionError } from '../common/errors';
import { RXNORM_VOCABULARIES } from '../concepts/concepts.service';
import {
  GeneralConcept,
  GeneralConceptRepository,
  Mapping,
  MappingRepository,
} from '../database/repositories';
import {
  AncestorRepository,
  ConceptRepository,
  RelationshipRepository,
} from '../vocabulary/repositories';
import { VocabularyStoreService } from '../vocabulary/vocabulary-store.service';
import type { VocabularyConcept } from '../vocabulary/vocabulary.types';

export const ENRICHABLE_VOCABULARIES: ReadonlySet<string> = new Set([
  'RxNorm',
  'RxNorm Extension',
  'LOINC',
  'SNOMED',
  'ICD10',
]);

const MAPPING_RELATIONSHIPS = ['Maps to', 'Mapped from'];

export interface EnrichmentSummary {
  manualRows: number;
  derivedRows: number;
  relationshipRows: number;
  drugRows: number;
  deleted: number;
  inserted: number;
}

const mappingKey = (m: Pick<Mapping, 'generalConceptId' | 'conceptId'>) =>
  `${m.generalConceptId}:${m.conceptId}`;

const byConceptId = (a: VocabularyConcept, b: VocabularyConcept) =>
  a.conceptId - b.conceptId;

@Injectable()
export class MappingEnrichmentService {
  private readonly logger = new Logger(MappingEnrichmentService.name);

  constructor(
    private readonly store: VocabularyStoreService,
    private readonly conceptRepo: ConceptRepository,
    private readonly relationshipRepo: RelationshipRepository,
    private readonly ancestorRepo: AncestorRepository,
    private readonly mappingRepo: MappingRepository,
    private readonly generalConceptRepo: GeneralConceptRepository,
  ) {}

  // ============================================
  // 1. REGENERATE (curation store round trip)
  // ============================================

  /**
   * Recomputes the derived partition of the mapping table and writes it back
   * in one transaction.
   */
  async regenerate(preserveRecommended: boolean): Promise<EnrichmentSummary> {
    this.assertVocabularyLoaded();

    const [mappings, generalConcepts] = await Promise.all([
      this.mappingRepo.findAll(),
      this.generalConceptRepo.findAll(),
    ]);
    const { table, relationshipRows, drugRows } = await this.buildTable(
      mappings,
      generalConcepts,
      preserveRecommended,
    );
    const derived = table.filter((m) => m.source === 'derived');

    try {
      const written = await this.mappingRepo.replaceDerived(derived);
      this.logger.log(
        `Derived mappings regenerated: ${written.deleted} deleted, ${written.inserted} inserted`,
      );
      return {
        relationshipRows,
        drugRows,
        manualRows: table.length - derived.length,
        derivedRows: derived.length,
        deleted: written.deleted,
        inserted: written.inserted,
      };
    } catch (error) {
      this.logger.error('Derived mapping transaction rolled back', error);
      throw error;
    }
  }

  // ============================================
  // 2. ENRICH (pure over the vocabulary snapshot)
  // ============================================

  async enrich(
    mappings: Mapping[],
    generalConcepts: GeneralConcept[],
    preserveRecommended: boolean,
  ): Promise<Mapping[]> {
    const { table } = await this.buildTable(
      mappings,
      generalConcepts,
      preserveRecommended,
    );
    return table;
  }

  private async buildTable(
    mappings: Mapping[],
    generalConcepts: GeneralConcept[],
    preserveRecommended: boolean,
  ): Promise<{ table: Mapping[]; relationshipRows: number; drugRows: number }> {
    this.assertVocabularyLoaded();

    const wasRecommended = new Set(
      preserveRecommended
        ? mappings
            .filter((m) => m.source === 'derived' && m.recommended)
            .map((m) => m.conceptId)
        : [],
    );
    const retained = mappings.filter((m) => m.source !== 'derived');

    const relationshipRows = await this.deriveFromManualMappings(
      retained.filter((m) => m.source === 'manual' && m.recommended),
      wasRecommended,
    );
    const drugRows = await this.deriveFromDrugIngredients(
      generalConcepts.filter((g) => g.category === 'Drug'),
    );

    // Drug rows win over relationship rows for the same concept
    const drugIds = new Set(drugRows.map((m) => m.conceptId));
    const keys = new Set(retained.map(mappingKey));
    const table = [...retained];
    for (const row of [
      ...relationshipRows.filter((m) => !drugIds.has(m.conceptId)),
      ...drugRows,
    ]) {
      const key = mappingKey(row);
      if (keys.has(key)) continue;
      keys.add(key);
      table.push(row);
    }

    this.logger.log(
      `Enrichment: ${relationshipRows.length} relationship rows, ${drugRows.length} drug rows, ${table.length - retained.length} kept`,
    );
    return {
      table,
      relationshipRows: relationshipRows.length,
      drugRows: drugRows.length,
    };
  }

  private assertVocabularyLoaded(): void {
    if (!this.store.isAvailable()) {
      throw new EnrichmentPreconditionError('vocabulary snapshot is not loaded');
    }
  }

  // ============================================
  // 3. MANUAL MAPPINGS -> RELATED CONCEPTS
  // ============================================

  private async deriveFromManualMappings(
    manual: Mapping[],
    wasRecommended: ReadonlySet<number>,
  ): Promise<Mapping[]> {
    if (manual.length === 0) return [];

    const sources = await this.conceptRepo.findByIds(manual.map((m) => m.conceptId));
    const eligible = manual.filter((m) => {
      const source = sources.get(m.conceptId);
      return source !== undefined && ENRICHABLE_VOCABULARIES.has(source.vocabularyId);
    });
    if (eligible.length === 0) return [];

    const sourceIds = eligible.map((m) => m.conceptId);
    const [mapped, descendants] = await Promise.all([
      this.relationshipRepo.findEnrichmentTargets(sourceIds, MAPPING_RELATIONSHIPS),
      this.ancestorRepo.findEnrichmentDescendants(sourceIds),
    ]);

    const reached = new Map<number, Map<number, VocabularyConcept>>();
    for (const { sourceId, concept } of [...mapped, ...descendants]) {
      const targets = reached.get(sourceId) ?? new Map<number, VocabularyConcept>();
      targets.set(concept.conceptId, concept);
      reached.set(sourceId, targets);
    }

    const rows: Mapping[] = [];
    for (const mapping of eligible) {
      const kept = [...(reached.get(mapping.conceptId)?.values() ?? [])].sort(
        byConceptId,
      );

      for (const concept of kept) {
        rows.push({
          generalConceptId: mapping.generalConceptId,
          conceptId: concept.conceptId,
          unitConceptId: mapping.unitConceptId,
          recommended: wasRecommended.has(concept.conceptId),
          source: 'derived',
        });
      }
    }
    return rows;
  }

  // ============================================
  // 4. DRUG GENERAL CONCEPTS -> CLINICAL DRUGS
  // ============================================

  /**
   * Ingredient (by name) <- "RxNorm has ing" - Clinical Drug Comp
   * - "Constitutes" -> Clinical Drug
   */
  private async deriveFromDrugIngredients(
    drugs: GeneralConcept[],
  ): Promise<Mapping[]> {
    const rows: Mapping[] = [];
    for (const drug of drugs) {
      const ingredients = await this.conceptRepo.findValidByNameIgnoringCase(
        drug.generalConceptName,
        'Ingredient',
        RXNORM_VOCABULARIES,
      );
      if (ingredients.length === 0) continue;

      const compLinks = await this.relationshipRepo.findBackward(
        ingredients.map((c) => c.conceptId),
        ['RxNorm has ing'],
      );
      const comps = await this.conceptRepo.findValidOfClass(
        compLinks.map((p) => p.sourceId),
        'Clinical Drug Comp',
      );
      if (comps.length === 0) continue;

      const drugLinks = await this.relationshipRepo.findForward(
        comps.map((c) => c.conceptId),
        ['Constitutes'],
      );
      const clinicalDrugs = await this.conceptRepo.findValidOfClass(
        drugLinks.map((p) => p.targetId),
        'Clinical Drug',
      );

      for (const clinicalDrug of clinicalDrugs.sort(byConceptId)) {
        rows.push({
          generalConceptId: drug.generalConceptId,
          conceptId: clinicalDrug.conceptId,
          unitConceptId: null,
          recommended: true,
          source: 'derived',
        });
      }
    }
    return rows;
  }
}
