// Domain interfaces for vocabulary concepts and query results

export type StandardFlag = 'Standard' | 'Classification' | 'Non-standard';

export interface VocabularyConcept {
  conceptId: number;
  conceptName: string;
  domainId: string;
  vocabularyId: string;
  conceptClassId: string;
  conceptCode: string;
  standardFlag: StandardFlag;
  valid: boolean;
}

export interface ScoredConcept extends VocabularyConcept {
  score: number;
}

// A concept reached from `sourceId`
export interface SourcedConcept {
  sourceId: number;
  concept: VocabularyConcept;
}

export interface RelationshipEdge {
  conceptId1: number;
  conceptId2: number;
  relationshipId: string;
}

export interface RelationshipKind {
  relationshipId: string;
  reverseRelationshipId: string;
  definesAncestry: boolean;
}

export interface RelatedConcept {
  conceptId: number;
  conceptName: string;
  vocabularyId: string;
  conceptCode: string;
  relationshipId: string;
}

export type HierarchyLabel = 'Ancestor' | 'Descendant';

export interface HierarchyNeighbor {
  conceptId: number;
  conceptName: string;
  vocabularyId: string;
  conceptCode: string;
  relationshipId: HierarchyLabel;
  minSeparation: number;
  // true when the label came from a direct hierarchical edge
  direct: boolean;
}

export interface ConceptSynonym {
  synonym: string;
  language: string | null;
  languageConceptId: number | null;
}

export interface RecommendationCandidate extends RelatedConcept {
  recommended: boolean;
}

export function toStandardFlag(raw: string | null): StandardFlag {
  if (raw === 'S') return 'Standard';
  if (raw === 'C') return 'Classification';
  return 'Non-standard';
}

export function isValid(invalidReason: string | null): boolean {
  return invalidReason === null || invalidReason === '';
}
