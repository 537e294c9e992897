// Row shapes of the vocabulary tables, column-exact with the Athena export.

export type ConceptTable = {
  concept_id: number;
  concept_name: string;
  domain_id: string;
  vocabulary_id: string;
  concept_class_id: string;
  standard_concept: string | null;
  concept_code: string;
  valid_start_date: string | null;
  valid_end_date: string | null;
  invalid_reason: string | null;
};

export type ConceptRelationshipTable = {
  concept_id_1: number;
  concept_id_2: number;
  relationship_id: string;
  valid_start_date: string | null;
  valid_end_date: string | null;
  invalid_reason: string | null;
};

export type ConceptAncestorTable = {
  ancestor_concept_id: number;
  descendant_concept_id: number;
  min_levels_of_separation: number;
  max_levels_of_separation: number;
};

export type ConceptSynonymTable = {
  concept_id: number;
  concept_synonym_name: string;
  language_concept_id: number | null;
};

export type RelationshipTable = {
  relationship_id: string;
  relationship_name: string;
  is_hierarchical: number;
  defines_ancestry: number;
  reverse_relationship_id: string;
  relationship_concept_id: number | null;
};

export interface VocabularyDB {
  concept: ConceptTable;
  concept_relationship: ConceptRelationshipTable;
  concept_ancestor: ConceptAncestorTable;
  concept_synonym: ConceptSynonymTable;
  relationship: RelationshipTable;
}

export type VocabularyTableName = keyof VocabularyDB;
