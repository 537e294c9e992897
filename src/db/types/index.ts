import type { ColumnType, Generated } from 'kysely';

// Curation store tables (see sql/curation-schema.sql)

export type MappingSource = 'manual' | 'derived';

export type CreatedAt = ColumnType<Date | string, Date | string | undefined, never>;

export interface GeneralConceptTable {
  general_concept_id: number;
  general_concept_name: string;
  category: string;
  created_at: CreatedAt;
}

export interface ConceptMappingTable {
  id: Generated<number>;
  general_concept_id: number;
  concept_id: number;
  unit_concept_id: number | null;
  // TINYINT(1)
  recommended: number;
  source: MappingSource;
  created_at: CreatedAt;
}

export interface DB {
  general_concepts: GeneralConceptTable;
  concept_mappings: ConceptMappingTable;
}
