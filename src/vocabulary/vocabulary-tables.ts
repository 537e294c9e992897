import type { VocabularyTableName } from './types';

export type ColumnKind = 'integer' | 'text';

export interface ColumnDefinition {
  name: string;
  kind: ColumnKind;
  nullable: boolean;
}

export interface VocabularyTableDefinition {
  table: VocabularyTableName;
  // Base name of the export file, e.g. CONCEPT for CONCEPT.csv
  fileName: string;
  required: boolean;
  columns: ColumnDefinition[];
  indexes: string[][];
}

const int = (name: string, nullable = false): ColumnDefinition => ({
  name,
  kind: 'integer',
  nullable,
});
const text = (name: string, nullable = true): ColumnDefinition => ({
  name,
  kind: 'text',
  nullable,
});

export const VOCABULARY_TABLES: readonly VocabularyTableDefinition[] = [
  {
    table: 'concept',
    fileName: 'CONCEPT',
    required: true,
    columns: [
      int('concept_id'),
      text('concept_name', false),
      text('domain_id', false),
      text('vocabulary_id', false),
      text('concept_class_id', false),
      text('standard_concept'),
      text('concept_code', false),
      text('valid_start_date'),
      text('valid_end_date'),
      text('invalid_reason'),
    ],
    indexes: [
      ['concept_id'],
      ['vocabulary_id'],
      ['concept_class_id'],
      ['standard_concept'],
    ],
  },
  {
    table: 'concept_relationship',
    fileName: 'CONCEPT_RELATIONSHIP',
    required: true,
    columns: [
      int('concept_id_1'),
      int('concept_id_2'),
      text('relationship_id', false),
      text('valid_start_date'),
      text('valid_end_date'),
      text('invalid_reason'),
    ],
    indexes: [['concept_id_1'], ['concept_id_2'], ['relationship_id']],
  },
  {
    table: 'concept_ancestor',
    fileName: 'CONCEPT_ANCESTOR',
    required: true,
    columns: [
      int('ancestor_concept_id'),
      int('descendant_concept_id'),
      int('min_levels_of_separation'),
      int('max_levels_of_separation'),
    ],
    indexes: [['ancestor_concept_id'], ['descendant_concept_id']],
  },
  {
    table: 'concept_synonym',
    fileName: 'CONCEPT_SYNONYM',
    required: false,
    columns: [
      int('concept_id'),
      text('concept_synonym_name', false),
      int('language_concept_id', true),
    ],
    indexes: [['concept_id']],
  },
  {
    table: 'relationship',
    fileName: 'RELATIONSHIP',
    required: false,
    columns: [
      text('relationship_id', false),
      text('relationship_name', false),
      int('is_hierarchical'),
      int('defines_ancestry'),
      text('reverse_relationship_id', false),
      int('relationship_concept_id', true),
    ],
    indexes: [['relationship_id'], ['defines_ancestry']],
  },
];

export const REQUIRED_TABLES = VOCABULARY_TABLES.filter((t) => t.required).map(
  (t) => t.table,
);
