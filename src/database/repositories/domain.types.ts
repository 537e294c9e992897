// Domain interfaces for the curation store

import type { MappingSource } from '../../db/types';

export type { MappingSource };

export interface Mapping {
  generalConceptId: number;
  conceptId: number;
  unitConceptId: number | null;
  recommended: boolean;
  source: MappingSource;
}

export interface GeneralConcept {
  generalConceptId: number;
  generalConceptName: string;
  category: string;
}

export interface DerivedWriteResult {
  deleted: number;
  inserted: number;
}
