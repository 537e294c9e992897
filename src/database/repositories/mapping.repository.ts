import { Injectable } from '@nestjs/common';
import type { Insertable, Selectable } from 'kysely';
import { chunk } from '../../common/batch';
import { DatabaseService } from '../../db/database.service';
import type { DB } from '../../db/types';
import type { DerivedWriteResult, Mapping } from './domain.types';

// -- Database Types (Kysely) --
type ConceptMappingTable = DB['concept_mappings'];
type NewConceptMapping = Insertable<ConceptMappingTable>;

const INSERT_BATCH_SIZE = 500;

@Injectable()
export class MappingRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  // ============================================
  // READS (replica with master fallback)
  // ============================================

  async findAll(): Promise<Mapping[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('concept_mappings')
        .selectAll()
        .orderBy('id', 'asc')
        .execute(),
    );
    return rows.map(toMapping);
  }

  async findByGeneralConcept(generalConceptId: number): Promise<Mapping[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('concept_mappings')
        .selectAll()
        .where('general_concept_id', '=', generalConceptId)
        .orderBy('id', 'asc')
        .execute(),
    );
    return rows.map(toMapping);
  }

  // ============================================
  // DERIVED PARTITION (single transaction on master)
  // ============================================

  /**
   * Deletes every derived row and inserts `derived` in their place. Either
   * the whole replacement lands or none of it does.
   */
  async replaceDerived(derived: Mapping[]): Promise<DerivedWriteResult> {
    return this.databaseService.db.transaction(async (trx) => {
      const deleted = await trx
        .deleteFrom('concept_mappings')
        .where('source', '=', 'derived')
        .executeTakeFirst();

      const values = derived.map(toInsertable);
      for (const batch of chunk(values, INSERT_BATCH_SIZE)) {
        await trx.insertInto('concept_mappings').values(batch).execute();
      }

      return {
        deleted: Number(deleted.numDeletedRows),
        inserted: values.length,
      };
    });
  }
}

// --- MAPPERS ---

function toMapping(row: Selectable<ConceptMappingTable>): Mapping {
  return {
    generalConceptId: row.general_concept_id,
    conceptId: row.concept_id,
    unitConceptId: row.unit_concept_id,
    recommended: Boolean(row.recommended),
    source: row.source,
  };
}

function toInsertable(mapping: Mapping): NewConceptMapping {
  return {
    general_concept_id: mapping.generalConceptId,
    concept_id: mapping.conceptId,
    unit_concept_id: mapping.unitConceptId,
    recommended: mapping.recommended ? 1 : 0,
    source: 'derived',
  };
}
