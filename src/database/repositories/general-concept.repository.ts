import { Injectable } from '@nestjs/common';
import type { Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import type { DB } from '../../db/types';
import type { GeneralConcept } from './domain.types';

@Injectable()
export class GeneralConceptRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findAll(): Promise<GeneralConcept[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('general_concepts')
        .selectAll()
        .orderBy('general_concept_id', 'asc')
        .execute(),
    );
    return rows.map(this.mapToDomain);
  }

  private mapToDomain(row: Selectable<DB['general_concepts']>): GeneralConcept {
    return {
      generalConceptId: row.general_concept_id,
      generalConceptName: row.general_concept_name,
      category: row.category,
    };
  }
}
