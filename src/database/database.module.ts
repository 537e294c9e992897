import { Global, Module } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import { GeneralConceptRepository, MappingRepository } from './repositories';

@Global()
@Module({
  providers: [DatabaseService, MappingRepository, GeneralConceptRepository],
  exports: [DatabaseService, MappingRepository, GeneralConceptRepository],
})
export class DatabaseModule {}
