import { Module } from '@nestjs/common';
import { MappingEnrichmentService } from './mapping-enrichment.service';
import { MappingsController } from './mappings.controller';

@Module({
  controllers: [MappingsController],
  providers: [MappingEnrichmentService],
})
export class MappingsModule {}
