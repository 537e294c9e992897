import { Module } from '@nestjs/common';
import { ConceptSetsController } from './concept-sets.controller';
import { ConceptSetsService } from './concept-sets.service';

@Module({
  controllers: [ConceptSetsController],
  providers: [ConceptSetsService],
})
export class ConceptSetsModule {}
