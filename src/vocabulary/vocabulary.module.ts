import { Global, Module } from '@nestjs/common';
import {
  AncestorRepository,
  ConceptRepository,
  RelationshipRepository,
  SynonymRepository,
} from './repositories';
import { VocabularyStoreService } from './vocabulary-store.service';

const repositories = [
  ConceptRepository,
  RelationshipRepository,
  AncestorRepository,
  SynonymRepository,
];

@Global()
@Module({
  providers: [VocabularyStoreService, ...repositories],
  exports: [VocabularyStoreService, ...repositories],
})
export class VocabularyModule {}
