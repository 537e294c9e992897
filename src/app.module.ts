import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ConceptSetsModule } from './concept-sets/concept-sets.module';
import { ConceptsModule } from './concepts/concepts.module';
import { DatabaseModule } from './database/database.module';
import { GraphModule } from './graph/graph.module';
import { HealthController } from './health.controller';
import { MappingsModule } from './mappings/mappings.module';
import { VocabularyModule } from './vocabulary/vocabulary.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    DatabaseModule,
    VocabularyModule,
    ConceptsModule,
    GraphModule,
    ConceptSetsModule,
    MappingsModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
