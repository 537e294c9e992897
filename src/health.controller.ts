import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { VocabularyStoreService } from './vocabulary/vocabulary-store.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly vocabularyStore: VocabularyStoreService) {}

  @Get()
  @ApiOperation({ summary: 'Health check' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('vocabulary')
  @ApiOperation({ summary: 'Vocabulary snapshot status' })
  vocabulary() {
    const status = this.vocabularyStore.status();
    return {
      status: status.loaded ? 'ok' : 'unavailable',
      timestamp: new Date().toISOString(),
      vocabulary: status,
    };
  }
}
