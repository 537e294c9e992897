import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { EnrichMappingsDto, EnrichmentSummaryDto } from './dto';
import { MappingEnrichmentService } from './mapping-enrichment.service';

@ApiTags('mappings')
@Controller('api/mappings')
export class MappingsController {
  constructor(private readonly enrichmentService: MappingEnrichmentService) {}

  @Post('enrich')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Regenerate derived concept mappings',
    description:
      'Replaces every derived mapping with rows reached from recommended manual mappings and from drug general concepts.',
  })
  @ApiResponse({ status: 200, type: EnrichmentSummaryDto })
  @ApiResponse({ status: 412, description: 'Vocabulary not loaded' })
  async enrich(@Body() dto: EnrichMappingsDto): Promise<EnrichmentSummaryDto> {
    return this.enrichmentService.regenerate(dto.preserveRecommended ?? false);
  }
}
