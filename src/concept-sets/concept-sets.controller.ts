import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConceptSetsService } from './concept-sets.service';
import { OptimizationResultDto, OptimizeConceptSetDto } from './dto';

@ApiTags('concept-sets')
@Controller('api/concept-sets')
export class ConceptSetsController {
  constructor(private readonly conceptSetsService: ConceptSetsService) {}

  @Post('optimize')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Minimize a concept set',
    description:
      'Replaces fully covered groups of descendants with their common ancestor, or drops items already implied by an item that includes descendants.',
  })
  @ApiResponse({ status: 200, type: OptimizationResultDto })
  async optimize(
    @Body() dto: OptimizeConceptSetDto,
  ): Promise<OptimizationResultDto> {
    return this.conceptSetsService.optimize(
      dto.items.map((item) => ({
        conceptId: item.conceptId,
        conceptName: item.conceptName,
        excluded: item.excluded ?? false,
        includeDescendants: item.includeDescendants ?? false,
        includeMapped: item.includeMapped ?? false,
      })),
    );
  }
}
