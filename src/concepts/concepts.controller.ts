import {
  Controller,
  DefaultValuePipe,
  Get,
  NotFoundException,
  Param,
  ParseBoolPipe,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConceptsService } from './concepts.service';
import {
  ConceptResponseDto,
  ConceptSynonymDto,
  HierarchyNeighborDto,
  RecommendationDto,
  RelatedConceptDto,
  SearchConceptsQueryDto,
  SearchConceptsResponseDto,
} from './dto';

@ApiTags('concepts')
@Controller('api/concepts')
export class ConceptsController {
  constructor(private readonly conceptsService: ConceptsService) {}

  // Declared before ':id' so that "search" is not read as an id
  @Get('search')
  @ApiOperation({
    summary: 'Search concepts by name',
    description:
      'Names containing the query score 1; others are ranked by Jaro-Winkler similarity.',
  })
  @ApiResponse({ type: SearchConceptsResponseDto })
  async search(
    @Query() query: SearchConceptsQueryDto,
  ): Promise<SearchConceptsResponseDto> {
    return this.conceptsService.searchConcepts(query.q, {
      limit: query.limit,
      minScore: query.minScore,
      domainId: query.domainId,
      vocabularyIds: query.vocabularyId,
      standardOnly: query.standardOnly,
    });
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one vocabulary concept' })
  @ApiResponse({ type: ConceptResponseDto })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ConceptResponseDto> {
    const concept = await this.conceptsService.findConcept(id);
    if (!concept) throw new NotFoundException(`Concept ${id} not found`);
    return concept;
  }

  @Get(':id/related')
  @ApiOperation({
    summary: 'Concepts reached through relationships of this concept',
    description:
      'Unfiltered results are ordered by how often each relationship kind occurs.',
  })
  @ApiQuery({ name: 'standardOnly', required: false, type: Boolean })
  @ApiResponse({ type: [RelatedConceptDto] })
  async related(
    @Param('id', ParseIntPipe) id: number,
    @Query('standardOnly', new DefaultValuePipe(false), ParseBoolPipe)
    standardOnly: boolean,
  ): Promise<RelatedConceptDto[]> {
    return this.conceptsService.relatedConcepts(id, standardOnly);
  }

  @Get(':id/descendants')
  @ApiOperation({ summary: 'Standard, valid descendants from the ancestor closure' })
  @ApiResponse({ type: [RelatedConceptDto] })
  async descendants(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<RelatedConceptDto[]> {
    return this.conceptsService.descendantConcepts(id);
  }

  @Get(':id/hierarchy')
  @ApiOperation({ summary: 'Ancestors and descendants labelled by direction' })
  @ApiResponse({ type: [HierarchyNeighborDto] })
  async hierarchy(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<HierarchyNeighborDto[]> {
    return this.conceptsService.hierarchyNeighbors(id);
  }

  @Get(':id/synonyms')
  @ApiOperation({ summary: 'Synonyms with their language' })
  @ApiResponse({ type: [ConceptSynonymDto] })
  async synonyms(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ConceptSynonymDto[]> {
    return this.conceptsService.synonyms(id);
  }

  @Get(':id/recommendations')
  @ApiOperation({
    summary: 'Related and descendant concepts flagged against existing mappings',
  })
  @ApiQuery({ name: 'generalConceptId', required: false, type: Number })
  @ApiResponse({ type: [RecommendationDto] })
  async recommendations(
    @Param('id', ParseIntPipe) id: number,
    @Query('generalConceptId', new ParseIntPipe({ optional: true }))
    generalConceptId?: number,
  ): Promise<RecommendationDto[]> {
    return this.conceptsService.recommendationsForGeneralConcept(
      id,
      generalConceptId,
    );
  }

  @Get(':id/clinical-drugs')
  @ApiOperation({ summary: 'Clinical drugs containing an ingredient' })
  @ApiResponse({ type: [ConceptResponseDto] })
  async clinicalDrugs(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ConceptResponseDto[]> {
    return this.conceptsService.clinicalDrugsFromIngredient(id);
  }
}
