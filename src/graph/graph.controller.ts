import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { HierarchyGraphDto, HierarchyQueryDto } from './dto';
import { GraphService } from './graph.service';

@ApiTags('graph')
@Controller('api/graph')
export class GraphController {
  constructor(private readonly graphService: GraphService) {}

  @Get('hierarchy/:conceptId')
  @ApiOperation({
    summary: 'Get the bounded hierarchy around a concept',
    description: `
      Returns the concept, its ancestors and its descendants within the requested
      number of levels, plus the parent -> child edges between them.

      **Notes:**
      - Levels are the minimum separation recorded in the ancestor closure
      - stats report total vs displayed counts so callers can show truncation
      - An unknown concept yields an empty graph
    `,
  })
  @ApiParam({ name: 'conceptId', example: 201826 })
  @ApiResponse({ status: 200, type: HierarchyGraphDto })
  async getHierarchy(
    @Param('conceptId', ParseIntPipe) conceptId: number,
    @Query() query: HierarchyQueryDto,
  ): Promise<HierarchyGraphDto> {
    return this.graphService.buildHierarchy(
      conceptId,
      query.maxLevelsUp,
      query.maxLevelsDown,
    );
  }
}
