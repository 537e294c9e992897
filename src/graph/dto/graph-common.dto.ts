import { ApiProperty } from '@nestjs/swagger';

/**
 * Common DTO for a directed parent -> child edge
 */
export class GraphEdgeDto {
  @ApiProperty({ description: 'Parent concept ID', example: 443238 })
  from!: number;

  @ApiProperty({ description: 'Child concept ID', example: 201826 })
  to!: number;
}
