import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { GraphEdgeDto } from './graph-common.dto';

// ============================================
// REQUEST DTO
// ============================================

export const DEFAULT_HIERARCHY_LEVELS = 5;

export class HierarchyQueryDto {
  @ApiPropertyOptional({
    description: 'Ancestor levels to include above the concept',
    default: DEFAULT_HIERARCHY_LEVELS,
    minimum: 0,
    maximum: 20,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(20)
  @Transform(({ value }) => parseInt(value, 10))
  maxLevelsUp?: number = DEFAULT_HIERARCHY_LEVELS;

  @ApiPropertyOptional({
    description: 'Descendant levels to include below the concept',
    default: DEFAULT_HIERARCHY_LEVELS,
    minimum: 0,
    maximum: 20,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(20)
  @Transform(({ value }) => parseInt(value, 10))
  maxLevelsDown?: number = DEFAULT_HIERARCHY_LEVELS;
}

// ============================================
// RESPONSE DTO
// ============================================

export type HierarchyNodeCategory = 'selected' | 'ancestor' | 'descendant' | 'other';

export class HierarchyNodeDto {
  @ApiProperty({ example: 201826 })
  id!: number;

  @ApiProperty({
    description: 'Display label, at most 50 characters',
    example: 'Type 2 diabetes mellitus',
  })
  label!: string;

  @ApiProperty({
    description: 'Negative above the selected concept, positive below',
    example: -1,
  })
  level!: number;

  @ApiProperty({ enum: ['selected', 'ancestor', 'descendant', 'other'] })
  category!: HierarchyNodeCategory;

  @ApiProperty({ example: 'Type 2 diabetes mellitus' })
  conceptName!: string;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: '44054006' })
  conceptCode!: string;

  @ApiProperty({ example: 'Clinical Finding' })
  conceptClassId!: string;
}

export class HierarchyStatsDto {
  @ApiProperty({ example: 12 })
  totalAncestors!: number;

  @ApiProperty({ example: 340 })
  totalDescendants!: number;

  @ApiProperty({ example: 12 })
  displayedAncestors!: number;

  @ApiProperty({ example: 120 })
  displayedDescendants!: number;
}

export class HierarchyGraphDto {
  @ApiProperty({ type: [HierarchyNodeDto] })
  nodes!: HierarchyNodeDto[];

  @ApiProperty({ type: [GraphEdgeDto] })
  edges!: GraphEdgeDto[];

  @ApiProperty({ type: HierarchyStatsDto })
  stats!: HierarchyStatsDto;
}
