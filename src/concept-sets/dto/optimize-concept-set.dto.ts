import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

// ============================================
// REQUEST DTO
// ============================================

export class ConceptSetItemDto {
  @ApiProperty({ example: 201826 })
  @IsInt()
  @Min(0)
  conceptId!: number;

  @ApiPropertyOptional({ example: 'Type 2 diabetes mellitus' })
  @IsOptional()
  @IsString()
  conceptName?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  excluded?: boolean = false;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeDescendants?: boolean = false;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeMapped?: boolean = false;
}

export class OptimizeConceptSetDto {
  @ApiProperty({ type: [ConceptSetItemDto] })
  @IsArray()
  @ArrayMaxSize(50000)
  @ValidateNested({ each: true })
  @Type(() => ConceptSetItemDto)
  items!: ConceptSetItemDto[];
}

// ============================================
// RESPONSE DTO
// ============================================

export class ConceptSetItemResponseDto {
  @ApiProperty({ example: 201826 })
  conceptId!: number;

  @ApiPropertyOptional({ example: 'Type 2 diabetes mellitus' })
  conceptName?: string;

  @ApiProperty()
  excluded!: boolean;

  @ApiProperty()
  includeDescendants!: boolean;

  @ApiProperty()
  includeMapped!: boolean;
}

export class OptimizationResultDto {
  @ApiProperty({ enum: ['ok', 'unavailable'] })
  status!: 'ok' | 'unavailable';

  @ApiProperty({ enum: ['bottom_up', 'top_down', 'none'] })
  strategy!: 'bottom_up' | 'top_down' | 'none';

  @ApiProperty({ type: [ConceptSetItemResponseDto] })
  optimizedItems!: ConceptSetItemResponseDto[];

  @ApiProperty({ type: [ConceptSetItemResponseDto] })
  removedItems!: ConceptSetItemResponseDto[];

  @ApiProperty({ type: [ConceptSetItemResponseDto] })
  addedItems!: ConceptSetItemResponseDto[];

  @ApiProperty({ example: 2 })
  removedCount!: number;

  @ApiProperty({ description: 'Bottom-up passes that changed the set', example: 1 })
  passes!: number;

  @ApiProperty({ description: 'True when the pass cap stopped bottom-up early' })
  iterationLimitReached!: boolean;

  @ApiPropertyOptional()
  error?: string;
}
