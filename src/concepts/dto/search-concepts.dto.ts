import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { DEFAULT_MIN_SCORE, DEFAULT_SEARCH_LIMIT } from '../concepts.service';
import { ConceptResponseDto } from './concept-response.dto';

// ============================================
// REQUEST DTO
// ============================================

export class SearchConceptsQueryDto {
  @ApiProperty({ description: 'Concept name to look for', example: 'metformin' })
  @IsString()
  @IsNotEmpty()
  q!: string;

  @ApiPropertyOptional({
    description: 'Maximum number of concepts returned',
    default: DEFAULT_SEARCH_LIMIT,
    minimum: 1,
    maximum: 1000,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  @Type(() => Number)
  limit?: number = DEFAULT_SEARCH_LIMIT;

  @ApiPropertyOptional({
    description: 'Similarity a name must exceed to be returned',
    default: DEFAULT_MIN_SCORE,
    minimum: 0,
    maximum: 1,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  @Type(() => Number)
  minScore?: number = DEFAULT_MIN_SCORE;

  @ApiPropertyOptional({ example: 'Drug' })
  @IsOptional()
  @IsString()
  domainId?: string;

  @ApiPropertyOptional({
    description: 'Comma separated vocabulary ids',
    type: [String],
    example: ['RxNorm', 'RxNorm Extension'],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @Transform(({ value }) => (typeof value === 'string' ? value.split(',') : value))
  vocabularyId?: string[];

  @ApiPropertyOptional({
    description: 'Only Standard, valid concepts',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  @Transform(({ value }) => value === true || value === 'true')
  standardOnly?: boolean = false;
}

// ============================================
// RESPONSE DTO
// ============================================

export class ScoredConceptDto extends ConceptResponseDto {
  @ApiProperty({
    description: '1 when the name contains the query, else Jaro-Winkler similarity',
    example: 0.97,
  })
  score!: number;
}

export class SearchConceptsResponseDto {
  @ApiProperty({ type: [ScoredConceptDto] })
  concepts!: ScoredConceptDto[];

  @ApiProperty({ description: 'Number of concepts returned' })
  total!: number;

  @ApiProperty({ description: 'Time taken by the search in ms' })
  took!: number;
}
