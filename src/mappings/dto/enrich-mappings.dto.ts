import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional } from 'class-validator';

export class EnrichMappingsDto {
  @ApiPropertyOptional({
    description:
      'Keep the recommended flag of derived concepts that were recommended before regeneration',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  preserveRecommended?: boolean = false;
}

export class EnrichmentSummaryDto {
  @ApiProperty({ description: 'Rows kept as they were (manual)', example: 420 })
  manualRows!: number;

  @ApiProperty({ description: 'Derived rows after regeneration', example: 1380 })
  derivedRows!: number;

  @ApiProperty({ description: 'Rows reached from manual mappings', example: 1200 })
  relationshipRows!: number;

  @ApiProperty({ description: 'Rows reached from drug ingredients', example: 210 })
  drugRows!: number;

  @ApiProperty({ example: 1375 })
  deleted!: number;

  @ApiProperty({ example: 1380 })
  inserted!: number;
}
