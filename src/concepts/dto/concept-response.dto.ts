import { ApiProperty } from '@nestjs/swagger';

export class ConceptResponseDto {
  @ApiProperty({ example: 201826 })
  conceptId!: number;

  @ApiProperty({ example: 'Type 2 diabetes mellitus' })
  conceptName!: string;

  @ApiProperty({ example: 'Condition' })
  domainId!: string;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: 'Clinical Finding' })
  conceptClassId!: string;

  @ApiProperty({ example: '44054006' })
  conceptCode!: string;

  @ApiProperty({ enum: ['Standard', 'Classification', 'Non-standard'] })
  standardFlag!: 'Standard' | 'Classification' | 'Non-standard';

  @ApiProperty({ example: true })
  valid!: boolean;
}

export class RelatedConceptDto {
  @ApiProperty({ example: 443238 })
  conceptId!: number;

  @ApiProperty({ example: 'Diabetic disorder' })
  conceptName!: string;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: '73211009' })
  conceptCode!: string;

  @ApiProperty({ example: 'Is a' })
  relationshipId!: string;
}

export class HierarchyNeighborDto {
  @ApiProperty({ example: 443238 })
  conceptId!: number;

  @ApiProperty({ example: 'Diabetic disorder' })
  conceptName!: string;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: '73211009' })
  conceptCode!: string;

  @ApiProperty({ enum: ['Ancestor', 'Descendant'] })
  relationshipId!: 'Ancestor' | 'Descendant';

  @ApiProperty({ example: 1 })
  minSeparation!: number;

  @ApiProperty({
    description: 'Label taken from a direct hierarchical relationship',
  })
  direct!: boolean;
}

export class ConceptSynonymDto {
  @ApiProperty({ example: 'Type II diabetes mellitus' })
  synonym!: string;

  @ApiProperty({ example: 'English', nullable: true, type: String })
  language!: string | null;

  @ApiProperty({ example: 4180186, nullable: true, type: Number })
  languageConceptId!: number | null;
}

export class RecommendationDto extends RelatedConceptDto {
  @ApiProperty({ description: 'Already mapped to the general concept' })
  recommended!: boolean;
}
