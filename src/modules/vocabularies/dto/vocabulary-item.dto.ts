import { IsIn, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';

import {
  PARTS_OF_SPEECH,
  PROFICIENCY_LEVELS,
  VOCABULARY_STATUSES,
  type PartOfSpeech,
  type ProficiencyLevel,
  type VocabularyStatus,
} from '../../../domain/models/enums';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';

class VocabularyItemFieldsDto {
  @IsString()
  @IsNotEmpty({ message: 'Term is required' })
  @MaxLength(200)
  term!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  lemma?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  stem?: string;

  @IsOptional()
  @IsIn(PARTS_OF_SPEECH)
  partOfSpeech?: PartOfSpeech;

  @IsOptional()
  @IsNumber()
  @Min(0)
  frequency?: number;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

/** Body of POST /vocabularies/:id/items. Status, review count and confidence take their defaults. */
export class CreateVocabularyItemDto extends VocabularyItemFieldsDto {
  @IsOptional()
  @IsIn(VOCABULARY_STATUSES)
  status?: VocabularyStatus;

  @IsOptional()
  @IsIn(PROFICIENCY_LEVELS)
  confidenceLevel?: ProficiencyLevel;
}

/** Body of PUT /vocabulary-items/:id. Omitted optional text fields are cleared. */
export class UpdateVocabularyItemDto extends VocabularyItemFieldsDto {
  @IsIn(VOCABULARY_STATUSES)
  status!: VocabularyStatus;

  @IsInt()
  @Min(0)
  timesReviewed!: number;

  @IsIn(PROFICIENCY_LEVELS)
  confidenceLevel!: ProficiencyLevel;
}

export class VocabularyItemQueryDto extends PaginationQueryDto {
  @IsOptional()
  @IsIn(VOCABULARY_STATUSES)
  status?: VocabularyStatus;
}
