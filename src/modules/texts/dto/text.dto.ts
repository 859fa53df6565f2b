import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

import { PROFICIENCY_LEVELS, type ProficiencyLevel } from '../../../domain/models/enums';

/** Body of POST /texts. */
export class TextDto {
  @IsString()
  @IsNotEmpty({ message: 'Title is required' })
  @MaxLength(255)
  title!: string;

  @IsString()
  @IsNotEmpty({ message: 'Content is required' })
  content!: string;

  @IsString()
  @IsNotEmpty()
  languageId!: string;

  /** Omitted for system-authored texts. */
  @IsOptional()
  @IsString()
  userId?: string;

  @IsIn(PROFICIENCY_LEVELS)
  proficiencyLevel!: ProficiencyLevel;

  @IsInt()
  @Min(0)
  wordCount!: number;

  @IsOptional()
  @IsBoolean()
  isPublic?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  source?: string;
}

/**
 * Body of PUT /texts/:id. Omitted fields keep their stored values; `userId`
 * and `source` are cleared with an explicit null.
 */
export class UpdateTextDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'Title is required' })
  @MaxLength(255)
  title?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'Content is required' })
  content?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  languageId?: string;

  @IsOptional()
  @IsString()
  userId?: string | null;

  @IsOptional()
  @IsIn(PROFICIENCY_LEVELS)
  proficiencyLevel?: ProficiencyLevel;

  @IsOptional()
  @IsInt()
  @Min(0)
  wordCount?: number;

  @IsOptional()
  @IsBoolean()
  isPublic?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  source?: string | null;
}
