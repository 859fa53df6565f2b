import { Type } from 'class-transformer';
import { IsDate, IsIn, IsOptional } from 'class-validator';

import { PROFICIENCY_LEVELS, type ProficiencyLevel } from '../../../domain/models/enums';

/** Body of PUT /users/:userId/languages/:languageId. */
export class UserLanguageDto {
  @IsIn(PROFICIENCY_LEVELS)
  proficiencyLevel!: ProficiencyLevel;

  /** Only used when the entry is created. */
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  startedAt?: Date;
}
