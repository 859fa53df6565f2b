import { Transform, type TransformFnParams } from 'class-transformer';
import { ArrayMaxSize, IsArray, IsBoolean, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

import { PROFICIENCY_LEVELS, type ProficiencyLevel } from '../../../domain/models/enums';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';

// Implicit conversion has already run on `value`; the raw query string is on `obj`.
function rawValue({ obj, key }: TransformFnParams): unknown {
  const source: Record<string, unknown> = obj;
  return source[key];
}

function toBoolean(params: TransformFnParams): unknown {
  const value = rawValue(params);
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/** `tagIds=a,b` and `tagIds=a&tagIds=b` are both accepted. */
function toIdList(params: TransformFnParams): unknown {
  const value = rawValue(params);
  const parts = Array.isArray(value) ? value : [value];
  return parts.flatMap(part => (typeof part === 'string' ? part.split(',') : [part])).filter(part => part !== '');
}

/**
 * Filters for GET /texts. At most one filter applies, checked in this order:
 * tagIds, languageId, userId, proficiencyLevel, publicOnly.
 */
export class TextQueryDto extends PaginationQueryDto {
  @IsOptional()
  @IsString()
  languageId?: string;

  @IsOptional()
  @IsString()
  userId?: string;

  @IsOptional()
  @IsIn(PROFICIENCY_LEVELS)
  proficiencyLevel?: ProficiencyLevel;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  publicOnly?: boolean;

  @IsOptional()
  @Transform(toIdList)
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  tagIds?: string[];
}

export class TextSearchQueryDto extends PaginationQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'Search query "q" is required' })
  q!: string;
}
