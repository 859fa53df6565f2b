import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

import type { PageOptions } from '../../../domain/repositories/pagination';

export const MAX_PAGE_LIMIT = 1000;

export class PaginationQueryDto implements PageOptions {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  skip?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(MAX_PAGE_LIMIT)
  limit?: number;
}

export function toPage(query: PaginationQueryDto): PageOptions {
  return { skip: query.skip, limit: query.limit };
}
