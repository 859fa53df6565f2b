import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';

import type { TextTag } from '../../domain/models/text-tag.model';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { TagDto } from './dto/tag.dto';
import { TagsService } from './tags.service';

@Controller('tags')
export class TagsController {
  constructor(private readonly tagsService: TagsService) {}

  @Post()
  async create(@Body() dto: TagDto): Promise<TextTag> {
    return this.tagsService.create(dto);
  }

  @Get()
  async list(@Query() query: PaginationQueryDto): Promise<TextTag[]> {
    return this.tagsService.list(toPage(query));
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<TextTag> {
    return this.tagsService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: TagDto): Promise<TextTag> {
    return this.tagsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.tagsService.delete(id);
  }
}
