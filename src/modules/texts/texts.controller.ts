import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';

import type { Text } from '../../domain/models/text.model';
import { toPage } from '../common/dto/pagination-query.dto';
import { TextDto, UpdateTextDto } from './dto/text.dto';
import { TextQueryDto, TextSearchQueryDto } from './dto/text-query.dto';
import type { TextWithTags } from './text.response';
import { TextsService } from './texts.service';

@Controller('texts')
export class TextsController {
  constructor(private readonly textsService: TextsService) {}

  @Post()
  async create(@Body() dto: TextDto): Promise<Text> {
    return this.textsService.create(dto);
  }

  /**
   * List texts
   * GET /texts?languageId=&userId=&proficiencyLevel=&publicOnly=&tagIds=&skip=&limit=
   */
  @Get()
  async list(@Query() query: TextQueryDto): Promise<Text[]> {
    return this.textsService.list(query);
  }

  /** Case-insensitive title search, private texts included. */
  @Get('search')
  async search(@Query() query: TextSearchQueryDto): Promise<Text[]> {
    return this.textsService.search(query.q, toPage(query));
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<TextWithTags> {
    return this.textsService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateTextDto): Promise<Text> {
    return this.textsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.textsService.delete(id);
  }

  @Put(':id/tags/:tagId')
  @HttpCode(204)
  async addTag(@Param('id') id: string, @Param('tagId') tagId: string): Promise<void> {
    return this.textsService.addTag(id, tagId);
  }

  @Delete(':id/tags/:tagId')
  @HttpCode(204)
  async removeTag(@Param('id') id: string, @Param('tagId') tagId: string): Promise<void> {
    return this.textsService.removeTag(id, tagId);
  }
}
