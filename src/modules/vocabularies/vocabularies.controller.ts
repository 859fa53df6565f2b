import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';

import type { UserVocabulary, UserVocabularyItem } from '../../domain/models/vocabulary.model';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { CreateVocabularyItemDto, VocabularyItemQueryDto } from './dto/vocabulary-item.dto';
import { CreateVocabularyDto, UpdateVocabularyDto } from './dto/vocabulary.dto';
import { VocabulariesService } from './vocabularies.service';
import { VocabularyItemsService } from './vocabulary-items.service';

@Controller('users/:userId/vocabularies')
export class UserVocabulariesController {
  constructor(private readonly vocabulariesService: VocabulariesService) {}

  @Post()
  async create(@Param('userId') userId: string, @Body() dto: CreateVocabularyDto): Promise<UserVocabulary> {
    return this.vocabulariesService.create(userId, dto);
  }

  @Get()
  async list(@Param('userId') userId: string, @Query() query: PaginationQueryDto): Promise<UserVocabulary[]> {
    return this.vocabulariesService.listForUser(userId, toPage(query));
  }
}

@Controller('vocabularies')
export class VocabulariesController {
  constructor(
    private readonly vocabulariesService: VocabulariesService,
    private readonly itemsService: VocabularyItemsService,
  ) {}

  @Get(':id')
  async get(@Param('id') id: string): Promise<UserVocabulary> {
    return this.vocabulariesService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateVocabularyDto): Promise<UserVocabulary> {
    return this.vocabulariesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.vocabulariesService.delete(id);
  }

  @Post(':id/items')
  async addItem(@Param('id') id: string, @Body() dto: CreateVocabularyItemDto): Promise<UserVocabularyItem> {
    return this.itemsService.add(id, dto);
  }

  /**
   * Items of a vocabulary
   * GET /vocabularies/{id}/items?status=LEARNING
   */
  @Get(':id/items')
  async listItems(@Param('id') id: string, @Query() query: VocabularyItemQueryDto): Promise<UserVocabularyItem[]> {
    return this.itemsService.list(id, query);
  }
}
