import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put } from '@nestjs/common';

import type { UserVocabularyItem } from '../../domain/models/vocabulary.model';
import { UpdateVocabularyItemDto } from './dto/vocabulary-item.dto';
import { VocabularyItemsService } from './vocabulary-items.service';

@Controller('vocabulary-items')
export class VocabularyItemsController {
  constructor(private readonly itemsService: VocabularyItemsService) {}

  @Get(':id')
  async get(@Param('id') id: string): Promise<UserVocabularyItem> {
    return this.itemsService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateVocabularyItemDto): Promise<UserVocabularyItem> {
    return this.itemsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.itemsService.delete(id);
  }

  /** Count one review. Returns the item with its new review count. */
  @Post(':id/reviews')
  @HttpCode(200)
  async recordReview(@Param('id') id: string): Promise<UserVocabularyItem> {
    return this.itemsService.recordReview(id);
  }
}
