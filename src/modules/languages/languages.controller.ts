import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';

import type { Language } from '../../domain/models/language.model';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { LanguageDto, UpdateLanguageDto } from './dto/language.dto';
import { LanguagesService } from './languages.service';

@Controller('languages')
export class LanguagesController {
  constructor(private readonly languagesService: LanguagesService) {}

  @Post()
  async create(@Body() dto: LanguageDto): Promise<Language> {
    return this.languagesService.create(dto);
  }

  @Get()
  async list(@Query() query: PaginationQueryDto): Promise<Language[]> {
    return this.languagesService.list(toPage(query));
  }

  /**
   * GET /languages/by-code/{code}
   * Declared before ':id' so the literal segment wins.
   */
  @Get('by-code/:code')
  async getByCode(@Param('code') code: string): Promise<Language> {
    return this.languagesService.getByCode(code);
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<Language> {
    return this.languagesService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateLanguageDto): Promise<Language> {
    return this.languagesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.languagesService.delete(id);
  }
}
