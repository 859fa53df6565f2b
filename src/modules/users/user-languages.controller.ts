import { Body, Controller, Delete, Get, HttpCode, Param, Put } from '@nestjs/common';

import type { UserLanguage } from '../../domain/models/user-language.model';
import { UserLanguageDto } from './dto/user-language.dto';
import { UserLanguagesService } from './user-languages.service';

@Controller('users/:userId/languages')
export class UserLanguagesController {
  constructor(private readonly userLanguagesService: UserLanguagesService) {}

  @Get()
  async list(@Param('userId') userId: string): Promise<UserLanguage[]> {
    return this.userLanguagesService.list(userId);
  }

  @Put(':languageId')
  async upsert(
    @Param('userId') userId: string,
    @Param('languageId') languageId: string,
    @Body() dto: UserLanguageDto,
  ): Promise<UserLanguage> {
    return this.userLanguagesService.upsert(userId, languageId, dto);
  }

  @Delete(':languageId')
  @HttpCode(204)
  async delete(@Param('userId') userId: string, @Param('languageId') languageId: string): Promise<void> {
    return this.userLanguagesService.delete(userId, languageId);
  }
}
