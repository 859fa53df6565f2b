import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';

import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import type { PublicUser } from './user.response';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  async create(@Body() dto: CreateUserDto): Promise<PublicUser> {
    return this.usersService.create(dto);
  }

  @Get()
  async list(@Query() query: PaginationQueryDto): Promise<PublicUser[]> {
    return this.usersService.list(toPage(query));
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<PublicUser> {
    return this.usersService.get(id);
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateUserDto): Promise<PublicUser> {
    return this.usersService.update(id, dto);
  }

  /** Deleting a user removes its study languages and vocabularies and detaches its texts. */
  @Delete(':id')
  @HttpCode(204)
  async delete(@Param('id') id: string): Promise<void> {
    return this.usersService.delete(id);
  }

  /**
   * Mark the user as active now
   * POST /users/{id}/activity
   */
  @Post(':id/activity')
  @HttpCode(204)
  async recordActivity(@Param('id') id: string): Promise<void> {
    return this.usersService.recordActivity(id);
  }
}
