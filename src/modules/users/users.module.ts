import { Module } from '@nestjs/common';

import { BcryptPasswordHasher, PASSWORD_HASHER } from './password-hasher';
import { UserLanguagesController } from './user-languages.controller';
import { UserLanguagesService } from './user-languages.service';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  controllers: [UsersController, UserLanguagesController],
  providers: [UsersService, UserLanguagesService, { provide: PASSWORD_HASHER, useClass: BcryptPasswordHasher }],
  exports: [UsersService],
})
export class UsersModule {}
