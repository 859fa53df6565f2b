import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';

import { RepositoryModule, type RepositoryModuleOptions } from '../../infrastructure/repositories/repository.module';
import { ApiExceptionFilter } from '../common/filters/api-exception.filter';
import { HealthModule } from '../health/health.module';
import { LanguagesModule } from '../languages/languages.module';
import { LoggingModule } from '../logging/logging.module';
import { TagsModule } from '../tags/tags.module';
import { TextsModule } from '../texts/texts.module';
import { UsersModule } from '../users/users.module';
import { VocabulariesModule } from '../vocabularies/vocabularies.module';

@Module({})
export class AppModule {
  /**
   * Root module. `persistence` is forwarded to RepositoryModule.register(),
   * so tests can point the app at an in-memory database.
   */
  static register(persistence: RepositoryModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        LoggingModule,
        RepositoryModule.register(persistence),
        LanguagesModule,
        UsersModule,
        TextsModule,
        TagsModule,
        VocabulariesModule,
        HealthModule,
      ],
      providers: [{ provide: APP_FILTER, useClass: ApiExceptionFilter }],
    };
  }
}
