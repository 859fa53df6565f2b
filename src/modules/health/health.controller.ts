import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { ILanguageRepository } from '../../domain/repositories/language.repository.interface';
import {
  REPOSITORY_FACTORY,
  type IRepositoryFactory,
  type PersistenceBackend,
} from '../../domain/repositories/repository-factory.interface';
import { LANGUAGE_REPOSITORY } from '../../domain/repositories/repository.tokens';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

export interface HealthResponse {
  status: 'ok';
  backend: PersistenceBackend;
  uptimeSeconds: number;
  timestamp: string;
}

export interface AboutResponse {
  name: string;
  version: string;
  description: string;
  backend: PersistenceBackend;
}

export interface VersionResponse {
  name: string;
  version: string;
  /** `APP_BUILD_DATE`, null when the build did not record one. */
  buildDate: string | null;
  nodeVersion: string;
}

export const DEFAULT_APP_NAME = 'language-learning-api';
export const DEFAULT_APP_VERSION = '1.0.0';

@Controller()
export class HealthController {
  constructor(
    @Inject(REPOSITORY_FACTORY) private readonly factory: IRepositoryFactory,
    @Inject(LANGUAGE_REPOSITORY) private readonly languages: ILanguageRepository,
    private readonly config: ConfigService,
    private readonly logger: AppLogger,
  ) {}

  /** Answers 503 when the storage backend cannot serve a one-row read. */
  @Get('health')
  async health(): Promise<HealthResponse> {
    try {
      await this.languages.getAll({ limit: 1 });
    } catch (error) {
      this.logger.warn(LogCategory.DATABASE, 'Health probe failed', {
        backend: this.factory.backend,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw new ServiceUnavailableException(`Storage backend "${this.factory.backend}" is unavailable`);
    }
    return {
      status: 'ok',
      backend: this.factory.backend,
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('about')
  about(): AboutResponse {
    return {
      name: this.appName(),
      version: this.appVersion(),
      description: 'REST API for a language-learning application',
      backend: this.factory.backend,
    };
  }

  @Get('about/version')
  version(): VersionResponse {
    return {
      name: this.appName(),
      version: this.appVersion(),
      buildDate: this.config.get<string>('APP_BUILD_DATE') ?? null,
      nodeVersion: process.versions.node,
    };
  }

  private appName(): string {
    return this.config.get<string>('APP_NAME') ?? DEFAULT_APP_NAME;
  }

  private appVersion(): string {
    return this.config.get<string>('APP_VERSION') ?? DEFAULT_APP_VERSION;
  }
}
