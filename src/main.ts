import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';

/** Shared by main() and the end-to-end tests so both run the same pipeline. */
export function configureApp(app: NestExpressApplication, prefix = process.env.API_PREFIX?.trim() ?? ''): void {
  // Trust reverse proxy so req.ip reflects the original client
  app.set('trust proxy', true);

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Request-Id'],
    credentials: false,
  });

  if (prefix) {
    app.setGlobalPrefix(prefix);
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule.register(), {
    bufferLogs: true,
  });
  configureApp(app);
  // Fire onApplicationShutdown (repository factory dispose) on SIGTERM/SIGINT
  app.enableShutdownHooks();
  app.useLogger(new Logger('LanguageLearningApi'));

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  const prefix = process.env.API_PREFIX?.trim();
  Logger.log(`API is running on http://localhost:${port}/${prefix ?? ''}`);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
    process.exit(1);
  });
}
