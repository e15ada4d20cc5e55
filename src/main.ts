import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);

  // Global logger
  const isProd =
    configService.get<string>('app.env', 'development') === 'production';
  app.useLogger(
    isProd ? ['error', 'warn'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  );

  configureApp(app);
  app.enableShutdownHooks();

  const port = configService.get<number>('app.port', 3000);
  await app.listen(port);

  Logger.log(`Application is running on: http://localhost:${port}/api`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Bootstrap failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`,
    undefined,
    'Bootstrap',
  );
  process.exit(1);
});
