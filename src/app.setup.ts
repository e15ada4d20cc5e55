import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nValidationExceptionFilter, I18nValidationPipe } from 'nestjs-i18n';
import {
  formatValidationErrors,
  validationResponseBody,
} from './common/exceptions/validation.exception';

/**
 * HTTP wiring shared by the server entry point and the end-to-end tests:
 * the /api prefix, request validation and CORS.
 */
export const configureApp = (app: INestApplication): void => {
  const configService = app.get(ConfigService);

  app.setGlobalPrefix('api');

  // Global pipes
  app.useGlobalPipes(
    new I18nValidationPipe({
      whitelist: true,
      transform: true,
      stopAtFirstError: true,
    }),
  );

  // Global filters
  app.useGlobalFilters(
    new I18nValidationExceptionFilter({
      errorFormatter: formatValidationErrors,
      responseBodyFormatter: validationResponseBody,
    }),
  );

  // CORS
  app.enableCors({
    origin: configService.get<string[]>('cors.origins', []),
    credentials: true,
  });
};
