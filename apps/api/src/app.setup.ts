import { INestApplication, ValidationPipe } from '@nestjs/common';

import { ValidationException } from './common/exceptions';

export const GLOBAL_PREFIX = 'api';

/**
 * Route prefix and request validation shared by the server and the HTTP tests.
 */
export function configureGlobalSettings(app: INestApplication): void {
  app.setGlobalPrefix(GLOBAL_PREFIX);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      stopAtFirstError: true,
      exceptionFactory: (errors) => ValidationException.fromValidationErrors(errors)
    })
  );
}
