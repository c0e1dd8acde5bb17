import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import helmet from '@fastify/helmet';
import { Logger, LoggerErrorInterceptor } from 'nestjs-pino';

import { AppModule } from './app.module';
import { configureGlobalSettings, GLOBAL_PREFIX } from './app.setup';
import type { Env } from './config/env.validation';
import { toErrorInfo } from './shared/error.util';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      ignoreTrailingSlash: true,
      // Request logging goes through nestjs-pino
      logger: false
    }),
    { bufferLogs: true }
  );

  await registerMiddlewares(app);

  configureGlobalSettings(app);

  const config = app.get<ConfigService<Env, true>>(ConfigService);
  if (config.get('NODE_ENV', { infer: true }) !== 'production') {
    setupSwagger(app);
  }

  await startServer(app, config);
}

async function registerMiddlewares(app: NestFastifyApplication): Promise<void> {
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: [`'self'`],
        // Swagger UI needs inline styles and data-URI images
        styleSrc: [`'self'`, `'unsafe-inline'`],
        imgSrc: [`'self'`, 'data:', 'validator.swagger.io'],
        scriptSrc: [`'self'`, `'unsafe-inline'`],
        objectSrc: [`'none'`],
        frameAncestors: [`'self'`]
      }
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true
    },
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin'
    }
  });

  app.useLogger(app.get(Logger));
  app.useGlobalInterceptors(new LoggerErrorInterceptor());
}

function setupSwagger(app: NestFastifyApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Storefront API')
    .setDescription('Catalogue categories for the storefront')
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(`${GLOBAL_PREFIX}/docs`, app, document, {
    swaggerOptions: {
      displayOperationId: true,
      filter: true,
      showRequestDuration: true
    },
    jsonDocumentUrl: `${GLOBAL_PREFIX}/docs-json`
  });
}

async function startServer(app: NestFastifyApplication, config: ConfigService<Env, true>): Promise<void> {
  const logger = app.get(Logger);
  const port = config.get('PORT', { infer: true });
  const host = config.get('HOST', { infer: true });

  try {
    await app.listen(port, host);
    logger.log(`Application is running on: http://${host}:${port}/${GLOBAL_PREFIX}`);
  } catch (error: unknown) {
    const { message, stack } = toErrorInfo(error);
    logger.error(`Error starting the server: ${message}`, stack);
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}. Shutting down gracefully...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${toErrorInfo(error).message}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap().catch((error: unknown) => {
  console.error('Bootstrap failed:', error);
  process.exit(1);
});
