import 'reflect-metadata';

// Nest Modules
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import {
  DocumentBuilder,
  SwaggerCustomOptions,
  SwaggerModule,
} from '@nestjs/swagger';

// Third's Modules
import * as luxon from 'luxon';
import helmet from 'helmet';

// App Module
import { AppModule } from './app.module';
import { EnvVars } from './config/config.schema';
import { AppLoggerService } from './modules/logging/application/app-logger.service';

/**
 *  Start the application
 */
async function bootstrap() {
  luxon.Settings.defaultLocale = 'en-US';

  // Logger
  const logger = new Logger('bootstrap');

  // App
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const appLogger = app.get(AppLoggerService);
  app.useLogger(appLogger);

  const config = app.get<ConfigService, ConfigService<EnvVars, true>>(ConfigService);
  const port = config.get('PORT', { infer: true });

  // Global pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: false,
      },
    }),
  );

  // Securities modules; the page loads htmx and Bootstrap from their CDNs
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          scriptSrc: ["'self'", 'https://unpkg.com'],
          styleSrc: ["'self'", "'unsafe-inline'", 'https://cdn.jsdelivr.net'],
          imgSrc: ["'self'", 'data:', 'https:'],
        },
      },
    }),
  );

  // Metadata for Swagger
  const metaData = new DocumentBuilder()
    .setTitle('Ticker Board')
    .setDescription('Market dashboard fragments, health check and log management')
    .setVersion('0.1.0')
    .addServer(`http://127.0.0.1:${port}`)
    .build();

  // Swagger options
  const swaggerCustomOptions: SwaggerCustomOptions = {
    customSiteTitle: 'Ticker Board Endpoints',
    jsonDocumentUrl: 'swagger/json',
  };

  // Swagger document
  const document = SwaggerModule.createDocument(app, metaData);

  // Start swagger
  SwaggerModule.setup('swagger', app, document, swaggerCustomOptions);

  // SIGINT / SIGTERM stop the rotation interval and close the log file
  app.enableShutdownHooks();

  // Define port
  await app.listen(port);

  // Start logs
  logger.log(
    `Ticker Board is running on: ${await app.getUrl()} ` +
      `(docs: ${await app.getUrl()}/swagger, health: ${await app.getUrl()}/healthz)`,
  );

  // Unhandled errors are logged; the server keeps running
  process.on('uncaughtException', (err) => {
    logger.error(`Uncaught Exception: ${err.message}`, err.stack);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(
      `Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`,
      reason instanceof Error ? reason.stack : undefined,
    );
  });
}

bootstrap().catch((error: unknown) => {
  new Logger('bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
