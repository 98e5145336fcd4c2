import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import type { IncomingMessage } from 'http';
import { AppModule } from './app/app.module';
import { AppConfigService } from './core/config/app-config.service';
import { configureApp } from './app/configure-app';

type RequestWithId = IncomingMessage & { requestId?: string };

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(AppConfigService);
  const logger = new Logger('bootstrap');

  app.enableShutdownHooks();
  app.use(helmet());

  // JSON-логирование запросов
  app.use(
    pinoHttp({
      level: config.getLogLevel(),
      redact: {
        paths: [
          'req.headers.authorization',
          'req.headers["x-admin-key"]',
          'req.headers["x-api-key"]',
          'req.headers["x-metrics-token"]',
        ],
        censor: '[REDACTED]',
      },
      autoLogging: true,
      customProps: (req: RequestWithId) => ({
        requestId: req.requestId || req.headers['x-request-id'] || undefined,
      }),
    }),
  );

  configureApp(app);

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Avocado bonus API')
      .setDescription('Bonus ledger, discounts and the sales write path')
      .setVersion('1.0.0')
      .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'api-key')
      .addApiKey({ type: 'apiKey', name: 'x-admin-key', in: 'header' }, 'admin-key')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  const port = config.getPort();
  await app.listen(port);
  logger.log(`API on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('bootstrap').error(
    `failed to start: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`,
  );
  process.exit(1);
});
