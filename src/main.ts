import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule } from '@nestjs/swagger';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ApiEnabledGuard } from './common/guards/api-enabled.guard';
import { HttpErrorFilter } from './common/filters/http-error.filter';
import { buildSwaggerConfig } from './common/utils/swagger.config';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: true,
  });

  app.useGlobalGuards(app.get(ApiEnabledGuard));
  app.useGlobalFilters(app.get(HttpErrorFilter));
  app.enableCors({ origin: '*' });
  app.enableShutdownHooks();

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties that don't have decorators
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true, // query strings arrive as text
      },
    }),
  );

  const document = SwaggerModule.createDocument(app, buildSwaggerConfig());
  SwaggerModule.setup('doc', app, document, {
    swaggerOptions: {
      defaultModelsExpandDepth: -1, // Hide schemas section
    },
  });

  const port = app.get(ConfigService).get<number>('api.port') ?? 1937;
  await app.listen(port, '0.0.0.0');
  Logger.log(`[INIT] Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('[ERROR] Failed to start', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
