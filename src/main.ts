import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { AppSettings } from './config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);

  // Enable graceful shutdown
  app.enableShutdownHooks();

  const settings = app.get(ConfigService).getOrThrow<AppSettings>('app');
  app.enableCors({ origin: settings.corsOrigins === '*' ? true : settings.corsOrigins });

  const config = new DocumentBuilder()
    .setTitle('Profile RAG API')
    .setDescription('Ask questions about a professional profile')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  await app.listen(settings.port, settings.host);

  const url = await app.getUrl();
  logger.log(`🚀 Application is running on: ${url}`);
  logger.log(`📚 Swagger UI available at: ${url}/api`);
  logger.log(`⏳ Profile index builds in the background; GET /health reports readiness.`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application', error);
  process.exit(1);
});
