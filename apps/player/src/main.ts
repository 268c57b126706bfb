import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { PlayerModule } from './player.module';
import { PlayerConfigService } from './config/config.service';

async function bootstrap() {
  const app = await NestFactory.create(PlayerModule);
  const logger = new Logger('Bootstrap');

  const configService = app.get(PlayerConfigService);

  // Global prefix
  app.setGlobalPrefix(configService.apiPrefix);

  // Close browsers and HTTP agents on SIGTERM
  app.enableShutdownHooks();

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Swagger documentation (not in production)
  if (!configService.isProduction) {
    const config = new DocumentBuilder()
      .setTitle('Streamcast Player')
      .setDescription('Stream extraction, casting and music commands')
      .setVersion('0.1.0')
      .addTag('Health', 'Health check endpoints')
      .addTag('Commands', 'Player, browser and music commands')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(`${configService.apiPrefix}/docs`, app, document);

    logger.log(`Swagger docs available at http://localhost:${configService.port}/${configService.apiPrefix}/docs`);
  }

  const port = configService.port;
  await app.listen(port);

  logger.log(`Streamcast player running on http://localhost:${port}/${configService.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
