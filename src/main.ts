import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConsoleLogger, Logger } from '@nestjs/common';
import { configureApp } from './app.setup';
import { envs } from './config/envs';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: new ConsoleLogger({
      prefix: 'PDF-Merger',
      timestamp: true,
    }),
  });

  configureApp(app, envs);

  const logger = new Logger(bootstrap.name);

  if (envs.nodeEnv !== 'production') {
    const config = new DocumentBuilder()
      .setTitle('PDF Merger API')
      .setDescription(
        'Une PDFs e imágenes PNG/JPEG en un único PDF. Las imágenes se ubican centradas en páginas A4 con márgenes de 10 mm.',
      )
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('docs', app, document, {
      useGlobalPrefix: true,
    });
  }

  app.enableShutdownHooks();

  await app.listen(envs.port, '0.0.0.0');
  logger.log(`Server running on port ${envs.port}`);
  logger.log(`Almacenamiento: ${envs.storageDriver}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('bootstrap').error(`No fue posible iniciar el servidor: ${error}`);
  process.exit(1);
});
