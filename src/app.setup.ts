import { INestApplication, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { Envs } from './config/envs';

/** Prefijo, validación y cabeceras comunes al servidor y a las pruebas e2e. */
export function configureApp(app: INestApplication, config: Pick<Envs, 'apiPrefix' | 'corsOrigin'>) {
  app.setGlobalPrefix(config.apiPrefix);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.use(helmet());

  app.enableCors({
    origin: config.corsOrigin,
  });

  return app;
}
