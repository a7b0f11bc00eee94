import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const GLOBAL_PREFIX = 'api';

/**
 * HTTP settings shared by the server and the e2e tests
 */
export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);

  app.setGlobalPrefix(GLOBAL_PREFIX);
  app.enableCors({
    origin: configService.get<string>('app.corsOrigin') ?? '*',
    credentials: true,
  });
  app.enableShutdownHooks();

  return app;
}
