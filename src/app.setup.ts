import { INestApplication } from '@nestjs/common';
import { HttpExceptionFilter } from './core/http-exception.filter';

// Used by the bootstrap and by the e2e tests.
export function setupApp(app: INestApplication): INestApplication {
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();
  return app;
}
