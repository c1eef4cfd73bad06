import express from 'express';
import type { Store } from './db.js';
import type { AppConfig } from './config.js';
import { requestLogger } from './logger.js';
import { createApiRouter } from './routes.js';
import { createPagesRouter } from './pages.js';
import { createErrorHandler, notFound } from './errors.js';

export interface AppOptions {
  db: Store;
  config: Pick<AppConfig, 'nodeEnv' | 'staticDir'>;
}

export function createApp({ db, config }: AppOptions) {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use('/static', express.static(config.staticDir));

  app.get('/health', (_req, res) => {
    res.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createApiRouter(db));
  app.use('/', createPagesRouter(db));

  app.use(notFound);
  app.use(createErrorHandler({ exposeErrors: config.nodeEnv === 'development' }));

  return app;
}
