import cors from 'cors';
import express, { type Request } from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';

import type { AppContext } from './app.context.js';
import { env } from './config/env.js';
import { logger } from './core/logger/index.js';
import { errorHandler } from './core/middleware/error-handler.js';
import { notFoundHandler } from './core/middleware/not-found.js';
import { requestId } from './core/middleware/request-id.js';
import { createApiRouter } from './routes/index.js';

export const createApp = (context: AppContext) => {
  const app = express();

  app.use(cors({ origin: true, methods: ['GET', 'POST', 'OPTIONS'] }));

  // Plain HTTP on the local network: no HSTS and no upgrade of form posts.
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          'script-src': ["'self'", "'unsafe-inline'"],
          'upgrade-insecure-requests': null,
        },
      },
      strictTransportSecurity: false,
    }),
  );
  app.use(express.json({ limit: '64kb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(requestId);
  app.use(
    pinoHttp({
      logger,
      quietReqLogger: env.NODE_ENV === 'test',
      customProps: (req: Request) => ({ requestId: req.id }),
      autoLogging: { ignore: (req) => req.url === '/api/status' },
    }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createApiRouter(context));
  app.use('/', context.dashboard.router);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
