import type { Server } from 'node:http';
import express from 'express';
import type { Express } from 'express';
import { createLogger, generateCorrelationId } from './utils/logger.js';
import type { ForecastRouterDeps } from './adapters/http/forecastRouter.js';
import { createForecastRouter } from './adapters/http/forecastRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(deps: ForecastRouterDeps): Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path, requestId: generateCorrelationId() }, 'Incoming request');
    next();
  });

  app.use(createForecastRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      logger.error({ error: err }, 'Unhandled error in Express');
      res.status(status).json({ error: 'Internal server error' });
      return;
    }
    logger.warn({ error: err }, 'Request rejected');
    res.status(status).json({ error: err.message });
  });

  return app;
}

export async function startServer(
  deps: ForecastRouterDeps,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createApp(deps);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
