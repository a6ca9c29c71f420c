import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { createLogger } from './utils/logger.js';
import { createForecastRouter, type ForecastService } from './adapters/http/forecastRouter.js';
const logger = createLogger({ component: 'server' });

const indexPage = fileURLToPath(new URL('../public/index.html', import.meta.url));

export function createApp(service: ForecastService): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/', (_req, res, next) => {
    res.sendFile(indexPage, (error) => {
      if (error) next(error);
    });
  });

  app.use('/api', createForecastRouter(service));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Endpoint not found' });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  service: ForecastService,
  port: number,
  host: string = 'localhost'
): Promise<Server> {
  const app = createApp(service);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
