import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createClusterRoutes } from './routes/clusters';
import { createDocumentRoutes } from './routes/documents';
import { createEstimateRoutes } from './routes/estimate';
import { createTaskRoutes } from './routes/tasks';
import type { Services } from './runtime';

export interface AppOptions {
  corsOrigins?: string[];
}

export function createApp(services: Services, options: AppOptions = {}) {
  const app = express();

  app.use(helmet());

  app.use(
    cors({
      origin: options.corsOrigins ?? [],
    })
  );

  app.use(express.json({ limit: '5mb' }));

  app.get('/health', async (_req, res, next) => {
    try {
      const report = await services.health.check();
      res.status(report.status === 'ok' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.use(requestLogger);

  app.use('/api/clusters', createClusterRoutes(services));
  app.use('/api/documents', createDocumentRoutes(services));
  app.use('/api/tasks', createTaskRoutes(services));
  app.use('/api/estimate', createEstimateRoutes(services.config));

  app.use(errorHandler);

  return app;
}
