import express from 'express';
import helmet from 'helmet';
import {
  errorHandler,
  notFoundHandler,
  requestLogger,
} from './middleware/errorHandler';
import {
  createHealthRouter,
  createWebhookRouter,
  RouteDependencies,
} from './routes/health';

export function createApp(deps: RouteDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  app.use(createHealthRouter(deps));
  if (deps.webhook) {
    app.use(createWebhookRouter(deps.webhook));
  }

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
