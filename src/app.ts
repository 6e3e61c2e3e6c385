import express from 'express';
import type { ContentService } from './content/index.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createContentRouter } from './routes/content.js';
import healthRouter from './routes/health.js';

export function createApp(content: ContentService, options: { corsOrigins: string[] }): express.Express {
  const app = express();

  // Middleware
  app.use(createCorsMiddleware(options.corsOrigins));
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use(healthRouter);
  app.use(createContentRouter(content));

  app.use(errorHandler);
  return app;
}
