import express, { Express } from 'express';
import cors from 'cors';
import { DataSource } from 'typeorm';
import { config } from './config/env.js';
import { correlationMiddleware } from './middleware/correlation.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createRoutes, createServices } from './routes.js';

/**
 * Build the Express app around an initialized DataSource
 */
export function createApp(dataSource: DataSource): Express {
  const app = express();

  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json());
  // Form posts from the staff pages
  app.use(express.urlencoded({ extended: true }));
  app.use(correlationMiddleware);

  app.get('/', (req, res) => {
    res.json({
      name: 'front-of-house',
      endpoints: ['/categories', '/menu', '/tables', '/orders', '/api/dashboard', '/api/health', '/debug/data']
    });
  });

  app.use(createRoutes(createServices(dataSource)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
