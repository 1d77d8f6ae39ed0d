import express, { Router } from 'express';
import { DataSource } from 'typeorm';
import { CatalogService } from './services/catalogService.js';
import { DashboardService } from './services/dashboardService.js';
import { DiagnosticsService } from './services/diagnosticsService.js';
import { OrderService } from './services/OrderService.js';
import { TableService } from './services/tableService.js';
import { ApiServices, createApiRoutes } from './routes/api.js';
import { createCategoryRoutes } from './routes/categories.js';
import { createDebugRoutes } from './routes/debug.js';
import { createMenuRoutes } from './routes/menu.js';
import { createOrderRoutes } from './routes/orders.js';
import { createTableRoutes } from './routes/tables.js';

export type AppServices = ApiServices;

/**
 * Wire every service to the given DataSource
 */
export function createServices(dataSource: DataSource): AppServices {
  return {
    catalog: new CatalogService(dataSource),
    tables: new TableService(dataSource),
    orders: new OrderService(dataSource),
    dashboard: new DashboardService(dataSource),
    diagnostics: new DiagnosticsService(dataSource)
  };
}

export function createRoutes(services: AppServices): Router {
  const router: Router = express.Router();

  router.use('/categories', createCategoryRoutes(services.catalog));
  router.use('/menu', createMenuRoutes(services.catalog));
  router.use('/tables', createTableRoutes(services.tables));
  router.use('/orders', createOrderRoutes(services.orders));
  router.use('/api', createApiRoutes(services));
  router.use('/debug', createDebugRoutes(services.diagnostics));

  return router;
}
