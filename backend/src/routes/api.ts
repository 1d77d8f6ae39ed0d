import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { getCorrelationId } from '../middleware/correlation.js';
import { CatalogService } from '../services/catalogService.js';
import { DashboardService } from '../services/dashboardService.js';
import { DiagnosticsService } from '../services/diagnosticsService.js';
import { OrderService } from '../services/OrderService.js';
import { TableService } from '../services/tableService.js';
import * as logger from '../utils/logger.js';
import { presentDashboard, presentMenuItem, presentOrder, presentTable } from './presenters.js';

export interface ApiServices {
  catalog: CatalogService;
  tables: TableService;
  orders: OrderService;
  dashboard: DashboardService;
  diagnostics: DiagnosticsService;
}

/**
 * Read-only JSON views
 * - GET /api/health     database connectivity and row counts
 * - GET /api/dashboard  aggregate statistics
 * - GET /api/menu       menu catalog
 * - GET /api/tables     tables by number
 * - GET /api/orders     orders, newest first
 */
export function createApiRoutes(services: ApiServices): Router {
  const router = express.Router();

  router.get('/health', asyncHandler(async (req, res) => {
    const correlationId = getCorrelationId(res);
    const health = await services.diagnostics.getHealth();

    logger.debug('Health check completed', { correlationId, context: 'healthCheck', data: health });

    // Service Unavailable if DB is down
    res.status(health.database.connected ? 200 : 503).json(health);
  }));

  router.get('/dashboard', asyncHandler(async (req, res) => {
    const stats = await services.dashboard.getStats();
    res.json(presentDashboard(stats));
  }));

  router.get('/menu', asyncHandler(async (req, res) => {
    const menuItems = await services.catalog.listMenuItems();
    res.json(menuItems.map(presentMenuItem));
  }));

  router.get('/tables', asyncHandler(async (req, res) => {
    const tables = await services.tables.listTables();
    res.json(tables.map(presentTable));
  }));

  router.get('/orders', asyncHandler(async (req, res) => {
    const orders = await services.orders.listOrders();
    res.json(orders.map(presentOrder));
  }));

  return router;
}
