import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { DiagnosticsService } from '../services/diagnosticsService.js';
import { presentCategory, presentMenuItem, presentOrder, presentTable } from './presenters.js';

/**
 * GET /debug/data - every row of every table with counts
 */
export function createDebugRoutes(diagnostics: DiagnosticsService): Router {
  const router = express.Router();

  router.get('/data', asyncHandler(async (req, res) => {
    const snapshot = await diagnostics.dump();
    res.json({
      counts: snapshot.counts,
      tables: snapshot.tables.map(presentTable),
      categories: snapshot.categories.map(presentCategory),
      menu_items: snapshot.menu_items.map(presentMenuItem),
      orders: snapshot.orders.map(presentOrder)
    });
  }));

  return router;
}
