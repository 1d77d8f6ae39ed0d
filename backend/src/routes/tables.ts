import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { TableService } from '../services/tableService.js';
import { idParamSchema, parseInput, tableInputSchema, tableUpdateSchema } from '../validation/schemas.js';
import { presentTable } from './presenters.js';

/**
 * Table Routes
 * - GET    /tables          list tables by number (?available=true for free ones)
 * - POST   /tables          add a table
 * - GET    /tables/:id      table details
 * - PUT    /tables/:id      change number or capacity
 * - DELETE /tables/:id      delete (refused while it has orders)
 */
export function createTableRoutes(tableService: TableService): Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (req, res) => {
    const tables = await tableService.listTables({ availableOnly: req.query.available === 'true' });
    res.json({ success: true, tables: tables.map(presentTable), count: tables.length });
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const input = parseInput(tableInputSchema, req.body);
    const table = await tableService.createTable(input);
    res.status(201).json({ success: true, message: `Table ${table.number} added successfully!`, table: presentTable(table) });
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const table = await tableService.getTable(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, table: presentTable(table) });
  }));

  router.put('/:id', asyncHandler(async (req, res) => {
    const id = parseInput(idParamSchema, req.params.id);
    const input = parseInput(tableUpdateSchema, req.body);
    const table = await tableService.updateTable(id, input);
    res.json({ success: true, message: `Table ${table.number} updated successfully!`, table: presentTable(table) });
  }));

  router.delete('/:id', asyncHandler(async (req, res) => {
    await tableService.deleteTable(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, message: 'Table deleted successfully!' });
  }));

  return router;
}
