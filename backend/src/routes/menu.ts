import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { CatalogService } from '../services/catalogService.js';
import { idParamSchema, menuItemInputSchema, menuItemUpdateSchema, parseInput } from '../validation/schemas.js';
import { presentMenuItem } from './presenters.js';

/**
 * Menu item Routes
 * - GET    /menu            list menu items (?available=true for orderable ones)
 * - POST   /menu            create a menu item
 * - GET    /menu/:id        menu item details
 * - PUT    /menu/:id        update
 * - DELETE /menu/:id        delete (refused while on an active order)
 */
export function createMenuRoutes(catalog: CatalogService): Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (req, res) => {
    const menuItems = await catalog.listMenuItems({ availableOnly: req.query.available === 'true' });
    res.json({ success: true, menu_items: menuItems.map(presentMenuItem), count: menuItems.length });
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const input = parseInput(menuItemInputSchema, req.body);
    const menuItem = await catalog.createMenuItem(input);
    res.status(201).json({ success: true, message: 'Menu item added successfully!', menu_item: presentMenuItem(menuItem) });
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const menuItem = await catalog.getMenuItem(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, menu_item: presentMenuItem(menuItem) });
  }));

  router.put('/:id', asyncHandler(async (req, res) => {
    const id = parseInput(idParamSchema, req.params.id);
    const input = parseInput(menuItemUpdateSchema, req.body);
    const menuItem = await catalog.updateMenuItem(id, input);
    res.json({ success: true, message: 'Menu item updated successfully!', menu_item: presentMenuItem(menuItem) });
  }));

  router.delete('/:id', asyncHandler(async (req, res) => {
    await catalog.deleteMenuItem(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, message: 'Menu item deleted successfully!' });
  }));

  return router;
}
