import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { CatalogService } from '../services/catalogService.js';
import { categoryInputSchema, idParamSchema, parseInput } from '../validation/schemas.js';
import { presentCategory } from './presenters.js';

/**
 * Category Routes
 * - GET    /categories      list categories
 * - POST   /categories      create a category
 * - GET    /categories/:id  category details
 * - PUT    /categories/:id  rename / describe
 * - DELETE /categories/:id  delete (refused while it has menu items)
 */
export function createCategoryRoutes(catalog: CatalogService): Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (req, res) => {
    const categories = await catalog.listCategories();
    res.json({ success: true, categories: categories.map(presentCategory), count: categories.length });
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const input = parseInput(categoryInputSchema, req.body);
    const category = await catalog.createCategory(input);
    res.status(201).json({ success: true, message: 'Category added successfully!', category: presentCategory(category) });
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const category = await catalog.getCategory(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, category: presentCategory(category) });
  }));

  router.put('/:id', asyncHandler(async (req, res) => {
    const id = parseInput(idParamSchema, req.params.id);
    const input = parseInput(categoryInputSchema.partial(), req.body);
    const category = await catalog.updateCategory(id, input);
    res.json({ success: true, message: 'Category updated successfully!', category: presentCategory(category) });
  }));

  router.delete('/:id', asyncHandler(async (req, res) => {
    await catalog.deleteCategory(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, message: 'Category deleted successfully!' });
  }));

  return router;
}
