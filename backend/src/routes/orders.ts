import express, { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { getCorrelationId } from '../middleware/correlation.js';
import { ValidationError } from '../errors.js';
import { OrderService } from '../services/OrderService.js';
import { OrderStatus, isOrderStatus } from '../types/order.js';
import {
  addOrderItemSchema,
  createOrderSchema,
  idParamSchema,
  orderListQuerySchema,
  parseInput,
  updateStatusSchema
} from '../validation/schemas.js';
import { presentOrder } from './presenters.js';

/**
 * Order Routes
 * - GET    /orders             list orders, newest first (?status=)
 * - POST   /orders             create an order on a free table
 * - GET    /orders/:id         order details with items
 * - DELETE /orders/:id         administrative delete
 * - POST   /orders/:id/items   add a menu item to the order
 * - POST   /orders/:id/status  change status
 */
export function createOrderRoutes(orderService: OrderService): Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (req, res) => {
    const { status } = parseInput(orderListQuerySchema, req.query);
    let filter: OrderStatus | undefined;
    if (status !== undefined) {
      if (!isOrderStatus(status)) throw new ValidationError('Invalid status!');
      filter = status;
    }
    const orders = await orderService.listOrders({ status: filter });
    res.json({ success: true, orders: orders.map(presentOrder), count: orders.length });
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const input = parseInput(createOrderSchema, req.body);
    const order = await orderService.createOrder(input, { correlationId: getCorrelationId(res) });
    res.status(201).json({
      success: true,
      message: 'Order created successfully!',
      order_id: order.id,
      order: presentOrder(order)
    });
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const order = await orderService.getOrder(parseInput(idParamSchema, req.params.id));
    res.json({ success: true, order: presentOrder(order) });
  }));

  router.delete('/:id', asyncHandler(async (req, res) => {
    await orderService.deleteOrder(parseInput(idParamSchema, req.params.id), { correlationId: getCorrelationId(res) });
    res.json({ success: true, message: 'Order deleted' });
  }));

  router.post('/:id/items', asyncHandler(async (req, res) => {
    const id = parseInput(idParamSchema, req.params.id);
    const line = parseInput(addOrderItemSchema, req.body);
    const order = await orderService.addItem(id, line, { correlationId: getCorrelationId(res) });
    res.json({ success: true, message: 'Item added to order!', order: presentOrder(order) });
  }));

  router.post('/:id/status', asyncHandler(async (req, res) => {
    const id = parseInput(idParamSchema, req.params.id);
    const { status } = parseInput(updateStatusSchema, req.body);
    const order = await orderService.updateStatus(id, status, { correlationId: getCorrelationId(res) });
    res.json({ success: true, message: `Order status updated to ${order.status}!`, order: presentOrder(order) });
  }));

  return router;
}
