import { DataSource, EntityManager } from 'typeorm';
import { withManager, withTransaction } from '../database.js';
import { MenuItem } from '../entities/MenuItem.js';
import { Order } from '../entities/Order.js';
import { OrderItem } from '../entities/OrderItem.js';
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  TableUnavailableError,
  ValidationError
} from '../errors.js';
import { MenuItemRepository } from '../repositories/MenuItemRepository.js';
import { OrderRepository } from '../repositories/OrderRepository.js';
import { TableRepository } from '../repositories/TableRepository.js';
import {
  CreateOrderInput,
  OrderLineInput,
  MAX_LINE_QUANTITY,
  OrderStatus,
  canTransition,
  isOrderStatus,
  isTerminalStatus
} from '../types/order.js';
import * as logger from '../utils/logger.js';
import { priceCalculator } from './priceCalculator.js';

export interface OperationContext {
  correlationId?: string;
}

/**
 * The order workflow: creation, adding items, status changes and the
 * table occupancy that follows them. Each write is one transaction.
 */
export class OrderService {
  constructor(private readonly dataSource: DataSource) {}

  async listOrders(options: { status?: OrderStatus; limit?: number } = {}): Promise<Order[]> {
    return withManager(this.dataSource, (manager) => new OrderRepository(manager).list(options));
  }

  async getOrder(orderId: number): Promise<Order> {
    const order = await withManager(this.dataSource, (manager) =>
      new OrderRepository(manager).findWithItems(orderId)
    );
    if (!order) throw new NotFoundError('Order', orderId);
    return order;
  }

  /**
   * Create a pending order on a free table and mark the table occupied.
   * Lines for the same menu item are merged. Any unknown or unavailable
   * menu item rejects the whole order.
   */
  async createOrder(input: CreateOrderInput, context: OperationContext = {}): Promise<Order> {
    const { correlationId } = context;

    logger.info('Creating order', {
      correlationId,
      tableId: input.tableId,
      context: 'OrderService.createOrder',
      data: { customerName: input.customerName, lineCount: input.items.length }
    });

    const customerName = input.customerName.trim();
    if (!customerName) {
      throw new ValidationError('Customer name is required');
    }

    const orderId = await withTransaction(this.dataSource, async (manager) => {
      const tables = new TableRepository(manager);
      const orders = new OrderRepository(manager);

      const table = await tables.findOne(input.tableId);
      if (!table) throw new NotFoundError('Table', input.tableId);
      if (table.is_occupied) throw new TableUnavailableError(table.number);

      if (input.items.length === 0) {
        throw new ValidationError('Please add at least one item to the order');
      }

      const quantities = mergeLines(input.items);
      const menuItems = await this.loadOrderableMenuItems(manager, [...quantities.keys()]);

      const order = new Order();
      order.table_id = table.id;
      order.customer_name = customerName;
      order.status = OrderStatus.PENDING;
      order.total_amount = 0;
      const savedOrder = await orders.save(order);

      const orderItems = [...quantities.entries()].map(([menuItemId, quantity]) => {
        const menuItem = menuItems.get(menuItemId);
        if (!menuItem) throw new NotFoundError('Menu item', menuItemId);
        return buildOrderItem(savedOrder.id, menuItem, quantity);
      });
      await orders.saveItems(orderItems);

      savedOrder.total_amount = priceCalculator.calculateOrderTotal(await orders.findItems(savedOrder.id));
      await orders.save(savedOrder);

      await tables.setOccupied(table.id, true);
      return savedOrder.id;
    });

    logger.info('Order created', {
      correlationId,
      orderId,
      tableId: input.tableId,
      context: 'OrderService.createOrder'
    });

    return this.getOrder(orderId);
  }

  /**
   * Add a quantity of a menu item to an active order. An existing line
   * for the item grows in place and keeps its captured price; the total is
   * re-aggregated from all lines.
   */
  async addItem(orderId: number, line: OrderLineInput, context: OperationContext = {}): Promise<Order> {
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new ValidationError('Quantity must be a whole number of at least 1');
    }

    await withTransaction(this.dataSource, async (manager) => {
      const orders = new OrderRepository(manager);

      const order = await orders.findOne(orderId);
      if (!order) throw new NotFoundError('Order', orderId);
      if (isTerminalStatus(order.status)) {
        throw new ConflictError(`Cannot add items to a ${order.status} order`);
      }

      const menuItems = await this.loadOrderableMenuItems(manager, [line.menuItemId]);
      const menuItem = menuItems.get(line.menuItemId);
      if (!menuItem) throw new NotFoundError('Menu item', line.menuItemId);

      const existing = await orders.findItemForMenuItem(order.id, menuItem.id);
      if (existing) {
        existing.quantity = checkLineQuantity(existing.quantity + line.quantity);
        await orders.saveItems([existing]);
      } else {
        await orders.saveItems([buildOrderItem(order.id, menuItem, checkLineQuantity(line.quantity))]);
      }

      order.total_amount = priceCalculator.calculateOrderTotal(await orders.findItems(order.id));
      order.updated_at = new Date();
      await orders.save(order);
    });

    logger.info('Item added to order', {
      correlationId: context.correlationId,
      orderId,
      context: 'OrderService.addItem',
      data: line
    });

    return this.getOrder(orderId);
  }

  /**
   * Move an order to `status`. A terminal status frees the table once no
   * other active order remains on it; other statuses leave it alone.
   */
  async updateStatus(orderId: number, status: string, context: OperationContext = {}): Promise<Order> {
    if (!isOrderStatus(status)) {
      throw new ValidationError('Invalid status!');
    }

    const previousStatus = await withTransaction(this.dataSource, async (manager) => {
      const orders = new OrderRepository(manager);
      const tables = new TableRepository(manager);

      const order = await orders.findOne(orderId);
      if (!order) throw new NotFoundError('Order', orderId);

      const from = order.status;
      if (!canTransition(from, status)) {
        throw new InvalidTransitionError(`Cannot move order ${orderId} from ${from} to ${status}`);
      }

      order.status = status;
      order.updated_at = new Date();
      await orders.save(order);

      if (isTerminalStatus(status)) {
        await this.releaseTableIfIdle(tables, order);
      }
      return from;
    });

    logger.info(`Order status updated to ${status}`, {
      correlationId: context.correlationId,
      orderId,
      context: 'OrderService.updateStatus',
      data: { from: previousStatus, to: status }
    });

    return this.getOrder(orderId);
  }

  /**
   * Administrative removal. Lines go with the order; an active order's
   * table is freed when nothing else is running on it.
   */
  async deleteOrder(orderId: number, context: OperationContext = {}): Promise<void> {
    await withTransaction(this.dataSource, async (manager) => {
      const orders = new OrderRepository(manager);
      const tables = new TableRepository(manager);

      const order = await orders.findOne(orderId);
      if (!order) throw new NotFoundError('Order', orderId);

      await manager.getRepository(OrderItem).delete({ order_id: order.id });
      await orders.delete(order.id);

      if (!isTerminalStatus(order.status)) {
        await this.releaseTableIfIdle(tables, order);
      }
    });

    logger.warn('Order deleted', {
      correlationId: context.correlationId,
      orderId,
      context: 'OrderService.deleteOrder'
    });
  }

  private async releaseTableIfIdle(tables: TableRepository, order: Order): Promise<void> {
    const stillActive = await tables.countActiveOrders(order.table_id, order.id);
    if (stillActive === 0) {
      await tables.setOccupied(order.table_id, false);
    }
  }

  /**
   * Load menu items by id, rejecting unknown or unavailable ones
   */
  private async loadOrderableMenuItems(manager: EntityManager, ids: number[]): Promise<Map<number, MenuItem>> {
    const found = await new MenuItemRepository(manager).findByIds(ids);
    const byId = new Map(found.map((menuItem) => [menuItem.id, menuItem]));

    for (const id of ids) {
      const menuItem = byId.get(id);
      if (!menuItem) throw new NotFoundError('Menu item', id);
      if (!menuItem.is_available) {
        throw new ConflictError(`Menu item "${menuItem.name}" is not available`);
      }
    }
    return byId;
  }
}

function mergeLines(lines: readonly OrderLineInput[]): Map<number, number> {
  const quantities = new Map<number, number>();
  for (const line of lines) {
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new ValidationError('Quantity must be a whole number of at least 1');
    }
    quantities.set(line.menuItemId, checkLineQuantity((quantities.get(line.menuItemId) ?? 0) + line.quantity));
  }
  return quantities;
}

function checkLineQuantity(quantity: number): number {
  if (quantity > MAX_LINE_QUANTITY) {
    throw new ValidationError(`Quantity cannot exceed ${MAX_LINE_QUANTITY}`);
  }
  return quantity;
}

function buildOrderItem(orderId: number, menuItem: MenuItem, quantity: number): OrderItem {
  const orderItem = new OrderItem();
  orderItem.order_id = orderId;
  orderItem.menu_item_id = menuItem.id;
  orderItem.menu_item_name = menuItem.name;
  orderItem.quantity = quantity;
  orderItem.price = menuItem.price;
  return orderItem;
}
