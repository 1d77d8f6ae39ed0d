import { DataSource, EntityManager } from "typeorm";
import { withManager } from "../database.js";
import { Order } from "../entities/Order.js";
import { MenuItemRepository } from "../repositories/MenuItemRepository.js";
import { OrderRepository } from "../repositories/OrderRepository.js";
import { TableRepository } from "../repositories/TableRepository.js";
import { OrderStatus } from "../types/order.js";

export interface DashboardStats {
  total_orders: number;
  pending_orders: number;
  active_orders: number;
  total_revenue: number;
  total_menu_items: number;
  occupied_tables: number;
  available_tables: number;
  recent_orders: Order[];
}

const RECENT_ORDER_LIMIT = 5;

export class DashboardService {
  constructor(private readonly dataSource: DataSource) {}

  async getStats(): Promise<DashboardStats> {
    return withManager(this.dataSource, (manager) => this.collect(manager));
  }

  private async collect(manager: EntityManager): Promise<DashboardStats> {
    const orders = new OrderRepository(manager);
    const tables = new TableRepository(manager);
    const menuItems = new MenuItemRepository(manager);

    const [
      totalOrders,
      pendingOrders,
      preparingOrders,
      readyOrders,
      totalRevenue,
      totalMenuItems,
      occupiedTables,
      availableTables,
      recentOrders
    ] = await Promise.all([
      orders.count(),
      orders.countByStatus(OrderStatus.PENDING),
      orders.countByStatus(OrderStatus.PREPARING),
      orders.countByStatus(OrderStatus.READY),
      orders.totalRevenue(),
      menuItems.count(),
      tables.count({ is_occupied: true }),
      tables.count({ is_occupied: false }),
      orders.list({ limit: RECENT_ORDER_LIMIT })
    ]);

    return {
      total_orders: totalOrders,
      pending_orders: pendingOrders,
      active_orders: pendingOrders + preparingOrders + readyOrders,
      total_revenue: totalRevenue,
      total_menu_items: totalMenuItems,
      occupied_tables: occupiedTables,
      available_tables: availableTables,
      recent_orders: recentOrders
    };
  }
}
