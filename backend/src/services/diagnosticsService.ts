import { DataSource, EntityManager } from "typeorm";
import { isDatabaseHealthy, withManager } from "../database.js";
import { Category } from "../entities/Category.js";
import { DiningTable } from "../entities/DiningTable.js";
import { MenuItem } from "../entities/MenuItem.js";
import { Order } from "../entities/Order.js";
import { OrderItem } from "../entities/OrderItem.js";

export interface HealthReport {
  status: "healthy" | "degraded";
  timestamp: string;
  database: {
    connected: boolean;
    type: string;
  };
  counts: RowCounts | null;
  version: string;
}

export interface RowCounts {
  categories: number;
  menu_items: number;
  tables: number;
  orders: number;
  order_items: number;
}

export class DiagnosticsService {
  constructor(private readonly dataSource: DataSource) {}

  async countRows(): Promise<RowCounts> {
    return withManager(this.dataSource, (manager) => countRowsWith(manager));
  }

  async getHealth(): Promise<HealthReport> {
    const connected = await isDatabaseHealthy(this.dataSource);
    return {
      status: connected ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      database: {
        connected,
        type: String(this.dataSource.options.type)
      },
      counts: connected ? await this.countRows() : null,
      version: process.env.npm_package_version || "1.0.0"
    };
  }

  /**
   * Every row of every table, for the debug page
   */
  async dump(): Promise<{
    counts: RowCounts;
    tables: DiningTable[];
    categories: Category[];
    menu_items: MenuItem[];
    orders: Order[];
  }> {
    return withManager(this.dataSource, async (manager) => {
      const [counts, tables, categories, menuItems, orders] = await Promise.all([
        countRowsWith(manager),
        manager.find(DiningTable, { order: { number: "ASC" } }),
        manager.find(Category, { order: { id: "ASC" } }),
        manager.find(MenuItem, { order: { id: "ASC" } }),
        manager.find(Order, { relations: ["table"], order: { id: "ASC" } })
      ]);
      return { counts, tables, categories, menu_items: menuItems, orders };
    });
  }
}

async function countRowsWith(manager: EntityManager): Promise<RowCounts> {
  const [categories, menuItems, tables, orders, orderItems] = await Promise.all([
    manager.count(Category),
    manager.count(MenuItem),
    manager.count(DiningTable),
    manager.count(Order),
    manager.count(OrderItem)
  ]);
  return { categories, menu_items: menuItems, tables, orders, order_items: orderItems };
}
