import { Category } from "../entities/Category.js";
import { DiningTable } from "../entities/DiningTable.js";
import { MenuItem } from "../entities/MenuItem.js";
import { Order } from "../entities/Order.js";
import { OrderItem } from "../entities/OrderItem.js";
import { priceCalculator } from "../services/priceCalculator.js";
import { DashboardStats } from "../services/dashboardService.js";

/**
 * JSON shapes returned by the HTTP layer
 */

export function presentCategory(category: Category) {
  return {
    id: category.id,
    name: category.name,
    description: category.description,
    created_at: category.created_at
  };
}

export function presentMenuItem(menuItem: MenuItem) {
  return {
    id: menuItem.id,
    name: menuItem.name,
    description: menuItem.description,
    price: menuItem.price,
    category_id: menuItem.category_id,
    category: menuItem.category ? menuItem.category.name : "Unknown",
    available: menuItem.is_available,
    image_url: menuItem.image_url
  };
}

export function presentTable(table: DiningTable) {
  return {
    id: table.id,
    number: table.number,
    capacity: table.capacity,
    is_occupied: table.is_occupied
  };
}

export function presentOrderItem(item: OrderItem) {
  return {
    id: item.id,
    menu_item_id: item.menu_item_id,
    name: item.menu_item_name,
    quantity: item.quantity,
    price: item.price,
    line_total: priceCalculator.calculateLineTotal(item)
  };
}

export function presentOrder(order: Order) {
  return {
    id: order.id,
    table_id: order.table_id,
    table_number: order.table ? order.table.number : null,
    customer_name: order.customer_name,
    status: order.status,
    total_amount: order.total_amount,
    created_at: order.created_at,
    updated_at: order.updated_at,
    items: (order.items ?? []).map(presentOrderItem)
  };
}

export function presentDashboard(stats: DashboardStats) {
  return {
    ...stats,
    recent_orders: stats.recent_orders.map(presentOrder)
  };
}
