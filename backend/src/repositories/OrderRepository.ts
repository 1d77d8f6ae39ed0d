import { EntityManager, FindOptionsWhere } from "typeorm";
import { Order } from "../entities/Order.js";
import { OrderItem } from "../entities/OrderItem.js";
import { BaseRepository } from "./BaseRepository.js";
import { OrderStatus } from "../types/order.js";

export class OrderRepository extends BaseRepository<Order> {
  constructor(manager: EntityManager) {
    super(manager, Order);
  }

  async findWithItems(id: number): Promise<Order | null> {
    return this.repository.findOne({
      where: { id },
      relations: ['items', 'table'],
      order: { items: { id: "ASC" } }
    });
  }

  /**
   * Orders newest first, with their items and table
   */
  async list(options: { status?: OrderStatus; limit?: number } = {}): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = options.status ? { status: options.status } : {};
    return this.repository.find({
      where,
      relations: ['items', 'table'],
      order: { created_at: 'DESC', id: 'DESC' },
      take: options.limit
    });
  }

  async countByStatus(status: OrderStatus): Promise<number> {
    return this.repository.count({ where: { status } });
  }

  /**
   * Sum of totals over every order that was not cancelled
   */
  async totalRevenue(): Promise<number> {
    const row = await this.repository
      .createQueryBuilder("ord")
      .select("COALESCE(SUM(ord.total_amount), 0)", "revenue")
      .where("ord.status != :cancelled", { cancelled: OrderStatus.CANCELLED })
      .getRawOne<{ revenue: string | number | null }>();
    return Number(row?.revenue ?? 0);
  }

  async findItems(orderId: number): Promise<OrderItem[]> {
    return this.manager.getRepository(OrderItem).find({
      where: { order_id: orderId },
      order: { id: "ASC" }
    });
  }

  async findItemForMenuItem(orderId: number, menuItemId: number): Promise<OrderItem | null> {
    return this.manager.getRepository(OrderItem).findOne({
      where: { order_id: orderId, menu_item_id: menuItemId }
    });
  }

  async saveItems(items: OrderItem[]): Promise<OrderItem[]> {
    return this.manager.getRepository(OrderItem).save(items);
  }
}
