import { EntityManager, In } from "typeorm";
import { MenuItem } from "../entities/MenuItem.js";
import { OrderItem } from "../entities/OrderItem.js";
import { ACTIVE_ORDER_STATUSES } from "../types/order.js";
import { BaseRepository } from "./BaseRepository.js";

export class MenuItemRepository extends BaseRepository<MenuItem> {
  constructor(manager: EntityManager) {
    super(manager, MenuItem);
  }

  async findWithCategory(id: number): Promise<MenuItem | null> {
    return this.repository.findOne({ where: { id }, relations: ['category'] });
  }

  async findAllWithCategory(options: { availableOnly?: boolean } = {}): Promise<MenuItem[]> {
    return this.repository.find({
      where: options.availableOnly ? { is_available: true } : {},
      relations: ['category'],
      order: { category_id: "ASC", name: "ASC" }
    });
  }

  async findByIds(ids: number[]): Promise<MenuItem[]> {
    if (ids.length === 0) return [];
    return this.repository.find({ where: { id: In(ids) } });
  }

  async findByName(name: string): Promise<MenuItem | null> {
    return this.repository.findOne({ where: { name } });
  }

  /**
   * Number of order lines on active orders that reference the menu item
   */
  async countActiveOrderReferences(menuItemId: number): Promise<number> {
    return this.manager
      .getRepository(OrderItem)
      .createQueryBuilder("order_item")
      .innerJoin("order_item.order", "ord")
      .where("order_item.menu_item_id = :menuItemId", { menuItemId })
      .andWhere("ord.status IN (:...statuses)", { statuses: [...ACTIVE_ORDER_STATUSES] })
      .getCount();
  }
}
