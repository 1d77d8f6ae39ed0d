import { EntityManager, In, Not } from "typeorm";
import { DiningTable } from "../entities/DiningTable.js";
import { Order } from "../entities/Order.js";
import { ACTIVE_ORDER_STATUSES } from "../types/order.js";
import { BaseRepository } from "./BaseRepository.js";

export class TableRepository extends BaseRepository<DiningTable> {
  constructor(manager: EntityManager) {
    super(manager, DiningTable);
  }

  async findAllOrdered(): Promise<DiningTable[]> {
    return this.repository.find({ order: { number: "ASC" } });
  }

  async findAvailable(): Promise<DiningTable[]> {
    return this.repository.find({ where: { is_occupied: false }, order: { number: "ASC" } });
  }

  async findByNumber(number: number, excludeId?: number): Promise<DiningTable | null> {
    return this.repository.findOne({
      where: excludeId === undefined ? { number } : { number, id: Not(excludeId) }
    });
  }

  /**
   * Count orders in pending/preparing/ready on a table, optionally
   * leaving one order out of the count
   */
  async countActiveOrders(tableId: number, excludeOrderId?: number): Promise<number> {
    return this.manager.getRepository(Order).count({
      where: {
        table_id: tableId,
        status: In([...ACTIVE_ORDER_STATUSES]),
        ...(excludeOrderId === undefined ? {} : { id: Not(excludeOrderId) })
      }
    });
  }

  async countOrders(tableId: number): Promise<number> {
    return this.manager.getRepository(Order).count({ where: { table_id: tableId } });
  }

  async setOccupied(tableId: number, isOccupied: boolean): Promise<void> {
    await this.repository.update({ id: tableId }, { is_occupied: isOccupied });
  }
}
