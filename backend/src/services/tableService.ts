import { DataSource } from "typeorm";
import { withManager, withTransaction } from "../database.js";
import { DiningTable } from "../entities/DiningTable.js";
import { ConflictError, DeletionBlockedError, NotFoundError } from "../errors.js";
import { TableRepository } from "../repositories/TableRepository.js";
import * as logger from "../utils/logger.js";
import type { TableInput, TableUpdate } from "../validation/schemas.js";

export class TableService {
  constructor(private readonly dataSource: DataSource) {}

  async listTables(options: { availableOnly?: boolean } = {}): Promise<DiningTable[]> {
    return withManager(this.dataSource, (manager) => {
      const tables = new TableRepository(manager);
      return options.availableOnly ? tables.findAvailable() : tables.findAllOrdered();
    });
  }

  async getTable(id: number): Promise<DiningTable> {
    const table = await withManager(this.dataSource, (manager) => new TableRepository(manager).findOne(id));
    if (!table) throw new NotFoundError("Table", id);
    return table;
  }

  async createTable(input: TableInput): Promise<DiningTable> {
    const table = await withTransaction(this.dataSource, async (manager) => {
      const tables = new TableRepository(manager);

      if (await tables.findByNumber(input.number)) {
        throw new ConflictError(`Table ${input.number} already exists! Please choose a different number.`);
      }

      const table = new DiningTable();
      table.number = input.number;
      table.capacity = input.capacity;
      table.is_occupied = false;
      return tables.save(table);
    });

    logger.info(`Table ${table.number} added`, { context: "tables", tableId: table.id });
    return table;
  }

  /**
   * Number and capacity only; occupancy follows the order workflow
   */
  async updateTable(id: number, input: TableUpdate): Promise<DiningTable> {
    return withTransaction(this.dataSource, async (manager) => {
      const tables = new TableRepository(manager);
      const table = await tables.findOne(id);
      if (!table) throw new NotFoundError("Table", id);

      if (input.number !== undefined && input.number !== table.number) {
        if (await tables.findByNumber(input.number, id)) {
          throw new ConflictError(`Table ${input.number} already exists! Please choose a different number.`);
        }
        table.number = input.number;
      }
      if (input.capacity !== undefined) {
        table.capacity = input.capacity;
      }
      return tables.save(table);
    });
  }

  /**
   * Refused while the table has active orders. Orders are never touched;
   * a table that only has finished orders keeps them and stays as well.
   */
  async deleteTable(id: number): Promise<void> {
    await withTransaction(this.dataSource, async (manager) => {
      const tables = new TableRepository(manager);
      const table = await tables.findOne(id);
      if (!table) throw new NotFoundError("Table", id);

      const activeOrders = await tables.countActiveOrders(id);
      if (activeOrders > 0) {
        throw new DeletionBlockedError(`Cannot delete table ${table.number}. It has active orders.`);
      }

      const pastOrders = await tables.countOrders(id);
      if (pastOrders > 0) {
        throw new DeletionBlockedError(
          `Cannot delete table ${table.number}. It has ${pastOrders} past order(s) on record.`
        );
      }

      await tables.delete(id);
    });

    logger.info("Table deleted", { context: "tables", tableId: id });
  }
}
