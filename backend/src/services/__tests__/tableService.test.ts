import { DataSource } from "typeorm";
import { ConflictError, DeletionBlockedError, NotFoundError } from "../../errors.js";
import { OrderService } from "../OrderService.js";
import { TableService } from "../tableService.js";
import {
  clearDatabase,
  createTestDataSource,
  insertCategory,
  insertMenuItem,
  insertTable
} from "../../../tests/helpers/database.js";

describe("TableService", () => {
  let dataSource: DataSource;
  let tableService: TableService;

  const placeOrder = async (tableId: number) => {
    const category = await insertCategory(dataSource, "Mains");
    const menuItem = await insertMenuItem(dataSource, category, "Curry", 12);
    return new OrderService(dataSource).createOrder({
      tableId,
      customerName: "Ann",
      items: [{ menuItemId: menuItem.id, quantity: 1 }]
    });
  };

  beforeAll(async () => {
    dataSource = await createTestDataSource();
    tableService = new TableService(dataSource);
  });

  afterEach(async () => {
    await clearDatabase(dataSource);
  });

  afterAll(async () => {
    await dataSource.destroy();
  });

  it("should create a free table", async () => {
    const table = await tableService.createTable({ number: 0, capacity: 1 });
    expect(table.number).toBe(0);
    expect(table.capacity).toBe(1);
    expect(table.is_occupied).toBe(false);
  });

  it("should refuse a duplicate table number", async () => {
    await tableService.createTable({ number: 4, capacity: 2 });

    const attempt = tableService.createTable({ number: 4, capacity: 6 });

    await expect(attempt).rejects.toBeInstanceOf(ConflictError);
    await expect(attempt).rejects.toThrow("Table 4 already exists! Please choose a different number.");
  });

  it("should list tables by number and filter the free ones", async () => {
    await insertTable(dataSource, 3);
    const tableOne = await insertTable(dataSource, 1);
    await insertTable(dataSource, 2);
    await placeOrder(tableOne.id);

    const all = await tableService.listTables();
    const free = await tableService.listTables({ availableOnly: true });

    expect(all.map((table) => table.number)).toEqual([1, 2, 3]);
    expect(free.map((table) => table.number)).toEqual([2, 3]);
  });

  it("should update number and capacity but not occupancy", async () => {
    const table = await insertTable(dataSource, 1, 4);
    await placeOrder(table.id);

    const updated = await tableService.updateTable(table.id, { number: 7, capacity: 8 });

    expect(updated.number).toBe(7);
    expect(updated.capacity).toBe(8);
    expect(updated.is_occupied).toBe(true);
  });

  it("should refuse to renumber onto an existing table", async () => {
    await insertTable(dataSource, 1);
    const tableTwo = await insertTable(dataSource, 2);

    await expect(tableService.updateTable(tableTwo.id, { number: 1 })).rejects.toBeInstanceOf(ConflictError);
  });

  it("should refuse to delete a table with an active order", async () => {
    const table = await insertTable(dataSource, 5);
    await placeOrder(table.id);

    const attempt = tableService.deleteTable(table.id);

    await expect(attempt).rejects.toBeInstanceOf(DeletionBlockedError);
    await expect(attempt).rejects.toThrow("Cannot delete table 5. It has active orders.");
  });

  it.each(["preparing", "ready"])("should refuse to delete a table whose order is %s", async (status) => {
    const table = await insertTable(dataSource, 6);
    const order = await placeOrder(table.id);
    await new OrderService(dataSource).updateStatus(order.id, status);

    const attempt = tableService.deleteTable(table.id);

    await expect(attempt).rejects.toBeInstanceOf(DeletionBlockedError);
    await expect(attempt).rejects.toThrow("Cannot delete table 6. It has active orders.");
    await expect(tableService.getTable(table.id)).resolves.toMatchObject({ number: 6, is_occupied: true });
  });

  it("should refuse to delete a table with past orders", async () => {
    const table = await insertTable(dataSource, 5);
    const order = await placeOrder(table.id);
    await new OrderService(dataSource).updateStatus(order.id, "delivered");

    await expect(tableService.deleteTable(table.id)).rejects.toThrow(
      "Cannot delete table 5. It has 1 past order(s) on record."
    );
  });

  it("should delete an unused table", async () => {
    const table = await insertTable(dataSource, 5);
    await tableService.deleteTable(table.id);
    await expect(tableService.getTable(table.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
