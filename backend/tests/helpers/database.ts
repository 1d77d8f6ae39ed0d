import { DataSource } from 'typeorm';
import { createDataSource, initializeDatabase } from '../../src/database.js';
import { Category } from '../../src/entities/Category.js';
import { DiningTable } from '../../src/entities/DiningTable.js';
import { MenuItem } from '../../src/entities/MenuItem.js';
import { entities } from '../../src/entities/index.js';

/**
 * Fresh in-memory SQLite database with the schema synchronised
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = createDataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    synchronize: true,
    dropSchema: true,
    logging: false,
    entities
  });
  return initializeDatabase(dataSource);
}

export async function clearDatabase(dataSource: DataSource): Promise<void> {
  await dataSource.query('DELETE FROM "order_items"');
  await dataSource.query('DELETE FROM "orders"');
  await dataSource.query('DELETE FROM "menu_items"');
  await dataSource.query('DELETE FROM "categories"');
  await dataSource.query('DELETE FROM "dining_tables"');
}

export async function insertTable(
  dataSource: DataSource,
  number: number,
  capacity = 4,
  isOccupied = false
): Promise<DiningTable> {
  const table = new DiningTable();
  table.number = number;
  table.capacity = capacity;
  table.is_occupied = isOccupied;
  return dataSource.manager.save(table);
}

export async function insertCategory(dataSource: DataSource, name: string): Promise<Category> {
  const category = new Category();
  category.name = name;
  category.description = null;
  return dataSource.manager.save(category);
}

export async function insertMenuItem(
  dataSource: DataSource,
  category: Category,
  name: string,
  price: number,
  isAvailable = true
): Promise<MenuItem> {
  const menuItem = new MenuItem();
  menuItem.name = name;
  menuItem.description = `${name} description`;
  menuItem.price = price;
  menuItem.category_id = category.id;
  menuItem.is_available = isAvailable;
  menuItem.image_url = null;
  return dataSource.manager.save(menuItem);
}
