import { DataSource } from "typeorm";
import { z } from "zod";
import { withTransaction } from "../database.js";
import { Category } from "../entities/Category.js";
import { DiningTable } from "../entities/DiningTable.js";
import { MenuItem } from "../entities/MenuItem.js";
import { CategoryRepository } from "../repositories/CategoryRepository.js";
import { MenuItemRepository } from "../repositories/MenuItemRepository.js";
import { TableRepository } from "../repositories/TableRepository.js";
import * as logger from "../utils/logger.js";
import sampleDataJson from "../data/sample-data.json";

const sampleDataSchema = z.object({
  categories: z.array(z.object({ name: z.string().min(1), description: z.string() })),
  menuItems: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().min(1),
      price: z.number().positive(),
      category: z.string().min(1)
    })
  ),
  tables: z.array(
    z.object({
      number: z.number().int().min(0),
      capacity: z.number().int().min(1).max(20)
    })
  )
});

export type SampleData = z.infer<typeof sampleDataSchema>;

export interface SeedResult {
  categories: number;
  menuItems: number;
  tables: number;
}

export function loadSampleData(raw: unknown = sampleDataJson): SampleData {
  return sampleDataSchema.parse(raw);
}

/**
 * Insert the sample catalog and tables. Rows whose name (or table number)
 * already exists are skipped, so running it twice adds nothing.
 */
export async function seedSampleData(
  dataSource: DataSource,
  data: SampleData = loadSampleData()
): Promise<SeedResult> {
  const result = await withTransaction(dataSource, async (manager) => {
    const categories = new CategoryRepository(manager);
    const menuItems = new MenuItemRepository(manager);
    const tables = new TableRepository(manager);
    const created: SeedResult = { categories: 0, menuItems: 0, tables: 0 };

    for (const categoryData of data.categories) {
      if (await categories.findByName(categoryData.name)) continue;
      const category = new Category();
      category.name = categoryData.name;
      category.description = categoryData.description;
      await categories.save(category);
      created.categories++;
    }

    for (const itemData of data.menuItems) {
      if (await menuItems.findByName(itemData.name)) continue;
      const category = await categories.findByName(itemData.category);
      if (!category) {
        logger.warn(`Skipping sample menu item "${itemData.name}": no category "${itemData.category}"`, {
          context: "sampleData"
        });
        continue;
      }
      const menuItem = new MenuItem();
      menuItem.name = itemData.name;
      menuItem.description = itemData.description;
      menuItem.price = itemData.price;
      menuItem.category_id = category.id;
      menuItem.is_available = true;
      menuItem.image_url = null;
      await menuItems.save(menuItem);
      created.menuItems++;
    }

    for (const tableData of data.tables) {
      if (await tables.findByNumber(tableData.number)) continue;
      const table = new DiningTable();
      table.number = tableData.number;
      table.capacity = tableData.capacity;
      table.is_occupied = false;
      await tables.save(table);
      created.tables++;
    }

    return created;
  });

  logger.info("Sample data seeded", { context: "sampleData", data: result });
  return result;
}
