import { DataSource } from "typeorm";
import { withManager, withTransaction } from "../database.js";
import { Category } from "../entities/Category.js";
import { MenuItem } from "../entities/MenuItem.js";
import { OrderItem } from "../entities/OrderItem.js";
import { ConflictError, DeletionBlockedError, NotFoundError } from "../errors.js";
import { CategoryRepository } from "../repositories/CategoryRepository.js";
import { MenuItemRepository } from "../repositories/MenuItemRepository.js";
import * as logger from "../utils/logger.js";
import type { CategoryInput, MenuItemInput, MenuItemUpdate } from "../validation/schemas.js";

/**
 * Categories and menu items. Reads go through withManager, every write
 * runs in its own transaction.
 */
export class CatalogService {
  constructor(private readonly dataSource: DataSource) {}

  // ---- Categories ----

  async listCategories(): Promise<Category[]> {
    return withManager(this.dataSource, (manager) => new CategoryRepository(manager).findAllOrdered());
  }

  async getCategory(id: number): Promise<Category> {
    const category = await withManager(this.dataSource, (manager) => new CategoryRepository(manager).findOne(id));
    if (!category) throw new NotFoundError("Category", id);
    return category;
  }

  async createCategory(input: CategoryInput): Promise<Category> {
    const category = await withTransaction(this.dataSource, async (manager) => {
      const categories = new CategoryRepository(manager);

      if (await categories.findByName(input.name)) {
        throw new ConflictError(`Category "${input.name}" already exists!`);
      }

      const category = new Category();
      category.name = input.name;
      category.description = input.description;
      return categories.save(category);
    });

    logger.info("Category created", { context: "catalog", data: { id: category.id, name: category.name } });
    return category;
  }

  async updateCategory(id: number, input: Partial<CategoryInput>): Promise<Category> {
    return withTransaction(this.dataSource, async (manager) => {
      const categories = new CategoryRepository(manager);
      const category = await categories.findOne(id);
      if (!category) throw new NotFoundError("Category", id);

      if (input.name !== undefined && input.name !== category.name) {
        if (await categories.findByName(input.name, id)) {
          throw new ConflictError(`Category "${input.name}" already exists!`);
        }
        category.name = input.name;
      }
      if (input.description !== undefined) {
        category.description = input.description;
      }
      return categories.save(category);
    });
  }

  /**
   * Refused while the category still owns menu items
   */
  async deleteCategory(id: number): Promise<void> {
    await withTransaction(this.dataSource, async (manager) => {
      const categories = new CategoryRepository(manager);
      const category = await categories.findOne(id);
      if (!category) throw new NotFoundError("Category", id);

      const itemCount = await categories.countMenuItems(id);
      if (itemCount > 0) {
        throw new DeletionBlockedError(
          `Cannot delete category "${category.name}". It still has ${itemCount} menu item(s).`
        );
      }
      await categories.delete(id);
    });

    logger.info("Category deleted", { context: "catalog", data: { id } });
  }

  // ---- Menu items ----

  async listMenuItems(options: { availableOnly?: boolean } = {}): Promise<MenuItem[]> {
    return withManager(this.dataSource, (manager) => new MenuItemRepository(manager).findAllWithCategory(options));
  }

  async getMenuItem(id: number): Promise<MenuItem> {
    const menuItem = await withManager(this.dataSource, (manager) =>
      new MenuItemRepository(manager).findWithCategory(id)
    );
    if (!menuItem) throw new NotFoundError("Menu item", id);
    return menuItem;
  }

  async createMenuItem(input: MenuItemInput): Promise<MenuItem> {
    const id = await withTransaction(this.dataSource, async (manager) => {
      const categories = new CategoryRepository(manager);
      const menuItems = new MenuItemRepository(manager);

      if ((await categories.count()) === 0) {
        throw new ConflictError("Please create at least one category first!");
      }
      if (!(await categories.findOne(input.category_id))) {
        throw new NotFoundError("Category", input.category_id);
      }

      const menuItem = new MenuItem();
      menuItem.name = input.name;
      menuItem.description = input.description;
      menuItem.price = input.price;
      menuItem.category_id = input.category_id;
      menuItem.is_available = input.is_available;
      menuItem.image_url = input.image_url;
      const saved = await menuItems.save(menuItem);
      return saved.id;
    });

    logger.info("Menu item created", { context: "catalog", data: { id, name: input.name } });
    return this.getMenuItem(id);
  }

  /**
   * Price changes never reach existing order lines: they keep the
   * price captured when they were added.
   */
  async updateMenuItem(id: number, input: MenuItemUpdate): Promise<MenuItem> {
    await withTransaction(this.dataSource, async (manager) => {
      const categories = new CategoryRepository(manager);
      const menuItems = new MenuItemRepository(manager);
      const menuItem = await menuItems.findOne(id);
      if (!menuItem) throw new NotFoundError("Menu item", id);

      if (input.category_id !== undefined && !(await categories.findOne(input.category_id))) {
        throw new NotFoundError("Category", input.category_id);
      }

      if (input.name !== undefined) menuItem.name = input.name;
      if (input.description !== undefined) menuItem.description = input.description;
      if (input.price !== undefined) menuItem.price = input.price;
      if (input.category_id !== undefined) menuItem.category_id = input.category_id;
      if (input.is_available !== undefined) menuItem.is_available = input.is_available;
      if (input.image_url !== undefined) menuItem.image_url = input.image_url;
      await menuItems.save(menuItem);
    });

    return this.getMenuItem(id);
  }

  /**
   * Refused while any active order has a line for the item. Lines on
   * finished orders keep their captured name and price and lose the link.
   */
  async deleteMenuItem(id: number): Promise<void> {
    await withTransaction(this.dataSource, async (manager) => {
      const menuItems = new MenuItemRepository(manager);
      const menuItem = await menuItems.findOne(id);
      if (!menuItem) throw new NotFoundError("Menu item", id);

      const activeReferences = await menuItems.countActiveOrderReferences(id);
      if (activeReferences > 0) {
        throw new DeletionBlockedError(
          `Cannot delete menu item "${menuItem.name}". It is part of ${activeReferences} active order line(s).`
        );
      }

      await manager.getRepository(OrderItem).update({ menu_item_id: id }, { menu_item_id: null });
      await menuItems.delete(id);
    });

    logger.info("Menu item deleted", { context: "catalog", data: { id } });
  }
}
