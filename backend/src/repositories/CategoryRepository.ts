import { EntityManager, Not } from "typeorm";
import { Category } from "../entities/Category.js";
import { MenuItem } from "../entities/MenuItem.js";
import { BaseRepository } from "./BaseRepository.js";

export class CategoryRepository extends BaseRepository<Category> {
  constructor(manager: EntityManager) {
    super(manager, Category);
  }

  async findAllOrdered(): Promise<Category[]> {
    return this.repository.find({ order: { name: "ASC" } });
  }

  /**
   * Find a category by exact name, optionally ignoring one id (for edits)
   */
  async findByName(name: string, excludeId?: number): Promise<Category | null> {
    return this.repository.findOne({
      where: excludeId === undefined ? { name } : { name, id: Not(excludeId) }
    });
  }

  async countMenuItems(categoryId: number): Promise<number> {
    return this.manager.getRepository(MenuItem).count({ where: { category_id: categoryId } });
  }
}
