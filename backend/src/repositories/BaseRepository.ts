import { EntityManager, EntityTarget, Repository, FindOptionsWhere, ObjectLiteral } from "typeorm";

/**
 * Repositories are bound to the EntityManager they are given, so the same
 * class works against the DataSource manager or a transaction's manager.
 */
export abstract class BaseRepository<T extends ObjectLiteral & { id: number }> {
  protected repository: Repository<T>;

  constructor(protected readonly manager: EntityManager, entity: EntityTarget<T>) {
    this.repository = manager.getRepository(entity);
  }

  async findOne(id: number): Promise<T | null> {
    return this.repository.findOne({
      where: { id } as unknown as FindOptionsWhere<T>,
    });
  }

  async count(where?: FindOptionsWhere<T>): Promise<number> {
    return this.repository.count({ where });
  }

  async save(entity: T): Promise<T> {
    return this.repository.save(entity);
  }

  async delete(id: number): Promise<void> {
    await this.repository.delete(id);
  }
}
