import { Category } from '../category.entity';
import { CategoryRepository } from '../category.repository';

import { CategoryAlreadyExistsException } from '../../common/exceptions';

/**
 * Map-backed stand-in for the TypeORM repository. Enforces name uniqueness
 * the way the database constraint does.
 */
export class InMemoryCategoryRepository extends CategoryRepository {
  private readonly rows = new Map<number, Category>();
  private nextId = 1;

  async exists(name: string): Promise<boolean> {
    return [...this.rows.values()].some((row) => row.name === name);
  }

  async save(category: Category): Promise<Category> {
    if (await this.exists(category.name)) throw new CategoryAlreadyExistsException(category.name);

    const now = new Date();
    const saved = new Category({ ...category, id: this.nextId++, createdAt: now, updatedAt: now });
    this.rows.set(saved.id, saved);
    return new Category({ ...saved });
  }

  async findById(id: number): Promise<Category | null> {
    const row = this.rows.get(id);
    return row ? new Category({ ...row }) : null;
  }

  async findAll(): Promise<Category[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((row) => new Category({ ...row }));
  }

  /** Number of stored rows */
  get size(): number {
    return this.rows.size;
  }
}
