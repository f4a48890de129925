/**
 * In-memory entity repository
 *
 * One flat Map per entity type, integer ids allocated in insertion order.
 * Entities are frozen on the way in; updates replace the stored version.
 */

import { NotFoundError } from '@strata/utils';
import type { EntityRepository } from '@strata/core';

export class InMemoryEntityRepository<T extends { readonly id: number }>
  implements EntityRepository<T>
{
  private readonly rows = new Map<number, T>();
  private nextId = 1;

  constructor(private readonly table: string) {}

  insert(create: (id: number) => T): T {
    const id = this.nextId++;
    const entity = create(id);
    if (entity.id !== id) {
      throw new RangeError(`${this.table}: created entity id ${entity.id} does not match allocated id ${id}`);
    }
    Object.freeze(entity);
    this.rows.set(id, entity);
    return entity;
  }

  get(id: number): T {
    const entity = this.rows.get(id);
    if (!entity) {
      throw new NotFoundError(this.table, id);
    }
    return entity;
  }

  find(id: number): T | null {
    return this.rows.get(id) ?? null;
  }

  update(id: number, patch: Partial<Omit<T, 'id'>>): T {
    const existing = this.get(id);
    const updated: T = { ...existing, ...patch, id };
    Object.freeze(updated);
    this.rows.set(id, updated);
    return updated;
  }

  where(predicate: (entity: T) => boolean): T[] {
    return this.all().filter(predicate);
  }

  all(): T[] {
    return [...this.rows.values()];
  }

  count(): number {
    return this.rows.size;
  }
}
