// ============================================
// Component Store
// Sparse-set storage, one store per component type
// ============================================

import { EcsInvariantError } from './errors';
import { sameEntity, type Entity } from './types';

const ABSENT = -1;

/**
 * Type-erased view of a component store.
 * ComponentManager holds every store behind this interface so that
 * entity-wide operations (despawn, clear, stats) need no knowledge of T.
 */
export interface ComponentStorage {
  /** Component class name, for diagnostics only */
  readonly typeName: string;
  readonly size: number;
  remove(entity: Entity): boolean;
  has(entity: Entity): boolean;
  clear(): void;
  entities(): readonly Entity[];
  validate(): void;
}

/**
 * ComponentStore - sparse set keyed by entity ID.
 *
 * sparse[id] holds the dense index for that ID (or ABSENT). dense and
 * denseEntities are parallel, packed arrays; removal swaps the last element
 * into the hole, so iteration order changes after a remove and callers must
 * not depend on it.
 *
 * Lookups compare the full handle stored in denseEntities, so a stale handle
 * never reaches a component that now belongs to a newer entity with the
 * same ID.
 */
export class ComponentStore<T> implements ComponentStorage {
  private sparse: number[] = [];
  private dense: T[] = [];
  private denseEntities: Entity[] = [];

  constructor(public readonly typeName: string = 'Component') {}

  /**
   * Insert or overwrite the component for an entity.
   * Returns true if the entity gained the component, false if an existing
   * component for the same handle was overwritten.
   */
  insert(entity: Entity, value: T): boolean {
    this.ensureSparse(entity.id);

    const index = this.sparse[entity.id];
    if (index !== ABSENT) {
      const previous = this.denseEntities[index];
      this.dense[index] = value;
      this.denseEntities[index] = entity;
      return !sameEntity(previous, entity);
    }

    this.sparse[entity.id] = this.dense.length;
    this.dense.push(value);
    this.denseEntities.push(entity);
    return true;
  }

  /**
   * Remove the component for an entity via swap-remove.
   */
  remove(entity: Entity): boolean {
    const index = this.indexOf(entity);
    if (index === ABSENT) return false;

    const last = this.dense.length - 1;
    if (index !== last) {
      const moved = this.denseEntities[last];
      this.dense[index] = this.dense[last];
      this.denseEntities[index] = moved;
      this.sparse[moved.id] = index;
    }

    this.dense.pop();
    this.denseEntities.pop();
    this.sparse[entity.id] = ABSENT;
    return true;
  }

  /**
   * Get the component for an entity.
   * Returns undefined if absent or if the handle's generation does not match.
   */
  get(entity: Entity): T | undefined {
    const index = this.indexOf(entity);
    return index === ABSENT ? undefined : this.dense[index];
  }

  has(entity: Entity): boolean {
    return this.indexOf(entity) !== ABSENT;
  }

  get size(): number {
    return this.dense.length;
  }

  /**
   * Live view of the entity handles, in dense order. Do not mutate.
   */
  entities(): readonly Entity[] {
    return this.denseEntities;
  }

  /**
   * Live view of the component values, in dense order. Do not mutate.
   */
  components(): readonly T[] {
    return this.dense;
  }

  /**
   * Iterate (entity, component) pairs in dense order.
   */
  *[Symbol.iterator](): IterableIterator<[Entity, T]> {
    for (let i = 0; i < this.dense.length; i++) {
      yield [this.denseEntities[i], this.dense[i]];
    }
  }

  clear(): void {
    this.sparse = [];
    this.dense = [];
    this.denseEntities = [];
  }

  /**
   * Check the sparse-set invariant. Throws EcsInvariantError if:
   * - dense and denseEntities differ in length
   * - any dense slot is not pointed to by its entity's sparse entry
   * - any sparse entry points outside the dense arrays or at another ID
   */
  validate(): void {
    if (this.dense.length !== this.denseEntities.length) {
      throw new EcsInvariantError(`${this.typeName}: dense arrays out of step`, {
        dense: this.dense.length,
        entities: this.denseEntities.length,
      });
    }

    for (let i = 0; i < this.denseEntities.length; i++) {
      const { id } = this.denseEntities[i];
      if (this.sparse[id] !== i) {
        throw new EcsInvariantError(`${this.typeName}: sparse entry does not point back to dense slot`, {
          id,
          denseIndex: i,
          sparseIndex: this.sparse[id],
        });
      }
    }

    let occupied = 0;
    for (let id = 0; id < this.sparse.length; id++) {
      const index = this.sparse[id];
      if (index === ABSENT) continue;
      occupied++;
      if (index < 0 || index >= this.denseEntities.length || this.denseEntities[index].id !== id) {
        throw new EcsInvariantError(`${this.typeName}: dangling sparse entry`, { id, index });
      }
    }

    if (occupied !== this.dense.length) {
      throw new EcsInvariantError(`${this.typeName}: occupied sparse slots do not match dense length`, {
        occupied,
        dense: this.dense.length,
      });
    }
  }

  private indexOf(entity: Entity): number {
    const { id } = entity;
    if (id < 0 || id >= this.sparse.length) return ABSENT;

    const index = this.sparse[id];
    if (index === ABSENT || !sameEntity(this.denseEntities[index], entity)) {
      return ABSENT;
    }
    return index;
  }

  // Sparse grows lazily; unseen IDs read as ABSENT
  private ensureSparse(id: number): void {
    if (id < this.sparse.length) return;
    const start = this.sparse.length;
    this.sparse.length = id + 1;
    this.sparse.fill(ABSENT, start);
  }
}
