// ============================================
// ECS World
// ============================================

import { ComponentManager } from './ComponentManager';
import type { ComponentStore } from './Component';
import { EntityManager } from './Entity';
import { isComponentEnabled, type ComponentType, type Entity } from './types';

/**
 * World - the central ECS container and the only entry point callers use.
 *
 * Manages:
 * - Entity lifecycle (spawn, despawn, validity)
 * - Component storage (add, get, remove)
 * - Queries (entities holding 1-3 component types)
 * - Resources (singleton data not tied to entities)
 *
 * Every entity-scoped operation checks the handle first; a stale handle
 * yields false/undefined and never throws.
 */
export class World {
  private readonly entities = new EntityManager();
  private readonly components = new ComponentManager();

  // Resources - singleton data keyed by class (clock, map, config)
  private readonly resources = new Map<ComponentType<unknown>, unknown>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Start building a new entity.
   *
   * Example: world.spawn().with(Transform, new Transform(pos)).build()
   */
  spawn(): EntityBuilder {
    return new EntityBuilder(this, this.entities.create());
  }

  /**
   * Destroy an entity and purge all its components.
   * The generation is bumped first, so the handle is already invalid while
   * its components are being removed.
   */
  despawn(entity: Entity): boolean {
    if (!this.entities.destroy(entity)) return false;
    this.components.removeAll(entity);
    return true;
  }

  isValid(entity: Entity): boolean {
    return this.entities.isValid(entity);
  }

  /**
   * Handles of all living entities, in ID order.
   */
  aliveEntities(): Entity[] {
    return this.entities.aliveEntities();
  }

  get entityCount(): number {
    return this.entities.activeCount;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Add (or overwrite) a component.
   * Returns true if the entity gained the component, false if it was
   * overwritten or the handle is stale.
   */
  add<T>(entity: Entity, type: ComponentType<T>, component: T): boolean {
    if (!this.entities.isValid(entity)) return false;
    return this.components.add(entity, type, component);
  }

  remove<T>(entity: Entity, type: ComponentType<T>): boolean {
    if (!this.entities.isValid(entity)) return false;
    return this.components.remove(entity, type);
  }

  /**
   * Read a component. Use getMut() at sites that change it.
   */
  get<T>(entity: Entity, type: ComponentType<T>): Readonly<T> | undefined {
    if (!this.entities.isValid(entity)) return undefined;
    return this.components.get(entity, type);
  }

  /**
   * Get a component for modification.
   */
  getMut<T>(entity: Entity, type: ComponentType<T>): T | undefined {
    if (!this.entities.isValid(entity)) return undefined;
    return this.components.get(entity, type);
  }

  has<T>(entity: Entity, type: ComponentType<T>): boolean {
    if (!this.entities.isValid(entity)) return false;
    return this.components.has(entity, type);
  }

  /**
   * Should systems process this component?
   * True only if the entity is valid, holds the component, and the
   * component is not switched off through its `enabled` flag.
   */
  isProcessable<T extends object>(entity: Entity, type: ComponentType<T>): boolean {
    const component = this.get(entity, type);
    return component !== undefined && isComponentEnabled(component);
  }

  /**
   * Store for a component type, for direct dense iteration.
   * Undefined until the first component of that type is added.
   */
  storage<T>(type: ComponentType<T>): ComponentStore<T> | undefined {
    return this.components.storage(type);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * All entities holding component A.
   */
  query1<A>(a: ComponentType<A>): Array<[Entity, Readonly<A>]> {
    const store = this.components.storage(a);
    if (!store) return [];

    const result: Array<[Entity, Readonly<A>]> = [];
    for (const [entity, compA] of store) {
      if (this.entities.isValid(entity)) {
        result.push([entity, compA]);
      }
    }
    return result;
  }

  /**
   * All entities holding both A and B.
   * Walks the smaller store and filters by the other.
   */
  query2<A, B>(a: ComponentType<A>, b: ComponentType<B>): Array<[Entity, Readonly<A>, Readonly<B>]> {
    const driver = this.smallestStore([a, b]);
    if (!driver) return [];

    const result: Array<[Entity, Readonly<A>, Readonly<B>]> = [];
    for (const entity of driver.entities()) {
      if (!this.entities.isValid(entity)) continue;
      const compA = this.components.get(entity, a);
      const compB = this.components.get(entity, b);
      if (compA !== undefined && compB !== undefined) {
        result.push([entity, compA, compB]);
      }
    }
    return result;
  }

  /**
   * All entities holding A, B and C.
   */
  query3<A, B, C>(
    a: ComponentType<A>,
    b: ComponentType<B>,
    c: ComponentType<C>
  ): Array<[Entity, Readonly<A>, Readonly<B>, Readonly<C>]> {
    const driver = this.smallestStore([a, b, c]);
    if (!driver) return [];

    const result: Array<[Entity, Readonly<A>, Readonly<B>, Readonly<C>]> = [];
    for (const entity of driver.entities()) {
      if (!this.entities.isValid(entity)) continue;
      const compA = this.components.get(entity, a);
      const compB = this.components.get(entity, b);
      const compC = this.components.get(entity, c);
      if (compA !== undefined && compB !== undefined && compC !== undefined) {
        result.push([entity, compA, compB, compC]);
      }
    }
    return result;
  }

  /**
   * Query with callback - avoids tuple allocation for hot paths.
   *
   * Iterates a snapshot of the smallest store's handles and re-checks
   * validity and membership right before each callback, so the callback
   * may despawn entities or remove components safely.
   */
  queryEach(types: ReadonlyArray<ComponentType<unknown>>, callback: (entity: Entity) => void): void {
    const driver = this.smallestStore(types);
    if (!driver) return;

    const snapshot = driver.entities().slice();
    for (const entity of snapshot) {
      if (!this.entities.isValid(entity)) continue;
      if (types.every((type) => this.components.has(entity, type))) {
        callback(entity);
      }
    }
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  /**
   * Set a resource. Resources are class instances keyed by their class.
   */
  setResource<R extends object>(type: ComponentType<R>, value: R): void {
    this.resources.set(type, value);
  }

  getResource<R>(type: ComponentType<R>): R | undefined {
    const value = this.resources.get(type);
    return value instanceof type ? value : undefined;
  }

  hasResource<R>(type: ComponentType<R>): boolean {
    return this.resources.has(type);
  }

  removeResource<R>(type: ComponentType<R>): boolean {
    return this.resources.delete(type);
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Despawn every entity and drop all resources.
   * Component types stay registered. Handles issued before the clear stay
   * invalid even after their IDs are reused.
   */
  clear(): void {
    this.components.clear();
    this.entities.reset();
    this.resources.clear();
  }

  /**
   * Check every component store's sparse-set invariant.
   * Throws EcsInvariantError on corruption.
   */
  validate(): void {
    this.components.validate();
  }

  /**
   * Debug: get stats about the world.
   */
  getStats(): {
    entities: number;
    totalCreated: number;
    componentTypes: number;
    stores: Record<string, number>;
    resources: string[];
  } {
    return {
      entities: this.entities.activeCount,
      totalCreated: this.entities.totalCreated,
      componentTypes: this.components.typeCount,
      stores: this.components.sizes(),
      resources: Array.from(this.resources.keys(), (type) => type.name),
    };
  }

  // Undefined if any type has never been stored: nothing can match
  private smallestStore(types: ReadonlyArray<ComponentType<unknown>>): ComponentStore<unknown> | undefined {
    let smallest: ComponentStore<unknown> | undefined;
    for (const type of types) {
      const store = this.components.storage(type);
      if (!store) return undefined;
      if (!smallest || store.size < smallest.size) {
        smallest = store;
      }
    }
    return smallest;
  }
}

/**
 * EntityBuilder - attaches initial components to a freshly spawned entity.
 */
export class EntityBuilder {
  constructor(
    private readonly world: World,
    public readonly entity: Entity
  ) {}

  with<T>(type: ComponentType<T>, component: T): this {
    this.world.add(this.entity, type, component);
    return this;
  }

  build(): Entity {
    return this.entity;
  }
}
