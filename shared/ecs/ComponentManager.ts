// ============================================
// Component Manager
// Registry of per-type component stores
// ============================================

import { ComponentStore, type ComponentStorage } from './Component';
import type { ComponentType, Entity } from './types';

/**
 * ComponentManager - maps each component class to its store.
 *
 * Stores are created on first insert. The manager is the only owner of the
 * stores; World owns the manager.
 */
export class ComponentManager {
  private storages = new Map<ComponentType<unknown>, ComponentStorage>();

  /**
   * Register a component type, returning its store.
   * Registering an already-known type returns the existing store.
   */
  register<T>(type: ComponentType<T>): ComponentStore<T> {
    const existing = this.storage(type);
    if (existing) return existing;

    const store = new ComponentStore<T>(type.name);
    this.storages.set(type, store);
    return store;
  }

  /**
   * Typed store for a component type, or undefined if never registered.
   */
  storage<T>(type: ComponentType<T>): ComponentStore<T> | undefined {
    const store = this.storages.get(type);
    return store instanceof ComponentStore ? store : undefined;
  }

  add<T>(entity: Entity, type: ComponentType<T>, component: T): boolean {
    return this.register(type).insert(entity, component);
  }

  remove<T>(entity: Entity, type: ComponentType<T>): boolean {
    return this.storages.get(type)?.remove(entity) ?? false;
  }

  get<T>(entity: Entity, type: ComponentType<T>): T | undefined {
    return this.storage(type)?.get(entity);
  }

  has<T>(entity: Entity, type: ComponentType<T>): boolean {
    return this.storages.get(type)?.has(entity) ?? false;
  }

  /**
   * Remove every component an entity holds.
   * Visits every registered store; returns how many components were removed.
   */
  removeAll(entity: Entity): number {
    let removed = 0;
    for (const store of this.storages.values()) {
      if (store.remove(entity)) removed++;
    }
    return removed;
  }

  /**
   * Empty every store. Types stay registered.
   */
  clear(): void {
    for (const store of this.storages.values()) {
      store.clear();
    }
  }

  get typeCount(): number {
    return this.storages.size;
  }

  /**
   * Component count per type name.
   */
  sizes(): Record<string, number> {
    const sizes: Record<string, number> = {};
    for (const store of this.storages.values()) {
      sizes[store.typeName] = store.size;
    }
    return sizes;
  }

  /**
   * Run the sparse-set invariant check on every store.
   */
  validate(): void {
    for (const store of this.storages.values()) {
      store.validate();
    }
  }
}
