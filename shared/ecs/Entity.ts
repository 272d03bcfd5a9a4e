// ============================================
// Entity Manager
// Allocates and recycles generational entity handles
// ============================================

import type { Entity, EntityId } from './types';

// Compact the free queue once this many slots have been consumed from its head
const FREE_QUEUE_COMPACT_THRESHOLD = 1024;

/**
 * EntityManager - owns the generation table and the free-ID queue.
 *
 * - New IDs start at generation 1.
 * - destroy() bumps the slot's generation before the ID is queued, so every
 *   handle issued for the old generation becomes permanently invalid.
 * - Freed IDs are reissued oldest-first (FIFO).
 */
export class EntityManager {
  private generations: number[] = [];
  private alive: boolean[] = [];
  private freeIds: EntityId[] = [];
  private freeHead = 0;
  private nextId = 0;

  /**
   * Create a new entity.
   * Reuses the oldest freed ID (at its already-bumped generation) if one is
   * queued, otherwise allocates a fresh ID at generation 1.
   */
  create(): Entity {
    if (this.freeHead < this.freeIds.length) {
      const id = this.freeIds[this.freeHead++];
      this.compactFreeQueue();
      this.alive[id] = true;
      return { id, generation: this.generations[id] };
    }

    const id = this.nextId++;
    this.generations[id] = 1;
    this.alive[id] = true;
    return { id, generation: 1 };
  }

  /**
   * Destroy an entity.
   * Returns false (and changes nothing) if the handle is already stale.
   */
  destroy(entity: Entity): boolean {
    if (!this.isValid(entity)) return false;

    this.generations[entity.id] += 1;
    this.alive[entity.id] = false;
    this.freeIds.push(entity.id);
    return true;
  }

  /**
   * Check whether a handle still refers to a living entity.
   */
  isValid(entity: Entity): boolean {
    const { id } = entity;
    if (!Number.isInteger(id) || id < 0 || id >= this.generations.length) {
      return false;
    }
    return this.alive[id] && this.generations[id] === entity.generation;
  }

  /**
   * Current generation for an ID, or undefined if the ID was never issued.
   */
  generation(id: EntityId): number | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= this.generations.length) {
      return undefined;
    }
    return this.generations[id];
  }

  /**
   * Number of distinct IDs ever allocated.
   */
  get totalCreated(): number {
    return this.nextId;
  }

  /**
   * Number of currently living entities.
   */
  get activeCount(): number {
    return this.nextId - (this.freeIds.length - this.freeHead);
  }

  /**
   * Handles of all living entities, in ID order.
   */
  aliveEntities(): Entity[] {
    const result: Entity[] = [];
    for (let id = 0; id < this.nextId; id++) {
      if (this.alive[id]) {
        result.push({ id, generation: this.generations[id] });
      }
    }
    return result;
  }

  /**
   * Destroy every living entity at once.
   * Live slots get a bumped generation and join the free queue in ID order,
   * behind any IDs already waiting, so no earlier handle becomes valid again.
   */
  reset(): void {
    for (let id = 0; id < this.nextId; id++) {
      if (!this.alive[id]) continue;
      this.generations[id] += 1;
      this.alive[id] = false;
      this.freeIds.push(id);
    }
  }

  private compactFreeQueue(): void {
    if (this.freeHead < FREE_QUEUE_COMPACT_THRESHOLD) return;
    this.freeIds = this.freeIds.slice(this.freeHead);
    this.freeHead = 0;
  }
}
