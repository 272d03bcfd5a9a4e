// ============================================
// ECS System Types
// ============================================

import type { World } from '@stationfall/shared';

/**
 * Base System interface
 * All simulation systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every simulation tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   */
  update(world: World, deltaTime: number): void;
}

export interface SystemTiming {
  name: string;
  ms: number;
}

/**
 * What one SystemRunner.update() call did
 */
export interface TickReport {
  totalMs: number;
  /** Per-system wall time, in run order */
  timings: SystemTiming[];
  /** Names of systems that threw this tick */
  failed: string[];
  /** totalMs exceeded ENGINE_CONFIG.TICK_BUDGET_MS */
  slow: boolean;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Patrol (hands out new targets)
 * 2. Pathfinding (search + steering)
 * 3. Physics (velocity integration, gravity)
 */
export const SystemPriority = {
  // AI decisions - before movement
  PATROL: 100,

  // Navigation - plans and steers toward waypoints
  PATHFINDING: 300,

  // Physics and forces
  PHYSICS: 500,
} as const;
